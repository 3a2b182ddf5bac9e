/**
 * Component Type Classification
 *
 * Maps a library identifier ("Device:R", "Connector_Generic:Conn_01x02")
 * and footprint to a canonical category.
 *
 * Precedence, evaluated top to bottom, first hit wins:
 * 1. CLASSIFICATION_RULES against the symbol name, then the library namespace
 * 2. FOOTPRINT_RULES against the footprint (package shapes imply an IC)
 * 3. CLASSIFICATION_RULES against the reference designator prefix ("R10" → "R")
 * 4. UNKNOWN
 *
 * Rule order matters: LED precedes the inductor rule so "LED" is never
 * read as "L", and the specific IC families (regulators, MCUs, op-amps)
 * precede the generic IC rule.
 */

import { ComponentCategory } from './types';

export interface ClassificationRule {
  readonly category: ComponentCategory;
  readonly pattern: RegExp;
}

/**
 * Applied to upper-cased symbol names, library namespaces and
 * reference prefixes.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { category: ComponentCategory.LED, pattern: /^LED(?:[_-].*)?$|^LED[A-Z]*$|_LED$/ },
  { category: ComponentCategory.RESISTOR, pattern: /^(?:R|RN|RES|RESISTOR)(?:[_-].*)?$|RESISTOR/ },
  { category: ComponentCategory.CAPACITOR, pattern: /^(?:C|CP|CAP|CAPACITOR)(?:[_-].*)?$|CAPACITOR/ },
  { category: ComponentCategory.INDUCTOR, pattern: /^(?:L|IND|INDUCTOR|FERRITE)(?:[_-].*)?$|INDUCTOR/ },
  { category: ComponentCategory.DIODE, pattern: /^(?:D|DIODE|ZENER|TVS)(?:[_-].*)?$|DIODE/ },
  { category: ComponentCategory.TRANSISTOR, pattern: /^(?:Q|TRANSISTOR|MOSFET)(?:[_-].*)?$|TRANSISTOR/ },
  { category: ComponentCategory.OSCILLATOR, pattern: /^(?:Y|X|XTAL|CRYSTAL)(?:[_-].*)?$|CRYSTAL|OSCILLATOR/ },
  { category: ComponentCategory.REGULATOR, pattern: /^(?:VR|LDO|VREG)(?:[_-].*)?$|REGULATOR/ },
  { category: ComponentCategory.MICROCONTROLLER, pattern: /^MCU(?:[_-].*)?$|MICROCONTROLLER/ },
  { category: ComponentCategory.ANALOG, pattern: /^(?:AMPLIFIER|OPAMP|COMPARATOR)(?:[_-].*)?$/ },
  { category: ComponentCategory.RELAY, pattern: /^(?:K|RLY|RELAY)(?:[_-].*)?$|RELAY/ },
  { category: ComponentCategory.SWITCH, pattern: /^(?:S|SW|BUTTON|SWITCH)(?:[_-].*)?$|SWITCH/ },
  { category: ComponentCategory.CONNECTOR, pattern: /^(?:J|P|CN|CONN)(?:[_-].*)?$|^CONN|CONNECTOR/ },
  { category: ComponentCategory.SILK_SCREEN, pattern: /^(?:LOGO|GRAPHIC|SILK)(?:[_-].*)?$/ },
  {
    category: ComponentCategory.INTEGRATED_CIRCUIT,
    pattern: /^(?:U|IC)(?:[_-].*)?$|^(?:INTERFACE|MEMORY|LOGIC|SENSOR|TIMER|DRIVER|POWER_MANAGEMENT|74XX|CMOS)(?:[_-].*)?$/,
  },
];

/**
 * Applied to the upper-cased footprint when the library id is inconclusive.
 */
export const FOOTPRINT_RULES: readonly ClassificationRule[] = [
  { category: ComponentCategory.LED, pattern: /(?:^|[:_-])LED(?:[_-]|$)/ },
  { category: ComponentCategory.RESISTOR, pattern: /RESISTOR|(?:^|[:_-])RES(?:[_-]|$)|(?:^|:)R_\d{4}/ },
  { category: ComponentCategory.CAPACITOR, pattern: /CAPACITOR|(?:^|[:_-])CAP(?:[_-]|$)|(?:^|:)C_\d{4}/ },
  { category: ComponentCategory.INDUCTOR, pattern: /INDUCTOR|(?:^|:)L_\d{4}/ },
  { category: ComponentCategory.DIODE, pattern: /DIODE/ },
  { category: ComponentCategory.OSCILLATOR, pattern: /CRYSTAL|OSCILLATOR/ },
  { category: ComponentCategory.SWITCH, pattern: /SWITCH|BUTTON/ },
  { category: ComponentCategory.CONNECTOR, pattern: /CONNECTOR|PIN_?HEADER|PIN_?SOCKET/ },
  {
    category: ComponentCategory.INTEGRATED_CIRCUIT,
    pattern: /(?:^|[^A-Z])(?:SOIC|SSOP|TSSOP|MSOP|QFN|DFN|QFP|LQFP|TQFP|BGA|WLCSP|PLCC|DIP)(?:[^A-Z]|$)/,
  },
];

function firstMatch(rules: readonly ClassificationRule[], tokens: readonly string[]): ComponentCategory | null {
  for (const rule of rules) {
    if (tokens.some((token) => token !== '' && rule.pattern.test(token))) {
      return rule.category;
    }
  }
  return null;
}

/**
 * Splits "Namespace:Symbol" into upper-cased [symbol, namespace].
 */
function libraryTokens(libraryId: string): string[] {
  const trimmed = (libraryId ?? '').trim().toUpperCase();
  const separator = trimmed.indexOf(':');
  if (separator === -1) return [trimmed];
  return [trimmed.slice(separator + 1), trimmed.slice(0, separator)];
}

/**
 * Leading alphabetic run of a reference designator ("R10" → "R", "LED3" → "LED").
 */
export function referencePrefix(reference: string): string {
  const match = /^([A-Za-z]+)/.exec((reference ?? '').trim());
  return match ? match[1].toUpperCase() : '';
}

/**
 * Classifies a component. A pure function of its arguments; unrecognized
 * input yields UNKNOWN rather than an error.
 *
 * @param libraryId - Namespaced symbol id (e.g., "Device:R")
 * @param footprint - Footprint name (e.g., "Package_SO:SOIC-8_3.9x4.9mm_P1.27mm")
 * @param reference - Optional reference designator, consulted last
 *
 * @example
 * classify('Device:LED', '')     // 'LED'
 * classify('Device:L', '')       // 'IND'
 * classify('Foo:Bar123', '')     // 'UNKNOWN'
 * classify('Foo:Bar123', '', 'R7') // 'RES'
 */
export function classify(libraryId: string, footprint: string, reference = ''): ComponentCategory {
  return (
    firstMatch(CLASSIFICATION_RULES, libraryTokens(libraryId)) ??
    firstMatch(FOOTPRINT_RULES, [(footprint ?? '').trim().toUpperCase()]) ??
    firstMatch(CLASSIFICATION_RULES, [referencePrefix(reference)]) ??
    ComponentCategory.UNKNOWN
  );
}

export default classify;
