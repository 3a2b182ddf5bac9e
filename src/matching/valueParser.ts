/**
 * Electrical Value Parsing and EIA Formatting
 *
 * Component values arrive in several dialects: plain decimals ("330"),
 * suffix notation ("22k", "100nF") and EIA letter-as-decimal-point
 * notation ("4K7", "3R3", "4n7").
 *
 * Every parse function applies the same fallback order:
 * 1. Clean the text: trim, drop unit symbols and spaces, fold µ/μ to u
 * 2. Letter-as-decimal-point notation ("2K2" → 2200)
 * 3. Decimal with an optional multiplier suffix ("4.7k" → 4700)
 * 4. Bare decimal in the quantity's default unit
 * 5. null - no exception, no substituted default
 *
 * Scaling is done on decimal text ("2.2e3") rather than by multiplying
 * doubles, so "100n" and "0.1u" parse to the identical number.
 */

import logger from '../utils/logger';
import { PRECISION_THRESHOLD, VALUE_EPSILON } from './constants';
import { ComponentCategory } from './types';
import type { AnnotatedComponent, ParseOptions, ValueQuantity } from './types';

// ============================================
// Shared helpers
// ============================================

const RESISTANCE_EXPONENT: Readonly<Record<string, number>> = { R: 0, K: 3, M: 6 };
const SUBUNIT_EXPONENT: Readonly<Record<string, number>> = { p: -12, n: -9, u: -6, m: -3 };

/** Applies a power-of-ten exponent to decimal text without binary rounding error */
function scaleDecimal(decimalText: string, exponent: number): number | null {
  const value = Number(`${decimalText}e${exponent}`);
  return Number.isFinite(value) ? value : null;
}

function roundSignificant(value: number, digits: number): number {
  return Number(value.toPrecision(digits));
}

// ============================================
// Resistance
// ============================================

const EIA_RESISTANCE = /^(\d*)([RKM])(\d+)$/;
const SUFFIX_RESISTANCE = /^(\d*\.?\d+)([RKM]?)$/;
const PRECISION_NOTATION = /^\d+[RKM]\d+$/;

function cleanResistance(text: string): string {
  return text
    .trim()
    .replace(/ohms?|[\u03A9\u03C9\u2126]/gi, '')
    .replace(/\s+/g, '')
    .toUpperCase();
}

/**
 * Parses a resistance into ohms.
 *
 * @example
 * parseResistance('4K7')  // 4700
 * parseResistance('3R3')  // 3.3
 * parseResistance('22k')  // 22000
 * parseResistance('10K0') // 10000
 * parseResistance('abc')  // null
 */
export function parseResistance(text: string): number | null {
  if (!text) return null;
  const cleaned = cleanResistance(text);

  const eia = EIA_RESISTANCE.exec(cleaned);
  if (eia) {
    const [, whole, unit, fraction] = eia;
    return scaleDecimal(`${whole || '0'}.${fraction}`, RESISTANCE_EXPONENT[unit]);
  }

  const suffix = SUFFIX_RESISTANCE.exec(cleaned);
  if (suffix) {
    const [, digits, unit] = suffix;
    return scaleDecimal(digits, RESISTANCE_EXPONENT[unit || 'R']);
  }

  return null;
}

/**
 * True when a resistance is written with a digit after the unit letter
 * ("10K0", "4K7", "3R3", "1M5"), which marks the value as a precision part.
 * Suffix and plain notations ("10K", "4.7k", "4700") carry no such intent.
 */
export function hasExplicitPrecision(text: string): boolean {
  if (!text) return false;
  return PRECISION_NOTATION.test(cleanResistance(text));
}

// ============================================
// Capacitance and inductance
// ============================================

function cleanSubunitValue(text: string): string {
  return text.trim().toLowerCase().replace(/[\u00B5\u03BC]/g, 'u').replace(/\s+/g, '');
}

/**
 * Parses values written with p/n/u/m multipliers and a one-letter unit
 * ("f" for farads, "h" for henries).
 */
function parseSubunitValue(text: string, unitLetter: 'f' | 'h', options: ParseOptions): number | null {
  if (!text) return null;
  const cleaned = cleanSubunitValue(text);

  const eia = new RegExp(`^(\\d+)([pnum])(\\d+)${unitLetter}?$`).exec(cleaned);
  if (eia) {
    const [, whole, unit, fraction] = eia;
    return scaleDecimal(`${whole}.${fraction}`, SUBUNIT_EXPONENT[unit]);
  }

  const suffix = new RegExp(`^(\\d*\\.?\\d+)([pnum])${unitLetter}?$`).exec(cleaned);
  if (suffix) {
    const [, digits, unit] = suffix;
    return scaleDecimal(digits, SUBUNIT_EXPONENT[unit]);
  }

  const baseUnit = new RegExp(`^(\\d*\\.?\\d+)${unitLetter}$`).exec(cleaned);
  if (baseUnit) {
    return scaleDecimal(baseUnit[1], 0);
  }

  const bare = /^(\d*\.?\d+)$/.exec(cleaned);
  if (bare && options.legacyBareUnits !== false) {
    return scaleDecimal(bare[1], SUBUNIT_EXPONENT.u);
  }

  return null;
}

/**
 * Parses a capacitance into farads.
 * Bare numbers read as microfarads unless `legacyBareUnits` is false,
 * in which case they are rejected.
 *
 * @example
 * parseCapacitance('100nF') // 1e-7
 * parseCapacitance('4u7')   // 4.7e-6
 * parseCapacitance('0.1')   // 1e-7
 */
export function parseCapacitance(text: string, options: ParseOptions = {}): number | null {
  return parseSubunitValue(text, 'f', options);
}

/**
 * Parses an inductance into henries.
 * Bare numbers read as microhenries unless `legacyBareUnits` is false.
 */
export function parseInductance(text: string, options: ParseOptions = {}): number | null {
  return parseSubunitValue(text, 'h', options);
}

export function parseQuantity(
  quantity: ValueQuantity,
  text: string,
  options: ParseOptions = {}
): number | null {
  switch (quantity) {
    case 'resistance':
      return parseResistance(text);
    case 'capacitance':
      return parseCapacitance(text, options);
    case 'inductance':
      return parseInductance(text, options);
  }
}

// ============================================
// Formatting
// ============================================

interface UnitScale {
  readonly factor: number;
  readonly letter: string;
  /** Whole values at this scale may take a trailing precision zero */
  readonly precisionDigit: boolean;
}

const RESISTANCE_SCALES: readonly UnitScale[] = [
  { factor: 1e6, letter: 'M', precisionDigit: true },
  { factor: 1e3, letter: 'K', precisionDigit: true },
  { factor: 1, letter: 'R', precisionDigit: false },
];

const CAPACITANCE_SCALES: readonly UnitScale[] = [
  { factor: 1e-6, letter: 'u', precisionDigit: true },
  { factor: 1e-9, letter: 'n', precisionDigit: true },
  { factor: 1e-12, letter: 'p', precisionDigit: true },
];

const INDUCTANCE_SCALES: readonly UnitScale[] = [
  { factor: 1e-3, letter: 'm', precisionDigit: true },
  { factor: 1e-6, letter: 'u', precisionDigit: true },
  { factor: 1e-9, letter: 'n', precisionDigit: true },
];

/**
 * Writes a value with the unit letter standing in for the decimal point,
 * using the largest scale the value reaches (the last scale otherwise).
 */
function formatWithUnitLetter(
  value: number,
  scales: readonly UnitScale[],
  forcePrecisionDigit: boolean,
  unitSuffix: string
): string {
  const rounded = roundSignificant(value, 3);
  const scale = scales.find((candidate) => rounded >= candidate.factor) ?? scales[scales.length - 1];
  const text = String(roundSignificant(rounded / scale.factor, 3));

  if (text.includes('.')) {
    return `${text.replace('.', scale.letter)}${unitSuffix}`;
  }
  return `${text}${scale.letter}${forcePrecisionDigit && scale.precisionDigit ? '0' : ''}${unitSuffix}`;
}

/**
 * Formats ohms in EIA notation: 3R3, 330R, 4K7, 10K, 1M5, 0R22.
 * With `forcePrecisionDigit`, whole kilo and mega values keep a trailing
 * zero (10K0); ohm values do not (330R).
 *
 * @returns "" for negative or non-finite input
 */
export function formatResistanceEia(ohms: number, forcePrecisionDigit = false): string {
  if (!Number.isFinite(ohms) || ohms < 0) return '';
  if (ohms === 0) return '0R';

  const rounded = roundSignificant(ohms, 3);
  if (rounded < 1) {
    const text = String(roundSignificant(rounded, 2));
    return text.includes('.') ? text.replace('.', 'R') : `${text}R`;
  }
  return formatWithUnitLetter(rounded, RESISTANCE_SCALES, forcePrecisionDigit, '');
}

/**
 * Formats farads as 100nF, 4u7F, 22pF.
 */
export function formatCapacitance(farads: number, forcePrecisionDigit = false): string {
  if (!Number.isFinite(farads) || farads < 0) return '';
  return formatWithUnitLetter(farads, CAPACITANCE_SCALES, forcePrecisionDigit, 'F');
}

/**
 * Formats henries as 10uH, 2m2H, 100nH.
 */
export function formatInductance(henries: number, forcePrecisionDigit = false): string {
  if (!Number.isFinite(henries) || henries < 0) return '';
  return formatWithUnitLetter(henries, INDUCTANCE_SCALES, forcePrecisionDigit, 'H');
}

// ============================================
// Normalization and comparison
// ============================================

/**
 * Normalizes free-text values for string comparison:
 * lowercase, unit symbols stripped, µ folded to u, whitespace removed.
 *
 * @example
 * normalizeValue(' 3.3 V ') // "3.3v"
 * normalizeValue('10 kΩ')   // "10k"
 */
export function normalizeValue(text: string): string {
  if (!text) return '';
  return text
    .trim()
    .toLowerCase()
    .replace(/ohm|[\u03A9\u03C9\u2126]/g, '')
    .replace(/[\u00B5\u03BC]/g, 'u')
    .replace(/\s+/g, '');
}

/**
 * The quantity a category's value field expresses, if it is numeric.
 */
export function quantityForCategory(category: ComponentCategory): ValueQuantity | null {
  switch (category) {
    case ComponentCategory.RESISTOR:
      return 'resistance';
    case ComponentCategory.CAPACITOR:
      return 'capacitance';
    case ComponentCategory.INDUCTOR:
      return 'inductance';
    default:
      return null;
  }
}

export function numericValuesEqual(quantity: ValueQuantity, left: number, right: number): boolean {
  return Math.abs(left - right) <= VALUE_EPSILON[quantity];
}

/**
 * Compares a component value with an inventory value the way the
 * filters do: numerically for resistors, capacitors and inductors,
 * by normalized text otherwise. Unparseable or empty values never match.
 */
export function valuesEqual(
  category: ComponentCategory,
  left: string,
  right: string,
  options: ParseOptions = {}
): boolean {
  if (!left || !right) return false;

  const quantity = quantityForCategory(category);
  if (quantity) {
    const leftValue = parseQuantity(quantity, left, options);
    const rightValue = parseQuantity(quantity, right, options);
    return leftValue !== null && rightValue !== null && numericValuesEqual(quantity, leftValue, rightValue);
  }

  const normalized = normalizeValue(left);
  return normalized !== '' && normalized === normalizeValue(right);
}

// ============================================
// Tolerance
// ============================================

const TOLERANCE_PATTERN = /^(?:±|\+\/-|\+-)?\s*(\d*\.?\d+)\s*%?$/;

/**
 * Parses "±5%", "5%", "+/-1 %" or "0.1" into a percentage.
 * Malformed text is ignored (logged at debug level) and yields null.
 */
export function parseTolerance(text: string): number | null {
  const trimmed = (text ?? '').trim();
  if (!trimmed) return null;

  const match = TOLERANCE_PATTERN.exec(trimmed);
  if (!match) {
    logger.debug(`Ignoring malformed tolerance "${trimmed}"`);
    return null;
  }
  return Number(match[1]);
}

// ============================================
// Display
// ============================================

/**
 * Formats an annotated component's value for BOM display: EIA notation for
 * resistors (keeping the precision digit when 1% is implied), capacitors
 * and inductors; the raw value for everything else or when unparseable.
 */
export function formatValueForDisplay(annotated: AnnotatedComponent): string {
  const { category, numericValue, component } = annotated;
  if (numericValue === null) return component.value;

  switch (category) {
    case ComponentCategory.RESISTOR: {
      const precise =
        annotated.precisionIntent ||
        (annotated.requiredTolerance !== null && annotated.requiredTolerance <= PRECISION_THRESHOLD);
      return formatResistanceEia(numericValue, precise);
    }
    case ComponentCategory.CAPACITOR:
      return formatCapacitance(numericValue);
    case ComponentCategory.INDUCTOR:
      return formatInductance(numericValue);
    default:
      return component.value;
  }
}
