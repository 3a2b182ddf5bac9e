/**
 * Category-Specific Properties
 *
 * LEDs, oscillators, connectors and MCUs/ICs carry extra fields that help
 * pick between otherwise equal parts. Each family gets its own variant of
 * the CategoryProperties union, read from component properties or
 * inventory attributes, and scored by an exhaustive switch.
 */

import { PROPERTY_ALIASES, SCORE_WEIGHTS } from './constants';
import type { PropertyName } from './constants';
import { ComponentCategory } from './types';
import type { CategoryProperties, ScoreLine } from './types';

/**
 * Case-insensitive lookup of the first non-empty field among a property's aliases.
 */
export function lookupProperty(
  fields: Readonly<Record<string, string>>,
  name: PropertyName
): string | undefined {
  const aliases: readonly string[] = PROPERTY_ALIASES[name];
  for (const alias of aliases) {
    const wanted = alias.toUpperCase();
    for (const [key, value] of Object.entries(fields)) {
      if (key.trim().toUpperCase() === wanted && value && value.trim()) {
        return value.trim();
      }
    }
  }
  return undefined;
}

/**
 * Reads the variant relevant to a category from a field map.
 */
export function extractCategoryProperties(
  category: ComponentCategory,
  fields: Readonly<Record<string, string>>
): CategoryProperties {
  switch (category) {
    case ComponentCategory.LED:
      return {
        kind: 'led',
        wavelength: lookupProperty(fields, 'wavelength'),
        intensity: lookupProperty(fields, 'intensity'),
        angle: lookupProperty(fields, 'angle'),
      };
    case ComponentCategory.OSCILLATOR:
      return {
        kind: 'oscillator',
        frequency: lookupProperty(fields, 'frequency'),
        stability: lookupProperty(fields, 'stability'),
        load: lookupProperty(fields, 'load'),
      };
    case ComponentCategory.CONNECTOR:
      return { kind: 'connector', pitch: lookupProperty(fields, 'pitch') };
    case ComponentCategory.MICROCONTROLLER:
    case ComponentCategory.INTEGRATED_CIRCUIT:
      return { kind: 'family', family: lookupProperty(fields, 'family') };
    default:
      return { kind: 'none' };
  }
}

/**
 * Property names consumed by a variant, so the generic bonus skips them.
 */
export function categoryPropertyNames(properties: CategoryProperties): readonly PropertyName[] {
  switch (properties.kind) {
    case 'led':
      return ['wavelength', 'intensity', 'angle'];
    case 'oscillator':
      return ['frequency', 'stability', 'load'];
    case 'connector':
      return ['pitch'];
    case 'family':
      return ['family'];
    case 'none':
      return [];
  }
}

/** Wanted text is contained in the offered text, ignoring case */
export function containsText(offered: string | undefined, wanted: string | undefined): boolean {
  if (!offered || !wanted) return false;
  return offered.toLowerCase().includes(wanted.toLowerCase());
}

function bonus(
  lines: ScoreLine[],
  label: string,
  wanted: string | undefined,
  offered: string | undefined,
  points: number
): void {
  if (containsText(offered, wanted)) {
    lines.push({ rule: 'category', points, detail: `${label} match: +${points} (${wanted ?? ''})` });
  }
}

/**
 * Scores a component's category properties against an inventory item's.
 * Both sides must be the same variant; anything else scores nothing.
 */
export function scoreCategoryProperties(
  wanted: CategoryProperties,
  offered: CategoryProperties
): ScoreLine[] {
  const lines: ScoreLine[] = [];

  switch (wanted.kind) {
    case 'led':
      if (offered.kind !== 'led') break;
      bonus(lines, 'Wavelength', wanted.wavelength, offered.wavelength, SCORE_WEIGHTS.LED_WAVELENGTH);
      bonus(lines, 'Intensity', wanted.intensity, offered.intensity, SCORE_WEIGHTS.LED_INTENSITY);
      bonus(lines, 'Angle', wanted.angle, offered.angle, SCORE_WEIGHTS.LED_ANGLE);
      break;
    case 'oscillator':
      if (offered.kind !== 'oscillator') break;
      bonus(lines, 'Frequency', wanted.frequency, offered.frequency, SCORE_WEIGHTS.OSC_FREQUENCY);
      bonus(lines, 'Stability', wanted.stability, offered.stability, SCORE_WEIGHTS.OSC_STABILITY);
      bonus(lines, 'Load', wanted.load, offered.load, SCORE_WEIGHTS.OSC_LOAD);
      break;
    case 'connector':
      if (offered.kind !== 'connector') break;
      bonus(lines, 'Pitch', wanted.pitch, offered.pitch, SCORE_WEIGHTS.CON_PITCH);
      break;
    case 'family':
      if (offered.kind !== 'family') break;
      bonus(lines, 'Family', wanted.family, offered.family, SCORE_WEIGHTS.MCU_FAMILY);
      break;
    case 'none':
      break;
  }

  return lines;
}
