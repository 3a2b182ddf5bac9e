/**
 * Constants for the Part Matching Engine
 *
 * These values define the behavior of the filter and scoring stages.
 */

import { ComponentCategory } from './types';

// ============================================
// PRIORITY
// ============================================

/**
 * Priority of an inventory item without an explicit ranking.
 * Lower priorities are preferred, so unranked items sort last.
 */
export const DEFAULT_PRIORITY = 99;

// ============================================
// VALUE COMPARISON
// ============================================

/**
 * Absolute tolerances for numeric value equality.
 * These absorb floating-point rounding only, not component tolerance.
 */
export const VALUE_EPSILON = {
  resistance: 1e-12,
  capacitance: 1e-18,
  inductance: 1e-18,
} as const;

/**
 * Tolerance (percent) at or below which a resistor counts as precision.
 */
export const PRECISION_THRESHOLD = 1.0;

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Points awarded per matching criterion. Scores are purely additive.
 *
 * Example (10K 0603 resistor asking for 1%, inventory item 10K 0603 1%):
 * - 50 type + 40 value + 30 package + 15 tolerance = 135
 */
export const SCORE_WEIGHTS = {
  TYPE_MATCH: 50,
  VALUE_MATCH: 40,
  PACKAGE_MATCH: 30,
  TOLERANCE_EXACT: 15,
  /** Inventory tolerance is tighter than required */
  TOLERANCE_BETTER: 12,
  VOLTAGE_MATCH: 10,
  CURRENT_MATCH: 10,
  POWER_MATCH: 10,
  LED_WAVELENGTH: 8,
  LED_INTENSITY: 8,
  LED_ANGLE: 5,
  OSC_FREQUENCY: 12,
  OSC_STABILITY: 8,
  OSC_LOAD: 5,
  CON_PITCH: 10,
  MCU_FAMILY: 8,
  GENERIC_PROPERTY: 3,
} as const;

// ============================================
// PROPERTY NAMES
// ============================================

/**
 * Component property names read for each rating, in lookup order.
 */
export const PROPERTY_ALIASES = {
  tolerance: ['Tolerance'],
  voltage: ['Voltage', 'V'],
  current: ['A', 'Amperage', 'Current'],
  power: ['W', 'Power', 'Wattage', 'P'],
  wavelength: ['Wavelength'],
  intensity: ['mcd', 'Intensity'],
  angle: ['Angle'],
  frequency: ['Frequency'],
  stability: ['Stability'],
  load: ['Load'],
  pitch: ['Pitch'],
  family: ['Family'],
  datasheet: ['Datasheet'],
} as const;

export type PropertyName = keyof typeof PROPERTY_ALIASES;

/**
 * Component properties never compared by the generic property bonus.
 */
export const NON_SCORING_PROPERTIES: ReadonlySet<string> = new Set([
  'REFERENCE',
  'VALUE',
  'FOOTPRINT',
  'DATASHEET',
  'DESCRIPTION',
]);

// ============================================
// CATEGORY RATINGS
// ============================================

export interface CategoryRatings {
  readonly tolerance: boolean;
  readonly voltage: boolean;
  readonly current: boolean;
  readonly power: boolean;
}

const ratings = (...names: Array<keyof CategoryRatings>): CategoryRatings => ({
  tolerance: names.includes('tolerance'),
  voltage: names.includes('voltage'),
  current: names.includes('current'),
  power: names.includes('power'),
});

/**
 * Which electrical ratings are meaningful for parts of each category.
 * Rating bonuses only apply where the category carries the rating.
 */
export const CATEGORY_RATINGS: Readonly<Record<ComponentCategory, CategoryRatings>> = {
  [ComponentCategory.RESISTOR]: ratings('tolerance', 'voltage', 'power'),
  [ComponentCategory.CAPACITOR]: ratings('tolerance', 'voltage'),
  [ComponentCategory.INDUCTOR]: ratings('current', 'power'),
  [ComponentCategory.DIODE]: ratings('voltage', 'current'),
  [ComponentCategory.LED]: ratings('voltage', 'current'),
  [ComponentCategory.INTEGRATED_CIRCUIT]: ratings('voltage'),
  [ComponentCategory.MICROCONTROLLER]: ratings(),
  [ComponentCategory.TRANSISTOR]: ratings('voltage', 'current', 'power'),
  [ComponentCategory.CONNECTOR]: ratings(),
  [ComponentCategory.SWITCH]: ratings(),
  [ComponentCategory.RELAY]: ratings(),
  [ComponentCategory.REGULATOR]: ratings('voltage', 'current', 'power'),
  [ComponentCategory.OSCILLATOR]: ratings(),
  [ComponentCategory.ANALOG]: ratings('voltage'),
  [ComponentCategory.SILK_SCREEN]: ratings(),
  [ComponentCategory.UNKNOWN]: ratings('tolerance', 'voltage', 'current', 'power'),
};

// ============================================
// DISPLAY NAMES
// ============================================

export const CATEGORY_DISPLAY_NAMES: Readonly<Record<ComponentCategory, string>> = {
  [ComponentCategory.RESISTOR]: 'Resistor',
  [ComponentCategory.CAPACITOR]: 'Capacitor',
  [ComponentCategory.INDUCTOR]: 'Inductor',
  [ComponentCategory.DIODE]: 'Diode',
  [ComponentCategory.LED]: 'LED',
  [ComponentCategory.INTEGRATED_CIRCUIT]: 'IC',
  [ComponentCategory.MICROCONTROLLER]: 'Microcontroller',
  [ComponentCategory.TRANSISTOR]: 'Transistor',
  [ComponentCategory.CONNECTOR]: 'Connector',
  [ComponentCategory.SWITCH]: 'Switch',
  [ComponentCategory.RELAY]: 'Relay',
  [ComponentCategory.REGULATOR]: 'Regulator',
  [ComponentCategory.OSCILLATOR]: 'Oscillator',
  [ComponentCategory.ANALOG]: 'Analog IC',
  [ComponentCategory.SILK_SCREEN]: 'Silkscreen graphic',
  [ComponentCategory.UNKNOWN]: 'Unknown',
};

/** Lowercase plural-able names for console diagnostics ("No resistors ...") */
export const CATEGORY_FRIENDLY_NAMES: Readonly<Record<ComponentCategory, string>> = {
  [ComponentCategory.RESISTOR]: 'resistor',
  [ComponentCategory.CAPACITOR]: 'capacitor',
  [ComponentCategory.INDUCTOR]: 'inductor',
  [ComponentCategory.DIODE]: 'diode',
  [ComponentCategory.LED]: 'LED',
  [ComponentCategory.INTEGRATED_CIRCUIT]: 'IC',
  [ComponentCategory.MICROCONTROLLER]: 'microcontroller',
  [ComponentCategory.TRANSISTOR]: 'transistor',
  [ComponentCategory.CONNECTOR]: 'connector',
  [ComponentCategory.SWITCH]: 'switch',
  [ComponentCategory.RELAY]: 'relay',
  [ComponentCategory.REGULATOR]: 'regulator',
  [ComponentCategory.OSCILLATOR]: 'oscillator',
  [ComponentCategory.ANALOG]: 'analog IC',
  [ComponentCategory.SILK_SCREEN]: 'silkscreen graphic',
  [ComponentCategory.UNKNOWN]: 'part',
};
