/**
 * Type Definitions for the Part Matching Engine
 *
 * These types define the input/output contracts for the matching engine.
 * The engine is pure and deterministic - no file, network or database access.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * A placed design element as read from a schematic.
 * Immutable once constructed by the upstream reader.
 */
export interface Component {
  /** Unique reference designator (e.g., "R10") */
  readonly reference: string;
  /** Namespaced symbol identifier (e.g., "Device:R") */
  readonly libraryId: string;
  /** Free-text value as entered by the designer (e.g., "10K0", "100nF") */
  readonly value: string;
  /** Free-text footprint name (e.g., "Resistor_SMD:R_0603_1608Metric") */
  readonly footprint: string;
  /** Additional symbol fields (e.g., "Tolerance" → "1%") */
  readonly properties: Readonly<Record<string, string>>;
}

/**
 * A catalog entry from the stocked/sourceable parts list.
 */
export interface InventoryItem {
  /** Internal part number, the inventory's primary key */
  readonly ipn: string;
  readonly category: string;
  readonly value: string;
  readonly package: string;
  readonly tolerance: string;
  readonly voltage: string;
  readonly amperage: string;
  readonly wattage: string;
  readonly manufacturer: string;
  readonly manufacturerPartNumber: string;
  /** Distributor stock code (e.g., an LCSC number) */
  readonly distributorId: string;
  readonly description: string;
  /** Surface-mount marker as stocked ("SMD", "PTH", "Y", ...), free text */
  readonly smd: string;
  /** Lower is more desirable; 99 means no explicit priority */
  readonly priority: number;
  /** Every column of the source row, including category-specific fields */
  readonly attributes: Readonly<Record<string, string>>;
}

// ============================================
// CLASSIFICATION TYPES
// ============================================

/**
 * Canonical component categories. The code is what inventory
 * category columns carry (e.g., "RES", "CAP").
 */
export const ComponentCategory = {
  RESISTOR: 'RES',
  CAPACITOR: 'CAP',
  INDUCTOR: 'IND',
  DIODE: 'DIO',
  LED: 'LED',
  INTEGRATED_CIRCUIT: 'IC',
  MICROCONTROLLER: 'MCU',
  TRANSISTOR: 'Q',
  CONNECTOR: 'CON',
  SWITCH: 'SWI',
  RELAY: 'RLY',
  REGULATOR: 'REG',
  OSCILLATOR: 'OSC',
  ANALOG: 'ANA',
  SILK_SCREEN: 'SLK',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ComponentCategory = (typeof ComponentCategory)[keyof typeof ComponentCategory];

/** Physical quantity carried by a component's value, where it has one */
export type ValueQuantity = 'resistance' | 'capacitance' | 'inductance';

/**
 * Category-specific properties, one variant per category family.
 * Fields hold the raw text of the matching property, when present.
 */
export type CategoryProperties =
  | {
      readonly kind: 'led';
      readonly wavelength?: string;
      readonly intensity?: string;
      readonly angle?: string;
    }
  | {
      readonly kind: 'oscillator';
      readonly frequency?: string;
      readonly stability?: string;
      readonly load?: string;
    }
  | { readonly kind: 'connector'; readonly pitch?: string }
  | { readonly kind: 'family'; readonly family?: string }
  | { readonly kind: 'none' };

/**
 * Facts derived once per component and shared by scorer, engine and
 * diagnostics.
 */
export interface AnnotatedComponent {
  readonly component: Component;
  readonly category: ComponentCategory;
  /** Package token extracted from the footprint ("" when none) */
  readonly packageToken: string;
  /** Lowercased, unit-stripped value used for non-numeric comparison */
  readonly normalizedValue: string;
  /** SI value for resistors, capacitors and inductors; null otherwise or when unparseable */
  readonly numericValue: number | null;
  /** True when the value notation signals explicit precision (e.g. "10K0") */
  readonly precisionIntent: boolean;
  /** Tolerance in percent the design calls for, if any */
  readonly requiredTolerance: number | null;
  readonly categoryProperties: CategoryProperties;
}

// ============================================
// SCORING TYPES
// ============================================

export type ScoreRule =
  | 'type'
  | 'value'
  | 'package'
  | 'tolerance'
  | 'voltage'
  | 'current'
  | 'power'
  | 'category'
  | 'property';

/**
 * One line of a score calculation, kept for transparency and debug traces.
 */
export interface ScoreLine {
  readonly rule: ScoreRule;
  readonly points: number;
  readonly detail: string;
}

export interface ScoreResult {
  readonly score: number;
  readonly breakdown: readonly ScoreLine[];
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * A scored inventory candidate for one component.
 */
export interface MatchResult {
  readonly item: InventoryItem;
  readonly score: number;
  readonly priority: number;
  /** Position of the item in the inventory, the final tiebreaker */
  readonly inventoryIndex: number;
  readonly breakdown: readonly ScoreLine[];
  readonly debugTrace?: string;
}

export type MatchWarningKind = 'PRECISION_UNAVAILABLE';

export interface MatchWarning {
  readonly kind: MatchWarningKind;
  readonly message: string;
}

/**
 * Everything the engine knows about one component's match.
 */
export interface ComponentMatchReport {
  readonly annotated: AnnotatedComponent;
  /** All candidates, ordered by priority, score, then inventory order */
  readonly candidates: readonly MatchResult[];
  readonly best: MatchResult | null;
  /** Tied alternates (verbose mode only) */
  readonly alternates: readonly MatchResult[];
  /** Number of candidates sharing the best candidate's priority, best included */
  readonly tiedCount: number;
  readonly notes: readonly string[];
  readonly warnings: readonly MatchWarning[];
  /** Present only when there is no candidate */
  readonly diagnostic: Diagnostic | null;
}

/**
 * Components sharing a best match (or, unmatched, a raw value and footprint).
 */
export interface MatchGroup {
  readonly key: string;
  readonly components: readonly Component[];
  readonly report: ComponentMatchReport;
}

export type GroupedResults = Map<string, MatchGroup>;

// ============================================
// DIAGNOSTIC TYPES
// ============================================

export type DiagnosticIssue =
  | { readonly kind: 'TYPE_UNKNOWN' }
  | { readonly kind: 'NO_TYPE_MATCH'; readonly category: ComponentCategory }
  | { readonly kind: 'NO_VALUE_MATCH'; readonly category: ComponentCategory; readonly value: string }
  | {
      readonly kind: 'PACKAGE_MISMATCH';
      readonly value: string;
      readonly requiredPackage: string;
      readonly availablePackages: readonly string[];
    }
  | { readonly kind: 'PACKAGE_MISMATCH_GENERIC'; readonly requiredPackage: string }
  | { readonly kind: 'NO_MATCH' };

export interface Diagnostic {
  readonly component: {
    readonly reference: string;
    readonly libraryId: string;
    readonly value: string;
    readonly footprint: string;
  };
  readonly analysis: {
    readonly category: ComponentCategory;
    readonly packageToken: string;
    readonly normalizedValue: string;
  };
  readonly issue: DiagnosticIssue;
}

export type DiagnosticFormat = 'terse' | 'verbose';

// ============================================
// OPTIONS
// ============================================

export interface ParseOptions {
  /** Read bare capacitance/inductance numbers as micro-units instead of rejecting them */
  readonly legacyBareUnits?: boolean;
}

export interface MatchEngineOptions extends ParseOptions {
  /** Surface tied alternates and tie notes */
  readonly verbose?: boolean;
  /** Attach score traces to results */
  readonly debug?: boolean;
  /** Upper bound on alternates surfaced in verbose mode */
  readonly maxAlternates?: number;
}
