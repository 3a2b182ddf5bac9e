/**
 * Part Matching Engine
 *
 * Pure, deterministic matching of schematic components against an
 * inventory of stocked parts:
 * - Value parsing and EIA formatting (resistance, capacitance, inductance)
 * - Category classification and package token extraction
 * - Primary filters, additive scoring and priority ordering
 * - No-match diagnostics
 *
 * Usage:
 * ```typescript
 * import { MatchEngine, createComponent } from './matching';
 *
 * const engine = new MatchEngine(inventory, { verbose: true });
 * const [best] = engine.findMatches(createComponent({ reference: 'R1', libraryId: 'Device:R', value: '10K' }));
 * ```
 */

// Engine
export { MatchEngine, compareMatches } from './matchEngine';
export type { ResolvedEngineOptions } from './matchEngine';

// Scoring and diagnostics
export { passesPrimaryFilters, scoreItem, score, formatScoreTrace, categoryMatches } from './matchScorer';
export { analyze, renderDiagnostic, pluralize } from './diagnosticAnalyzer';

// Annotation and models
export {
  annotateComponent,
  createComponent,
  createInventoryItem,
  impliesPrecision,
  normalizePriority,
  toAnnotated,
} from './models';
export type { ComponentInput, InventoryItemInput, MatchSubject } from './models';

// Building blocks
export {
  parseResistance,
  parseCapacitance,
  parseInductance,
  parseQuantity,
  parseTolerance,
  hasExplicitPrecision,
  formatResistanceEia,
  formatCapacitance,
  formatInductance,
  formatValueForDisplay,
  normalizeValue,
  valuesEqual,
} from './valueParser';
export { classify, referencePrefix, CLASSIFICATION_RULES, FOOTPRINT_RULES } from './typeClassifier';
export { extractPackage, packageContains, PACKAGE_PATTERNS } from './packageExtractor';
export { extractCategoryProperties, scoreCategoryProperties, lookupProperty } from './categoryProperties';

// Constants
export {
  DEFAULT_PRIORITY,
  PRECISION_THRESHOLD,
  SCORE_WEIGHTS,
  VALUE_EPSILON,
  CATEGORY_RATINGS,
  CATEGORY_DISPLAY_NAMES,
} from './constants';

// Types
export { ComponentCategory } from './types';
export type {
  Component,
  InventoryItem,
  AnnotatedComponent,
  CategoryProperties,
  ValueQuantity,
  ScoreLine,
  ScoreResult,
  MatchResult,
  MatchWarning,
  ComponentMatchReport,
  MatchGroup,
  GroupedResults,
  Diagnostic,
  DiagnosticIssue,
  DiagnosticFormat,
  ParseOptions,
  MatchEngineOptions,
} from './types';
