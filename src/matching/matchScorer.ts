/**
 * Primary Filters and Suitability Scoring
 *
 * An inventory item is first put through three hard filters (category,
 * package, value). Items that pass are scored additively:
 *
 * - Type match: +50
 * - Value match: +40
 * - Package match: +30
 * - Tolerance: +15 exact, +12 when the item is tighter than required
 * - Voltage / current / power containment: +10 each, per category ratings
 * - Category-specific properties: +5 to +12
 * - Any other shared free-form property: +3
 *
 * There is no normalization or cap.
 */

import { CATEGORY_RATINGS, NON_SCORING_PROPERTIES, PROPERTY_ALIASES, SCORE_WEIGHTS } from './constants';
import type { PropertyName } from './constants';
import {
  categoryPropertyNames,
  containsText,
  extractCategoryProperties,
  lookupProperty,
  scoreCategoryProperties,
} from './categoryProperties';
import { toAnnotated } from './models';
import type { MatchSubject } from './models';
import { packageContains } from './packageExtractor';
import { ComponentCategory } from './types';
import type {
  AnnotatedComponent,
  InventoryItem,
  ParseOptions,
  ScoreLine,
  ScoreResult,
} from './types';
import { parseTolerance, valuesEqual } from './valueParser';

/**
 * Whether an inventory category field carries the component's category.
 * Always false for UNKNOWN.
 */
export function categoryMatches(category: ComponentCategory, inventoryCategory: string): boolean {
  if (category === ComponentCategory.UNKNOWN) return false;
  return (inventoryCategory ?? '').toUpperCase().includes(category);
}

// ============================================
// PRIMARY FILTERS
// ============================================

/**
 * Hard filters; any failure excludes the item.
 *
 * 1. Known category must appear in the item's category
 * 2. A package token, when present, must appear in the item's package
 * 3. A component value, when present, must equal the item's value
 */
export function passesPrimaryFilters(
  subject: MatchSubject,
  item: InventoryItem,
  options: ParseOptions = {}
): boolean {
  const annotated = toAnnotated(subject, options);
  const { category, packageToken, component } = annotated;

  if (category !== ComponentCategory.UNKNOWN && !categoryMatches(category, item.category)) {
    return false;
  }
  if (packageToken && !packageContains(item.package, packageToken)) {
    return false;
  }
  if (annotated.normalizedValue && !valuesEqual(category, component.value, item.value, options)) {
    return false;
  }
  return true;
}

// ============================================
// SCORING
// ============================================

function scoreTolerance(annotated: AnnotatedComponent, item: InventoryItem): ScoreLine | null {
  const required = annotated.requiredTolerance;
  const offered = parseTolerance(item.tolerance);
  if (required === null || offered === null) return null;

  if (offered === required) {
    return {
      rule: 'tolerance',
      points: SCORE_WEIGHTS.TOLERANCE_EXACT,
      detail: `Tolerance exact: +${SCORE_WEIGHTS.TOLERANCE_EXACT} (${offered}%)`,
    };
  }
  if (offered < required) {
    return {
      rule: 'tolerance',
      points: SCORE_WEIGHTS.TOLERANCE_BETTER,
      detail: `Tolerance tighter: +${SCORE_WEIGHTS.TOLERANCE_BETTER} (${offered}% < ${required}%)`,
    };
  }
  return null;
}

interface RatingRule {
  readonly rule: 'voltage' | 'current' | 'power';
  readonly label: string;
  readonly points: number;
  readonly offered: (item: InventoryItem) => string;
}

const RATING_RULES: readonly RatingRule[] = [
  { rule: 'voltage', label: 'Voltage', points: SCORE_WEIGHTS.VOLTAGE_MATCH, offered: (item) => item.voltage },
  { rule: 'current', label: 'Current', points: SCORE_WEIGHTS.CURRENT_MATCH, offered: (item) => item.amperage },
  { rule: 'power', label: 'Power', points: SCORE_WEIGHTS.POWER_MATCH, offered: (item) => item.wattage },
];

/** Property names handled by a dedicated rule, upper-cased */
function consumedPropertyKeys(annotated: AnnotatedComponent): Set<string> {
  const names: PropertyName[] = ['tolerance', 'voltage', 'current', 'power'];
  names.push(...categoryPropertyNames(annotated.categoryProperties));
  const keys = new Set<string>();
  for (const name of names) {
    for (const alias of PROPERTY_ALIASES[name]) keys.add(alias.toUpperCase());
  }
  return keys;
}

/**
 * +3 for each remaining component property whose text is contained in the
 * inventory attribute of the same name.
 */
function scoreGenericProperties(annotated: AnnotatedComponent, item: InventoryItem): ScoreLine[] {
  const consumed = consumedPropertyKeys(annotated);
  const lines: ScoreLine[] = [];

  for (const [name, value] of Object.entries(annotated.component.properties)) {
    const key = name.trim().toUpperCase();
    if (!value || !value.trim() || consumed.has(key) || NON_SCORING_PROPERTIES.has(key)) continue;

    const offered = Object.entries(item.attributes).find(([attribute]) => attribute.trim().toUpperCase() === key);
    if (offered && containsText(offered[1], value.trim())) {
      lines.push({
        rule: 'property',
        points: SCORE_WEIGHTS.GENERIC_PROPERTY,
        detail: `Property ${name}: +${SCORE_WEIGHTS.GENERIC_PROPERTY} (${value.trim()})`,
      });
    }
  }
  return lines;
}

/**
 * Scores an item, returning every contributing line. Call only for items
 * that pass the primary filters.
 */
export function scoreItem(subject: MatchSubject, item: InventoryItem, options: ParseOptions = {}): ScoreResult {
  const annotated = toAnnotated(subject, options);
  const { category, component, packageToken } = annotated;
  const ratings = CATEGORY_RATINGS[category];
  const breakdown: ScoreLine[] = [];

  if (categoryMatches(category, item.category)) {
    breakdown.push({
      rule: 'type',
      points: SCORE_WEIGHTS.TYPE_MATCH,
      detail: `Type match: +${SCORE_WEIGHTS.TYPE_MATCH} (${category} in ${item.category})`,
    });
  }

  if (component.value && valuesEqual(category, component.value, item.value, options)) {
    breakdown.push({
      rule: 'value',
      points: SCORE_WEIGHTS.VALUE_MATCH,
      detail: `Value match: +${SCORE_WEIGHTS.VALUE_MATCH} (${component.value} = ${item.value})`,
    });
  }

  if (packageToken && packageContains(item.package, packageToken)) {
    breakdown.push({
      rule: 'package',
      points: SCORE_WEIGHTS.PACKAGE_MATCH,
      detail: `Package match: +${SCORE_WEIGHTS.PACKAGE_MATCH} (${packageToken} in ${item.package})`,
    });
  }

  if (ratings.tolerance) {
    const line = scoreTolerance(annotated, item);
    if (line) breakdown.push(line);
  }

  for (const rating of RATING_RULES) {
    if (!ratings[rating.rule]) continue;
    const wanted = lookupProperty(component.properties, rating.rule);
    if (wanted && containsText(rating.offered(item), wanted)) {
      breakdown.push({
        rule: rating.rule,
        points: rating.points,
        detail: `${rating.label} match: +${rating.points} (${wanted})`,
      });
    }
  }

  breakdown.push(
    ...scoreCategoryProperties(
      annotated.categoryProperties,
      extractCategoryProperties(category, item.attributes)
    )
  );
  breakdown.push(...scoreGenericProperties(annotated, item));

  return {
    score: breakdown.reduce((total, line) => total + line.points, 0),
    breakdown,
  };
}

/**
 * Total suitability score of an item for a component.
 */
export function score(subject: MatchSubject, item: InventoryItem, options: ParseOptions = {}): number {
  return scoreItem(subject, item, options).score;
}

/**
 * One-line summary of a scored item, as attached to debug results.
 *
 * @example
 * "IPN: R-001, Score: 120, Priority: 1, Type match: +50 (RES in RES), Value match: +40 (10K = 10K), ..."
 */
export function formatScoreTrace(item: InventoryItem, result: ScoreResult): string {
  const head = `IPN: ${item.ipn}, Score: ${result.score}, Priority: ${item.priority}`;
  if (result.breakdown.length === 0) return head;
  return `${head}, ${result.breakdown.map((line) => line.detail).join(', ')}`;
}
