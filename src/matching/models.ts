/**
 * Component and Inventory Models
 *
 * Factories for the engine's inputs, and the per-component annotation
 * (category, package token, parsed value, tolerance intent) shared by the
 * scorer, engine and diagnostics.
 */

import { DEFAULT_PRIORITY, PRECISION_THRESHOLD } from './constants';
import { extractCategoryProperties, lookupProperty } from './categoryProperties';
import { extractPackage } from './packageExtractor';
import { classify } from './typeClassifier';
import { ComponentCategory } from './types';
import type { AnnotatedComponent, Component, InventoryItem, ParseOptions } from './types';
import {
  hasExplicitPrecision,
  normalizeValue,
  parseQuantity,
  parseTolerance,
  quantityForCategory,
} from './valueParser';

// ============================================
// FACTORIES
// ============================================

export type ComponentInput = Partial<Component> & Pick<Component, 'reference'>;

export function createComponent(input: ComponentInput): Component {
  return {
    reference: input.reference,
    libraryId: input.libraryId ?? '',
    value: input.value ?? '',
    footprint: input.footprint ?? '',
    properties: { ...(input.properties ?? {}) },
  };
}

/**
 * Maps a priority field to a finite integer. Anything that is not an
 * integer (empty, "high", 1.5, NaN) becomes DEFAULT_PRIORITY.
 *
 * @example
 * normalizePriority('1')   // 1
 * normalizePriority('')    // 99
 * normalizePriority(null)  // 99
 */
export function normalizePriority(value: number | string | null | undefined): number {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : DEFAULT_PRIORITY;
  }
  const trimmed = (value ?? '').trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return DEFAULT_PRIORITY;
  return Number.parseInt(trimmed, 10);
}

export type InventoryItemInput = Omit<Partial<InventoryItem>, 'priority'> &
  Pick<InventoryItem, 'ipn'> & {
    readonly priority?: number | string | null;
  };

export function createInventoryItem(input: InventoryItemInput): InventoryItem {
  return {
    ipn: input.ipn,
    category: input.category ?? '',
    value: input.value ?? '',
    package: input.package ?? '',
    tolerance: input.tolerance ?? '',
    voltage: input.voltage ?? '',
    amperage: input.amperage ?? '',
    wattage: input.wattage ?? '',
    manufacturer: input.manufacturer ?? '',
    manufacturerPartNumber: input.manufacturerPartNumber ?? '',
    distributorId: input.distributorId ?? '',
    description: input.description ?? '',
    smd: input.smd ?? '',
    priority: normalizePriority(input.priority),
    attributes: { ...(input.attributes ?? {}) },
  };
}

// ============================================
// ANNOTATION
// ============================================

/**
 * Derives the facts every later stage works from. Never throws:
 * unparseable values and tolerances come back as null.
 */
export function annotateComponent(component: Component, options: ParseOptions = {}): AnnotatedComponent {
  const category = classify(component.libraryId, component.footprint, component.reference);
  const quantity = quantityForCategory(category);
  const numericValue = quantity ? parseQuantity(quantity, component.value, options) : null;
  const precisionIntent =
    category === ComponentCategory.RESISTOR && hasExplicitPrecision(component.value);

  const toleranceText = lookupProperty(component.properties, 'tolerance');
  const statedTolerance = toleranceText ? parseTolerance(toleranceText) : null;

  return {
    component,
    category,
    packageToken: extractPackage(component.footprint),
    normalizedValue: normalizeValue(component.value),
    numericValue,
    precisionIntent,
    requiredTolerance: statedTolerance ?? (precisionIntent ? PRECISION_THRESHOLD : null),
    categoryProperties: extractCategoryProperties(category, component.properties),
  };
}

/** Operations accept a raw component or one already annotated */
export type MatchSubject = Component | AnnotatedComponent;

export function isAnnotated(subject: MatchSubject): subject is AnnotatedComponent {
  return 'component' in subject;
}

export function toAnnotated(subject: MatchSubject, options: ParseOptions = {}): AnnotatedComponent {
  return isAnnotated(subject) ? subject : annotateComponent(subject, options);
}

/**
 * True when a resistor calls for 1%-class precision, by notation or by a
 * stated tolerance.
 */
export function impliesPrecision(annotated: AnnotatedComponent): boolean {
  if (annotated.category !== ComponentCategory.RESISTOR) return false;
  return (
    annotated.precisionIntent ||
    (annotated.requiredTolerance !== null && annotated.requiredTolerance <= PRECISION_THRESHOLD)
  );
}
