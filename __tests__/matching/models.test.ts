/**
 * Tests for Component and Inventory Models
 */

import {
  annotateComponent,
  createComponent,
  createInventoryItem,
  impliesPrecision,
  normalizePriority,
  toAnnotated,
} from '../../src/matching/models';
import { ComponentCategory } from '../../src/matching/types';

describe('createComponent', () => {
  it('should fill missing fields with empty values', () => {
    expect(createComponent({ reference: 'R1' })).toEqual({
      reference: 'R1',
      libraryId: '',
      value: '',
      footprint: '',
      properties: {},
    });
  });
});

describe('normalizePriority', () => {
  it('should parse integer text', () => {
    expect(normalizePriority('1')).toBe(1);
    expect(normalizePriority(' 5 ')).toBe(5);
    expect(normalizePriority(3)).toBe(3);
  });

  it('should map missing or non-integer priorities to 99', () => {
    expect(normalizePriority('')).toBe(99);
    expect(normalizePriority(undefined)).toBe(99);
    expect(normalizePriority(null)).toBe(99);
    expect(normalizePriority('high')).toBe(99);
    expect(normalizePriority('1.5')).toBe(99);
    expect(normalizePriority(Number.NaN)).toBe(99);
  });
});

describe('createInventoryItem', () => {
  it('should default priority to 99, never 0', () => {
    const item = createInventoryItem({ ipn: 'R-001' });

    expect(item.priority).toBe(99);
    expect(item.category).toBe('');
    expect(item.smd).toBe('');
    expect(item.attributes).toEqual({});
  });

  it('should normalize text priorities', () => {
    expect(createInventoryItem({ ipn: 'R-001', priority: '2' }).priority).toBe(2);
  });
});

describe('annotateComponent', () => {
  it('should annotate a precision resistor', () => {
    const annotated = annotateComponent(
      createComponent({
        reference: 'R1',
        libraryId: 'Device:R',
        value: '10K0',
        footprint: 'Resistor_SMD:R_0603_1608Metric',
      })
    );

    expect(annotated.category).toBe(ComponentCategory.RESISTOR);
    expect(annotated.packageToken).toBe('0603');
    expect(annotated.normalizedValue).toBe('10k0');
    expect(annotated.numericValue).toBe(10000);
    expect(annotated.precisionIntent).toBe(true);
    expect(annotated.requiredTolerance).toBe(1);
    expect(annotated.categoryProperties).toEqual({ kind: 'none' });
  });

  it('should prefer a stated tolerance over precision notation', () => {
    const annotated = annotateComponent(
      createComponent({ reference: 'R2', libraryId: 'Device:R', value: '10K0', properties: { Tolerance: '0.5%' } })
    );

    expect(annotated.requiredTolerance).toBe(0.5);
  });

  it('should leave tolerance empty for suffix notation', () => {
    const annotated = annotateComponent(createComponent({ reference: 'R3', libraryId: 'Device:R', value: '4.7k' }));

    expect(annotated.precisionIntent).toBe(false);
    expect(annotated.requiredTolerance).toBeNull();
  });

  it('should require 1% for two-digit letter-as-decimal values', () => {
    const annotated = annotateComponent(createComponent({ reference: 'R4', libraryId: 'Device:R', value: '4K7' }));

    expect(annotated.precisionIntent).toBe(true);
    expect(annotated.requiredTolerance).toBe(1);
  });

  it('should only flag precision notation on resistors', () => {
    const annotated = annotateComponent(createComponent({ reference: 'U1', libraryId: 'Foo:10K0', value: '10K0' }));

    expect(annotated.category).toBe(ComponentCategory.INTEGRATED_CIRCUIT);
    expect(annotated.precisionIntent).toBe(false);
    expect(annotated.numericValue).toBeNull();
  });

  it('should fall back to the reference designator for the category', () => {
    const annotated = annotateComponent(createComponent({ reference: 'C4', libraryId: 'Foo:Bar123', value: '100nF' }));

    expect(annotated.category).toBe(ComponentCategory.CAPACITOR);
    expect(annotated.numericValue).toBe(1e-7);
  });

  it('should honour legacy bare unit options', () => {
    const component = createComponent({ reference: 'C1', libraryId: 'Device:C', value: '0.1' });

    expect(annotateComponent(component).numericValue).toBe(1e-7);
    expect(annotateComponent(component, { legacyBareUnits: false }).numericValue).toBeNull();
  });

  it('should extract category properties from component properties', () => {
    const annotated = annotateComponent(
      createComponent({ reference: 'D1', libraryId: 'Device:LED', value: 'Red', properties: { Wavelength: '625nm' } })
    );

    expect(annotated.categoryProperties).toEqual({
      kind: 'led',
      wavelength: '625nm',
      intensity: undefined,
      angle: undefined,
    });
  });
});

describe('toAnnotated', () => {
  it('should return an annotated component unchanged', () => {
    const annotated = annotateComponent(createComponent({ reference: 'R1', libraryId: 'Device:R', value: '1K' }));

    expect(toAnnotated(annotated)).toBe(annotated);
  });

  it('should annotate a raw component', () => {
    expect(toAnnotated(createComponent({ reference: 'R1', libraryId: 'Device:R' })).category).toBe(
      ComponentCategory.RESISTOR
    );
  });
});

describe('impliesPrecision', () => {
  const annotate = (value: string, properties: Record<string, string> = {}, libraryId = 'Device:R') =>
    annotateComponent(createComponent({ reference: 'R1', libraryId, value, properties }));

  it('should be true for precision notation or a tolerance of 1% or less', () => {
    expect(impliesPrecision(annotate('10K0'))).toBe(true);
    expect(impliesPrecision(annotate('10K', { Tolerance: '1%' }))).toBe(true);
    expect(impliesPrecision(annotate('10K', { Tolerance: '0.1%' }))).toBe(true);
  });

  it('should be false for looser tolerances', () => {
    expect(impliesPrecision(annotate('10K'))).toBe(false);
    expect(impliesPrecision(annotate('10K', { Tolerance: '5%' }))).toBe(false);
  });

  it('should be false for non-resistors', () => {
    expect(impliesPrecision(annotate('100nF', { Tolerance: '1%' }, 'Device:C'))).toBe(false);
  });
});
