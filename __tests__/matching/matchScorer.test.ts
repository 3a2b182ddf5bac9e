/**
 * Tests for Primary Filters and Scoring
 *
 * Weights: type 50, value 40, package 30, tolerance 15 exact / 12 tighter,
 * V/A/W 10 each, generic property 3.
 */

import {
  passesPrimaryFilters,
  scoreItem,
  score,
  formatScoreTrace,
  categoryMatches,
} from '../../src/matching/matchScorer';
import { annotateComponent, createComponent, createInventoryItem } from '../../src/matching/models';
import type { ComponentInput, InventoryItemInput } from '../../src/matching/models';
import { ComponentCategory } from '../../src/matching/types';
import type { Component, InventoryItem } from '../../src/matching/types';

describe('matchScorer', () => {
  // ============================================
  // Test fixtures
  // ============================================

  const createResistor = (value = '10K', properties: Record<string, string> = {}): Component =>
    createComponent({
      reference: 'R1',
      libraryId: 'Device:R',
      value,
      footprint: 'Resistor_SMD:R_0603_1608Metric',
      properties,
    });

  const createItem = (overrides: Partial<InventoryItemInput> = {}): InventoryItem =>
    createInventoryItem({
      ipn: 'R-001',
      category: 'RES',
      value: '10K',
      package: '0603',
      tolerance: '5%',
      priority: 1,
      ...overrides,
    });

  const component = (input: ComponentInput): Component => createComponent(input);

  // ============================================
  // Primary filters
  // ============================================

  describe('passesPrimaryFilters', () => {
    it('should pass an item matching category, package and value', () => {
      expect(passesPrimaryFilters(createResistor(), createItem())).toBe(true);
    });

    it('should accept an annotated component', () => {
      expect(passesPrimaryFilters(annotateComponent(createResistor()), createItem())).toBe(true);
    });

    it('should reject a different category', () => {
      expect(passesPrimaryFilters(createResistor(), createItem({ category: 'CAP' }))).toBe(false);
    });

    it('should match the category as a case-insensitive substring', () => {
      expect(passesPrimaryFilters(createResistor(), createItem({ category: 'smd res' }))).toBe(true);
    });

    it('should reject a different package', () => {
      expect(passesPrimaryFilters(createResistor(), createItem({ package: '0805' }))).toBe(false);
    });

    it('should reject a different value', () => {
      expect(passesPrimaryFilters(createResistor(), createItem({ value: '4K7' }))).toBe(false);
    });

    it('should reject unparseable inventory values instead of throwing', () => {
      expect(passesPrimaryFilters(createResistor(), createItem({ value: 'abc' }))).toBe(false);
      expect(passesPrimaryFilters(createResistor('n/a'), createItem())).toBe(false);
    });

    it('should compare numerically across notations', () => {
      expect(passesPrimaryFilters(createResistor('10K0'), createItem({ value: '10000' }))).toBe(true);
    });

    it('should not constrain what the component leaves empty', () => {
      const unknown = component({ reference: 'H1', libraryId: 'Foo:Bar123' });

      expect(passesPrimaryFilters(unknown, createItem({ category: 'CAP', package: '', value: '' }))).toBe(true);
    });

    it('should skip the value filter for components without a value', () => {
      expect(passesPrimaryFilters(createResistor(''), createItem({ value: '4K7' }))).toBe(true);
    });
  });

  // ============================================
  // Scoring
  // ============================================

  describe('scoreItem', () => {
    it('should add type, value and package points', () => {
      const result = scoreItem(createResistor(), createItem());

      expect(result.score).toBe(120);
      expect(result.breakdown.map((line) => line.rule)).toEqual(['type', 'value', 'package']);
      expect(result.breakdown.map((line) => line.detail)).toEqual([
        'Type match: +50 (RES in RES)',
        'Value match: +40 (10K = 10K)',
        'Package match: +30 (0603 in 0603)',
      ]);
    });

    it('should award 15 for an exact tolerance', () => {
      expect(score(createResistor('10K', { Tolerance: '5%' }), createItem({ tolerance: '5%' }))).toBe(135);
    });

    it('should award 12 for a tighter tolerance', () => {
      expect(score(createResistor('10K', { Tolerance: '5%' }), createItem({ tolerance: '1%' }))).toBe(132);
    });

    it('should award nothing for a looser tolerance', () => {
      expect(score(createResistor('10K', { Tolerance: '5%' }), createItem({ tolerance: '10%' }))).toBe(120);
    });

    it('should score a tighter tolerance above zero and below an exact match', () => {
      const required = createResistor('10K', { Tolerance: '5%' });
      const tighter = scoreItem(required, createItem({ tolerance: '1%' })).breakdown.find(
        (line) => line.rule === 'tolerance'
      );
      const exact = scoreItem(required, createItem({ tolerance: '5%' })).breakdown.find(
        (line) => line.rule === 'tolerance'
      );

      expect(tighter?.points).toBe(12);
      expect(exact?.points).toBe(15);
    });

    it('should treat precision notation as a 1% requirement', () => {
      expect(score(createResistor('10K0'), createItem({ tolerance: '1%' }))).toBe(135);
      expect(score(createResistor('10K0'), createItem({ tolerance: '5%' }))).toBe(120);
    });

    it('should ignore a malformed tolerance', () => {
      expect(score(createResistor('10K', { Tolerance: 'tight' }), createItem({ tolerance: '1%' }))).toBe(120);
    });

    it('should award rating containment for the category ratings only', () => {
      const capacitor = component({
        reference: 'C1',
        libraryId: 'Device:C',
        value: '100nF',
        footprint: 'Capacitor_SMD:C_0603_1608Metric',
        properties: { Voltage: '50V', W: '0.1W' },
      });
      const item = createItem({ ipn: 'C-001', category: 'CAP', value: '0.1uF', voltage: '50V', wattage: '0.1W' });

      expect(score(capacitor, item)).toBe(130);
    });

    it('should award power containment for resistors', () => {
      expect(score(createResistor('10K', { Power: '0.1W' }), createItem({ wattage: '0.1W 1/10W' }))).toBe(130);
    });

    it('should award current containment for inductors', () => {
      const inductor = component({
        reference: 'L1',
        libraryId: 'Device:L',
        value: '10uH',
        footprint: 'Inductor_SMD:L_0805_2012Metric',
        properties: { Current: '1A' },
      });
      const item = createItem({ ipn: 'L-001', category: 'IND', value: '10u', package: '0805', amperage: '1A' });

      expect(score(inductor, item)).toBe(130);
    });

    it('should award category-specific points', () => {
      const led = component({
        reference: 'D1',
        libraryId: 'Device:LED',
        value: 'Red',
        footprint: 'LED_SMD:LED_0603_1608Metric',
        properties: { Wavelength: '625nm' },
      });
      const item = createItem({
        ipn: 'LED-001',
        category: 'LED',
        value: 'red',
        attributes: { Wavelength: '625nm' },
      });

      expect(score(led, item)).toBe(128);
    });

    it('should award 3 for other shared properties', () => {
      const result = scoreItem(
        createResistor('10K', { Manufacturer: 'Yageo', Datasheet: 'n/a' }),
        createItem({ attributes: { Manufacturer: 'YAGEO', Datasheet: 'n/a' } })
      );

      expect(result.score).toBe(123);
      expect(result.breakdown[3]).toEqual({
        rule: 'property',
        points: 3,
        detail: 'Property Manufacturer: +3 (Yageo)',
      });
    });

    it('should score zero when nothing is known about the component', () => {
      const unknown = component({ reference: 'H1', libraryId: 'Foo:Bar123' });

      expect(score(unknown, createItem())).toBe(0);
    });
  });

  describe('formatScoreTrace', () => {
    it('should list the item, score, priority and lines', () => {
      const item = createItem();

      expect(formatScoreTrace(item, scoreItem(createResistor(), item))).toBe(
        'IPN: R-001, Score: 120, Priority: 1, Type match: +50 (RES in RES), ' +
          'Value match: +40 (10K = 10K), Package match: +30 (0603 in 0603)'
      );
    });

    it('should omit lines when nothing scored', () => {
      expect(formatScoreTrace(createItem(), { score: 0, breakdown: [] })).toBe('IPN: R-001, Score: 0, Priority: 1');
    });
  });

  describe('categoryMatches', () => {
    it('should never match UNKNOWN', () => {
      expect(categoryMatches(ComponentCategory.UNKNOWN, 'UNKNOWN')).toBe(false);
    });

    it('should match a substring of the inventory category', () => {
      expect(categoryMatches(ComponentCategory.CAPACITOR, 'cap ceramic')).toBe(true);
    });
  });
});
