/**
 * Tests for Category-Specific Properties
 */

import {
  extractCategoryProperties,
  lookupProperty,
  scoreCategoryProperties,
  containsText,
} from '../../src/matching/categoryProperties';
import { ComponentCategory } from '../../src/matching/types';

describe('lookupProperty', () => {
  it('should match aliases case-insensitively', () => {
    expect(lookupProperty({ voltage: '50V' }, 'voltage')).toBe('50V');
    expect(lookupProperty({ V: '25V' }, 'voltage')).toBe('25V');
    expect(lookupProperty({ MCD: '120' }, 'intensity')).toBe('120');
  });

  it('should prefer earlier aliases', () => {
    expect(lookupProperty({ V: '25V', Voltage: '50V' }, 'voltage')).toBe('50V');
  });

  it('should skip empty values', () => {
    expect(lookupProperty({ Voltage: '  ', V: '16V' }, 'voltage')).toBe('16V');
    expect(lookupProperty({ Tolerance: '' }, 'tolerance')).toBeUndefined();
  });
});

describe('extractCategoryProperties', () => {
  it('should read LED fields', () => {
    const properties = extractCategoryProperties(ComponentCategory.LED, {
      Wavelength: '625nm',
      mcd: '120',
    });

    expect(properties).toEqual({ kind: 'led', wavelength: '625nm', intensity: '120', angle: undefined });
  });

  it('should read oscillator fields', () => {
    const properties = extractCategoryProperties(ComponentCategory.OSCILLATOR, {
      Frequency: '16MHz',
      Load: '18pF',
    });

    expect(properties).toEqual({ kind: 'oscillator', frequency: '16MHz', stability: undefined, load: '18pF' });
  });

  it('should read connector pitch', () => {
    expect(extractCategoryProperties(ComponentCategory.CONNECTOR, { Pitch: '2.54mm' })).toEqual({
      kind: 'connector',
      pitch: '2.54mm',
    });
  });

  it('should read family for MCUs and ICs', () => {
    expect(extractCategoryProperties(ComponentCategory.MICROCONTROLLER, { Family: 'AVR' })).toEqual({
      kind: 'family',
      family: 'AVR',
    });
    expect(extractCategoryProperties(ComponentCategory.INTEGRATED_CIRCUIT, {})).toEqual({
      kind: 'family',
      family: undefined,
    });
  });

  it('should carry nothing for other categories', () => {
    expect(extractCategoryProperties(ComponentCategory.RESISTOR, { Wavelength: '625nm' })).toEqual({ kind: 'none' });
  });
});

describe('scoreCategoryProperties', () => {
  it('should score LED fields', () => {
    const lines = scoreCategoryProperties(
      { kind: 'led', wavelength: '625nm', intensity: '120', angle: '120°' },
      { kind: 'led', wavelength: '625nm', intensity: '120mcd', angle: '60°' }
    );

    expect(lines.map((line) => line.points)).toEqual([8, 8]);
    expect(lines[0].detail).toBe('Wavelength match: +8 (625nm)');
  });

  it('should score oscillator fields', () => {
    const lines = scoreCategoryProperties(
      { kind: 'oscillator', frequency: '16MHz', stability: '20ppm', load: '18pF' },
      { kind: 'oscillator', frequency: '16mhz', stability: '±20ppm', load: '18pF' }
    );

    expect(lines.reduce((total, line) => total + line.points, 0)).toBe(25);
  });

  it('should score connector pitch and family', () => {
    expect(
      scoreCategoryProperties({ kind: 'connector', pitch: '2.54mm' }, { kind: 'connector', pitch: '2.54mm' })
    ).toEqual([{ rule: 'category', points: 10, detail: 'Pitch match: +10 (2.54mm)' }]);
    expect(
      scoreCategoryProperties({ kind: 'family', family: 'AVR' }, { kind: 'family', family: 'AVR 8-bit' })
    ).toEqual([{ rule: 'category', points: 8, detail: 'Family match: +8 (AVR)' }]);
  });

  it('should score nothing for missing or mismatched variants', () => {
    expect(scoreCategoryProperties({ kind: 'connector' }, { kind: 'connector', pitch: '2.54mm' })).toEqual([]);
    expect(scoreCategoryProperties({ kind: 'connector', pitch: '2.54mm' }, { kind: 'none' })).toEqual([]);
    expect(scoreCategoryProperties({ kind: 'none' }, { kind: 'none' })).toEqual([]);
  });
});

describe('containsText', () => {
  it('should compare case-insensitively', () => {
    expect(containsText('50V X7R', '50v')).toBe(true);
  });

  it('should be false when either side is missing', () => {
    expect(containsText(undefined, '50V')).toBe(false);
    expect(containsText('50V', '')).toBe(false);
  });
});
