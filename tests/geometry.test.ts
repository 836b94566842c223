import { describe, expect, test } from '@jest/globals';
import {
  baseLength,
  computeDesignPower,
  perimeterLength,
  power,
  productCellsPerArray,
  productStringLength,
  stringLength,
} from '../src/lib/costing';
import { testDesign } from './fixtures/array';

describe('stringLength', () => {
  test('sums end gaps, cells and the gaps between them', () => {
    expect(stringLength(20, 6.6, 1.0, 5.0, 5.0)).toBeCloseTo(161.0, 10);
  });

  test('has no inter-cell gap for a single cell', () => {
    expect(stringLength(1, 6.6, 1.0, 5.0, 5.0)).toBeCloseTo(16.6, 10);
  });

  test('grows when any single input grows', () => {
    const base: [number, number, number, number, number] = [20, 6.6, 1.0, 5.0, 5.0];
    const length = stringLength(...base);
    for (let index = 0; index < base.length; index++) {
      const larger: [number, number, number, number, number] = [...base];
      larger[index] += 1;
      expect(stringLength(...larger)).toBeGreaterThan(length);
    }
  });

  test('treats zero and negative cell counts as an empty string', () => {
    expect(stringLength(0, 6.6, 1.0, 5.0, 5.0)).toBe(10);
    expect(stringLength(-3, 6.6, 1.0, 5.0, 5.0)).toBe(10);
  });
});

describe('baseLength and perimeterLength', () => {
  test('base length uses the design geometry', () => {
    expect(baseLength(testDesign())).toBeCloseTo(161.0, 10);
  });

  test('perimeter adds the fixed 140 mm allowance', () => {
    expect(perimeterLength(161)).toBe(462);
    expect(perimeterLength(0)).toBe(140);
  });
});

describe('power', () => {
  test('AM1.5 uses 1000 W/m2 and the AM1.5 efficiency', () => {
    const result = power(testDesign(), 'AM1.5');
    expect(result.cellPowerW).toBeCloseTo(0.6, 10);
    expect(result.arrayPowerW).toBeCloseTo(12, 10);
  });

  test('AM0 uses 1366 W/m2 and the AM0 efficiency', () => {
    const result = power(testDesign(), 'AM0');
    expect(result.cellPowerW).toBeCloseTo(0.76496, 10);
    expect(result.arrayPowerW).toBeCloseTo(15.2992, 10);
  });

  test('a 30% cell with 20 cells gives 12 W at AM1.5', () => {
    const design = testDesign({ numCells: 20, effAm15Percent: 30 });
    expect(power(design, 'AM1.5').arrayPowerW).toBeCloseTo(12.0, 10);
  });

  test('array power is exactly cell power times the cell count', () => {
    for (const numCells of [1, 7, 20, 80, 333]) {
      for (const illumination of ['AM1.5', 'AM0'] as const) {
        const result = power(testDesign({ numCells }), illumination);
        expect(result.arrayPowerW).toBe(result.cellPowerW * numCells);
      }
    }
  });

  test('zero efficiency gives zero power', () => {
    expect(power(testDesign({ effAm15Percent: 0 }), 'AM1.5').arrayPowerW).toBe(0);
  });

  test('design power summary lists both spectra', () => {
    const summary = computeDesignPower(testDesign());
    expect(summary.arrayAm15W).toBeCloseTo(12, 10);
    expect(summary.arrayAm0W).toBeCloseTo(15.2992, 10);
  });
});

describe('product figures', () => {
  const product = {
    name: 'Default MAT Array',
    cellsPerString: 20,
    stringsPerArray: 4,
    exchangeRateGbpPerUsd: 0.8,
    cellHeightMm: 6.6,
    gapBetweenCellsMm: 1.0,
    positiveEndGapMm: 5.0,
    negativeEndGapMm: 5.0,
  };

  test('cells per array is cells per string times strings', () => {
    expect(productCellsPerArray(product)).toBe(80);
  });

  test('string length follows the product geometry', () => {
    expect(productStringLength(product)).toBeCloseTo(161.0, 10);
  });
});
