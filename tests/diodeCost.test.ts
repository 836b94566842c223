import { describe, expect, test } from '@jest/globals';
import { calculateDiodeCost, diodeAssemblyCost } from '../src/lib/costing';
import { testCatalog, testContext, testSelections } from './fixtures/array';

describe('diodeAssemblyCost', () => {
  test('adds tabs and welds to the diode price, then divides by yield', () => {
    const cost = diodeAssemblyCost({
      diodePriceGbp: 0.1,
      tabLengthsMm: [5, 5],
      silverCostPerMm: 0.00005,
      weldCost: 0.002,
      yieldFraction: 0.8,
      quantity: 20,
    });
    expect(cost.tabSilverCost).toBeCloseTo(0.0005, 12);
    expect(cost.rawCost).toBeCloseTo(0.1025, 12);
    expect(cost.effectiveCost).toBeCloseTo(0.128125, 12);
    expect(cost.totalCost).toBeCloseTo(2.5625, 10);
  });

  test('zero yield counts as 100%', () => {
    const cost = diodeAssemblyCost({
      diodePriceGbp: 1,
      tabLengthsMm: [],
      silverCostPerMm: 0,
      weldCost: 0,
      yieldFraction: 0,
      quantity: 2,
    });
    expect(cost.totalCost).toBe(2);
  });
});

describe('calculateDiodeCost', () => {
  test('costs bypass and blocking diodes', () => {
    const result = calculateDiodeCost(testContext(), testSelections().diodes);
    expect(result.status).toBe('OK');
    expect(result.detail?.bypass.silverCostPerMm).toBeCloseTo(0.0075, 12);
    expect(result.detail?.bypass.weldCost).toBeCloseTo(0.005, 12);
    expect(result.detail?.bypass.totalCost).toBeCloseTo(4.5, 10);
    expect(result.detail?.blocking.diodePriceGbp).toBeCloseTo(1.0, 12);
    expect(result.detail?.blocking.tabLengthsMm).toEqual([10, 15]);
    expect(result.detail?.blocking.totalCost).toBeCloseTo(2.8, 10);
    expect(result.costPerUnit).toBeCloseTo(7.3, 10);
  });

  test('custom yields replace the defaults', () => {
    const selection = { ...testSelections().diodes, bypassYieldPercent: 100, blockingYieldPercent: 100 };
    const result = calculateDiodeCost(testContext(), selection);
    // 0.18 * 20 + 1.26 * 2
    expect(result.costPerUnit).toBeCloseTo(6.12, 10);
  });

  test('requirements list diodes and tab silver', () => {
    const result = calculateDiodeCost(testContext(), testSelections().diodes);
    expect(result.requirements.map((r) => [r.description, r.materialId, r.quantity, r.unit])).toEqual([
      ['Bypass diodes', 'D-BYP', 20, 'each'],
      ['Bypass diode tab silver', 'AG-STD', 200, 'mm'],
      ['Blocking diodes', 'D-BLK', 2, 'each'],
      ['Blocking diode tab silver', 'AG-BLK', 50, 'mm'],
    ]);
  });

  test('a missing diode weld head makes the category NOT_CONFIGURED', () => {
    const catalog = testCatalog();
    catalog['Weld heads'] = (catalog['Weld heads'] ?? []).filter((head) => head.id !== 'Weld_Head_Au');
    const result = calculateDiodeCost(testContext({ catalog }), testSelections().diodes);
    expect(result.status).toBe('NOT_CONFIGURED');
    expect(result.issues.map((issue) => issue.role)).toEqual(['Weld_Head_Au']);
  });

  test('an unknown bypass diode id zeroes that line only', () => {
    const selection = { ...testSelections().diodes, bypassDiode: { id: 'NOPE' } };
    const result = calculateDiodeCost(testContext(), selection);
    expect(result.status).toBe('INCOMPLETE');
    expect(result.detail?.bypass.totalCost).toBe(0);
    expect(result.costPerUnit).toBeCloseTo(2.8, 10);
  });
});
