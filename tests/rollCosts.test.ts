import { describe, expect, test } from '@jest/globals';
import { calculateLaminationCost, calculateTapeCost } from '../src/lib/costing';
import { testCatalog, testContext, testSelections } from './fixtures/array';

describe('calculateLaminationCost', () => {
  test('three layers with waste plus a liner at base length', () => {
    const result = calculateLaminationCost(testContext(), testSelections().lamination);
    expect(result.status).toBe('OK');
    expect(result.detail?.baseLengthMm).toBeCloseTo(161, 10);
    expect(result.detail?.layers.map((layer) => layer.cost)).toEqual([
      expect.closeTo(0.1, 10),
      expect.closeTo(0.1, 10),
      expect.closeTo(0.1288, 10),
    ]);
    expect(result.detail?.layers[2].costPerM).toBeCloseTo(0.8, 10);
    expect(result.detail?.liner.cost).toBeCloseTo(0.0805, 10);
    expect(result.costPerUnit).toBeCloseTo(0.4093, 10);
  });

  test('missing layer selections default to the first roll with no waste', () => {
    const result = calculateLaminationCost(testContext(), {});
    // four lengths of 0.161 m at £0.5/m
    expect(result.costPerUnit).toBeCloseTo(0.322, 10);
  });

  test('empty lamination catalog is NOT_CONFIGURED', () => {
    const result = calculateLaminationCost(testContext({ catalog: { ...testCatalog(), Lamination: [] } }));
    expect(result.status).toBe('NOT_CONFIGURED');
  });
});

describe('calculateTapeCost', () => {
  test('perimeter tape runs round the array and the other tape is cut to length', () => {
    const result = calculateTapeCost(testContext(), testSelections().tapes);
    expect(result.detail?.perimeterLengthMm).toBeCloseTo(462, 10);
    expect(result.detail?.perimeter.cost).toBeCloseTo(0.1386, 10);
    expect(result.detail?.other.cost).toBeCloseTo(0.05, 10);
    expect(result.costPerUnit).toBeCloseTo(0.1886, 10);
  });

  test('other tape length defaults to zero', () => {
    const result = calculateTapeCost(testContext(), { perimeterTape: { id: 'TAPE-K' } });
    expect(result.costPerUnit).toBeCloseTo(0.1386, 10);
  });

  test('requirements are in metres', () => {
    const result = calculateTapeCost(testContext(), testSelections().tapes);
    expect(result.requirements.map((r) => [r.materialId, r.quantity, r.unit])).toEqual([
      ['TAPE-K', expect.closeTo(0.462, 10), 'm'],
      ['TAPE-X', expect.closeTo(0.1, 10), 'm'],
    ]);
  });
});
