import { describe, expect, test } from '@jest/globals';
import { calculateSilverCost, topTabCount } from '../src/lib/costing';
import { testCatalog, testContext, testDesign } from './fixtures/array';

describe('topTabCount', () => {
  test('two tabs per cell junction', () => {
    expect(topTabCount(20)).toBe(38);
    expect(topTabCount(1)).toBe(0);
    expect(topTabCount(0)).toBe(0);
  });
});

describe('calculateSilverCost', () => {
  test('costs top tabs, both negative end bars and the negative bar', () => {
    const result = calculateSilverCost(testContext(), { topTabSilver: { id: 'AG-STD' }, topTabLengthMm: 5 });

    expect(result.status).toBe('OK');
    expect(result.costPerUnit).toBeCloseTo(2.6, 10);
    expect(result.costPerWatt).toBeCloseTo(2.6 / 12, 10);
    expect(result.detail?.topTabCount).toBe(38);
    expect(result.detail?.lines.map((line) => [line.role, line.lengthMm])).toEqual([
      ['Top tabs', 190],
      ['Negative end bars', 40],
      ['Negative bar', 30],
    ]);
  });

  test('top tab length defaults to 5 mm', () => {
    const result = calculateSilverCost(testContext(), {});
    expect(result.detail?.lines[0].lengthMm).toBe(190);
  });

  test('lists each line as a requirement in millimetres', () => {
    const result = calculateSilverCost(testContext());
    expect(result.requirements).toEqual([
      { category: 'Silver', description: 'Top tabs', materialId: 'AG-STD', materialName: 'Standard ribbon', quantity: 190, unit: 'mm' },
      { category: 'Silver', description: 'Negative end bars', materialId: 'AG-STD', materialName: 'Standard ribbon', quantity: 40, unit: 'mm' },
      { category: 'Silver', description: 'Negative bar', materialId: 'AG-STD', materialName: 'Standard ribbon', quantity: 30, unit: 'mm' },
    ]);
  });

  test('negative bar uses the linked ribbon width, not the design width field', () => {
    const context = testContext({ design: testDesign({ negativeBarSilverId: 'AG-BLK', negativeBarWidthMm: 1 }) });
    const result = calculateSilverCost(context);
    // 30 mm at £0.02/mm
    expect(result.detail?.lines[2].cost).toBeCloseTo(0.6, 10);
  });

  test('a stale design link is INCOMPLETE and that line costs nothing', () => {
    const context = testContext({ design: testDesign({ negativeEndSilverId: 'GONE' }) });
    const result = calculateSilverCost(context);
    expect(result.status).toBe('INCOMPLETE');
    expect(result.costPerUnit).toBeCloseTo(2.2, 10);
    expect(result.issues.map((issue) => issue.code)).toEqual(['DESIGN_REFERENCE_NOT_FOUND']);
  });

  test('no silver in the catalog is NOT_CONFIGURED', () => {
    const result = calculateSilverCost(testContext({ catalog: { ...testCatalog(), 'Silver Ribbon': [] } }));
    expect(result.status).toBe('NOT_CONFIGURED');
    expect(result.costPerUnit).toBe(0);
    expect(result.detail).toBeNull();
  });
});
