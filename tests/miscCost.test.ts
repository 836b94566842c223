import { describe, expect, test } from '@jest/globals';
import { calculateMiscCost } from '../src/lib/costing';
import { testCatalog, testContext, testSelections } from './fixtures/array';

describe('calculateMiscCost', () => {
  test('one Kapton disk per cell and epoxy on two diodes', () => {
    const result = calculateMiscCost(testContext(), testSelections().misc);
    expect(result.status).toBe('OK');
    expect(result.detail?.kapton.disks).toBe(20);
    expect(result.detail?.kapton.costPerDisk).toBeCloseTo(0.02, 12);
    expect(result.detail?.kapton.cost).toBeCloseTo(0.4, 10);
    expect(result.detail?.epoxy.totalMl).toBe(1);
    expect(result.detail?.epoxy.cost).toBeCloseTo(0.2, 10);
    expect(result.costPerUnit).toBeCloseTo(0.6, 10);
  });

  test('epoxy selection ignores non-epoxy items', () => {
    const result = calculateMiscCost(testContext(), { epoxy: { id: 'GLOVES' }, epoxyMlPerDiode: 0.5 });
    expect(result.status).toBe('INCOMPLETE');
    expect(result.issues[0].code).toBe('SELECTION_NOT_FOUND');
    expect(result.costPerUnit).toBeCloseTo(0.4, 10);
  });

  test('no Kapton is reported and epoxy is still costed', () => {
    const catalog = testCatalog();
    catalog.Misc = (catalog.Misc ?? []).filter((item) => item.type !== 'Kapton');
    const result = calculateMiscCost(testContext({ catalog }), testSelections().misc);
    expect(result.status).toBe('INCOMPLETE');
    expect(result.issues.map((issue) => issue.role)).toEqual(['Kapton insulation']);
    expect(result.costPerUnit).toBeCloseTo(0.2, 10);
  });

  test('empty misc catalog is NOT_CONFIGURED', () => {
    const result = calculateMiscCost(testContext({ catalog: { ...testCatalog(), Misc: [] } }));
    expect(result.status).toBe('NOT_CONFIGURED');
  });
});
