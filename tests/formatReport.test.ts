import { describe, expect, test } from '@jest/globals';
import { calculateCostSummary, planForBudget, scaleMaterialRequirements } from '../src/lib/costing';
import { formatBudgetPlan, formatCostSummary, formatMaterialRequirements } from '../src/lib/reports/format';
import { testCatalog, testContext, testSelections } from './fixtures/array';

describe('formatCostSummary', () => {
  test('flags categories that are not configured and lists the issues', () => {
    const catalog = { ...testCatalog(), Tapes: [] };
    const text = formatCostSummary(calculateCostSummary(testContext({ catalog }), testSelections()));
    const lines = text.split('\n');

    expect(lines).toContain('  Tapes: £0.0000 (£0.0000/W) [NOT_CONFIGURED]');
    expect(lines).toContain('  Misc: £0.6000 (£0.0500/W)');
    expect(lines.slice(-2)).toEqual(['Configuration issues:', '  - Tapes: No tapes in the catalog']);
  });

  test('labour is omitted when not given', () => {
    const text = formatCostSummary(calculateCostSummary(testContext(), testSelections()));
    expect(text).not.toContain('Labour per array');
  });
});

describe('formatBudgetPlan', () => {
  test('explains when there is no cost to divide the budget by', () => {
    const plan = planForBudget(
      { costPerUnit: 10, labourCostPerUnit: 0, labourTimePerUnitS: 0, arrayPowerW: 12, yieldFraction: 0.9 },
      { budget: 500, coverage: 'materials_and_labour' }
    );
    expect(formatBudgetPlan(plan)).toBe(
      '=== Budget: £500.00 (materials + labour) ===\nNo cost per array available for this basis'
    );
  });
});

describe('formatMaterialRequirements', () => {
  test('whole quantities print as integers and lengths to three places', () => {
    const summary = calculateCostSummary(testContext(), testSelections());
    const lines = formatMaterialRequirements(scaleMaterialRequirements(summary, 2)).split('\n');

    expect(lines[0]).toBe('=== Materials for 2 arrays ===');
    expect(lines).toContain('  Diodes / Bypass diodes (Bypass diode): 40 each');
    expect(lines).toContain('  Tapes / Other tape (Marking tape): 0.200 m');
    expect(lines).toContain('Boxes: 1 (4 arrays per box)');
    expect(lines).toContain('25 mm foam pieces: 2');
  });
});
