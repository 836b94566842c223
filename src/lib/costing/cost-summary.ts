/**
 * Array Cost Summary - High-Level Orchestration
 *
 * Runs the seven category calculators for one design and combines them
 * into a single breakdown in a fixed category order, with cost per unit,
 * cost per watt and every configuration issue raised along the way.
 *
 * A category that could not be costed contributes 0 to the totals and is
 * flagged NOT_CONFIGURED in its row, never hidden.
 *
 * @module cost-summary
 */

import { ConfigurationError, type ConfigurationIssue } from "./errors";
import { power } from "./geometry";
import { costPerWatt } from "./results";
import { calculateDiodeCost, type DiodeCostDetail } from "./categories/diodes";
import { calculateLaminationCost, type LaminationCostDetail } from "./categories/lamination";
import { calculateMiscCost, type MiscCostDetail } from "./categories/misc";
import { calculatePackagingCost, type PackagingCostDetail } from "./categories/packaging";
import { calculateSilverCost, type SilverCostDetail } from "./categories/silver";
import { calculateTapeCost, type TapeCostDetail } from "./categories/tapes";
import { calculateWeldHeadCost, type WeldHeadCostDetail } from "./categories/weld-heads";
import {
  COST_CATEGORY_ORDER,
  type CategoryCostResult,
  type CategoryStatus,
  type CostCategory,
  type CostingContext,
  type CostSelections,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface CostBreakdownRow {
  category: CostCategory;
  costPerUnit: number;
  costPerWatt: number;
  status: CategoryStatus;
}

export interface CategoryCostTotals {
  rows: CostBreakdownRow[];
  totalCostPerUnit: number;
  totalCostPerWatt: number;
}

export interface CategoryResults {
  silver: CategoryCostResult<SilverCostDetail>;
  diodes: CategoryCostResult<DiodeCostDetail>;
  weldHeads: CategoryCostResult<WeldHeadCostDetail>;
  lamination: CategoryCostResult<LaminationCostDetail>;
  tapes: CategoryCostResult<TapeCostDetail>;
  misc: CategoryCostResult<MiscCostDetail>;
  packaging: CategoryCostResult<PackagingCostDetail>;
}

export interface ArrayCostSummary extends CategoryCostTotals {
  designName: string;
  arrayPowerW: number;
  categories: CategoryResults;
  issues: ConfigurationIssue[];
}

// ============================================================================
// IMPLEMENTATION
// ============================================================================

/**
 * Combine per-category costs into ordered rows and totals. Categories
 * missing from `costs` count as 0.
 */
export function summarizeCategoryCosts(
  costs: Partial<Record<CostCategory, number>>,
  arrayPowerW: number,
  statuses: Partial<Record<CostCategory, CategoryStatus>> = {}
): CategoryCostTotals {
  const rows: CostBreakdownRow[] = COST_CATEGORY_ORDER.map((category) => {
    const cost = costs[category] ?? 0;
    return {
      category,
      costPerUnit: cost,
      costPerWatt: costPerWatt(cost, arrayPowerW),
      status: statuses[category] ?? "OK",
    };
  });

  const totalCostPerUnit = rows.reduce((sum, row) => sum + row.costPerUnit, 0);
  return {
    rows,
    totalCostPerUnit,
    totalCostPerWatt: costPerWatt(totalCostPerUnit, arrayPowerW),
  };
}

/**
 * Cost one array design against the catalog with the caller's selections.
 *
 * @example
 * const summary = calculateCostSummary(
 *   { design, catalog, exchangeRateGbpPerUsd: 0.8, illumination: "AM1.5" },
 *   selections
 * );
 * summary.totalCostPerWatt;
 */
export function calculateCostSummary(
  context: CostingContext,
  selections: CostSelections = {}
): ArrayCostSummary {
  const categories: CategoryResults = {
    silver: calculateSilverCost(context, selections.silver),
    diodes: calculateDiodeCost(context, selections.diodes),
    weldHeads: calculateWeldHeadCost(context),
    lamination: calculateLaminationCost(context, selections.lamination),
    tapes: calculateTapeCost(context, selections.tapes),
    misc: calculateMiscCost(context, selections.misc),
    packaging: calculatePackagingCost(context, selections.packaging),
  };

  const results = categoryResultList(categories);
  const costs: Partial<Record<CostCategory, number>> = {};
  const statuses: Partial<Record<CostCategory, CategoryStatus>> = {};
  for (const result of results) {
    costs[result.category] = result.costPerUnit;
    statuses[result.category] = result.status;
  }

  const arrayPowerW = power(context.design, context.illumination).arrayPowerW;
  return {
    designName: context.design.name,
    arrayPowerW,
    categories,
    issues: results.flatMap((result) => result.issues),
    ...summarizeCategoryCosts(costs, arrayPowerW, statuses),
  };
}

/** Category results in breakdown order. */
export function categoryResultList(categories: CategoryResults): CategoryCostResult<unknown>[] {
  return [
    categories.silver,
    categories.diodes,
    categories.weldHeads,
    categories.lamination,
    categories.tapes,
    categories.misc,
    categories.packaging,
  ];
}

export function isFullyConfigured(summary: ArrayCostSummary): boolean {
  return summary.issues.length === 0;
}

/**
 * Throw a ConfigurationError if any category reported an issue.
 */
export function assertFullyConfigured(summary: ArrayCostSummary): void {
  if (!isFullyConfigured(summary)) {
    throw new ConfigurationError(summary.issues);
  }
}
