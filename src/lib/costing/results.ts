/**
 * Builders for CategoryCostResult values.
 */

import type { ConfigurationIssue } from "./errors";
import type { CategoryCostResult, CostCategory, MaterialRequirement } from "./types";

export function costPerWatt(costPerUnit: number, arrayPowerW: number): number {
  return arrayPowerW > 0 ? costPerUnit / arrayPowerW : 0;
}

export function notConfigured<TDetail>(
  category: CostCategory,
  issues: ConfigurationIssue[]
): CategoryCostResult<TDetail> {
  return {
    category,
    status: "NOT_CONFIGURED",
    costPerUnit: 0,
    costPerWatt: 0,
    detail: null,
    requirements: [],
    issues,
  };
}

export function costed<TDetail>(params: {
  category: CostCategory;
  costPerUnit: number;
  arrayPowerW: number;
  detail: TDetail;
  requirements: MaterialRequirement[];
  issues: ConfigurationIssue[];
}): CategoryCostResult<TDetail> {
  return {
    category: params.category,
    status: params.issues.length > 0 ? "INCOMPLETE" : "OK",
    costPerUnit: params.costPerUnit,
    costPerWatt: costPerWatt(params.costPerUnit, params.arrayPowerW),
    detail: params.detail,
    requirements: params.requirements,
    issues: params.issues,
  };
}
