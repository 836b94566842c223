/**
 * Lamination Cost Calculator
 *
 * Three laminate layers, each cut to the array's base length plus its own
 * waste allowance, and one liner cut to the base length.
 *
 * @module categories/lamination
 */

import { categoryItems, resolveSelection } from "../catalog";
import { LAMINATION_LAYER_COUNT } from "../constants";
import { configurationIssue, type ConfigurationIssue } from "../errors";
import { baseLength, power } from "../geometry";
import { costed, notConfigured } from "../results";
import { rollCostPerMetre } from "../unit-costs";
import type {
  CategoryCostResult,
  CostingContext,
  LaminationSelection,
  MaterialRequirement,
  RollItem,
} from "../types";
import { lengthOrDefault } from "./shared";

export interface RollLine {
  role: string;
  materialId: string | null;
  materialName: string | null;
  lengthM: number;
  costPerM: number;
  cost: number;
}

export interface LaminationCostDetail {
  baseLengthMm: number;
  layers: RollLine[];
  liner: RollLine;
}

export function calculateLaminationCost(
  context: CostingContext,
  selection: LaminationSelection = {}
): CategoryCostResult<LaminationCostDetail> {
  const { design, exchangeRateGbpPerUsd: rate } = context;
  const rolls = categoryItems(context.catalog, "Lamination");
  if (rolls.length === 0) {
    return notConfigured("Lamination", [
      configurationIssue("EMPTY_CATEGORY", "Lamination", "Lamination", "No lamination materials in the catalog"),
    ]);
  }

  const issues: ConfigurationIssue[] = [];
  const baseLengthMm = baseLength(design);

  const layers: RollLine[] = [];
  for (let index = 0; index < LAMINATION_LAYER_COUNT; index++) {
    const layer = selection.layers?.[index] ?? {};
    const role = `Layer ${index + 1}`;
    const resolved = resolveSelection(rolls, layer.material, "Lamination", role);
    if (resolved.issue) issues.push(resolved.issue);
    const lengthMm = baseLengthMm + lengthOrDefault(layer.wasteMm, 0);
    layers.push(rollLine(role, resolved.item, lengthMm, rate));
  }

  const linerResolved = resolveSelection(rolls, selection.liner, "Lamination", "Liner");
  if (linerResolved.issue) issues.push(linerResolved.issue);
  const liner = rollLine("Liner", linerResolved.item, baseLengthMm, rate);

  const lines = [...layers, liner];
  return costed({
    category: "Lamination",
    costPerUnit: lines.reduce((sum, line) => sum + line.cost, 0),
    arrayPowerW: power(design, context.illumination).arrayPowerW,
    detail: { baseLengthMm, layers, liner },
    requirements: rollRequirements("Lamination", lines),
    issues,
  });
}

export function rollLine(role: string, item: RollItem | undefined, lengthMm: number, rate: number): RollLine {
  const lengthM = lengthMm / 1000;
  const costPerM = item ? rollCostPerMetre(item, rate) : 0;
  return {
    role,
    materialId: item?.id ?? null,
    materialName: item?.name ?? null,
    lengthM,
    costPerM,
    cost: costPerM * lengthM,
  };
}

export function rollRequirements(
  category: "Lamination" | "Tapes",
  lines: RollLine[]
): MaterialRequirement[] {
  return lines
    .filter((line) => line.materialId !== null)
    .map(
      (line): MaterialRequirement => ({
        category,
        description: line.role,
        materialId: line.materialId,
        materialName: line.materialName,
        quantity: line.lengthM,
        unit: "m",
      })
    );
}
