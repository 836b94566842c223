/**
 * Order Scenario Engine
 *
 * Turns a per-array cost into production plans:
 * - how many arrays to build to deliver a power target
 * - how many arrays a budget buys, and the power they deliver
 * - the materials a build of N arrays consumes
 *
 * Yield is the fraction of built arrays that pass; build counts are rounded
 * up so the good arrays meet the target, budget counts are rounded down.
 *
 * @module order-scenarios
 */

import { SECONDS_PER_HOUR } from "./constants";
import { categoryResultList, type ArrayCostSummary } from "./cost-summary";
import { normaliseYield, type ArrayLabour } from "./labour";
import type { CostCategory, MaterialRequirement, RequirementUnit } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface ScenarioBasis {
  costPerUnit: number;                     // materials, GBP per array
  labourCostPerUnit: number;               // GBP per array
  labourTimePerUnitS: number;              // seconds per array
  arrayPowerW: number;
  yieldFraction: number;                   // good arrays / built arrays
}

export type PowerUnit = "W" | "kW";

export interface PowerTargetPlan {
  targetPowerW: number;
  goodUnitsRequired: number;
  unitsToBuild: number;
  expectedScrap: number;
  totalMaterialsCost: number;
  effectiveCostPerGoodUnit: number;
  totalLabourHours: number;
  totalLabourCost: number;
}

export type BudgetCoverage = "materials" | "materials_and_labour";

export interface BudgetPlan {
  budget: number;
  coverage: BudgetCoverage;
  costPerUnitForBudget: number | null;     // null when nothing can be priced
  unitsAffordable: number;
  goodUnitsExpected: number;
  achievablePowerW: number;
  totalLabourHours: number;
  totalLabourCost: number;
}

export interface ScaledRequirement {
  category: CostCategory;
  description: string;
  materialId: string | null;
  materialName: string | null;
  perUnit: number;
  total: number;
  unit: RequirementUnit;
}

export interface PackagingTotals {
  arraysPerBox: number;
  boxes: number;
  thickFoamPieces: number;
  thinFoamPieces: number;
}

export interface MaterialTotal {
  materialId: string;
  materialName: string | null;
  total: number;
  unit: RequirementUnit;
}

export interface ScenarioMaterialRequirements {
  units: number;
  lines: ScaledRequirement[];
  silverMetresByMaterial: MaterialTotal[];
  packaging: PackagingTotals | null;       // null when packaging is not configured
}

/**
 * Line yield as a fraction in (0, 1]. Missing or non-positive means every
 * array passes; anything above 1 is capped at 1.
 */
export function normaliseLineYield(yieldFraction: number | null | undefined): number {
  return Math.min(normaliseYield(yieldFraction), 1);
}

/**
 * Scenario inputs from a cost summary and per-array labour.
 */
export function scenarioBasisFrom(
  summary: ArrayCostSummary,
  labour: ArrayLabour,
  yieldFraction: number
): ScenarioBasis {
  return {
    costPerUnit: summary.totalCostPerUnit,
    labourCostPerUnit: labour.costPerArray,
    labourTimePerUnitS: labour.timePerArrayS,
    arrayPowerW: summary.arrayPowerW,
    yieldFraction,
  };
}

// ============================================================================
// POWER TARGET
// ============================================================================

export function toWatts(value: number, unit: PowerUnit): number {
  return unit === "kW" ? value * 1000 : value;
}

/**
 * Arrays to build so that the good ones deliver at least the target power.
 * A non-positive target or array power gives an empty plan.
 */
export function planForPowerTarget(
  basis: ScenarioBasis,
  target: { targetPower: number; unit: PowerUnit }
): PowerTargetPlan {
  const targetPowerW = toWatts(target.targetPower, target.unit);
  if (!(targetPowerW > 0) || !(basis.arrayPowerW > 0)) {
    return emptyPowerPlan(Number.isFinite(targetPowerW) ? targetPowerW : 0);
  }

  const yieldFraction = normaliseLineYield(basis.yieldFraction);
  const goodUnitsRequired = Math.ceil(targetPowerW / basis.arrayPowerW);
  const unitsToBuild = Math.ceil(goodUnitsRequired / yieldFraction);
  const totalMaterialsCost = unitsToBuild * basis.costPerUnit;

  return {
    targetPowerW,
    goodUnitsRequired,
    unitsToBuild,
    expectedScrap: Math.max(unitsToBuild - goodUnitsRequired, 0),
    totalMaterialsCost,
    effectiveCostPerGoodUnit: goodUnitsRequired > 0 ? totalMaterialsCost / goodUnitsRequired : 0,
    ...labourTotals(basis, unitsToBuild),
  };
}

// ============================================================================
// BUDGET
// ============================================================================

/**
 * Arrays a budget pays for. With labour coverage the per-array cost includes
 * labour; if that total (or the materials cost alone) is not positive there
 * is nothing to divide by and the plan is empty.
 */
export function planForBudget(
  basis: ScenarioBasis,
  request: { budget: number; coverage: BudgetCoverage }
): BudgetPlan {
  const { budget, coverage } = request;
  const labourAvailable = basis.labourCostPerUnit > 0;
  let costPerUnitForBudget: number | null = basis.costPerUnit;
  if (coverage === "materials_and_labour") {
    costPerUnitForBudget = labourAvailable ? basis.costPerUnit + basis.labourCostPerUnit : null;
  }
  if (costPerUnitForBudget !== null && !(costPerUnitForBudget > 0)) {
    costPerUnitForBudget = null;
  }

  if (costPerUnitForBudget === null || !(budget > 0)) {
    return {
      budget,
      coverage,
      costPerUnitForBudget,
      unitsAffordable: 0,
      goodUnitsExpected: 0,
      achievablePowerW: 0,
      totalLabourHours: 0,
      totalLabourCost: 0,
    };
  }

  const yieldFraction = normaliseLineYield(basis.yieldFraction);
  const unitsAffordable = Math.floor(budget / costPerUnitForBudget);
  const goodUnitsExpected = Math.floor(unitsAffordable * yieldFraction);

  return {
    budget,
    coverage,
    costPerUnitForBudget,
    unitsAffordable,
    goodUnitsExpected,
    achievablePowerW: goodUnitsExpected * Math.max(basis.arrayPowerW, 0),
    ...labourTotals(basis, unitsAffordable),
  };
}

// ============================================================================
// MATERIAL REQUIREMENTS
// ============================================================================

/**
 * Materials consumed by building `units` arrays. Per-array requirements
 * scale linearly; boxes are whole (`ceil(units / arraysPerBox)`) and foam
 * follows the box count.
 */
export function scaleMaterialRequirements(summary: ArrayCostSummary, units: number): ScenarioMaterialRequirements {
  const count = Math.max(Math.floor(units), 0);

  const requirements: MaterialRequirement[] = categoryResultList(summary.categories).flatMap(
    (result): MaterialRequirement[] => result.requirements
  );

  const lines: ScaledRequirement[] = requirements.map((requirement) => ({
    category: requirement.category,
    description: requirement.description,
    materialId: requirement.materialId,
    materialName: requirement.materialName,
    perUnit: requirement.quantity,
    total: requirement.quantity * count,
    unit: requirement.unit,
  }));

  const packaging = summary.categories.packaging.detail;
  let packagingTotals: PackagingTotals | null = null;
  if (packaging) {
    const boxes = Math.ceil(count / packaging.arraysPerBox);
    packagingTotals = {
      arraysPerBox: packaging.arraysPerBox,
      boxes,
      thickFoamPieces: boxes * packaging.foamPiecesPerBox.thick,
      thinFoamPieces: boxes * packaging.foamPiecesPerBox.thin,
    };
  }

  return {
    units: count,
    lines,
    silverMetresByMaterial: silverMetresByMaterial(lines),
    packaging: packagingTotals,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function labourTotals(basis: ScenarioBasis, units: number): { totalLabourHours: number; totalLabourCost: number } {
  return {
    totalLabourHours: (Math.max(basis.labourTimePerUnitS, 0) * units) / SECONDS_PER_HOUR,
    totalLabourCost: Math.max(basis.labourCostPerUnit, 0) * units,
  };
}

function emptyPowerPlan(targetPowerW: number): PowerTargetPlan {
  return {
    targetPowerW,
    goodUnitsRequired: 0,
    unitsToBuild: 0,
    expectedScrap: 0,
    totalMaterialsCost: 0,
    effectiveCostPerGoodUnit: 0,
    totalLabourHours: 0,
    totalLabourCost: 0,
  };
}

/**
 * Silver from every role (array tabs and bars, diode tabs) grouped by ribbon,
 * in metres, in first-seen order.
 */
function silverMetresByMaterial(lines: ScaledRequirement[]): MaterialTotal[] {
  const totals = new Map<string, MaterialTotal>();
  for (const line of lines) {
    const isSilver = line.category === "Silver" || (line.category === "Diodes" && line.unit === "mm");
    if (!isSilver || line.materialId === null) continue;

    const existing = totals.get(line.materialId);
    const metres = line.total / 1000;
    if (existing) {
      existing.total += metres;
    } else {
      totals.set(line.materialId, {
        materialId: line.materialId,
        materialName: line.materialName,
        total: metres,
        unit: "m",
      });
    }
  }
  return [...totals.values()];
}
