/**
 * Plain-text renderings of cost summaries and scenario plans for the
 * command line.
 */

import type { ArrayCostSummary } from "../costing/cost-summary";
import { getIssueMessages } from "../costing/errors";
import type { ArrayLabour } from "../costing/labour";
import type { BudgetPlan, PowerTargetPlan, ScenarioMaterialRequirements } from "../costing/order-scenarios";

function gbp(value: number, digits = 2): string {
  return `£${value.toFixed(digits)}`;
}

export function formatCostSummary(summary: ArrayCostSummary, labour?: ArrayLabour): string {
  const lines = [
    `=== Cost Summary: ${summary.designName} ===`,
    `Array power: ${summary.arrayPowerW.toFixed(3)} W`,
    "",
    ...summary.rows.map((row) => {
      const flag = row.status === "OK" ? "" : ` [${row.status}]`;
      return `  ${row.category}: ${gbp(row.costPerUnit, 4)} (${gbp(row.costPerWatt, 4)}/W)${flag}`;
    }),
    "",
    `Materials per array: ${gbp(summary.totalCostPerUnit)} (${gbp(summary.totalCostPerWatt, 4)}/W)`,
  ];

  if (labour) {
    lines.push(
      `Labour per array: ${gbp(labour.costPerArray)} (${(labour.timePerArrayS / 60).toFixed(1)} min)`
    );
  }

  if (summary.issues.length > 0) {
    lines.push("", "Configuration issues:", ...getIssueMessages(summary.issues).map((message) => `  - ${message}`));
  }

  return lines.join("\n");
}

export function formatPowerTargetPlan(plan: PowerTargetPlan): string {
  return [
    `=== Power Target: ${plan.targetPowerW.toFixed(1)} W ===`,
    `Good arrays required: ${plan.goodUnitsRequired}`,
    `Arrays to build: ${plan.unitsToBuild} (expected scrap ${plan.expectedScrap})`,
    `Materials: ${gbp(plan.totalMaterialsCost)} (${gbp(plan.effectiveCostPerGoodUnit)} per good array)`,
    `Labour: ${gbp(plan.totalLabourCost)} over ${plan.totalLabourHours.toFixed(2)} h`,
  ].join("\n");
}

export function formatBudgetPlan(plan: BudgetPlan): string {
  const basis = plan.coverage === "materials" ? "materials" : "materials + labour";
  if (plan.costPerUnitForBudget === null) {
    return [`=== Budget: ${gbp(plan.budget)} (${basis}) ===`, "No cost per array available for this basis"].join("\n");
  }
  return [
    `=== Budget: ${gbp(plan.budget)} (${basis}) ===`,
    `Cost per array: ${gbp(plan.costPerUnitForBudget)}`,
    `Arrays affordable: ${plan.unitsAffordable} (${plan.goodUnitsExpected} good)`,
    `Achievable power: ${plan.achievablePowerW.toFixed(1)} W`,
  ].join("\n");
}

export function formatMaterialRequirements(requirements: ScenarioMaterialRequirements): string {
  const lines = [
    `=== Materials for ${requirements.units} arrays ===`,
    ...requirements.lines.map(
      (line) =>
        `  ${line.category} / ${line.description}${line.materialName ? ` (${line.materialName})` : ""}: ` +
        `${formatQuantity(line.total)} ${line.unit}`
    ),
  ];

  if (requirements.silverMetresByMaterial.length > 0) {
    lines.push(
      "",
      "Silver by ribbon:",
      ...requirements.silverMetresByMaterial.map(
        (total) => `  ${total.materialName ?? total.materialId}: ${total.total.toFixed(3)} m`
      )
    );
  }

  if (requirements.packaging) {
    const packaging = requirements.packaging;
    lines.push(
      "",
      `Boxes: ${packaging.boxes} (${packaging.arraysPerBox} arrays per box)`,
      `25 mm foam pieces: ${packaging.thickFoamPieces}`,
      `3 mm foam pieces: ${packaging.thinFoamPieces}`
    );
  }

  return lines.join("\n");
}

function formatQuantity(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}
