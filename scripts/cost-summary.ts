#!/usr/bin/env tsx
/**
 * Print the cost breakdown of an array design, with optional order scenarios.
 *
 * Usage:
 *   npm run cost-summary -- --workspace data/workspace.json
 *   npm run cost-summary -- --design "Demo array" --illumination AM0
 *   npm run cost-summary -- --target-power 1 --power-unit kW --yield 0.9
 *   npm run cost-summary -- --budget 5000 --budget-basis materials_and_labour
 *   npm run cost-summary -- --strict   (exit 1 when any category is not fully configured)
 */

import minimist from "minimist";

import { ENV } from "../src/env";
import {
  assertFullyConfigured,
  calculateCostSummary,
  calculateLabourPerArray,
  planForBudget,
  planForPowerTarget,
  scaleMaterialRequirements,
  scenarioBasisFrom,
  ConfigurationError,
  type BudgetCoverage,
  type Illumination,
  type PowerUnit,
} from "../src/lib/costing";
import { createLogger } from "../src/lib/log";
import { loadWorkspaceFile, RecordValidationError, selectDesign } from "../src/lib/records";
import {
  formatBudgetPlan,
  formatCostSummary,
  formatMaterialRequirements,
  formatPowerTargetPlan,
} from "../src/lib/reports/format";

const log = createLogger("costing");

export interface CostSummaryRun {
  output: string;
  exitCode: number;
}

function parseIllumination(value: unknown): Illumination {
  return typeof value === "string" && value.toUpperCase() === "AM0" ? "AM0" : ENV.DEFAULT_ILLUMINATION;
}

function parsePowerUnit(value: unknown): PowerUnit {
  return typeof value === "string" && value.toLowerCase() === "kw" ? "kW" : "W";
}

function parseCoverage(value: unknown): BudgetCoverage {
  return value === "materials_and_labour" ? "materials_and_labour" : "materials";
}

function optionalStringArg(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function optionalNumberArg(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function runCostSummary(argv: string[]): CostSummaryRun {
  const args = minimist(argv, {
    string: ["workspace", "design", "illumination", "power-unit", "budget-basis"],
    boolean: ["strict"],
  });

  try {
    const workspace = loadWorkspaceFile(optionalStringArg(args.workspace) ?? ENV.COSTING_WORKSPACE);
    const design = selectDesign(workspace, optionalStringArg(args.design));
    const illumination = parseIllumination(args.illumination);

    const summary = calculateCostSummary(
      {
        design,
        catalog: workspace.catalog,
        exchangeRateGbpPerUsd: workspace.product.exchangeRateGbpPerUsd,
        illumination,
      },
      workspace.selections
    );
    if (args.strict) assertFullyConfigured(summary);

    const labour = calculateLabourPerArray(workspace.steps, workspace.operators, design.numCells);
    const yieldFraction = optionalNumberArg(args.yield) ?? ENV.DEFAULT_LINE_YIELD;
    if (yieldFraction > 1) {
      log.warn("Line yield is a fraction; values above 1 are treated as 1", { yield: yieldFraction });
    }
    const basis = scenarioBasisFrom(summary, labour, yieldFraction);

    const sections = [formatCostSummary(summary, labour)];

    const targetPower = optionalNumberArg(args["target-power"]);
    if (targetPower !== undefined) {
      const plan = planForPowerTarget(basis, { targetPower, unit: parsePowerUnit(args["power-unit"]) });
      sections.push(formatPowerTargetPlan(plan));
      sections.push(formatMaterialRequirements(scaleMaterialRequirements(summary, plan.unitsToBuild)));
    }

    const budget = optionalNumberArg(args.budget);
    if (budget !== undefined) {
      const plan = planForBudget(basis, { budget, coverage: parseCoverage(args["budget-basis"]) });
      sections.push(formatBudgetPlan(plan));
      sections.push(formatMaterialRequirements(scaleMaterialRequirements(summary, plan.unitsAffordable)));
    }

    log.debug("Cost summary complete", { design: design.name, issues: summary.issues.length });
    return { output: sections.join("\n\n"), exitCode: 0 };
  } catch (err) {
    if (err instanceof RecordValidationError || err instanceof ConfigurationError) {
      const details = err instanceof RecordValidationError ? err.details : err.issues.map((issue) => issue.message);
      log.error(err.message, details.length > 0 ? { details } : undefined);
      return { output: "", exitCode: 1 };
    }
    throw err;
  }
}

if (require.main === module) {
  const { output, exitCode } = runCostSummary(process.argv.slice(2));
  if (output) console.log(output);
  process.exitCode = exitCode;
}
