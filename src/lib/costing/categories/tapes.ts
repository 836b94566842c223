/**
 * Tape Cost Calculator
 *
 * Perimeter tape runs round the array (`2 * base + 140` mm); a second tape
 * is cut to a length the user enters.
 *
 * @module categories/tapes
 */

import { categoryItems, resolveSelection } from "../catalog";
import { configurationIssue, type ConfigurationIssue } from "../errors";
import { baseLength, perimeterLength, power } from "../geometry";
import { costed, notConfigured } from "../results";
import type { CategoryCostResult, CostingContext, TapeSelection } from "../types";
import { rollLine, rollRequirements, type RollLine } from "./lamination";
import { lengthOrDefault } from "./shared";

export interface TapeCostDetail {
  perimeterLengthMm: number;
  perimeter: RollLine;
  other: RollLine;
}

export function calculateTapeCost(
  context: CostingContext,
  selection: TapeSelection = {}
): CategoryCostResult<TapeCostDetail> {
  const { design, exchangeRateGbpPerUsd: rate } = context;
  const tapes = categoryItems(context.catalog, "Tapes");
  if (tapes.length === 0) {
    return notConfigured("Tapes", [
      configurationIssue("EMPTY_CATEGORY", "Tapes", "Tapes", "No tapes in the catalog"),
    ]);
  }

  const issues: ConfigurationIssue[] = [];
  const perimeterLengthMm = perimeterLength(baseLength(design));

  const perimeterTape = resolveSelection(tapes, selection.perimeterTape, "Tapes", "Perimeter tape");
  if (perimeterTape.issue) issues.push(perimeterTape.issue);
  const otherTape = resolveSelection(tapes, selection.otherTape, "Tapes", "Other tape");
  if (otherTape.issue) issues.push(otherTape.issue);

  const perimeter = rollLine("Perimeter tape", perimeterTape.item, perimeterLengthMm, rate);
  const other = rollLine("Other tape", otherTape.item, lengthOrDefault(selection.otherTapeLengthMm, 0), rate);

  return costed({
    category: "Tapes",
    costPerUnit: perimeter.cost + other.cost,
    arrayPowerW: power(design, context.illumination).arrayPowerW,
    detail: { perimeterLengthMm, perimeter, other },
    requirements: rollRequirements("Tapes", [perimeter, other]),
    issues,
  });
}
