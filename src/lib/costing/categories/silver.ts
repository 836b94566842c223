/**
 * Silver Ribbon Cost Calculator
 *
 * Silver consumed by the array itself (not by diode tabs, which are costed
 * with the diodes):
 * - top tabs: two per cell junction, i.e. `2 * (numCells - 1)`
 * - negative end bars: two per array, length from the design
 * - negative bar: one per array, length from the design
 *
 * Each line is cut at the linked ribbon's own width.
 *
 * @module categories/silver
 */

import { categoryItems, resolveDesignReference, resolveSelection } from "../catalog";
import { DEFAULT_TOP_TAB_LENGTH_MM } from "../constants";
import { configurationIssue, type ConfigurationIssue } from "../errors";
import { power } from "../geometry";
import { costed, notConfigured } from "../results";
import { silverCostPerMm } from "../unit-costs";
import type {
  CategoryCostResult,
  CostingContext,
  MaterialRequirement,
  SilverRibbonItem,
  SilverSelection,
} from "../types";
import { lengthOrDefault } from "./shared";

export interface SilverLine {
  role: string;                        // "Top tabs", "Negative end bars", "Negative bar"
  materialId: string | null;
  materialName: string | null;
  pieces: number;
  pieceLengthMm: number;
  lengthMm: number;                    // pieces * pieceLengthMm
  costPerMm: number;
  cost: number;
}

export interface SilverCostDetail {
  topTabCount: number;
  lines: SilverLine[];
}

export function topTabCount(numCells: number): number {
  return 2 * Math.max(numCells - 1, 0);
}

export function calculateSilverCost(
  context: CostingContext,
  selection: SilverSelection = {}
): CategoryCostResult<SilverCostDetail> {
  const { design, exchangeRateGbpPerUsd } = context;
  const silverItems = categoryItems(context.catalog, "Silver Ribbon");
  if (silverItems.length === 0) {
    return notConfigured("Silver", [
      configurationIssue("EMPTY_CATEGORY", "Silver", "Silver Ribbon", "No silver ribbon in the catalog"),
    ]);
  }

  const issues: ConfigurationIssue[] = [];
  const tabs = topTabCount(design.numCells);

  const lineFor = (
    role: string,
    item: SilverRibbonItem | undefined,
    pieces: number,
    pieceLengthMm: number
  ): SilverLine => {
    const lengthMm = pieces * pieceLengthMm;
    const costPerMm = item ? silverCostPerMm(item, exchangeRateGbpPerUsd) : 0;
    return {
      role,
      materialId: item?.id ?? null,
      materialName: item?.name ?? null,
      pieces,
      pieceLengthMm,
      lengthMm,
      costPerMm,
      cost: costPerMm * lengthMm,
    };
  };

  const topTab = resolveSelection(silverItems, selection.topTabSilver, "Silver", "Top tab silver");
  if (topTab.issue) issues.push(topTab.issue);

  const negativeEnd = resolveDesignReference(silverItems, design.negativeEndSilverId, "Silver", "Negative end silver");
  if (negativeEnd.issue) issues.push(negativeEnd.issue);

  const negativeBar = resolveDesignReference(silverItems, design.negativeBarSilverId, "Silver", "Negative bar silver");
  if (negativeBar.issue) issues.push(negativeBar.issue);

  const lines: SilverLine[] = [
    lineFor("Top tabs", topTab.item, tabs, lengthOrDefault(selection.topTabLengthMm, DEFAULT_TOP_TAB_LENGTH_MM)),
    lineFor("Negative end bars", negativeEnd.item, 2, lengthOrDefault(design.negativeEndLengthMm, 0)),
    lineFor("Negative bar", negativeBar.item, 1, lengthOrDefault(design.negativeBarLengthMm, 0)),
  ];

  const requirements: MaterialRequirement[] = lines
    .filter((line) => line.materialId !== null)
    .map((line): MaterialRequirement => ({
      category: "Silver",
      description: line.role,
      materialId: line.materialId,
      materialName: line.materialName,
      quantity: line.lengthMm,
      unit: "mm",
    }));

  return costed({
    category: "Silver",
    costPerUnit: lines.reduce((sum, line) => sum + line.cost, 0),
    arrayPowerW: power(design, context.illumination).arrayPowerW,
    detail: { topTabCount: tabs, lines },
    requirements,
    issues,
  });
}
