/**
 * Weld Head Cost Calculator
 *
 * Counts every weld made on an array and prices the silver (Ag) welds.
 * Aluminium, gold and BL welds attach the diodes and are already priced
 * inside the diode assemblies, so they appear in the breakdown but not in
 * this category's cost.
 *
 * @module categories/weld-heads
 */

import { categoryItems, findItemById, requireItemById } from "../catalog";
import {
  AG_WELDS_NEGATIVE_END,
  AG_WELDS_PER_BYPASS_DIODE,
  AG_WELDS_PER_TOP_TAB,
  AG_WELDS_POSITIVE_END,
  BL_WELDS_PER_ARRAY,
  WELD_HEAD_IDS,
} from "../constants";
import { power } from "../geometry";
import { costed, notConfigured } from "../results";
import { weldCostPerWeld } from "../unit-costs";
import type { CategoryCostResult, CostingContext, MaterialRequirement } from "../types";
import { topTabCount } from "./silver";

export interface WeldCounts {
  agTopTabs: number;
  agNegativeEnd: number;
  agPositiveEnd: number;
  agBypassAttach: number;
  ag: number;                          // sum of the four Ag figures
  al: number;
  au: number;
  bl: number;
}

export interface WeldHeadLine {
  headId: string;
  headName: string | null;             // null when the head is not in the catalog
  welds: number;
  costPerWeld: number | null;
  cost: number;
  includedInCategoryCost: boolean;
}

export interface WeldHeadCostDetail {
  counts: WeldCounts;
  heads: WeldHeadLine[];
  allHeadsCost: number;                // every head, including diode welds
}

export function countArrayWelds(numCells: number): WeldCounts {
  const cells = Math.max(numCells, 0);
  const agTopTabs = topTabCount(cells) * AG_WELDS_PER_TOP_TAB;
  const agBypassAttach = cells * AG_WELDS_PER_BYPASS_DIODE;
  return {
    agTopTabs,
    agNegativeEnd: AG_WELDS_NEGATIVE_END,
    agPositiveEnd: AG_WELDS_POSITIVE_END,
    agBypassAttach,
    ag: agTopTabs + AG_WELDS_NEGATIVE_END + AG_WELDS_POSITIVE_END + agBypassAttach,
    al: cells,
    au: cells,
    bl: BL_WELDS_PER_ARRAY,
  };
}

export function calculateWeldHeadCost(context: CostingContext): CategoryCostResult<WeldHeadCostDetail> {
  const { design, exchangeRateGbpPerUsd: rate } = context;
  const weldHeads = categoryItems(context.catalog, "Weld heads");

  const silverHead = requireItemById(weldHeads, WELD_HEAD_IDS.silver, "Weld heads");
  if (silverHead.issue) {
    return notConfigured("Weld heads", [silverHead.issue]);
  }

  const agHead = silverHead.item;
  const counts = countArrayWelds(design.numCells);
  const welds: Array<[string, number]> = [
    [WELD_HEAD_IDS.silver, counts.ag],
    [WELD_HEAD_IDS.aluminium, counts.al],
    [WELD_HEAD_IDS.gold, counts.au],
    [WELD_HEAD_IDS.blocking, counts.bl],
  ];

  const heads: WeldHeadLine[] = welds.map(([headId, count]) => {
    const head = headId === WELD_HEAD_IDS.silver ? agHead : findItemById(weldHeads, headId);
    const costPerWeld = head ? weldCostPerWeld(head, rate) : null;
    return {
      headId,
      headName: head?.name ?? null,
      welds: count,
      costPerWeld,
      cost: (costPerWeld ?? 0) * count,
      includedInCategoryCost: headId === WELD_HEAD_IDS.silver,
    };
  });

  const requirements = heads.map(
    (line): MaterialRequirement => ({
      category: "Weld heads",
      description: `${line.headId} welds`,
      materialId: line.headId,
      materialName: line.headName,
      quantity: line.welds,
      unit: "welds",
    })
  );

  return costed({
    category: "Weld heads",
    costPerUnit: heads.filter((line) => line.includedInCategoryCost).reduce((sum, line) => sum + line.cost, 0),
    arrayPowerW: power(design, context.illumination).arrayPowerW,
    detail: {
      counts,
      heads,
      allHeadsCost: heads.reduce((sum, line) => sum + line.cost, 0),
    },
    requirements,
    issues: [],
  });
}
