/**
 * Diode Cost Calculator
 *
 * Bypass diodes: one per cell, each with two silver tabs cut to the selected
 * tab width and welded with one aluminium and one gold weld.
 * Blocking diodes: two per array, tabs of the design's two lengths in the
 * design's blocking-tab silver, welded with two BL welds each.
 *
 * Each assembly's raw cost is divided by its yield so scrapped diodes are
 * paid for by the good ones.
 *
 * @module categories/diodes
 */

import { categoryItems, requireItemById, resolveDesignReference, resolveSelection } from "../catalog";
import {
  BLOCKING_DIODES_PER_ARRAY,
  BL_WELDS_PER_BLOCKING_DIODE,
  DEFAULT_BLOCKING_YIELD_PERCENT,
  DEFAULT_BYPASS_TAB_LENGTH_MM,
  DEFAULT_BYPASS_TAB_WIDTH_MM,
  DEFAULT_BYPASS_YIELD_PERCENT,
  TABS_PER_BYPASS_DIODE,
  WELD_HEAD_IDS,
} from "../constants";
import { configurationIssue, type ConfigurationIssue } from "../errors";
import { power } from "../geometry";
import { costed, notConfigured } from "../results";
import { diodeUnitPriceGbp, silverCostPerMm, weldCostPerWeld } from "../unit-costs";
import type {
  CategoryCostResult,
  CostingContext,
  DiodeItem,
  DiodeSelection,
  MaterialRequirement,
  SilverRibbonItem,
} from "../types";
import { effectiveUnitCost, lengthOrDefault, yieldFractionFromPercent } from "./shared";

// ============================================================================
// TYPES
// ============================================================================

export interface DiodeAssemblyInput {
  diodePriceGbp: number;
  tabLengthsMm: number[];              // one entry per tab
  silverCostPerMm: number;
  weldCost: number;                    // all welds on one diode
  yieldFraction: number;
  quantity: number;                    // diodes per array
}

export interface DiodeAssemblyCost {
  tabSilverCost: number;
  rawCost: number;                     // one diode before yield
  effectiveCost: number;               // one good diode
  totalCost: number;                   // effectiveCost * quantity
}

export interface DiodeLine extends DiodeAssemblyCost {
  role: "Bypass" | "Blocking";
  diodeId: string | null;
  diodeName: string | null;
  diodePriceGbp: number;
  silverId: string | null;
  silverName: string | null;
  tabWidthMm: number;
  tabLengthsMm: number[];
  silverCostPerMm: number;
  weldCost: number;
  yieldFraction: number;
  quantity: number;
}

export interface DiodeCostDetail {
  bypass: DiodeLine;
  blocking: DiodeLine;
}

// ============================================================================
// IMPLEMENTATION
// ============================================================================

/**
 * Cost of one diode assembly (diode + tab silver + welds) and of all the
 * array's diodes of that kind.
 *
 * @example
 * diodeAssemblyCost({ diodePriceGbp: 0.1, tabLengthsMm: [5, 5], silverCostPerMm: 0.00005,
 *   weldCost: 0.002, yieldFraction: 0.8, quantity: 20 }).totalCost // 2.5625
 */
export function diodeAssemblyCost(input: DiodeAssemblyInput): DiodeAssemblyCost {
  const tabLengthMm = input.tabLengthsMm.reduce((sum, length) => sum + length, 0);
  const tabSilverCost = tabLengthMm * input.silverCostPerMm;
  const rawCost = input.diodePriceGbp + tabSilverCost + input.weldCost;
  const effectiveCost = effectiveUnitCost(rawCost, input.yieldFraction);
  return {
    tabSilverCost,
    rawCost,
    effectiveCost,
    totalCost: effectiveCost * input.quantity,
  };
}

export function calculateDiodeCost(
  context: CostingContext,
  selection: DiodeSelection = {}
): CategoryCostResult<DiodeCostDetail> {
  const { design, catalog, exchangeRateGbpPerUsd: rate } = context;
  const diodes = categoryItems(catalog, "Diodes");
  const silver = categoryItems(catalog, "Silver Ribbon");
  const weldHeads = categoryItems(catalog, "Weld heads");

  const missing: ConfigurationIssue[] = [];
  if (diodes.length === 0) {
    missing.push(configurationIssue("EMPTY_CATEGORY", "Diodes", "Diodes", "No diodes in the catalog"));
  }
  if (silver.length === 0) {
    missing.push(configurationIssue("EMPTY_CATEGORY", "Diodes", "Silver Ribbon", "No silver ribbon for diode tabs"));
  }
  const aluminium = requireItemById(weldHeads, WELD_HEAD_IDS.aluminium, "Diodes");
  const gold = requireItemById(weldHeads, WELD_HEAD_IDS.gold, "Diodes");
  const blockingHead = requireItemById(weldHeads, WELD_HEAD_IDS.blocking, "Diodes");
  for (const head of [aluminium, gold, blockingHead]) {
    if (head.issue) missing.push(head.issue);
  }
  if (missing.length > 0 || !aluminium.item || !gold.item || !blockingHead.item) {
    return notConfigured("Diodes", missing);
  }

  const issues: ConfigurationIssue[] = [];

  // Bypass diodes
  const bypassDiode = resolveSelection(diodes, selection.bypassDiode, "Diodes", "Bypass diode");
  const bypassSilver = resolveSelection(silver, selection.bypassTabSilver, "Diodes", "Bypass tab silver");
  if (bypassDiode.issue) issues.push(bypassDiode.issue);
  if (bypassSilver.issue) issues.push(bypassSilver.issue);

  const bypassTabLength = lengthOrDefault(selection.bypassTabLengthMm, DEFAULT_BYPASS_TAB_LENGTH_MM);
  const bypassTabWidth = lengthOrDefault(selection.bypassTabWidthMm, DEFAULT_BYPASS_TAB_WIDTH_MM);
  const bypass = buildLine({
    role: "Bypass",
    diode: bypassDiode.item,
    silverItem: bypassSilver.item,
    tabWidthMm: bypassTabWidth,
    tabLengthsMm: Array.from({ length: TABS_PER_BYPASS_DIODE }, () => bypassTabLength),
    weldCost: weldCostPerWeld(aluminium.item, rate) + weldCostPerWeld(gold.item, rate),
    yieldFraction: yieldFractionFromPercent(selection.bypassYieldPercent, DEFAULT_BYPASS_YIELD_PERCENT),
    quantity: Math.max(design.numCells, 0),
    rate,
  });

  // Blocking diodes
  const blockingDiode = resolveSelection(diodes, selection.blockingDiode, "Diodes", "Blocking diode");
  const blockingSilver = resolveDesignReference(silver, design.blockingTabSilverId, "Diodes", "Blocking tab silver");
  if (blockingDiode.issue) issues.push(blockingDiode.issue);
  if (blockingSilver.issue) issues.push(blockingSilver.issue);

  const blockingLine = buildLine({
    role: "Blocking",
    diode: blockingDiode.item,
    silverItem: blockingSilver.item,
    tabWidthMm: lengthOrDefault(design.blockingTabWidthMm, 0),
    tabLengthsMm: [
      lengthOrDefault(design.blockingTabLength1Mm, 0),
      lengthOrDefault(design.blockingTabLength2Mm, 0),
    ],
    weldCost: BL_WELDS_PER_BLOCKING_DIODE * weldCostPerWeld(blockingHead.item, rate),
    yieldFraction: yieldFractionFromPercent(selection.blockingYieldPercent, DEFAULT_BLOCKING_YIELD_PERCENT),
    quantity: BLOCKING_DIODES_PER_ARRAY,
    rate,
  });

  return costed({
    category: "Diodes",
    costPerUnit: bypass.totalCost + blockingLine.totalCost,
    arrayPowerW: power(design, context.illumination).arrayPowerW,
    detail: { bypass, blocking: blockingLine },
    requirements: [...lineRequirements(bypass), ...lineRequirements(blockingLine)],
    issues,
  });
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * A line whose diode or silver could not be resolved costs nothing; the
 * caller has already recorded the issue.
 */
function buildLine(params: {
  role: DiodeLine["role"];
  diode: DiodeItem | undefined;
  silverItem: SilverRibbonItem | undefined;
  tabWidthMm: number;
  tabLengthsMm: number[];
  weldCost: number;
  yieldFraction: number;
  quantity: number;
  rate: number;
}): DiodeLine {
  const { diode, silverItem } = params;
  const resolved = diode !== undefined && silverItem !== undefined;
  const diodePriceGbp = diode ? diodeUnitPriceGbp(diode, params.rate) : 0;
  const silverPerMm = silverItem ? silverCostPerMm(silverItem, params.rate, params.tabWidthMm) : 0;

  const assembly = resolved
    ? diodeAssemblyCost({
        diodePriceGbp,
        tabLengthsMm: params.tabLengthsMm,
        silverCostPerMm: silverPerMm,
        weldCost: params.weldCost,
        yieldFraction: params.yieldFraction,
        quantity: params.quantity,
      })
    : { tabSilverCost: 0, rawCost: 0, effectiveCost: 0, totalCost: 0 };

  return {
    role: params.role,
    diodeId: diode?.id ?? null,
    diodeName: diode?.name ?? null,
    diodePriceGbp,
    silverId: silverItem?.id ?? null,
    silverName: silverItem?.name ?? null,
    tabWidthMm: params.tabWidthMm,
    tabLengthsMm: params.tabLengthsMm,
    silverCostPerMm: silverPerMm,
    weldCost: params.weldCost,
    yieldFraction: params.yieldFraction,
    quantity: params.quantity,
    ...assembly,
  };
}

function lineRequirements(line: DiodeLine): MaterialRequirement[] {
  const requirements: MaterialRequirement[] = [];
  if (line.diodeId !== null) {
    requirements.push({
      category: "Diodes",
      description: `${line.role} diodes`,
      materialId: line.diodeId,
      materialName: line.diodeName,
      quantity: line.quantity,
      unit: "each",
    });
  }
  if (line.silverId !== null) {
    const tabLengthMm = line.tabLengthsMm.reduce((sum, length) => sum + length, 0);
    requirements.push({
      category: "Diodes",
      description: `${line.role} diode tab silver`,
      materialId: line.silverId,
      materialName: line.silverName,
      quantity: tabLengthMm * line.quantity,
      unit: "mm",
    });
  }
  return requirements;
}
