/**
 * Misc Cost Calculator
 *
 * Kapton insulation disks (one under every bypass diode) and epoxy for the
 * two blocking diodes.
 *
 * @module categories/misc
 */

import { categoryItems, resolveSelection } from "../catalog";
import { DIODES_WITH_EPOXY_PER_ARRAY } from "../constants";
import { configurationIssue, type ConfigurationIssue } from "../errors";
import { power } from "../geometry";
import { costed, notConfigured } from "../results";
import { epoxyCostPerMl, kaptonCostPerDisk } from "../unit-costs";
import type {
  CategoryCostResult,
  CostingContext,
  EpoxyItem,
  KaptonItem,
  MaterialRequirement,
  MiscItem,
  MiscSelection,
} from "../types";
import { lengthOrDefault } from "./shared";

export interface MiscCostDetail {
  kapton: {
    materialId: string | null;
    disks: number;
    costPerDisk: number;
    cost: number;
  };
  epoxy: {
    materialId: string | null;
    mlPerDiode: number;
    diodes: number;
    totalMl: number;
    costPerMl: number;
    cost: number;
  };
}

function isKapton(item: MiscItem): item is KaptonItem {
  return item.type === "Kapton";
}

function isEpoxy(item: MiscItem): item is EpoxyItem {
  return item.type === "Epoxy";
}

export function calculateMiscCost(
  context: CostingContext,
  selection: MiscSelection = {}
): CategoryCostResult<MiscCostDetail> {
  const { design, exchangeRateGbpPerUsd: rate } = context;
  const miscItems = categoryItems(context.catalog, "Misc");
  if (miscItems.length === 0) {
    return notConfigured("Misc", [
      configurationIssue("EMPTY_CATEGORY", "Misc", "Misc", "No misc materials in the catalog"),
    ]);
  }

  const issues: ConfigurationIssue[] = [];

  const kaptonItem = miscItems.find(isKapton);
  if (!kaptonItem) {
    issues.push(configurationIssue("MISSING_ROLE", "Misc", "Kapton insulation", "No Kapton insulation in the catalog"));
  }
  const disks = Math.max(design.numCells, 0);
  const costPerDisk = kaptonItem ? kaptonCostPerDisk(kaptonItem, rate) : 0;

  const epoxyItems = miscItems.filter(isEpoxy);
  const epoxy = resolveSelection(epoxyItems, selection.epoxy, "Misc", "Epoxy");
  if (epoxy.issue) issues.push(epoxy.issue);
  const mlPerDiode = lengthOrDefault(selection.epoxyMlPerDiode, 0);
  const totalMl = mlPerDiode * DIODES_WITH_EPOXY_PER_ARRAY;
  const costPerMl = epoxy.item ? epoxyCostPerMl(epoxy.item, rate) : 0;

  const detail: MiscCostDetail = {
    kapton: {
      materialId: kaptonItem?.id ?? null,
      disks,
      costPerDisk,
      cost: costPerDisk * disks,
    },
    epoxy: {
      materialId: epoxy.item?.id ?? null,
      mlPerDiode,
      diodes: DIODES_WITH_EPOXY_PER_ARRAY,
      totalMl,
      costPerMl,
      cost: costPerMl * totalMl,
    },
  };

  const requirements: MaterialRequirement[] = [];
  if (kaptonItem) {
    requirements.push({
      category: "Misc",
      description: "Kapton disks",
      materialId: kaptonItem.id,
      materialName: kaptonItem.name,
      quantity: disks,
      unit: "each",
    });
  }
  if (epoxy.item) {
    requirements.push({
      category: "Misc",
      description: "Epoxy",
      materialId: epoxy.item.id,
      materialName: epoxy.item.name,
      quantity: totalMl,
      unit: "mL",
    });
  }

  return costed({
    category: "Misc",
    costPerUnit: detail.kapton.cost + detail.epoxy.cost,
    arrayPowerW: power(design, context.illumination).arrayPowerW,
    detail,
    requirements,
    issues,
  });
}
