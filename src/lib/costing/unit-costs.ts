/**
 * Unit-Cost Resolvers
 *
 * Turn a single catalog item into a GBP cost per unit of consumption
 * (per mm of ribbon, per weld, per metre of roll, per disk, per mL, per
 * piece). USD prices are converted exactly once, here, using the rate the
 * caller passes in.
 *
 * A missing, non-finite or non-positive divisor or geometry field yields 0.
 * None of these functions throw.
 *
 * @module unit-costs
 */

import { FEET_TO_METRES } from "./constants";
import type {
  BoxItem,
  Currency,
  DiodeItem,
  EpoxyItem,
  FoamItem,
  FrameItem,
  KaptonItem,
  RollItem,
  ShippingBoardItem,
  SilverRibbonItem,
  WeldHeadItem,
} from "./types";

export function toGbp(amount: number, currency: Currency, exchangeRateGbpPerUsd: number): number {
  return currency === "USD" ? amount * exchangeRateGbpPerUsd : amount;
}

// ============================================================================
// SILVER, DIODES, WELDS
// ============================================================================

/**
 * Cost of one millimetre of silver ribbon.
 *
 * Volume per mm is `(w/10) * (t/10) * 0.1` cm³, times density gives grams,
 * times the GBP price per gram gives cost. A width override replaces the
 * catalog width (diode tabs are cut narrower than the stock ribbon).
 */
export function silverCostPerMm(
  item: SilverRibbonItem,
  exchangeRateGbpPerUsd: number,
  widthOverrideMm?: number
): number {
  const width = positive(widthOverrideMm ?? item.widthMm);
  const thickness = positive(item.thicknessMm);
  const density = positive(item.densityGCm3);
  if (width === null || thickness === null || density === null) return 0;

  const pricePerG = finiteOrZero(item.pricePerG);
  const pricePerGGbp = toGbp(pricePerG, item.priceCurrency ?? "USD", exchangeRateGbpPerUsd);

  const volumePerMmCm3 = (width / 10) * (thickness / 10) * 0.1;
  return volumePerMmCm3 * density * pricePerGGbp;
}

export function diodeUnitPriceGbp(item: DiodeItem, exchangeRateGbpPerUsd: number): number {
  const currency = item.currency ?? "USD";
  if (currency === "USD") {
    return finiteOrZero(item.unitCostUsd) * exchangeRateGbpPerUsd;
  }
  return finiteOrZero(item.unitCostGbp);
}

/**
 * Cost of a single weld: the head's price spread over the welds it lasts.
 */
export function weldCostPerWeld(item: WeldHeadItem, exchangeRateGbpPerUsd: number): number {
  const numWelds = positive(item.numWelds);
  if (numWelds === null) return 0;

  const currency = item.currency ?? "USD";
  const unitCost =
    currency === "USD"
      ? finiteOrZero(item.unitCostUsd) * exchangeRateGbpPerUsd
      : finiteOrZero(item.unitCostGbp);
  return unitCost / numWelds;
}

// ============================================================================
// ROLLS (LAMINATION & TAPES)
// ============================================================================

export function rollLengthMetres(item: RollItem): number {
  const length = positive(item.rollLengthValue);
  if (length === null) return 0;
  return item.rollLengthUnit === "ft" ? length * FEET_TO_METRES : length;
}

/**
 * Cost of one metre off a roll. A GBP roll cost wins over a USD one.
 */
export function rollCostPerMetre(item: RollItem, exchangeRateGbpPerUsd: number): number {
  const metres = rollLengthMetres(item);
  if (metres <= 0) return 0;

  const rollCostGbp = normalizeNumber(item.rollCostGbp);
  if (rollCostGbp !== null) return rollCostGbp / metres;

  const rollCostUsd = normalizeNumber(item.rollCostUsd);
  if (rollCostUsd !== null) return (rollCostUsd * exchangeRateGbpPerUsd) / metres;

  return 0;
}

// ============================================================================
// MISC
// ============================================================================

export function kaptonCostPerDisk(item: KaptonItem, exchangeRateGbpPerUsd: number): number {
  const precomputed = normalizeNumber(item.costPerDiskGbp);
  if (precomputed !== null) return precomputed;

  const disks = positive(item.disksPerRoll);
  if (disks === null) return 0;

  const rollCostGbp = normalizeNumber(item.rollCostGbp);
  if (rollCostGbp !== null) return rollCostGbp / disks;

  const rollCostUsd = normalizeNumber(item.rollCostUsd);
  if ((item.currency ?? "USD") === "USD" && rollCostUsd !== null) {
    return (rollCostUsd * exchangeRateGbpPerUsd) / disks;
  }
  return 0;
}

export function epoxyCostPerMl(item: EpoxyItem, exchangeRateGbpPerUsd: number): number {
  const precomputed = normalizeNumber(item.costPerMlGbp);
  if (precomputed !== null) return precomputed;

  const volume = positive(item.volumeMl);
  if (volume === null) return 0;

  const totalGbp = normalizeNumber(item.totalCostGbp);
  if (totalGbp !== null) return totalGbp / volume;

  const totalUsd = normalizeNumber(item.totalCostUsd);
  if ((item.currency ?? "GBP") === "USD" && totalUsd !== null) {
    return (totalUsd * exchangeRateGbpPerUsd) / volume;
  }
  return 0;
}

// ============================================================================
// PACKAGING
// ============================================================================

/** Per-piece price of a frame, shipping board or box. */
export function unitCostGbp(
  item: FrameItem | ShippingBoardItem | BoxItem,
  exchangeRateGbpPerUsd: number
): number {
  const gbp = normalizeNumber(item.unitCostGbp);
  if (gbp !== null) return gbp;

  const usd = normalizeNumber(item.unitCostUsd);
  if ((item.currency ?? "GBP") === "USD" && usd !== null) {
    return usd * exchangeRateGbpPerUsd;
  }
  return 0;
}

export function foamCostPerPiece(item: FoamItem, exchangeRateGbpPerUsd: number): number {
  const pieces = positive(item.numPieces);
  if (pieces === null) return 0;

  const totalGbp = normalizeNumber(item.totalCostGbp);
  if (totalGbp !== null) return totalGbp / pieces;

  const totalUsd = normalizeNumber(item.totalCostUsd);
  if ((item.currency ?? "GBP") === "USD" && totalUsd !== null) {
    return (totalUsd * exchangeRateGbpPerUsd) / pieces;
  }
  return 0;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Normalize a number value, returning null for null/undefined/NaN/Infinity.
 */
function normalizeNumber(value: number | null | undefined): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  return value;
}

function positive(value: number | null | undefined): number | null {
  const normalized = normalizeNumber(value);
  return normalized !== null && normalized > 0 ? normalized : null;
}

function finiteOrZero(value: number | null | undefined): number {
  return normalizeNumber(value) ?? 0;
}
