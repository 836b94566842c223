/**
 * Small numeric helpers shared by the category calculators.
 */

/**
 * A caller-supplied length: negative values clamp to 0, missing or
 * non-finite values take the default.
 */
export function lengthOrDefault(value: number | null | undefined, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  return Math.max(value, 0);
}

/**
 * Yield as a fraction. Non-positive or non-finite yields count as 100%.
 */
export function yieldFractionFromPercent(percent: number | null | undefined, fallbackPercent: number): number {
  const value = typeof percent === "number" && Number.isFinite(percent) ? percent : fallbackPercent;
  return value > 0 ? value / 100 : 1;
}

/**
 * Cost of a good unit once scrap is accounted for.
 */
export function effectiveUnitCost(rawCost: number, yieldFraction: number): number {
  const y = Number.isFinite(yieldFraction) && yieldFraction > 0 ? yieldFraction : 1;
  return rawCost / y;
}
