/**
 * Array Geometry & Power
 *
 * String length, perimeter and electrical output of an array design. Pure
 * functions only; every length here is in millimetres.
 *
 * @module geometry
 */

import { CELL_AREA_M2, IRRADIANCE_W_PER_M2, PERIMETER_ALLOWANCE_MM } from "./constants";
import type { ArrayDesign, Illumination, ProductConfig } from "./types";

export interface ArrayPower {
  cellPowerW: number;
  arrayPowerW: number;
}

/**
 * Power at both standard spectra, as shown in design listings.
 */
export interface DesignPowerSummary {
  cellAm15W: number;
  arrayAm15W: number;
  cellAm0W: number;
  arrayAm0W: number;
}

// ============================================================================
// LENGTHS
// ============================================================================

/**
 * Physical length of a single string of cells.
 *
 * `posGap + negGap + n*cellHeight + max(n-1, 0)*gap`, with negative cell
 * counts treated as zero.
 */
export function stringLength(
  numCells: number,
  cellHeightMm: number,
  gapBetweenCellsMm: number,
  positiveEndGapMm: number,
  negativeEndGapMm: number
): number {
  const n = Math.max(numCells, 0);
  const cellsLength = n * cellHeightMm;
  const gapsLength = Math.max(n - 1, 0) * gapBetweenCellsMm;
  return positiveEndGapMm + negativeEndGapMm + cellsLength + gapsLength;
}

/** Base length of a design: its string length from its own geometry. */
export function baseLength(design: ArrayDesign): number {
  return stringLength(
    design.numCells,
    design.cellHeightMm,
    design.gapBetweenCellsMm,
    design.positiveEndGapMm,
    design.negativeEndGapMm
  );
}

export function perimeterLength(baseLengthMm: number): number {
  return 2 * baseLengthMm + PERIMETER_ALLOWANCE_MM;
}

export function productCellsPerArray(product: ProductConfig): number {
  return product.cellsPerString * product.stringsPerArray;
}

export function productStringLength(product: ProductConfig): number {
  return stringLength(
    product.cellsPerString,
    product.cellHeightMm,
    product.gapBetweenCellsMm,
    product.positiveEndGapMm,
    product.negativeEndGapMm
  );
}

// ============================================================================
// POWER
// ============================================================================

function cellPower(efficiencyPercent: number, illumination: Illumination): number {
  return (efficiencyPercent / 100) * IRRADIANCE_W_PER_M2[illumination] * CELL_AREA_M2;
}

/**
 * Electrical output of one cell and of the whole array under the given
 * spectrum. AM1.5 uses the design's AM1.5 efficiency, AM0 its AM0 efficiency.
 */
export function power(design: ArrayDesign, illumination: Illumination): ArrayPower {
  const efficiency = illumination === "AM0" ? design.effAm0Percent : design.effAm15Percent;
  const cellPowerW = cellPower(efficiency, illumination);
  return {
    cellPowerW,
    arrayPowerW: cellPowerW * design.numCells,
  };
}

export function computeDesignPower(design: ArrayDesign): DesignPowerSummary {
  const am15 = power(design, "AM1.5");
  const am0 = power(design, "AM0");
  return {
    cellAm15W: am15.cellPowerW,
    arrayAm15W: am15.arrayPowerW,
    cellAm0W: am0.cellPowerW,
    arrayAm0W: am0.arrayPowerW,
  };
}
