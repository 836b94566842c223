/**
 * Labour Calculator
 *
 * Converts process-step timings into seconds and GBP per unit, and rolls
 * steps up into whole-process and per-array labour.
 *
 * Step timing is entered in one of three ways:
 * - per cell or per diode, one unit at a time
 * - per cell or per diode, as a batch (time for N units)
 * - per array, spread over the cells the step handles
 *
 * The stored `timePerUnitS` is always the post-yield figure.
 *
 * @module labour
 */

import { SECONDS_PER_HOUR } from "./constants";
import type { OperatorProfile, OperatorProfiles, ProcessStep, QuantitySource, TimeUnit } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface StepTiming {
  rawTimePerUnitS: number;
  effectiveTimePerUnitS: number;           // raw / yield
  yieldFraction: number;                   // after normalisation
  unitLabel: "cell" | "diode" | "cell (array step)" | "unknown";
}

export interface ProcessQuantities {
  cellsPerString: number;
  stringsPerArray: number;
  bypassDiodesPerArray?: number;
  blockingDiodesPerArray?: number;
}

export interface StepLabourResult {
  stepId: string;
  stepName: string;
  timingBasis: string;
  quantitySource: string;
  unitsPerArray: number;
  timePerUnitS: number;
  setupTimeSPerArray: number;
  totalStepSeconds: number;
  operatorHours: number;
  cost: number;
  assignedOperators: OperatorProfile[];
  notes: string;
}

export interface ProcessLabourResult {
  steps: StepLabourResult[];
  totalCost: number;
  totalHours: number;
}

export interface ArrayLabour {
  timePerCellS: number;
  costPerCell: number;
  timePerArrayS: number;
  costPerArray: number;
}

// ============================================================================
// STEP TIMING
// ============================================================================

export function toSeconds(value: number, unit: TimeUnit): number {
  return unit === "minutes" ? value * 60 : value;
}

export function normaliseYield(yieldFraction: number | null | undefined): number {
  if (typeof yieldFraction !== "number" || !Number.isFinite(yieldFraction) || yieldFraction <= 0) return 1;
  return yieldFraction;
}

/**
 * Raw and yield-adjusted seconds per unit for a step, from how its time was
 * entered. Degenerate inputs (zero batch size, zero cells) give zero.
 */
export function computeStepTiming(step: ProcessStep): StepTiming {
  const yieldFraction = normaliseYield(step.yieldFraction);
  const basis = step.timingBasis.toLowerCase();

  let rawTimePerUnitS = 0;
  let unitLabel: StepTiming["unitLabel"] = "unknown";

  if (basis === "cell" || basis === "diode") {
    unitLabel = basis;
    if (step.entryMode === "per_batch") {
      const batchSeconds = toSeconds(finiteOrZero(step.batchTimeValue), step.batchTimeUnit);
      rawTimePerUnitS = step.batchUnits > 0 ? batchSeconds / step.batchUnits : 0;
    } else {
      rawTimePerUnitS = toSeconds(finiteOrZero(step.timeValue), step.timeUnit);
    }
  } else if (basis === "array") {
    unitLabel = "cell (array step)";
    const arraySeconds = toSeconds(finiteOrZero(step.timeValue), step.timeUnit);
    rawTimePerUnitS = step.cellsPerArrayForStep > 0 ? arraySeconds / step.cellsPerArrayForStep : 0;
  }

  return {
    rawTimePerUnitS,
    effectiveTimePerUnitS: rawTimePerUnitS / yieldFraction,
    yieldFraction,
    unitLabel,
  };
}

/**
 * Copy of the step with its stored time recomputed from its entry fields.
 * Steps on the per_array/per_unit bases keep their stored time.
 */
export function applyStepTiming(step: ProcessStep): ProcessStep {
  const timing = computeStepTiming(step);
  if (timing.unitLabel === "unknown") return { ...step };
  return { ...step, timePerUnitS: timing.effectiveTimePerUnitS };
}

// ============================================================================
// OPERATORS & COST
// ============================================================================

export function assignedOperators(step: ProcessStep, profiles: OperatorProfiles): OperatorProfile[] {
  const assigned: OperatorProfile[] = [];
  for (const slot of step.operators) {
    if (slot.operatorId === null) continue;
    const profile = profiles[slot.operatorId];
    if (profile) assigned.push(profile);
  }
  return assigned;
}

/**
 * Combined hourly rate of the operators assigned to a step. Empty slots and
 * unknown operator ids contribute nothing.
 */
export function sumOperatorRates(step: ProcessStep, profiles: OperatorProfiles): number {
  return assignedOperators(step, profiles).reduce((sum, profile) => sum + finiteOrZero(profile.hourlyRate), 0);
}

export function stepCostPerUnit(step: ProcessStep, profiles: OperatorProfiles): number {
  return (finiteOrZero(step.timePerUnitS) / SECONDS_PER_HOUR) * sumOperatorRates(step, profiles);
}

// ============================================================================
// AGGREGATION
// ============================================================================

/**
 * Labour for the whole process, one array at a time.
 *
 * - per_unit steps: `(units / yield) * timePerUnitS + setup`, units taken
 *   from the step's quantity source
 * - per_array steps: `timePerUnitS + setup`
 * - any other basis contributes nothing
 */
export function calculateProcessLabour(
  steps: ProcessStep[],
  profiles: OperatorProfiles,
  quantities: ProcessQuantities
): ProcessLabourResult {
  const quantityMap: Record<QuantitySource, number> = {
    array: 1,
    cells: quantities.cellsPerString * quantities.stringsPerArray,
    strings: quantities.stringsPerArray,
    bypass_diodes: quantities.bypassDiodesPerArray ?? 0,
    blocking_diodes: quantities.blockingDiodesPerArray ?? 0,
  };

  const results: StepLabourResult[] = steps.map((step) => {
    const basis = step.timingBasis.toLowerCase();
    const yieldFraction = normaliseYield(step.yieldFraction);
    const timePerUnitS = finiteOrZero(step.timePerUnitS);
    const setup = finiteOrZero(step.setupTimeSPerArray);

    let unitsPerArray = 0;
    let totalStepSeconds = 0;
    if (basis === "per_array") {
      unitsPerArray = 1;
      totalStepSeconds = timePerUnitS + setup;
    } else if (basis === "per_unit") {
      unitsPerArray = isQuantitySource(step.quantitySource) ? quantityMap[step.quantitySource] : 0;
      totalStepSeconds = (unitsPerArray / yieldFraction) * timePerUnitS + setup;
    }

    const operatorHours = totalStepSeconds / SECONDS_PER_HOUR;
    const operators = assignedOperators(step, profiles);
    const cost = operators.reduce((sum, profile) => sum + finiteOrZero(profile.hourlyRate) * operatorHours, 0);

    return {
      stepId: step.id,
      stepName: step.name,
      timingBasis: step.timingBasis,
      quantitySource: step.quantitySource,
      unitsPerArray,
      timePerUnitS,
      setupTimeSPerArray: setup,
      totalStepSeconds,
      operatorHours,
      cost,
      assignedOperators: operators,
      notes: step.notes,
    };
  });

  return {
    steps: results,
    totalCost: results.reduce((sum, step) => sum + step.cost, 0),
    totalHours: results.reduce((sum, step) => sum + step.operatorHours, 0),
  };
}

/**
 * Labour time and cost for one array from cell- and array-basis steps.
 *
 * Both bases store time per cell, so they sum to a per-cell figure that is
 * scaled by the array's cell count. Diode-basis steps and steps without a
 * positive stored time are left out.
 */
export function calculateLabourPerArray(
  steps: ProcessStep[],
  profiles: OperatorProfiles,
  numCells: number
): ArrayLabour {
  let timePerCellS = 0;
  let costPerCell = 0;

  for (const step of steps) {
    const basis = step.timingBasis.toLowerCase();
    if (basis !== "cell" && basis !== "array") continue;
    const seconds = finiteOrZero(step.timePerUnitS);
    if (seconds <= 0) continue;

    timePerCellS += seconds;
    costPerCell += seconds * (sumOperatorRates(step, profiles) / SECONDS_PER_HOUR);
  }

  const cells = Math.max(numCells, 0);
  return {
    timePerCellS,
    costPerCell,
    timePerArrayS: timePerCellS * cells,
    costPerArray: costPerCell * cells,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

const QUANTITY_SOURCES: readonly string[] = ["array", "cells", "strings", "bypass_diodes", "blocking_diodes"];

function isQuantitySource(value: string): value is QuantitySource {
  return QUANTITY_SOURCES.includes(value);
}

function finiteOrZero(value: number | null | undefined): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}
