/**
 * Process step records: schema upgrade and parsing.
 *
 * Older process files stored `operators` as a head count and lacked the
 * timing, yield and batch fields. `upgradeProcessSteps` fills those in once,
 * returning copies and whether anything changed so the caller can write the
 * upgraded records back.
 *
 * @module records/process-steps
 */

import { z } from "zod";

import type { EntryMode, OperatorSlot, ProcessStep, TimeUnit } from "../costing/types";
import { createLogger } from "../log";
import { RecordValidationError } from "./errors";
import { describeIssues, isRecord } from "./parse";
import { optionalNumber, optionalString } from "./schemas";

const log = createLogger("process");

export type RawProcessStep = Record<string, unknown>;

export interface UpgradedProcessSteps {
  steps: RawProcessStep[];
  upgraded: boolean;
}

const STEP_DEFAULTS: ReadonlyArray<[string, unknown]> = [
  ["timing_basis", "per_array"],
  ["quantity_source", "array"],
  ["yield_fraction", 1.0],
  ["entry_mode", "per_unit"],
  ["batch_units", 1.0],
  ["batch_seconds", 0.0],
  ["time_per_unit_s", 0.0],
  ["setup_time_s_per_array", 0.0],
];

// ============================================================================
// UPGRADE
// ============================================================================

/**
 * Bring raw step records up to the current schema. Accepts a list of steps
 * or `{ process: [...] }`. Input records are not modified.
 */
export function upgradeProcessSteps(raw: unknown): UpgradedProcessSteps {
  const list = isRecord(raw) ? raw["process"] : raw;
  if (list === undefined || list === null) return { steps: [], upgraded: false };
  if (!Array.isArray(list)) {
    throw new RecordValidationError("Process steps must be a list");
  }

  let upgraded = false;
  const steps = list.filter(isRecord).map((original) => {
    const step: RawProcessStep = { ...original };

    const operators = step["operators"];
    if (typeof operators === "number") {
      const count = Math.max(Math.trunc(operators), 0);
      step["operators"] = Array.from({ length: count }, () => ({ operator_id: null }));
      upgraded = true;
    } else if (!Array.isArray(operators)) {
      step["operators"] = [];
      upgraded = true;
    }

    // The step editor once saved the entry mode under a different key
    if (!("entry_mode" in step) && typeof step["timing_entry_mode"] === "string") {
      step["entry_mode"] = step["timing_entry_mode"];
      upgraded = true;
    }

    for (const [key, value] of STEP_DEFAULTS) {
      if (!(key in step)) {
        step[key] = value;
        upgraded = true;
      }
    }
    return step;
  });

  if (upgraded) {
    log.info("Upgraded process step records", { steps: steps.length });
  }
  return { steps, upgraded };
}

// ============================================================================
// PARSE
// ============================================================================

function toEntryMode(value: unknown): EntryMode {
  return typeof value === "string" && value.trim().toLowerCase() === "per_batch" ? "per_batch" : "per_unit";
}

function toTimeUnit(value: unknown): TimeUnit {
  return typeof value === "string" && value.trim().toLowerCase() === "minutes" ? "minutes" : "seconds";
}

function toLevel(value: unknown): ProcessStep["level"] {
  const level = typeof value === "string" ? value.trim().toLowerCase() : "";
  return level === "cell" || level === "diode" ? level : "array";
}

function toOperatorSlots(value: unknown): OperatorSlot[] {
  if (!Array.isArray(value)) return [];
  return value.map((slot) => {
    const operatorId = isRecord(slot) ? slot["operator_id"] : undefined;
    return { operatorId: typeof operatorId === "string" && operatorId.trim() !== "" ? operatorId.trim() : null };
  });
}

export const processStepSchema = z
  .object({
    id: optionalString,
    name: optionalString,
    level: z.unknown().transform(toLevel),
    timing_basis: optionalString,
    quantity_source: optionalString,
    entry_mode: z.unknown().transform(toEntryMode),
    time_value: optionalNumber,
    time_unit: z.unknown().transform(toTimeUnit),
    batch_units: optionalNumber,
    batch_time_value: optionalNumber,
    batch_time_unit: z.unknown().transform(toTimeUnit),
    cells_per_array_for_step: optionalNumber,
    yield_fraction: optionalNumber,
    time_per_unit_s: optionalNumber,
    setup_time_s_per_array: optionalNumber,
    operators: z.unknown().transform(toOperatorSlots),
    notes: optionalString,
  })
  .transform((raw, ctx): ProcessStep => {
    const id = raw.id ?? raw.name;
    if (id === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Step needs an id or a name" });
      return z.NEVER;
    }
    return {
      id,
      name: raw.name ?? id,
      level: raw.level,
      timingBasis: (raw.timing_basis ?? "per_array").toLowerCase(),
      quantitySource: (raw.quantity_source ?? "array").toLowerCase(),
      entryMode: raw.entry_mode,
      timeValue: raw.time_value ?? 0,
      timeUnit: raw.time_unit,
      batchUnits: raw.batch_units ?? 1,
      batchTimeValue: raw.batch_time_value ?? 0,
      batchTimeUnit: raw.batch_time_unit,
      cellsPerArrayForStep: raw.cells_per_array_for_step ?? 1,
      yieldFraction: raw.yield_fraction ?? 1,
      timePerUnitS: raw.time_per_unit_s ?? 0,
      setupTimeSPerArray: raw.setup_time_s_per_array ?? 0,
      operators: raw.operators,
      notes: raw.notes ?? "",
    };
  });

/**
 * Upgrade then parse step records. Steps that still fail validation are
 * skipped with a warning.
 */
export function parseProcessSteps(raw: unknown): ProcessStep[] {
  const { steps } = upgradeProcessSteps(raw);
  const parsed: ProcessStep[] = [];
  steps.forEach((step, index) => {
    const result = processStepSchema.safeParse(step);
    if (result.success) {
      parsed.push(result.data);
    } else {
      log.warn("Skipped process step", { index, reasons: describeIssues(result.error) });
    }
  });
  return parsed;
}
