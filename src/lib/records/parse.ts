/**
 * Record parsing: raw workspace data into costing inputs.
 *
 * Catalog items and designs that fail validation are skipped and listed in
 * `rejected` so one bad row never hides the rest of the catalog.
 */

import { z } from "zod";

import { ENV } from "../../env";
import type {
  ArrayDesign,
  CostSelections,
  MaterialCategory,
  MaterialsCatalog,
  OperatorProfiles,
  ProductConfig,
} from "../costing/types";
import { createLogger } from "../log";
import { RecordValidationError } from "./errors";
import {
  arrayDesignSchema,
  costSelectionsSchema,
  diodeSchema,
  miscSchema,
  operatorProfileSchema,
  packagingSchema,
  productFromRecord,
  productSchema,
  rollSchema,
  silverRibbonSchema,
  weldHeadSchema,
} from "./schemas";

const log = createLogger("records");

export interface RejectedRecord {
  source: MaterialCategory | "designs" | "operators";
  index: number;
  reasons: string[];
}

export interface ParsedCatalog {
  catalog: MaterialsCatalog;
  rejected: RejectedRecord[];
}

export interface ParsedDesigns {
  designs: ArrayDesign[];
  rejected: RejectedRecord[];
}

// ============================================================================
// PRODUCT
// ============================================================================

export function getDefaultProductConfig(): ProductConfig {
  return {
    name: "Default MAT Array",
    cellsPerString: 20,
    stringsPerArray: 4,
    exchangeRateGbpPerUsd: ENV.DEFAULT_EXCHANGE_RATE_GBP_PER_USD,
    cellHeightMm: 6.6,
    gapBetweenCellsMm: 1.0,
    positiveEndGapMm: 5.0,
    negativeEndGapMm: 5.0,
  };
}

/**
 * Product settings with defaults for anything missing. Unusable input
 * falls back to the default product.
 */
export function parseProductConfig(raw: unknown): ProductConfig {
  const defaults = getDefaultProductConfig();
  const parsed = productSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    log.warn("Product record unusable, using defaults", { reasons: describeIssues(parsed.error) });
    return defaults;
  }
  return productFromRecord(parsed.data, defaults);
}

// ============================================================================
// MATERIALS
// ============================================================================

export function parseMaterialsCatalog(raw: unknown): ParsedCatalog {
  if (raw === undefined || raw === null) {
    return { catalog: {}, rejected: [] };
  }
  if (!isRecord(raw)) {
    throw new RecordValidationError("Materials must be a mapping of category to item list");
  }

  const rejected: RejectedRecord[] = [];
  const catalog: MaterialsCatalog = {
    "Silver Ribbon": parseItems("Silver Ribbon", raw["Silver Ribbon"], silverRibbonSchema, rejected),
    Diodes: parseItems("Diodes", raw["Diodes"], diodeSchema, rejected),
    "Weld heads": parseItems("Weld heads", raw["Weld heads"], weldHeadSchema, rejected),
    Lamination: parseItems("Lamination", raw["Lamination"], rollSchema, rejected),
    Tapes: parseItems("Tapes", raw["Tapes"], rollSchema, rejected),
    Misc: parseItems("Misc", raw["Misc"], miscSchema, rejected),
    Packaging: parseItems("Packaging", raw["Packaging"], packagingSchema, rejected),
  };

  if (rejected.length > 0) {
    log.warn(`Skipped ${rejected.length} catalog item(s)`, {
      items: rejected.map((entry) => `${entry.source}[${entry.index}]`),
    });
  }
  return { catalog, rejected };
}

// ============================================================================
// DESIGNS
// ============================================================================

/**
 * Accepts a list of designs or `{ designs: [...] }`.
 */
export function parseArrayDesigns(raw: unknown): ParsedDesigns {
  const list = isRecord(raw) && "designs" in raw ? raw["designs"] : raw;
  if (list === undefined || list === null) return { designs: [], rejected: [] };
  if (!Array.isArray(list)) {
    throw new RecordValidationError("Designs must be a list");
  }

  const designs: ArrayDesign[] = [];
  const rejected: RejectedRecord[] = [];
  list.forEach((entry, index) => {
    const parsed = arrayDesignSchema.safeParse(entry);
    if (parsed.success) {
      designs.push(parsed.data);
    } else {
      rejected.push({ source: "designs", index, reasons: describeIssues(parsed.error) });
    }
  });

  if (rejected.length > 0) {
    log.warn(`Skipped ${rejected.length} design(s)`, { rejected });
  }
  return { designs, rejected };
}

export function parseArrayDesign(raw: unknown): ArrayDesign {
  const parsed = arrayDesignSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecordValidationError("Invalid array design", describeIssues(parsed.error));
  }
  return parsed.data;
}

// ============================================================================
// OPERATORS & SELECTIONS
// ============================================================================

/**
 * Accepts `{ operators: [...] }` or a bare list. Profiles are keyed by id;
 * a later duplicate id replaces an earlier one.
 */
export function parseOperatorProfiles(raw: unknown): OperatorProfiles {
  const list = isRecord(raw) ? raw["operators"] : raw;
  const profiles: OperatorProfiles = {};
  if (!Array.isArray(list)) return profiles;

  list.forEach((entry, index) => {
    const parsed = operatorProfileSchema.safeParse(entry);
    if (parsed.success) {
      profiles[parsed.data.id] = parsed.data;
    } else {
      log.warn("Skipped operator profile", { index, reasons: describeIssues(parsed.error) });
    }
  });
  return profiles;
}

export function parseCostSelections(raw: unknown): CostSelections {
  if (raw === undefined || raw === null) return {};
  const parsed = costSelectionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecordValidationError("Invalid cost selections", describeIssues(parsed.error));
  }
  return parsed.data;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function parseItems<T>(
  category: MaterialCategory,
  raw: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rejected: RejectedRecord[]
): T[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    rejected.push({ source: category, index: -1, reasons: ["Category is not a list"] });
    return [];
  }

  const items: T[] = [];
  raw.forEach((entry, index) => {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      items.push(parsed.data);
    } else {
      rejected.push({ source: category, index, reasons: describeIssues(parsed.error) });
    }
  });
  return items;
}

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
