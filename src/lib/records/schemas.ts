/**
 * Record Schemas
 *
 * zod schemas for the loosely-typed records the workspace file holds
 * (snake_case keys, numbers that may arrive as strings, currency codes in
 * any case) and transforms into the typed variants the costing core reads.
 *
 * @module records/schemas
 */

import { z } from "zod";

import type {
  ArrayDesign,
  BoxItem,
  Currency,
  DiodeItem,
  EpoxyItem,
  FoamItem,
  FrameItem,
  ItemSelector,
  KaptonItem,
  LengthUnit,
  MiscItem,
  OperatorProfile,
  PackagingItem,
  ProductConfig,
  RollItem,
  ShippingBoardItem,
  SilverRibbonItem,
  WeldHeadItem,
} from "../costing/types";
import { KAPTON_ITEM_ID } from "../costing/constants";

// ============================================================================
// FIELD SCHEMAS
// ============================================================================

function toOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toOptionalString(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function toCurrency(value: unknown): Currency | undefined {
  const code = toOptionalString(value)?.toUpperCase();
  return code === "GBP" || code === "USD" ? code : undefined;
}

function toLengthUnit(value: unknown): LengthUnit | undefined {
  const unit = toOptionalString(value)?.toLowerCase();
  if (unit === "ft" || unit === "foot" || unit === "feet") return "ft";
  if (unit === "m" || unit === "metre" || unit === "meter" || unit === "metres" || unit === "meters") return "m";
  return undefined;
}

/** Numbers may arrive as strings; anything unparseable becomes undefined. */
export const optionalNumber = z.unknown().transform(toOptionalNumber);
export const optionalString = z.unknown().transform(toOptionalString);
export const optionalCurrency = z.unknown().transform(toCurrency);
export const optionalLengthUnit = z.unknown().transform(toLengthUnit);

const identityFields = {
  id: optionalString,
  name: optionalString,
};

/**
 * Items are addressed by id. Older records carry only a name, which then
 * doubles as the id.
 */
function requireIdentity(
  raw: { id?: string; name?: string },
  ctx: z.RefinementCtx
): { id: string; name: string } | null {
  const id = raw.id ?? raw.name;
  if (id === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Record needs an id or a name" });
    return null;
  }
  return { id, name: raw.name ?? id };
}

// ============================================================================
// MATERIALS
// ============================================================================

export const silverRibbonSchema = z
  .object({
    ...identityFields,
    width_mm: optionalNumber,
    thickness_mm: optionalNumber,
    density_g_cm3: optionalNumber,
    price_per_g: optionalNumber,
    price_currency: optionalCurrency,
  })
  .transform((raw, ctx): SilverRibbonItem => {
    const identity = requireIdentity(raw, ctx);
    if (!identity) return z.NEVER;
    return {
      ...identity,
      widthMm: raw.width_mm,
      thicknessMm: raw.thickness_mm,
      densityGCm3: raw.density_g_cm3,
      pricePerG: raw.price_per_g,
      priceCurrency: raw.price_currency,
    };
  });

const unitPricedFields = {
  ...identityFields,
  unit_cost_usd: optionalNumber,
  unit_cost_gbp: optionalNumber,
  currency: optionalCurrency,
};

export const diodeSchema = z
  .object(unitPricedFields)
  .transform((raw, ctx): DiodeItem => {
    const identity = requireIdentity(raw, ctx);
    if (!identity) return z.NEVER;
    return {
      ...identity,
      unitCostUsd: raw.unit_cost_usd,
      unitCostGbp: raw.unit_cost_gbp,
      currency: raw.currency,
    };
  });

export const weldHeadSchema = z
  .object({ ...unitPricedFields, num_welds: optionalNumber })
  .transform((raw, ctx): WeldHeadItem => {
    const identity = requireIdentity(raw, ctx);
    if (!identity) return z.NEVER;
    return {
      ...identity,
      unitCostUsd: raw.unit_cost_usd,
      unitCostGbp: raw.unit_cost_gbp,
      currency: raw.currency,
      numWelds: raw.num_welds,
    };
  });

export const rollSchema = z
  .object({
    ...identityFields,
    width_mm: optionalNumber,
    roll_length_value: optionalNumber,
    roll_length_unit: optionalLengthUnit,
    roll_cost_gbp: optionalNumber,
    roll_cost_usd: optionalNumber,
  })
  .transform((raw, ctx): RollItem => {
    const identity = requireIdentity(raw, ctx);
    if (!identity) return z.NEVER;
    return {
      ...identity,
      widthMm: raw.width_mm,
      rollLengthValue: raw.roll_length_value,
      rollLengthUnit: raw.roll_length_unit,
      rollCostGbp: raw.roll_cost_gbp,
      rollCostUsd: raw.roll_cost_usd,
    };
  });

export const miscSchema = z
  .object({
    ...identityFields,
    type: optionalString,
    currency: optionalCurrency,
    cost_per_disk_gbp: optionalNumber,
    disks_per_roll: optionalNumber,
    roll_cost_gbp: optionalNumber,
    roll_cost_usd: optionalNumber,
    cost_per_ml_gbp: optionalNumber,
    volume_ml: optionalNumber,
    total_cost_gbp: optionalNumber,
    total_cost_usd: optionalNumber,
  })
  .transform((raw, ctx): MiscItem => {
    const identity = requireIdentity(raw, ctx);
    if (!identity) return z.NEVER;
    const type = raw.type?.toLowerCase();

    if (type === "kapton" || identity.id === KAPTON_ITEM_ID) {
      const kapton: KaptonItem = {
        ...identity,
        type: "Kapton",
        costPerDiskGbp: raw.cost_per_disk_gbp,
        disksPerRoll: raw.disks_per_roll,
        rollCostGbp: raw.roll_cost_gbp ?? raw.total_cost_gbp,
        rollCostUsd: raw.roll_cost_usd,
        currency: raw.currency,
      };
      return kapton;
    }
    if (type === "epoxy") {
      const epoxy: EpoxyItem = {
        ...identity,
        type: "Epoxy",
        costPerMlGbp: raw.cost_per_ml_gbp,
        volumeMl: raw.volume_ml,
        totalCostGbp: raw.total_cost_gbp,
        totalCostUsd: raw.total_cost_usd,
        currency: raw.currency,
      };
      return epoxy;
    }
    return { ...identity, type: "Other" };
  });

export const packagingSchema = z
  .object({
    ...unitPricedFields,
    type: optionalString,
    diameter_mm: optionalNumber,
    thickness_mm: optionalNumber,
    num_pieces: optionalNumber,
    total_cost_gbp: optionalNumber,
    total_cost_usd: optionalNumber,
  })
  .transform((raw, ctx): PackagingItem => {
    const identity = requireIdentity(raw, ctx);
    if (!identity) return z.NEVER;
    const priced = {
      ...identity,
      unitCostGbp: raw.unit_cost_gbp,
      unitCostUsd: raw.unit_cost_usd,
      currency: raw.currency,
    };

    switch (raw.type?.toLowerCase()) {
      case "frame": {
        const frame: FrameItem = { ...priced, type: "Frame" };
        return frame;
      }
      case "shipping board": {
        const board: ShippingBoardItem = { ...priced, type: "Shipping board" };
        return board;
      }
      case "box": {
        const box: BoxItem = { ...priced, type: "Box", diameterMm: raw.diameter_mm };
        return box;
      }
      case "foam": {
        const foam: FoamItem = {
          ...identity,
          type: "Foam",
          thicknessMm: raw.thickness_mm,
          numPieces: raw.num_pieces,
          totalCostGbp: raw.total_cost_gbp,
          totalCostUsd: raw.total_cost_usd,
          currency: raw.currency,
        };
        return foam;
      }
      default:
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown packaging type "${raw.type ?? ""}"`,
          path: ["type"],
        });
        return z.NEVER;
    }
  });

// ============================================================================
// PRODUCT & DESIGNS
// ============================================================================

export const productSchema = z
  .object({
    name: optionalString,
    cells_per_string: optionalNumber,
    strings_per_array: optionalNumber,
    exchange_rate: optionalNumber,
    cell_height_mm: optionalNumber,
    gap_between_cells_mm: optionalNumber,
    positive_end_gap_mm: optionalNumber,
    negative_end_gap_mm: optionalNumber,
  });

export type RawProduct = z.infer<typeof productSchema>;

export function productFromRecord(raw: RawProduct, defaults: ProductConfig): ProductConfig {
  return {
    name: raw.name ?? defaults.name,
    cellsPerString: Math.trunc(raw.cells_per_string ?? defaults.cellsPerString),
    stringsPerArray: Math.trunc(raw.strings_per_array ?? defaults.stringsPerArray),
    exchangeRateGbpPerUsd: raw.exchange_rate ?? defaults.exchangeRateGbpPerUsd,
    cellHeightMm: raw.cell_height_mm ?? defaults.cellHeightMm,
    gapBetweenCellsMm: raw.gap_between_cells_mm ?? defaults.gapBetweenCellsMm,
    positiveEndGapMm: raw.positive_end_gap_mm ?? defaults.positiveEndGapMm,
    negativeEndGapMm: raw.negative_end_gap_mm ?? defaults.negativeEndGapMm,
  };
}

/** Geometry is clamped to zero; a design must have at least one cell. */
export const arrayDesignSchema = z
  .object({
    name: optionalString,
    num_cells: optionalNumber,
    eff_am15_percent: optionalNumber,
    eff_am0_percent: optionalNumber,
    cell_height_mm: optionalNumber,
    gap_between_cells_mm: optionalNumber,
    positive_end_gap_mm: optionalNumber,
    negative_end_gap_mm: optionalNumber,
    blocking_tab_length1_mm: optionalNumber,
    blocking_tab_length2_mm: optionalNumber,
    blocking_tab_silver_id: optionalString,
    blocking_tab_width_mm: optionalNumber,
    negative_end_silver_id: optionalString,
    negative_end_width_mm: optionalNumber,
    negative_end_length_mm: optionalNumber,
    negative_bar_silver_id: optionalString,
    negative_bar_width_mm: optionalNumber,
    negative_bar_length_mm: optionalNumber,
  })
  .transform((raw, ctx): ArrayDesign => {
    if (raw.name === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Design needs a name", path: ["name"] });
      return z.NEVER;
    }
    const numCells = Math.trunc(raw.num_cells ?? 0);
    if (numCells < 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Design needs at least one cell", path: ["num_cells"] });
      return z.NEVER;
    }
    const geometry = (value: number | undefined, fallback: number) => Math.max(value ?? fallback, 0);

    return {
      name: raw.name,
      numCells,
      effAm15Percent: raw.eff_am15_percent ?? 0,
      effAm0Percent: raw.eff_am0_percent ?? 0,
      cellHeightMm: geometry(raw.cell_height_mm, 6.6),
      gapBetweenCellsMm: geometry(raw.gap_between_cells_mm, 1.0),
      positiveEndGapMm: geometry(raw.positive_end_gap_mm, 5.0),
      negativeEndGapMm: geometry(raw.negative_end_gap_mm, 5.0),
      blockingTabLength1Mm: geometry(raw.blocking_tab_length1_mm, 0),
      blockingTabLength2Mm: geometry(raw.blocking_tab_length2_mm, 0),
      blockingTabSilverId: raw.blocking_tab_silver_id ?? null,
      blockingTabWidthMm: geometry(raw.blocking_tab_width_mm, 0),
      negativeEndSilverId: raw.negative_end_silver_id ?? null,
      negativeEndWidthMm: geometry(raw.negative_end_width_mm, 0),
      negativeEndLengthMm: geometry(raw.negative_end_length_mm, 0),
      negativeBarSilverId: raw.negative_bar_silver_id ?? null,
      negativeBarWidthMm: geometry(raw.negative_bar_width_mm, 0),
      negativeBarLengthMm: geometry(raw.negative_bar_length_mm, 0),
    };
  });

// ============================================================================
// OPERATORS
// ============================================================================

export const operatorProfileSchema = z
  .object({
    id: optionalString,
    name: optionalString,
    job_title: optionalString,
    hourly_rate: optionalNumber,
  })
  .transform((raw, ctx): OperatorProfile => {
    if (raw.id === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Operator needs an id", path: ["id"] });
      return z.NEVER;
    }
    return {
      id: raw.id,
      name: raw.name ?? "",
      jobTitle: raw.job_title ?? "",
      hourlyRate: raw.hourly_rate ?? 0,
    };
  });

// ============================================================================
// SELECTIONS
// ============================================================================

/**
 * A stored selection is either `<role>_id` or, from older state, a list
 * position `<role>_index`. The id wins when both are present.
 */
export function toSelector(id: string | undefined, index: number | undefined): ItemSelector | undefined {
  if (id !== undefined) return { id };
  if (index !== undefined) return { index };
  return undefined;
}

export const silverSelectionSchema = z
  .object({
    top_tab_silver_id: optionalString,
    top_tab_silver_index: optionalNumber,
    top_tab_length_mm: optionalNumber,
  })
  .transform((raw) => ({
    topTabSilver: toSelector(raw.top_tab_silver_id, raw.top_tab_silver_index),
    topTabLengthMm: raw.top_tab_length_mm,
  }));

export const diodeSelectionSchema = z
  .object({
    bypass_diode_id: optionalString,
    bypass_diode_index: optionalNumber,
    bypass_tab_silver_id: optionalString,
    bypass_tab_silver_index: optionalNumber,
    blocking_diode_id: optionalString,
    blocking_diode_index: optionalNumber,
    bypass_tab_length_mm: optionalNumber,
    bypass_tab_width_mm: optionalNumber,
    bypass_yield_percent: optionalNumber,
    blocking_yield_percent: optionalNumber,
  })
  .transform((raw) => ({
    bypassDiode: toSelector(raw.bypass_diode_id, raw.bypass_diode_index),
    bypassTabSilver: toSelector(raw.bypass_tab_silver_id, raw.bypass_tab_silver_index),
    bypassTabLengthMm: raw.bypass_tab_length_mm,
    bypassTabWidthMm: raw.bypass_tab_width_mm,
    bypassYieldPercent: raw.bypass_yield_percent,
    blockingDiode: toSelector(raw.blocking_diode_id, raw.blocking_diode_index),
    blockingYieldPercent: raw.blocking_yield_percent,
  }));

const laminationLayerSchema = z
  .object({
    material_id: optionalString,
    material_index: optionalNumber,
    waste_mm: optionalNumber,
  })
  .transform((raw) => ({
    material: toSelector(raw.material_id, raw.material_index),
    wasteMm: raw.waste_mm,
  }));

export const laminationSelectionSchema = z
  .object({
    layers: z.array(laminationLayerSchema).optional(),
    liner_id: optionalString,
    liner_index: optionalNumber,
  })
  .transform((raw) => ({
    layers: raw.layers,
    liner: toSelector(raw.liner_id, raw.liner_index),
  }));

export const tapeSelectionSchema = z
  .object({
    perimeter_tape_id: optionalString,
    perimeter_tape_index: optionalNumber,
    other_tape_id: optionalString,
    other_tape_index: optionalNumber,
    other_tape_length_mm: optionalNumber,
  })
  .transform((raw) => ({
    perimeterTape: toSelector(raw.perimeter_tape_id, raw.perimeter_tape_index),
    otherTape: toSelector(raw.other_tape_id, raw.other_tape_index),
    otherTapeLengthMm: raw.other_tape_length_mm,
  }));

export const miscSelectionSchema = z
  .object({
    epoxy_id: optionalString,
    epoxy_index: optionalNumber,
    epoxy_ml_per_diode: optionalNumber,
  })
  .transform((raw) => ({
    epoxy: toSelector(raw.epoxy_id, raw.epoxy_index),
    epoxyMlPerDiode: raw.epoxy_ml_per_diode,
  }));

export const packagingSelectionSchema = z
  .object({
    frame_id: optionalString,
    frame_index: optionalNumber,
    shipping_board_id: optionalString,
    shipping_board_index: optionalNumber,
    box_id: optionalString,
    box_index: optionalNumber,
    arrays_per_box: optionalNumber,
  })
  .transform((raw) => ({
    frame: toSelector(raw.frame_id, raw.frame_index),
    shippingBoard: toSelector(raw.shipping_board_id, raw.shipping_board_index),
    box: toSelector(raw.box_id, raw.box_index),
    arraysPerBox: raw.arrays_per_box,
  }));

export const costSelectionsSchema = z.object({
  silver: silverSelectionSchema.optional(),
  diodes: diodeSelectionSchema.optional(),
  lamination: laminationSelectionSchema.optional(),
  tapes: tapeSelectionSchema.optional(),
  misc: miscSelectionSchema.optional(),
  packaging: packagingSelectionSchema.optional(),
});
