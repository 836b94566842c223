/**
 * Array Costing Types
 *
 * Data contracts consumed by the costing core: product configuration, array
 * designs, the materials catalog (one tagged variant per category), process
 * steps, operator profiles and the caller-held selections for each cost
 * category.
 *
 * All lengths are millimetres unless a field name says otherwise. All money
 * is GBP unless a field name says USD.
 *
 * @module types
 */

import type { ConfigurationIssue } from "./errors";

export type Illumination = "AM1.5" | "AM0";

export type Currency = "GBP" | "USD";

export type LengthUnit = "m" | "ft";

// ============================================================================
// PRODUCT & DESIGN
// ============================================================================

export interface ProductConfig {
  name: string;
  cellsPerString: number;
  stringsPerArray: number;
  exchangeRateGbpPerUsd: number;           // GBP per 1 USD
  cellHeightMm: number;
  gapBetweenCellsMm: number;
  positiveEndGapMm: number;
  negativeEndGapMm: number;
}

/**
 * A named array configuration. Silver ids link to Silver Ribbon catalog
 * items and may be stale; calculators report a configuration issue rather
 * than guessing.
 */
export interface ArrayDesign {
  name: string;
  numCells: number;
  effAm15Percent: number;
  effAm0Percent: number;

  // String geometry
  cellHeightMm: number;
  gapBetweenCellsMm: number;
  positiveEndGapMm: number;
  negativeEndGapMm: number;

  // Blocking diode tabs
  blockingTabLength1Mm: number;
  blockingTabLength2Mm: number;
  blockingTabSilverId: string | null;
  blockingTabWidthMm: number;

  // Negative end bars (two per array)
  negativeEndSilverId: string | null;
  negativeEndWidthMm: number;
  negativeEndLengthMm: number;

  // Negative bar (one per array)
  negativeBarSilverId: string | null;
  negativeBarWidthMm: number;
  negativeBarLengthMm: number;
}

// ============================================================================
// MATERIALS CATALOG
// ============================================================================

interface CatalogItemBase {
  id: string;
  name: string;
}

export interface SilverRibbonItem extends CatalogItemBase {
  widthMm?: number;
  thicknessMm?: number;
  densityGCm3?: number;
  pricePerG?: number;
  priceCurrency?: Currency;                // defaults to USD
}

export interface DiodeItem extends CatalogItemBase {
  unitCostUsd?: number;
  unitCostGbp?: number;
  currency?: Currency;                     // defaults to USD
}

export interface WeldHeadItem extends CatalogItemBase {
  unitCostUsd?: number;
  unitCostGbp?: number;
  currency?: Currency;                     // defaults to USD
  numWelds?: number;                       // welds a head lasts for
}

/** Lamination films and tapes are both bought by the roll. */
export interface RollItem extends CatalogItemBase {
  widthMm?: number;
  rollLengthValue?: number;
  rollLengthUnit?: LengthUnit;             // defaults to metres
  rollCostGbp?: number;
  rollCostUsd?: number;
}

export interface KaptonItem extends CatalogItemBase {
  type: "Kapton";
  costPerDiskGbp?: number;
  disksPerRoll?: number;
  rollCostGbp?: number;
  rollCostUsd?: number;
  currency?: Currency;                     // defaults to USD
}

export interface EpoxyItem extends CatalogItemBase {
  type: "Epoxy";
  costPerMlGbp?: number;
  volumeMl?: number;
  totalCostGbp?: number;
  totalCostUsd?: number;
  currency?: Currency;                     // defaults to GBP
}

export interface OtherMiscItem extends CatalogItemBase {
  type: "Other";
}

export type MiscItem = KaptonItem | EpoxyItem | OtherMiscItem;

interface UnitPricedItem extends CatalogItemBase {
  unitCostGbp?: number;
  unitCostUsd?: number;
  currency?: Currency;                     // defaults to GBP
}

export interface FrameItem extends UnitPricedItem {
  type: "Frame";
}

export interface ShippingBoardItem extends UnitPricedItem {
  type: "Shipping board";
}

export interface BoxItem extends UnitPricedItem {
  type: "Box";
  diameterMm?: number;
}

export interface FoamItem extends CatalogItemBase {
  type: "Foam";
  thicknessMm?: number;
  numPieces?: number;
  totalCostGbp?: number;
  totalCostUsd?: number;
  currency?: Currency;                     // defaults to GBP
}

export type PackagingItem = FrameItem | ShippingBoardItem | BoxItem | FoamItem;

export interface CatalogItemMap {
  "Silver Ribbon": SilverRibbonItem;
  Diodes: DiodeItem;
  "Weld heads": WeldHeadItem;
  Lamination: RollItem;
  Tapes: RollItem;
  Misc: MiscItem;
  Packaging: PackagingItem;
}

export type MaterialCategory = keyof CatalogItemMap;

export const MATERIAL_CATEGORIES: readonly MaterialCategory[] = [
  "Silver Ribbon",
  "Diodes",
  "Weld heads",
  "Lamination",
  "Tapes",
  "Misc",
  "Packaging",
];

/** Absent categories are treated as empty lists. */
export type MaterialsCatalog = {
  [K in MaterialCategory]?: CatalogItemMap[K][];
};

// ============================================================================
// PROCESS & OPERATORS
// ============================================================================

export type TimingBasis = "per_array" | "per_unit" | "cell" | "diode" | "array";
export type QuantitySource = "array" | "cells" | "strings" | "bypass_diodes" | "blocking_diodes";
export type EntryMode = "per_unit" | "per_batch";
export type TimeUnit = "seconds" | "minutes";

export interface OperatorSlot {
  operatorId: string | null;
}

export interface ProcessStep {
  id: string;
  name: string;
  level: "cell" | "diode" | "array";
  timingBasis: string;                     // a TimingBasis; anything else contributes nothing
  quantitySource: string;                  // a QuantitySource
  entryMode: EntryMode;
  timeValue: number;
  timeUnit: TimeUnit;
  batchUnits: number;
  batchTimeValue: number;
  batchTimeUnit: TimeUnit;
  cellsPerArrayForStep: number;
  yieldFraction: number;
  timePerUnitS: number;                    // stored effective (post-yield) time
  setupTimeSPerArray: number;
  operators: OperatorSlot[];
  notes: string;
}

export interface OperatorProfile {
  id: string;
  name: string;
  jobTitle: string;
  hourlyRate: number;                      // GBP per hour
}

export type OperatorProfiles = Record<string, OperatorProfile>;

// ============================================================================
// SELECTIONS
// ============================================================================

/**
 * Points at a catalog item. An id must match exactly; an index is clamped to
 * the list bounds; an absent selector picks the first item.
 */
export type ItemSelector = { id: string } | { index: number };

export interface SilverSelection {
  topTabSilver?: ItemSelector;
  topTabLengthMm?: number;
}

export interface DiodeSelection {
  bypassDiode?: ItemSelector;
  bypassTabSilver?: ItemSelector;
  bypassTabLengthMm?: number;
  bypassTabWidthMm?: number;
  bypassYieldPercent?: number;
  blockingDiode?: ItemSelector;
  blockingYieldPercent?: number;
}

export interface LaminationLayerSelection {
  material?: ItemSelector;
  wasteMm?: number;
}

export interface LaminationSelection {
  layers?: LaminationLayerSelection[];     // three layers, missing entries default
  liner?: ItemSelector;
}

export interface TapeSelection {
  perimeterTape?: ItemSelector;
  otherTape?: ItemSelector;
  otherTapeLengthMm?: number;
}

export interface MiscSelection {
  epoxy?: ItemSelector;                    // among Epoxy items only
  epoxyMlPerDiode?: number;
}

export interface PackagingSelection {
  frame?: ItemSelector;                    // among Frame items only
  shippingBoard?: ItemSelector;
  box?: ItemSelector;
  arraysPerBox?: number;
}

export interface CostSelections {
  silver?: SilverSelection;
  diodes?: DiodeSelection;
  lamination?: LaminationSelection;
  tapes?: TapeSelection;
  misc?: MiscSelection;
  packaging?: PackagingSelection;
}

// ============================================================================
// RESULTS
// ============================================================================

export type CostCategory =
  | "Silver"
  | "Diodes"
  | "Weld heads"
  | "Lamination"
  | "Tapes"
  | "Misc"
  | "Packaging";

export const COST_CATEGORY_ORDER: readonly CostCategory[] = [
  "Silver",
  "Diodes",
  "Weld heads",
  "Lamination",
  "Tapes",
  "Misc",
  "Packaging",
];

export type RequirementUnit = "mm" | "m" | "each" | "welds" | "mL";

/**
 * One physical quantity consumed per array. Order scenarios scale these by
 * the number of units built.
 */
export interface MaterialRequirement {
  category: CostCategory;
  description: string;
  materialId: string | null;
  materialName: string | null;
  quantity: number;
  unit: RequirementUnit;
}

export type CategoryStatus = "OK" | "INCOMPLETE" | "NOT_CONFIGURED";

/**
 * Result of one category calculator.
 * - "OK": every role resolved
 * - "INCOMPLETE": some sub-calculations could not be costed (see issues)
 * - "NOT_CONFIGURED": the category could not be costed at all
 */
export type CategoryCostResult<TDetail> =
  | {
      category: CostCategory;
      status: "OK" | "INCOMPLETE";
      costPerUnit: number;
      costPerWatt: number;
      detail: TDetail;
      requirements: MaterialRequirement[];
      issues: ConfigurationIssue[];
    }
  | {
      category: CostCategory;
      status: "NOT_CONFIGURED";
      costPerUnit: 0;
      costPerWatt: 0;
      detail: null;
      requirements: [];
      issues: ConfigurationIssue[];
    };

/** Everything a category calculator reads besides its own selection. */
export interface CostingContext {
  design: ArrayDesign;
  catalog: MaterialsCatalog;
  exchangeRateGbpPerUsd: number;
  illumination: Illumination;
}
