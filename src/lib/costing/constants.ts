/**
 * Physical and process constants shared by the costing calculators.
 */

import type { Illumination } from "./types";

// Active area of a single cell in square metres
export const CELL_AREA_M2 = 0.002;

export const IRRADIANCE_W_PER_M2: Record<Illumination, number> = {
  "AM1.5": 1000,
  AM0: 1366,
};

// Corner and overlap allowance added to twice the base length for perimeter tape
export const PERIMETER_ALLOWANCE_MM = 140;

export const FEET_TO_METRES = 0.3048;

// Foam thicknesses a shipping box is packed with
export const FOAM_THIN_THICKNESS_MM = 3.0;
export const FOAM_THICK_THICKNESS_MM = 25.0;
export const FOAM_THICKNESS_TOLERANCE_MM = 1e-3;
export const THICK_FOAM_PIECES_PER_BOX = 2;

export const DEFAULT_ARRAYS_PER_BOX = 4;

// Weld head roles are identified by catalog id
export const WELD_HEAD_IDS = {
  silver: "Weld_Head_Ag",
  aluminium: "Weld_Head_Al",
  gold: "Weld_Head_Au",
  blocking: "Weld_Head_BL",
} as const;

export const KAPTON_ITEM_ID = "Kapton_Insulation";

// Array weld counts
export const AG_WELDS_PER_TOP_TAB = 4;
export const AG_WELDS_NEGATIVE_END = 8;
export const AG_WELDS_POSITIVE_END = 4;
export const AG_WELDS_PER_BYPASS_DIODE = 4;
export const BL_WELDS_PER_ARRAY = 4;

// Diode assembly
export const TABS_PER_BYPASS_DIODE = 2;
export const BLOCKING_DIODES_PER_ARRAY = 2;
export const BL_WELDS_PER_BLOCKING_DIODE = 2;
export const DIODES_WITH_EPOXY_PER_ARRAY = 2;

export const DEFAULT_TOP_TAB_LENGTH_MM = 5.0;
export const DEFAULT_BYPASS_TAB_LENGTH_MM = 5.0;
export const DEFAULT_BYPASS_TAB_WIDTH_MM = 1.5;
export const DEFAULT_BYPASS_YIELD_PERCENT = 80.0;
export const DEFAULT_BLOCKING_YIELD_PERCENT = 90.0;

export const LAMINATION_LAYER_COUNT = 3;

export const SECONDS_PER_HOUR = 3600;
