/**
 * Packaging Cost Calculator
 *
 * Every array ships in its own frame on its own shipping board. Boxes hold
 * several arrays; each box is packed with two pieces of 25 mm foam and one
 * 3 mm foam sheet between each pair of arrays. Box and foam cost is shared
 * by the arrays in the box:
 *
 *   frame + board + (box + foam per box) / arraysPerBox
 *
 * @module categories/packaging
 */

import { categoryItems, requireUniqueItem, resolveSelection } from "../catalog";
import {
  DEFAULT_ARRAYS_PER_BOX,
  FOAM_THICKNESS_TOLERANCE_MM,
  FOAM_THICK_THICKNESS_MM,
  FOAM_THIN_THICKNESS_MM,
  THICK_FOAM_PIECES_PER_BOX,
} from "../constants";
import { configurationIssue, type ConfigurationIssue } from "../errors";
import { power } from "../geometry";
import { costed, notConfigured } from "../results";
import { foamCostPerPiece, unitCostGbp } from "../unit-costs";
import type {
  BoxItem,
  CategoryCostResult,
  CostingContext,
  FoamItem,
  FrameItem,
  MaterialRequirement,
  PackagingItem,
  PackagingSelection,
  ShippingBoardItem,
} from "../types";

// ============================================================================
// TYPES
// ============================================================================

export interface PackagingLine {
  materialId: string | null;
  materialName: string | null;
  unitCost: number;
}

export interface FoamPiecesPerBox {
  thick: number;                       // 25 mm pieces
  thin: number;                        // 3 mm pieces
}

export interface PackagingCostDetail {
  arraysPerBox: number;
  frame: PackagingLine;
  shippingBoard: PackagingLine;
  box: PackagingLine;
  thickFoam: PackagingLine;
  thinFoam: PackagingLine;
  foamPiecesPerBox: FoamPiecesPerBox;
  foamCostPerBox: number;
  boxSharePerArray: number;            // (box + foam) / arraysPerBox
}

// ============================================================================
// IMPLEMENTATION
// ============================================================================

export function normalizeArraysPerBox(value: number | null | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return DEFAULT_ARRAYS_PER_BOX;
  return Math.max(1, Math.floor(value));
}

export function foamPiecesPerBox(arraysPerBox: number): FoamPiecesPerBox {
  return {
    thick: THICK_FOAM_PIECES_PER_BOX,
    thin: Math.max(arraysPerBox - 1, 0),
  };
}

export function calculatePackagingCost(
  context: CostingContext,
  selection: PackagingSelection = {}
): CategoryCostResult<PackagingCostDetail> {
  const { design, exchangeRateGbpPerUsd: rate } = context;
  const items = categoryItems(context.catalog, "Packaging");

  const frames = items.filter((item): item is FrameItem => item.type === "Frame");
  const boards = items.filter((item): item is ShippingBoardItem => item.type === "Shipping board");
  const boxes = items.filter((item): item is BoxItem => item.type === "Box");
  const foams = items.filter((item): item is FoamItem => item.type === "Foam");

  const missing: ConfigurationIssue[] = [];
  const requireType = (list: PackagingItem[], label: string) => {
    if (list.length === 0) {
      missing.push(configurationIssue("MISSING_ROLE", "Packaging", label, `No ${label.toLowerCase()} in the catalog`));
    }
  };
  requireType(frames, "Frame");
  requireType(boards, "Shipping board");
  requireType(boxes, "Box");

  const thickFoam = requireUniqueItem(foams, (foam) => isFoamOfThickness(foam, FOAM_THICK_THICKNESS_MM), "Packaging", "25 mm foam");
  const thinFoam = requireUniqueItem(foams, (foam) => isFoamOfThickness(foam, FOAM_THIN_THICKNESS_MM), "Packaging", "3 mm foam");
  if (thickFoam.issue) missing.push(thickFoam.issue);
  if (thinFoam.issue) missing.push(thinFoam.issue);

  if (missing.length > 0 || !thickFoam.item || !thinFoam.item) {
    return notConfigured("Packaging", missing);
  }

  const issues: ConfigurationIssue[] = [];
  const frame = resolveSelection(frames, selection.frame, "Packaging", "Frame");
  const board = resolveSelection(boards, selection.shippingBoard, "Packaging", "Shipping board");
  const box = resolveSelection(boxes, selection.box, "Packaging", "Box");
  for (const resolved of [frame, board, box]) {
    if (resolved.issue) issues.push(resolved.issue);
  }

  const arraysPerBox = normalizeArraysPerBox(selection.arraysPerBox);
  const pieces = foamPiecesPerBox(arraysPerBox);

  const frameLine = unitLine(frame.item, rate);
  const boardLine = unitLine(board.item, rate);
  const boxLine = unitLine(box.item, rate);
  const thickLine = foamLine(thickFoam.item, rate);
  const thinLine = foamLine(thinFoam.item, rate);

  const foamCostPerBox = pieces.thick * thickLine.unitCost + pieces.thin * thinLine.unitCost;
  const boxSharePerArray = (boxLine.unitCost + foamCostPerBox) / arraysPerBox;

  const requirements: MaterialRequirement[] = [];
  for (const [description, line] of [
    ["Frames", frameLine],
    ["Shipping boards", boardLine],
  ] as const) {
    if (line.materialId !== null) {
      requirements.push({
        category: "Packaging",
        description,
        materialId: line.materialId,
        materialName: line.materialName,
        quantity: 1,
        unit: "each",
      });
    }
  }

  return costed({
    category: "Packaging",
    costPerUnit: frameLine.unitCost + boardLine.unitCost + boxSharePerArray,
    arrayPowerW: power(design, context.illumination).arrayPowerW,
    detail: {
      arraysPerBox,
      frame: frameLine,
      shippingBoard: boardLine,
      box: boxLine,
      thickFoam: thickLine,
      thinFoam: thinLine,
      foamPiecesPerBox: pieces,
      foamCostPerBox,
      boxSharePerArray,
    },
    requirements,
    issues,
  });
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function isFoamOfThickness(foam: FoamItem, thicknessMm: number): boolean {
  return (
    typeof foam.thicknessMm === "number" &&
    Math.abs(foam.thicknessMm - thicknessMm) < FOAM_THICKNESS_TOLERANCE_MM
  );
}

function unitLine(item: FrameItem | ShippingBoardItem | BoxItem | undefined, rate: number): PackagingLine {
  return {
    materialId: item?.id ?? null,
    materialName: item?.name ?? null,
    unitCost: item ? unitCostGbp(item, rate) : 0,
  };
}

function foamLine(item: FoamItem, rate: number): PackagingLine {
  return {
    materialId: item.id,
    materialName: item.name,
    unitCost: foamCostPerPiece(item, rate),
  };
}
