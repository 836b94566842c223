import fs from "fs";
import path from "path";

import type {
  ArrayDesign,
  CostSelections,
  MaterialsCatalog,
  OperatorProfiles,
  ProcessStep,
  ProductConfig,
} from "../costing/types";
import { createLogger } from "../log";
import { RecordValidationError } from "./errors";
import {
  isRecord,
  parseArrayDesigns,
  parseCostSelections,
  parseMaterialsCatalog,
  parseOperatorProfiles,
  parseProductConfig,
  type RejectedRecord,
} from "./parse";
import { parseProcessSteps } from "./process-steps";

const log = createLogger("workspace");

/**
 * Everything the costing tools need, read from one JSON document:
 * `{ product, materials, designs, process, operators, selections }`.
 */
export interface Workspace {
  product: ProductConfig;
  catalog: MaterialsCatalog;
  designs: ArrayDesign[];
  steps: ProcessStep[];
  operators: OperatorProfiles;
  selections: CostSelections;
  rejected: RejectedRecord[];
}

export function parseWorkspace(raw: unknown): Workspace {
  if (!isRecord(raw)) {
    throw new RecordValidationError("Workspace must be a JSON object");
  }

  const { catalog, rejected: rejectedItems } = parseMaterialsCatalog(raw["materials"]);
  const { designs, rejected: rejectedDesigns } = parseArrayDesigns(raw["designs"]);

  return {
    product: parseProductConfig(raw["product"]),
    catalog,
    designs,
    steps: parseProcessSteps(raw["process"]),
    operators: parseOperatorProfiles(raw["operators"]),
    selections: parseCostSelections(raw["selections"]),
    rejected: [...rejectedItems, ...rejectedDesigns],
  };
}

export function loadWorkspaceFile(filePath: string): Workspace {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new RecordValidationError(`Workspace file not found: ${resolved}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RecordValidationError(`Workspace file is not valid JSON: ${resolved}`, [reason]);
  }

  log.debug("Loaded workspace", { file: resolved });
  return parseWorkspace(raw);
}

/**
 * Pick a design by name, or the first design when no name is given.
 */
export function selectDesign(workspace: Workspace, name?: string): ArrayDesign {
  if (workspace.designs.length === 0) {
    throw new RecordValidationError("Workspace has no usable array designs");
  }
  if (name === undefined) return workspace.designs[0];

  const design = workspace.designs.find((candidate) => candidate.name === name);
  if (!design) {
    throw new RecordValidationError(`Design "${name}" not found`, workspace.designs.map((d) => d.name));
  }
  return design;
}
