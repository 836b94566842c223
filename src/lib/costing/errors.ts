/**
 * Configuration issues raised when a category cannot be fully costed.
 *
 * Calculators never throw: they return issues inside their result.
 * ConfigurationError is for callers that want to stop on the first
 * incomplete summary.
 */

import type { CostCategory } from "./types";

export type ConfigurationIssueCode =
  | "EMPTY_CATEGORY"              // catalog category has no items
  | "MISSING_ROLE"                // required item (by id or type) is absent
  | "DUPLICATE_ROLE"              // more than one item claims a single role
  | "SELECTION_NOT_FOUND"         // selector id matches no item
  | "DESIGN_REFERENCE_NOT_FOUND"; // design links to an unknown silver id

export interface ConfigurationIssue {
  code: ConfigurationIssueCode;
  category: CostCategory;
  role: string;                   // e.g. "Top tab silver", "Weld_Head_Ag"
  message: string;
}

export function configurationIssue(
  code: ConfigurationIssueCode,
  category: CostCategory,
  role: string,
  message: string
): ConfigurationIssue {
  return { code, category, role, message };
}

export class ConfigurationError extends Error {
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[]) {
    super(
      issues.length === 1
        ? issues[0].message
        : `${issues.length} configuration issues: ${issues.map((i) => `${i.category}/${i.role}`).join(", ")}`
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Human-readable lines for a list of issues, prefixed with the category.
 */
export function getIssueMessages(issues: ConfigurationIssue[]): string[] {
  return issues.map((issue) => `${issue.category}: ${issue.message}`);
}
