/**
 * Catalog lookup and selection resolution.
 *
 * Selections are held by the caller as stable ids (or, for older stored
 * state, list indices). Resolution never silently substitutes a different
 * item for a stale id.
 */

import { configurationIssue, type ConfigurationIssue } from "./errors";
import type { CatalogItemMap, CostCategory, ItemSelector, MaterialCategory, MaterialsCatalog } from "./types";

export type Resolved<T> = { item: T; issue?: undefined } | { item?: undefined; issue: ConfigurationIssue };

export function categoryItems<K extends MaterialCategory>(
  catalog: MaterialsCatalog,
  category: K
): CatalogItemMap[K][] {
  const items: CatalogItemMap[K][] | undefined = catalog[category];
  return items ?? [];
}

export function findItemById<T extends { id: string }>(items: readonly T[], id: string): T | undefined {
  return items.find((item) => item.id === id);
}

/**
 * Resolve a selector against a list.
 *
 * - no selector: the first item
 * - `{ index }`: clamped to the list bounds
 * - `{ id }`: exact match or a SELECTION_NOT_FOUND issue
 */
export function resolveSelection<T extends { id: string; name: string }>(
  items: readonly T[],
  selector: ItemSelector | undefined,
  category: CostCategory,
  role: string
): Resolved<T> {
  if (items.length === 0) {
    return {
      issue: configurationIssue("EMPTY_CATEGORY", category, role, `No items available for ${role}`),
    };
  }
  if (selector === undefined) return { item: items[0] };

  if ("index" in selector) {
    const index = Number.isFinite(selector.index) ? Math.trunc(selector.index) : 0;
    const clamped = Math.min(Math.max(index, 0), items.length - 1);
    return { item: items[clamped] };
  }

  const match = findItemById(items, selector.id);
  if (!match) {
    return {
      issue: configurationIssue(
        "SELECTION_NOT_FOUND",
        category,
        role,
        `Selected item "${selector.id}" for ${role} is not in the catalog`
      ),
    };
  }
  return { item: match };
}

/**
 * Resolve a silver id stored on the design. A null id or unknown id is a
 * DESIGN_REFERENCE_NOT_FOUND issue.
 */
export function resolveDesignReference<T extends { id: string }>(
  items: readonly T[],
  id: string | null,
  category: CostCategory,
  role: string
): Resolved<T> {
  const match = id === null ? undefined : findItemById(items, id);
  if (!match) {
    return {
      issue: configurationIssue(
        "DESIGN_REFERENCE_NOT_FOUND",
        category,
        role,
        id === null
          ? `Design has no silver linked for ${role}`
          : `Design links ${role} to "${id}", which is not in the catalog`
      ),
    };
  }
  return { item: match };
}

/**
 * Find the item that fills a required role by id, e.g. a specific weld head.
 */
export function requireItemById<T extends { id: string }>(
  items: readonly T[],
  id: string,
  category: CostCategory
): Resolved<T> {
  const match = findItemById(items, id);
  if (!match) {
    return {
      issue: configurationIssue("MISSING_ROLE", category, id, `Required item "${id}" is not in the catalog`),
    };
  }
  return { item: match };
}

/**
 * Find the single item matching a predicate. None or several is an issue.
 */
export function requireUniqueItem<T>(
  items: readonly T[],
  predicate: (item: T) => boolean,
  category: CostCategory,
  role: string
): Resolved<T> {
  const matches = items.filter(predicate);
  if (matches.length === 0) {
    return {
      issue: configurationIssue("MISSING_ROLE", category, role, `No item found for ${role}`),
    };
  }
  if (matches.length > 1) {
    return {
      issue: configurationIssue(
        "DUPLICATE_ROLE",
        category,
        role,
        `${matches.length} items match ${role}; exactly one is required`
      ),
    };
  }
  return { item: matches[0] };
}
