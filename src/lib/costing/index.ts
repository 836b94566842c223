/**
 * PV Array Costing Module
 *
 * Pure functions for costing a manufactured photovoltaic array.
 *
 * Modules:
 * - geometry: string length, perimeter, cell and array power
 * - unit-costs: catalog item to GBP per mm / weld / metre / disk / mL / piece
 * - categories/*: Silver, Diodes, Weld heads, Lamination, Tapes, Misc, Packaging
 * - labour: step timing, operator cost, process and per-array labour
 * - cost-summary: orchestration of the seven categories
 * - order-scenarios: power-target and budget plans, scaled material usage
 *
 * @example
 * ```typescript
 * import { calculateCostSummary, planForPowerTarget, scenarioBasisFrom } from "../lib/costing";
 *
 * const summary = calculateCostSummary(context, selections);
 * const plan = planForPowerTarget(scenarioBasisFrom(summary, labour, 0.9), { targetPower: 1, unit: "kW" });
 * ```
 */

export * from "./types";
export * from "./constants";
export * from "./errors";
export * from "./geometry";
export * from "./unit-costs";
export * from "./catalog";
export * from "./results";
export * from "./categories/shared";
export * from "./categories/silver";
export * from "./categories/diodes";
export * from "./categories/weld-heads";
export * from "./categories/lamination";
export * from "./categories/tapes";
export * from "./categories/misc";
export * from "./categories/packaging";
export * from "./labour";
export * from "./cost-summary";
export * from "./order-scenarios";
