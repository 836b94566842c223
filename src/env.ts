import "dotenv/config";

/**
 * Runtime settings for the costing tools. Every value has a default so the
 * library and tests run without a .env file.
 */

function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return fallback;
  const value = Number(raw.trim());
  if (!Number.isFinite(value)) {
    console.warn(`[env] ${name}="${raw}" is not a number, using ${fallback}`);
    return fallback;
  }
  return value;
}

function illuminationEnv(name: string): "AM1.5" | "AM0" {
  const raw = (process.env[name] || "AM1.5").trim().toUpperCase();
  if (raw === "AM0") return "AM0";
  if (raw !== "AM1.5") {
    console.warn(`[env] ${name}="${raw}" is not AM1.5 or AM0, using AM1.5`);
  }
  return "AM1.5";
}

export const ENV = {
  COSTING_WORKSPACE: process.env.COSTING_WORKSPACE?.trim() || "./data/workspace.json",
  DEFAULT_EXCHANGE_RATE_GBP_PER_USD: numberEnv("DEFAULT_EXCHANGE_RATE_GBP_PER_USD", 0.8),
  DEFAULT_ILLUMINATION: illuminationEnv("DEFAULT_ILLUMINATION"),
  DEFAULT_LINE_YIELD: numberEnv("DEFAULT_LINE_YIELD", 0.9),
  COSTING_LOG_VERBOSE: (process.env.COSTING_LOG_VERBOSE || "false").toLowerCase() === "true",
} as const;
