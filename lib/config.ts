/**
 * Pipeline configuration. Every stage takes a PipelineConfig instead of reading constants,
 * so tests can pass smaller lists and their own file locations.
 * Store credentials come from DATABASE_URL only (see lib/db.ts).
 */

import path from "node:path";
import type { YearRange } from "@/ingest/types";
import { loadCountries, loadIndicatorCatalog } from "@/lib/catalog";

export const PORTAL_ORIGIN = "https://africa-energy-portal.org";

export type PipelineFiles = {
  raw: string;
  formatted: string;
  report: string;
};

export type PipelineConfig = {
  portalOrigin: string;
  endpointPath: string;
  sourceLabel: string;
  mainGroup: string;
  indicatorGroups: string[];
  indicators: string[];
  countries: string[];
  /** Years sent in the portal query. */
  requestYears: YearRange;
  /** Year slots on every wide record. */
  recordYears: YearRange;
  /** Years the validator checks for gaps. Deliberately separate from recordYears. */
  validationYears: YearRange;
  expectedSubSectors: string[];
  files: PipelineFiles;
  batchSize: number;
  probeTimeoutMs: number;
  table: string;
};

export const DEFAULT_FILE_NAMES: PipelineFiles = {
  raw: "africa_energy_data.json",
  formatted: "formatted_africa_energy_data.json",
  report: "validation_report.json",
};

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

/**
 * Build the run configuration from the environment.
 * ETL_OUTPUT_DIR (default cwd), ENERGY_DATA_TABLE (default energy_data), ETL_BATCH_SIZE (default 500).
 */
export function loadConfig(env: Env = process.env): PipelineConfig {
  const catalog = loadIndicatorCatalog();
  const outputDir = path.resolve(process.cwd(), env.ETL_OUTPUT_DIR?.trim() || ".");
  const table = env.ENERGY_DATA_TABLE?.trim() || "energy_data";
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(table)) {
    throw new Error(`ENERGY_DATA_TABLE must be a plain SQL identifier, got "${table}"`);
  }

  return {
    portalOrigin: PORTAL_ORIGIN,
    endpointPath: "/get-database-data",
    sourceLabel: "Africa Energy Portal",
    mainGroup: catalog.mainGroup,
    indicatorGroups: catalog.groups,
    indicators: catalog.indicators,
    countries: loadCountries(),
    requestYears: { start: 2000, end: 2022 },
    recordYears: { start: 2000, end: 2024 },
    validationYears: { start: 2000, end: 2022 },
    expectedSubSectors: ["Access", "Supply", "Technical"],
    files: {
      raw: path.join(outputDir, DEFAULT_FILE_NAMES.raw),
      formatted: path.join(outputDir, DEFAULT_FILE_NAMES.formatted),
      report: path.join(outputDir, DEFAULT_FILE_NAMES.report),
    },
    batchSize: intFromEnv(env, "ETL_BATCH_SIZE", 500),
    probeTimeoutMs: 5000,
    table,
  };
}
