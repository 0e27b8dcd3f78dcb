/**
 * Validate stage: data-quality report over the formatted wide records.
 * Three independent passes: year gaps, repeated (country, metric) keys, missing sub-sectors.
 */

import type { PipelineConfig } from "@/lib/config";
import { readJsonFile, writeJsonFile } from "@/lib/jsonFile";
import { isRecord, yearKey, yearsIn } from "@/ingest/types";
import type { YearRange } from "@/ingest/types";

export type MissingYearsFinding = {
  country: string | null;
  metric: string | null;
  missing_years: string[];
};

export type DuplicateKey = [country: string | null, metric: string | null];

export type MissingSubSectorsFinding = {
  country: string;
  missing_subsectors: string[];
};

export type ValidationReport = {
  missing_years: MissingYearsFinding[];
  duplicates: DuplicateKey[];
  missing_subsectors: MissingSubSectorsFinding[];
};

export type ValidateOptions = {
  validationYears: YearRange;
  expectedSubSectors: readonly string[];
};

export type ValidateResult = {
  file: string;
  report: ValidationReport;
};

/** Records are read back from JSON, so fields are checked rather than trusted. */
type LooseRecord = Readonly<Record<string, unknown>>;

function text(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/** The only recognised no-value encodings: absent, null, "" and "NaN". */
export function isMissingValue(value: unknown): boolean {
  return value === undefined || value === null || value === "" || value === "NaN";
}

export function findMissingYears(
  records: readonly LooseRecord[],
  validationYears: YearRange
): MissingYearsFinding[] {
  const years = yearsIn(validationYears).map(yearKey);
  const findings: MissingYearsFinding[] = [];
  for (const record of records) {
    const missing = years.filter((y) => isMissingValue(record[y]));
    if (missing.length > 0) {
      findings.push({ country: text(record.country), metric: text(record.metric), missing_years: missing });
    }
  }
  return findings;
}

/**
 * Keys seen more than once, each reported once. Empty whenever the input came from
 * reshapeObservations; a non-empty result means the grouping step is broken.
 */
export function findDuplicateKeys(records: readonly LooseRecord[]): DuplicateKey[] {
  const seen = new Set<string>();
  const duplicates = new Map<string, DuplicateKey>();
  for (const record of records) {
    const pair: DuplicateKey = [text(record.country), text(record.metric)];
    const key = JSON.stringify(pair);
    if (seen.has(key)) duplicates.set(key, pair);
    else seen.add(key);
  }
  return Array.from(duplicates.values());
}

export function findMissingSubSectors(
  records: readonly LooseRecord[],
  expectedSubSectors: readonly string[]
): MissingSubSectorsFinding[] {
  const observed = new Map<string, Set<string>>();
  for (const record of records) {
    const country = text(record.country);
    const subSector = text(record.sub_sector);
    if (!country || !subSector) continue;
    let set = observed.get(country);
    if (!set) {
      set = new Set();
      observed.set(country, set);
    }
    set.add(subSector);
  }

  const findings: MissingSubSectorsFinding[] = [];
  for (const [country, subSectors] of observed) {
    const missing = expectedSubSectors.filter((s) => !subSectors.has(s));
    if (missing.length > 0) findings.push({ country, missing_subsectors: missing });
  }
  return findings;
}

export function validateRecords(
  records: readonly LooseRecord[],
  options: ValidateOptions
): ValidationReport {
  return {
    missing_years: findMissingYears(records, options.validationYears),
    duplicates: findDuplicateKeys(records),
    missing_subsectors: findMissingSubSectors(records, options.expectedSubSectors),
  };
}

export async function runValidate(config: PipelineConfig): Promise<ValidateResult> {
  const data = await readJsonFile(config.files.formatted);
  if (!Array.isArray(data)) {
    throw new Error(`${config.files.formatted}: expected a JSON list of records`);
  }

  const report = validateRecords(data.filter(isRecord), {
    validationYears: config.validationYears,
    expectedSubSectors: config.expectedSubSectors,
  });
  await writeJsonFile(config.files.report, report);

  if (process.env.NODE_ENV !== "test") {
    console.log(
      `[validate] ${report.missing_years.length} records with missing years, ` +
        `${report.duplicates.length} duplicate keys, ` +
        `${report.missing_subsectors.length} countries missing sub-sectors`
    );
    console.log(`[validate] Validation report saved as ${config.files.report}`);
  }
  return { file: config.files.report, report };
}
