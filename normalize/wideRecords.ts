/**
 * Transform stage: fold raw observations into one wide record per (country, metric).
 *
 * Repeated (country, metric, year) triples are last-write-wins with no warning. The
 * validator's duplicate pass relies on this stage emitting each key exactly once.
 */

import type { PipelineConfig } from "@/lib/config";
import { readJsonFile, writeJsonFile } from "@/lib/jsonFile";
import { toRawObservation, yearKey, yearsIn } from "@/ingest/types";
import type { RawObservation, WideRecord, YearRange } from "@/ingest/types";

export type ReshapeOptions = {
  recordYears: YearRange;
  portalOrigin: string;
  sourceLabel: string;
};

export type TransformResult = {
  file: string;
  records: number;
};

/** Map key for (country, metric); null stands in for an absent value. */
function recordKey(country: string | null, metric: string | null): string {
  return JSON.stringify([country, metric]);
}

function emptyRecord(first: RawObservation, options: ReshapeOptions): WideRecord {
  const record: WideRecord = {
    country: first.name,
    country_serial: first.id,
    metric: first.indicator_name,
    unit: first.unit,
    sector: first.indicator_group,
    sub_sector: first.indicator_topic,
    source_link: options.portalOrigin + (first.url ?? ""),
    source: options.sourceLabel,
  };
  for (const year of yearsIn(options.recordYears)) {
    record[yearKey(year)] = null;
  }
  return record;
}

/**
 * Group observations by (country, metric). Output order is first-seen order of keys.
 * Years outside options.recordYears are ignored.
 */
export function reshapeObservations(
  observations: readonly RawObservation[],
  options: ReshapeOptions
): WideRecord[] {
  const byKey = new Map<string, WideRecord>();
  const { start, end } = options.recordYears;

  for (const obs of observations) {
    const key = recordKey(obs.name, obs.indicator_name);
    let record = byKey.get(key);
    if (!record) {
      record = emptyRecord(obs, options);
      byKey.set(key, record);
    }
    if (obs.year !== null && obs.year >= start && obs.year <= end) {
      record[yearKey(obs.year)] = obs.score;
    }
  }

  return Array.from(byKey.values());
}

export async function runTransform(config: PipelineConfig): Promise<TransformResult> {
  const raw = await readJsonFile(config.files.raw);
  if (!Array.isArray(raw)) {
    throw new Error(`${config.files.raw}: expected a JSON list of observations`);
  }

  const records = reshapeObservations(raw.map(toRawObservation), {
    recordYears: config.recordYears,
    portalOrigin: config.portalOrigin,
    sourceLabel: config.sourceLabel,
  });
  await writeJsonFile(config.files.formatted, records);

  if (process.env.NODE_ENV !== "test") {
    console.log(`[transform] Formatted ${records.length} records saved to ${config.files.formatted}`);
  }
  return { file: config.files.formatted, records: records.length };
}
