/**
 * Full ETL run: extract → transform → validate → load, each stage reading the previous stage's file.
 * Extract and load report failures in their results; transform and validate throw.
 */

import type { PipelineConfig } from "@/lib/config";
import { runExtract } from "@/ingest/run";
import type { ExtractResult } from "@/ingest/run";
import type { FetchLike } from "@/ingest/sources/africaEnergyPortal";
import { runTransform } from "@/normalize/wideRecords";
import type { TransformResult } from "@/normalize/wideRecords";
import { runValidate } from "@/validate/report";
import { loadRecords } from "@/load/energyData";
import type { DocumentCollection, LoadResult } from "@/load/types";

export type PipelineDeps = {
  fetchImpl?: FetchLike;
  /** Called only when the load stage starts, so earlier stages never touch the store. */
  openCollection: () => DocumentCollection;
};

export type PipelineResult = {
  extract: ExtractResult;
  transform: TransformResult;
  validate: {
    file: string;
    missingYears: number;
    duplicates: number;
    missingSubSectors: number;
  };
  load: LoadResult;
};

function openOrFail(deps: PipelineDeps): DocumentCollection | LoadResult {
  try {
    return deps.openCollection();
  } catch (err) {
    const error = `connection failed: ${err instanceof Error ? err.message : String(err)}`;
    if (process.env.NODE_ENV !== "test") console.error("[load]", error);
    return { ok: false, inserted: 0, batches: 0, error };
  }
}

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps): Promise<PipelineResult> {
  const extract = await runExtract(config, deps.fetchImpl);
  const transform = await runTransform(config);
  const { file, report } = await runValidate(config);

  const collection = openOrFail(deps);
  const load = "ping" in collection ? await loadRecords(config, collection) : collection;

  if (process.env.NODE_ENV !== "test") {
    console.log("[etl] done", {
      fetched: extract.fetched,
      records: transform.records,
      inserted: load.inserted,
      loadOk: load.ok,
    });
  }

  return {
    extract,
    transform,
    validate: {
      file,
      missingYears: report.missing_years.length,
      duplicates: report.duplicates.length,
      missingSubSectors: report.missing_subsectors.length,
    },
    load,
  };
}
