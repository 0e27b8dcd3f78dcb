/**
 * Extract stage: query the portal once, persist whatever came back to the raw file.
 * A failed fetch still writes the file (an empty list) so the next stage has its input.
 */

import type { PipelineConfig } from "@/lib/config";
import { writeJsonFile } from "@/lib/jsonFile";
import { fetchObservations } from "@/ingest/sources/africaEnergyPortal";
import type { FetchLike } from "@/ingest/sources/africaEnergyPortal";

export type ExtractResult = {
  file: string;
  fetched: number;
  status: number | null;
  error?: string;
};

export async function runExtract(
  config: PipelineConfig,
  fetchImpl?: FetchLike
): Promise<ExtractResult> {
  if (process.env.NODE_ENV !== "test") {
    console.log("[extract] Fetching data from Africa Energy Portal...");
  }
  const result = await fetchObservations(config, fetchImpl);
  await writeJsonFile(config.files.raw, result.records);

  if (process.env.NODE_ENV !== "test") {
    console.log(`[extract] ${result.records.length} records saved to ${config.files.raw}`);
  }
  return {
    file: config.files.raw,
    fetched: result.records.length,
    status: result.status,
    ...(result.error ? { error: result.error } : {}),
  };
}
