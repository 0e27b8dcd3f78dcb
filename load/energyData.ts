/**
 * Load stage: insert formatted wide records into the document collection, in fixed-size batches.
 * Not transactional. A failed batch aborts the stage; batches already written stay written.
 * Every failure here is logged and reported in the result, never thrown.
 */

import { existsSync } from "node:fs";
import type { PipelineConfig } from "@/lib/config";
import { readJsonFile } from "@/lib/jsonFile";
import { isRecord } from "@/ingest/types";
import type { DocumentCollection, LoadResult, StoreDocument } from "@/load/types";

type LoadConfig = Pick<PipelineConfig, "files" | "batchSize" | "probeTimeoutMs" | "table">;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function probe(collection: DocumentCollection, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`ping timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    await Promise.race([collection.ping(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Insert documents in chunks of batchSize. Stops at the first failing chunk.
 */
export async function insertInBatches(
  collection: DocumentCollection,
  documents: readonly StoreDocument[],
  batchSize: number
): Promise<LoadResult> {
  let inserted = 0;
  let batches = 0;
  for (let i = 0; i < documents.length; i += batchSize) {
    const batch = documents.slice(i, i + batchSize);
    try {
      inserted += await collection.insertMany(batch);
      batches++;
    } catch (err) {
      const error = `batch ${i / batchSize + 1}: ${errorMessage(err)}`;
      if (process.env.NODE_ENV !== "test") {
        console.error("[load] Failed to insert data:", error);
      }
      return { ok: false, inserted, batches, error };
    }
  }
  return { ok: true, inserted, batches };
}

/**
 * Probe the store, then read the formatted file and insert it.
 * A list is inserted in batches; a single JSON object is inserted on its own.
 */
export async function loadRecords(
  config: LoadConfig,
  collection: DocumentCollection
): Promise<LoadResult> {
  try {
    await probe(collection, config.probeTimeoutMs);
  } catch (err) {
    const error = `connection failed: ${errorMessage(err)}`;
    if (process.env.NODE_ENV !== "test") console.error("[load]", error);
    return { ok: false, inserted: 0, batches: 0, error };
  }
  if (process.env.NODE_ENV !== "test") {
    console.log(`[load] Connected; target table ${config.table}`);
  }

  const file = config.files.formatted;
  if (!existsSync(file)) {
    const error = `file not found: ${file}`;
    if (process.env.NODE_ENV !== "test") console.error("[load]", error);
    return { ok: false, inserted: 0, batches: 0, error };
  }

  let data: unknown;
  try {
    data = await readJsonFile(file);
  } catch (err) {
    const error = `could not read ${file}: ${errorMessage(err)}`;
    if (process.env.NODE_ENV !== "test") console.error("[load]", error);
    return { ok: false, inserted: 0, batches: 0, error };
  }

  let result: LoadResult;
  if (Array.isArray(data)) {
    result = await insertInBatches(collection, data.filter(isRecord), config.batchSize);
  } else if (isRecord(data)) {
    result = await insertInBatches(collection, [data], config.batchSize);
  } else {
    result = { ok: false, inserted: 0, batches: 0, error: `${file}: expected a JSON list or object` };
    if (process.env.NODE_ENV !== "test") console.error("[load]", result.error);
  }

  if (result.ok && process.env.NODE_ENV !== "test") {
    console.log(`[load] Inserted ${result.inserted} records into '${config.table}' in ${result.batches} batches.`);
  }
  return result;
}
