/**
 * Africa Energy Portal database export. One POST, form-encoded, JSON back.
 * No retries and no timeout: a failed request means zero records for this run.
 */

import * as cheerio from "cheerio";
import type { PipelineConfig } from "@/lib/config";
import { isRecord, yearsIn } from "@/ingest/types";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type PortalFetchResult = {
  /** Raw observation objects exactly as the portal sent them. */
  records: Record<string, unknown>[];
  status: number | null;
  error?: string;
};

type QueryConfig = Pick<
  PipelineConfig,
  "mainGroup" | "indicatorGroups" | "indicators" | "requestYears" | "countries"
>;

/**
 * Form payload for /get-database-data. List fields repeat their key, PHP style (name[]=...).
 */
export function buildDatabaseQuery(config: QueryConfig): URLSearchParams {
  const form = new URLSearchParams();
  form.append("mainGroup", config.mainGroup);
  for (const group of config.indicatorGroups) form.append("mainIndicator[]", group);
  for (const indicator of config.indicators) form.append("mainIndicatorValue[]", indicator);
  for (const year of yearsIn(config.requestYears)) form.append("year[]", String(year));
  for (const country of config.countries) form.append("name[]", country);
  return form;
}

/**
 * Pull the observation list out of a parsed response: a bare list, or { data: [...] }.
 * Anything else yields no records. Non-object list items are skipped.
 */
export function extractObservations(payload: unknown): Record<string, unknown>[] {
  const list = Array.isArray(payload) ? payload : isRecord(payload) ? payload.data : undefined;
  if (!Array.isArray(list)) return [];
  return list.filter(isRecord);
}

/**
 * Short description of a body that is not JSON, for the log.
 * HTML pages (e.g. an anti-bot interstitial) are named by their <title>.
 */
export function describeNonJsonBody(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return "empty body";
  if (/^<(!doctype|html|head|body)/i.test(trimmed)) {
    const $ = cheerio.load(trimmed);
    const title = $("title").first().text().trim();
    return title ? `HTML page "${title}"` : "HTML page without title";
  }
  return `"${trimmed.slice(0, 120)}"`;
}

/**
 * POST the fixed query and return the observation objects.
 * Network errors and non-JSON bodies are logged and reported as an empty result.
 */
export async function fetchObservations(
  config: PipelineConfig,
  fetchImpl: FetchLike = fetch
): Promise<PortalFetchResult> {
  const url = `${config.portalOrigin}${config.endpointPath}`;
  let status: number | null = null;
  try {
    const res = await fetchImpl(url, {
      method: "POST",
      headers: {
        "User-Agent": DEFAULT_USER_AGENT,
        "Accept-Language": "en-US,en;q=0.9",
        Accept: "application/json, text/javascript, */*; q=0.01",
        "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8",
        "X-Requested-With": "XMLHttpRequest",
        Origin: config.portalOrigin,
        Referer: `${config.portalOrigin}/database`,
      },
      body: buildDatabaseQuery(config).toString(),
    });
    status = res.status;
    if (process.env.NODE_ENV !== "test") {
      console.log(`[extract] ${url} → HTTP ${res.status}`);
    }

    const body = await res.text();
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      throw new Error(`response is not JSON (${describeNonJsonBody(body)})`);
    }
    return { records: extractObservations(payload), status };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (process.env.NODE_ENV !== "test") {
      console.warn("[extract] Error during extraction:", message);
    }
    return { records: [], status, error: message };
  }
}
