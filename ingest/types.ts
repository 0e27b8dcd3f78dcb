/**
 * Shared record shapes for the ETL stages.
 * Raw observations come straight from the portal; wide records are what every later stage reads.
 */

/** One fact as returned by the portal. Any field may be missing or null in the feed. */
export interface RawObservation {
  name: string | null;
  id: string | null;
  indicator_name: string | null;
  unit: string | null;
  indicator_group: string | null;
  indicator_topic: string | null;
  year: number | null;
  score: YearValue;
  url: string | null;
}

/** Value stored in a year slot. null is the no-value marker. */
export type YearValue = number | string | null;

export type YearKey = `${number}`;

export type YearRange = { start: number; end: number };

export type WideRecordFields = {
  country: string | null;
  country_serial: string | null;
  metric: string | null;
  unit: string | null;
  sector: string | null;
  sub_sector: string | null;
  source_link: string;
  source: string;
};

/** One row per (country, metric) with a slot for every year of the record range. */
export type WideRecord = WideRecordFields & { [year: YearKey]: YearValue };

export function yearKey(year: number): YearKey {
  return `${year}`;
}

/** Inclusive list of years in a range. */
export function yearsIn(range: YearRange): number[] {
  const out: number[] = [];
  for (let y = range.start; y <= range.end; y++) out.push(y);
  return out;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function textOrNull(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function yearOrNull(value: unknown): number | null {
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  if (typeof value === "string" && /^\d{4}$/.test(value.trim())) return parseInt(value, 10);
  return null;
}

/**
 * Narrow one element of the raw feed. Unknown fields are dropped, wrong-typed ones become null.
 */
export function toRawObservation(value: unknown): RawObservation {
  const r = isRecord(value) ? value : {};
  const score = r.score;
  return {
    name: textOrNull(r.name),
    id: textOrNull(r.id),
    indicator_name: textOrNull(r.indicator_name),
    unit: textOrNull(r.unit),
    indicator_group: textOrNull(r.indicator_group),
    indicator_topic: textOrNull(r.indicator_topic),
    year: yearOrNull(r.year),
    score: typeof score === "number" || typeof score === "string" ? score : null,
    url: typeof r.url === "string" ? r.url : null,
  };
}
