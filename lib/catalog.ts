/**
 * Fixed query lists for the Africa Energy Portal database endpoint.
 * Kept in data/*.json so tests can build configs with smaller lists.
 */

import { readFileSync } from "node:fs";

export type IndicatorCatalog = {
  mainGroup: string;
  groups: string[];
  indicators: string[];
};

function readDataFile(name: string): unknown {
  const url = new URL(`../data/${name}`, import.meta.url);
  return JSON.parse(readFileSync(url, "utf-8"));
}

function stringList(value: unknown, label: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new Error(`${label} must be a list of strings`);
  }
  return value;
}

export function loadIndicatorCatalog(): IndicatorCatalog {
  const raw = readDataFile("indicators.json");
  if (typeof raw !== "object" || raw === null || !("mainGroup" in raw) || typeof raw.mainGroup !== "string") {
    throw new Error("data/indicators.json: mainGroup is required");
  }
  return {
    mainGroup: raw.mainGroup,
    groups: stringList("groups" in raw ? raw.groups : undefined, "data/indicators.json groups"),
    indicators: stringList("indicators" in raw ? raw.indicators : undefined, "data/indicators.json indicators"),
  };
}

export function loadCountries(): string[] {
  return stringList(readDataFile("countries.json"), "data/countries.json");
}
