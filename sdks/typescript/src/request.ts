import type { FilteredParameters, ParamValue, QueryParameters } from "./types";

export function buildUrl(baseUrl: string, path?: string): URL {
  return path ? new URL(path, baseUrl) : new URL(baseUrl);
}

export function isPresent(value: ParamValue): value is string | number | true | Date {
  return Boolean(value);
}

/**
 * Drops every falsy entry (`0`, `""`, `false`, `null`, `undefined`, `NaN`).
 * Applied to every outgoing request, validated or not.
 */
export function filterParams(params?: QueryParameters): FilteredParameters {
  const filtered: FilteredParameters = {};
  if (!params) {
    return filtered;
  }
  for (const [key, value] of Object.entries(params)) {
    if (isPresent(value)) {
      filtered[key] = value;
    }
  }
  return filtered;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Dates go out as the local calendar day, `YYYY-MM-DD`. */
export function formatQueryValue(value: string | number | boolean | Date): string {
  if (value instanceof Date) {
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  return String(value);
}

export function toSearchParams(params: FilteredParameters): Record<string, string> {
  const search: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    search[key] = formatQueryValue(value);
  }
  return search;
}
