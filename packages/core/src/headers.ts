/**
 * Header helpers.
 *
 * HTTP header names are case-insensitive. Filters normalize the
 * host's map once per event and look names up in lowercase.
 */

import type { HeaderMap, HeaderMutations } from "./types.js";

/**
 * Return a copy of `headers` with lowercase names.
 *
 * Multi-valued headers are joined with ", ", except `cookie`, whose
 * values are joined with "; " so the result still parses as one
 * cookie header. When two source names differ only in case their
 * values are joined the same way.
 */
export function normalizeHeaders(headers: HeaderMap): Map<string, string> {
  const result = new Map<string, string>();
  for (const [key, val] of Object.entries(headers)) {
    if (val === undefined) continue;
    const name = key.toLowerCase();
    const sep = name === "cookie" ? "; " : ", ";
    const value = Array.isArray(val) ? val.join(sep) : val;
    const existing = result.get(name);
    result.set(name, existing === undefined ? value : existing + sep + value);
  }
  return result;
}

/** Case-insensitive single header lookup. */
export function getHeader(headers: HeaderMap, name: string): string | undefined {
  return normalizeHeaders(headers).get(name.toLowerCase());
}

/** Header mutations that change nothing. */
export function noMutations(): HeaderMutations {
  return { add: {}, remove: [] };
}

/**
 * Apply mutations to a header map the way a host would: removals
 * first, then additions, which replace any header of the same name.
 * Names compare case-insensitively. Returns a new map.
 */
export function applyMutations(
  headers: HeaderMap,
  mutations: HeaderMutations,
): HeaderMap {
  const remove = new Set(mutations.remove.map((n) => n.toLowerCase()));
  for (const name of Object.keys(mutations.add)) remove.add(name.toLowerCase());
  const result: HeaderMap = {};
  for (const [key, val] of Object.entries(headers)) {
    if (remove.has(key.toLowerCase())) continue;
    result[key] = val;
  }
  for (const [key, val] of Object.entries(mutations.add)) {
    result[key] = val;
  }
  return result;
}
