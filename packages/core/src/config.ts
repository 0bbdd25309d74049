/**
 * Configuration loading helpers shared by the filters.
 *
 * Filter configs are JSON documents supplied once per filter instance.
 * Files may contain `//` comments and trailing commas. Field
 * readers validate shape and report the JSON path of the first bad
 * field; a malformed config never produces a half-configured filter.
 */

import fs from "node:fs";

import type { JsonObject, JsonValue } from "./types.js";

/**
 * Thrown for configuration that cannot be loaded. Fatal to filter
 * initialization: the host decides whether traffic then bypasses the
 * filter or is rejected.
 */
export class ConfigError extends Error {
  /** JSON path of the offending field, e.g. `rules[2].conditions[0].operator`. */
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(field ? `${field}: ${message}` : message);
    this.name = "ConfigError";
    this.field = field;
  }
}

/**
 * Strip // comments and trailing commas from JSON-with-comments.
 * Good enough for config files; not a full JSONC parser.
 *
 * String literals are copied as they are, so "//" in a URL and ",}"
 * or ",]" in a regex value survive.
 */
export function stripJsonComments(text: string): string {
  let out = "";
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"') {
      const end = skipString(text, i);
      out += text.slice(i, end);
      i = end;
    } else if (ch === "/" && text[i + 1] === "/") {
      i = skipComment(text, i);
    } else if (ch === "," && isClosingNext(text, i + 1)) {
      i++;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

/** Index just past the string literal opening at `start`. */
function skipString(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === "\\") i += 2;
    else if (text[i] === '"') return i + 1;
    else i++;
  }
  return i;
}

/** Index of the newline ending the comment at `start`. */
function skipComment(text: string, start: number): number {
  const end = text.indexOf("\n", start);
  return end === -1 ? text.length : end;
}

/** Whether only whitespace and comments separate `from` and a } or ]. */
function isClosingNext(text: string, from: number): boolean {
  let i = from;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "/" && text[i + 1] === "/") i = skipComment(text, i);
    else if (/\s/.test(ch)) i++;
    else return ch === "}" || ch === "]";
  }
  return false;
}

/** Parse JSON(C) text, wrapping syntax errors in a ConfigError. */
export function parseJsonText(text: string, source = "config"): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(stripJsonComments(text));
    return parsed;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${source} is not valid JSON (${reason})`);
  }
}

/** Read and parse a JSON(C) file. */
export function readJsonFile(filePath: string): JsonValue {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read ${filePath} (${reason})`);
  }
  return parseJsonText(raw, filePath);
}

// --- Field readers ---

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Require an object at `field`. */
export function expectObject(value: unknown, field: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new ConfigError(`expected an object, got ${describe(value)}`, field);
  }
  return value;
}

/** Require an array at `field`. */
export function expectArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`expected an array, got ${describe(value)}`, field);
  }
  return value;
}

/** Require a non-empty string at `field`. */
export function expectString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`expected a string, got ${describe(value)}`, field);
  }
  if (value.length === 0) {
    throw new ConfigError("must not be empty", field);
  }
  return value;
}

/** Require an integer at `field`, optionally bounded below. */
export function expectInteger(value: unknown, field: string, min?: number): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ConfigError(`expected an integer, got ${describe(value)}`, field);
  }
  if (min !== undefined && value < min) {
    throw new ConfigError(`must be at least ${min}`, field);
  }
  return value;
}

/** Read an optional string; `undefined` and `null` yield the fallback. */
export function optionalString(value: unknown, field: string, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  return expectString(value, field);
}

/** Read an optional boolean; `undefined` and `null` yield the fallback. */
export function optionalBoolean(value: unknown, field: string, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") {
    throw new ConfigError(`expected a boolean, got ${describe(value)}`, field);
  }
  return value;
}

/** Read an optional array of non-empty strings. */
export function optionalStringArray(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];
  return expectArray(value, field).map((item, i) =>
    expectString(item, `${field}[${i}]`),
  );
}

/** Read an optional string -> string map. Values may be empty strings. */
export function optionalStringRecord(
  value: unknown,
  field: string,
): Record<string, string> {
  if (value === undefined || value === null) return {};
  const obj = expectObject(value, field);
  const result: Record<string, string> = {};
  for (const [key, val] of Object.entries(obj)) {
    if (typeof val !== "string") {
      throw new ConfigError(`expected a string, got ${describe(val)}`, `${field}.${key}`);
    }
    result[key] = val;
  }
  return result;
}

/**
 * Compile a user-supplied pattern. A leading `(?i)` requests
 * case-insensitive matching, since JS has no inline flags. Patterns
 * compile in Unicode mode, so `\p{L}` and friends work and a needless
 * escape such as `\-` outside a class is an error.
 */
export function compilePattern(
  source: string,
  field: string,
  flags = "",
): RegExp {
  let body = source;
  let allFlags = flags.includes("u") ? flags : `${flags}u`;
  if (body.startsWith("(?i)")) {
    body = body.slice(4);
    if (!allFlags.includes("i")) allFlags += "i";
  }
  try {
    return new RegExp(body, allFlags);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid pattern (${reason})`, field);
  }
}
