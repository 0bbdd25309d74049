/**
 * Redaction engine.
 *
 * Scans a buffered body against the pattern table and writes each
 * pattern's replacement over its matches. Pure and deterministic:
 * identical input and table always give identical output. Never
 * throws; on internal failure the body passes through unmodified.
 */

import type { CompiledRedactConfig } from "./policy.js";
import type { PatternTable } from "./rules.js";
import { enabledPatterns } from "./rules.js";

/** Why a body was not scanned. */
export type BypassReason = "bypassed" | "non-text" | "too-large";

/** Value of the X-WASM-Scrub response header. */
export type ScrubStatus = "will-scrub" | BypassReason;

export interface RedactionStats {
  /** Total number of replacements made across all patterns. */
  totalReplacements: number;
  /** Per-pattern counts, in table order. Only patterns that matched. */
  byPattern: Map<string, number>;
}

export interface RedactionResult {
  /** Whether any replacement was made. */
  redacted: boolean;
  matchCount: number;
  /** Names of the patterns that matched, in table order, no duplicates. */
  matchedPatterns: string[];
  /** Output bytes. The input buffer itself when nothing changed. */
  content: Buffer;
  /** Set when scanning was skipped. */
  bypass: BypassReason | null;
  /** Set when scanning failed and the input was passed through. */
  failure: string | null;
}

/** What the engine needs to know about a response before scanning it. */
export interface BodyMeta {
  /** Request path; the query string is ignored. */
  path?: string;
  contentType?: string;
  /** Declared Content-Length, when the response has one. */
  contentLength?: number;
}

/**
 * Create fresh stats for a redaction pass.
 */
export function createStats(): RedactionStats {
  return { totalReplacements: 0, byPattern: new Map() };
}

function passThrough(
  body: Buffer,
  bypass: BypassReason | null,
  failure: string | null = null,
): RedactionResult {
  return {
    redacted: false,
    matchCount: 0,
    matchedPatterns: [],
    content: body,
    bypass,
    failure,
  };
}

// --- Text redaction ---

/**
 * Apply every enabled pattern to `input`, in table order. Each pattern
 * sees the output of the previous one.
 */
export function redactText(
  input: string,
  table: PatternTable,
  stats: RedactionStats,
): string {
  let result = input;
  for (const p of enabledPatterns(table)) {
    const matches = result.match(p.pattern);
    if (!matches) continue;
    result = result.replace(p.pattern, p.replacement);
    stats.totalReplacements += matches.length;
    stats.byPattern.set(p.name, (stats.byPattern.get(p.name) ?? 0) + matches.length);
  }
  return result;
}

// --- Buffer redaction ---

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Redact a body buffer.
 *
 * Valid UTF-8 is scanned as text. Anything else (a truncated multi-byte
 * sequence, a binary blob labeled as text) is scanned byte-wise through
 * a latin1 view, which maps each byte to one character and back, so
 * every unmatched byte survives exactly. Any internal error returns the
 * input unchanged with `failure` set.
 */
export function redactBuffer(body: Buffer, table: PatternTable): RedactionResult {
  try {
    let text: string;
    let encoding: "utf8" | "latin1" = "utf8";
    try {
      text = utf8.decode(body);
    } catch {
      encoding = "latin1";
      text = body.toString("latin1");
    }

    const stats = createStats();
    const redacted = redactText(text, table, stats);
    if (stats.totalReplacements === 0) {
      return passThrough(body, null);
    }

    return {
      redacted: true,
      matchCount: stats.totalReplacements,
      matchedPatterns: [...stats.byPattern.keys()],
      content: Buffer.from(redacted, encoding),
      bypass: null,
      failure: null,
    };
  } catch (err: unknown) {
    return passThrough(body, null, err instanceof Error ? err.message : String(err));
  }
}

// --- Scan decisions ---

/**
 * Check a request path against bypass entries. An entry ending in "*"
 * is a prefix; anything else must match exactly. The query string is
 * not part of the comparison.
 */
export function isBypassPath(path: string, bypassPaths: readonly string[]): boolean {
  const q = path.indexOf("?");
  const clean = q === -1 ? path : path.slice(0, q);
  for (const entry of bypassPaths) {
    if (entry.endsWith("*")) {
      if (clean.startsWith(entry.slice(0, -1))) return true;
    } else if (clean === entry) {
      return true;
    }
  }
  return false;
}

/** Only JSON and text bodies are scanned. A missing type is scanned. */
export function isScannableContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) return true;
  const lower = contentType.toLowerCase();
  return lower.includes("json") || lower.includes("text");
}

/**
 * Decide whether a response body will be scanned, from what is known
 * before the body arrives. Checks run in order: bypass path, content
 * type, declared length.
 */
export function classifyResponse(
  meta: BodyMeta,
  config: CompiledRedactConfig,
): ScrubStatus {
  if (meta.path !== undefined && isBypassPath(meta.path, config.bypassPaths)) {
    return "bypassed";
  }
  if (!isScannableContentType(meta.contentType)) return "non-text";
  if (meta.contentLength !== undefined && meta.contentLength > config.maxBodySizeBytes) {
    return "too-large";
  }
  return "will-scrub";
}

/**
 * Scan a complete body: classify, enforce the size cap on the actual
 * length, then redact. Skipped bodies come back unchanged with the
 * bypass reason set.
 */
export function scanBody(
  body: Buffer,
  meta: BodyMeta,
  config: CompiledRedactConfig,
): RedactionResult {
  const status = classifyResponse(meta, config);
  if (status !== "will-scrub") return passThrough(body, status);
  if (body.length > config.maxBodySizeBytes) return passThrough(body, "too-large");
  return redactBuffer(body, config.table);
}
