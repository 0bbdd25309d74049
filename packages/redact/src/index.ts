/**
 * @edgeward/redact - Response body redaction filter.
 *
 * Masks sensitive text (card numbers, SSNs, email addresses, US phone
 * numbers, custom patterns) in response bodies before they reach the
 * client.
 *
 * ```typescript
 * import { createRedactFilter } from '@edgeward/redact';
 *
 * // Built-in defaults: cards, SSNs and emails; /health and /metrics bypassed
 * const redact = createRedactFilter();
 *
 * // From a config file
 * const redact = createRedactFilter({ configFile: "redact.json" });
 * ```
 */

import {
  createLogger,
  normalizeHeaders,
  noMutations,
  type EdgeFilter,
  type FilterContext,
  type HeaderMutations,
  type LogSink,
} from "@edgeward/core";

import type { CompiledRedactConfig } from "./policy.js";
import { loadRedactConfigFile, parseRedactConfig } from "./policy.js";
import type { ScrubStatus } from "./redact.js";
import { classifyResponse, createStats, redactText } from "./redact.js";
import type { BodyScanner } from "./stream.js";
import { createBodyScanner } from "./stream.js";

/** Configuration for {@link createRedactFilter}. */
export interface RedactFilterOptions {
  /** Config document (parsed JSON). Default: built-in defaults. */
  config?: unknown;
  /** Path to a config JSON(C) file. Overrides `config`. */
  configFile?: string;
  /** Pre-compiled config. Overrides both `config` and `configFile`. */
  compiled?: CompiledRedactConfig;
  /** Where log lines go. Default: stderr. */
  logSink?: LogSink;
}

/** Response headers the filter adds. */
export const WASM_ACTIVE_HEADER = "X-WASM-Active";
export const WASM_SCRUB_HEADER = "X-WASM-Scrub";

/** Resolve effective config: compiled > file > document > defaults. */
function resolveConfig(options?: RedactFilterOptions): CompiledRedactConfig {
  if (options?.compiled) return options.compiled;
  if (options?.configFile) return loadRedactConfigFile(options.configFile);
  return parseRedactConfig(options?.config ?? {});
}

function parseContentLength(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return undefined;
  return parseInt(value, 10);
}

/**
 * Create a redaction filter.
 *
 * Configuration is compiled here, once; a malformed config throws
 * ConfigError and no filter is created. Each request then gets its own
 * context that decides at response-header time whether to scan
 * (X-WASM-Scrub), buffers the body, and replaces it with the redacted
 * version at end of stream.
 */
export function createRedactFilter(options?: RedactFilterOptions): EdgeFilter {
  const config = resolveConfig(options);
  const log = createLogger("redact", config.logLevel, options?.logSink);

  const enabled = config.table.patterns.filter((p) => p.enabled).map((p) => p.name);
  log.info(
    `Configured: patterns=[${enabled.join(", ")}] bypass_paths=${config.bypassPaths.length} max_body_size_bytes=${config.maxBodySizeBytes}`,
  );

  let nextId = 1;

  function createContext(): FilterContext {
    const id = nextId++;
    let path: string | undefined;
    let status: ScrubStatus | null = null;
    let scanner: BodyScanner | null = null;

    /** Status from the path alone, for hosts that skip response headers. */
    function ensureStatus(): ScrubStatus {
      if (status === null) status = classifyResponse({ path }, config);
      return status;
    }

    return {
      onRequestHeaders(event): HeaderMutations {
        path = event.path;
        log.trace(`[${id}] request path=${path}`);
        return noMutations();
      },

      onResponseHeaders(event): HeaderMutations {
        const headers = normalizeHeaders(event.headers);
        const contentType = headers.get("content-type");
        const contentLength = parseContentLength(headers.get("content-length"));
        status = classifyResponse({ path, contentType, contentLength }, config);

        if (status === "bypassed") {
          log.debug(`[${id}] Bypassing scrubbing for path: ${path ?? "(unknown)"}`);
        } else if (status === "non-text") {
          log.debug(`[${id}] Skipping non-text content type: ${contentType ?? ""}`);
        } else if (status === "too-large") {
          log.warn(`[${id}] Body too large (${contentLength ?? 0} bytes), skipping scrubbing`);
        }

        const mutations: HeaderMutations = {
          add: { [WASM_ACTIVE_HEADER]: "true", [WASM_SCRUB_HEADER]: status },
          remove: [],
        };
        // The body may change length once redacted.
        if (status === "will-scrub") mutations.remove.push("content-length");
        return mutations;
      },

      onResponseBody(chunk, endOfStream) {
        if (ensureStatus() !== "will-scrub") return { type: "continue" };
        if (scanner === null) scanner = createBodyScanner(config);

        const action = scanner.onChunk(chunk, endOfStream);
        const result = action.type === "flush" ? scanner.result : null;
        if (result === null) return action;

        if (result.bypass === "too-large") {
          log.warn(`[${id}] Body too large (${scanner.bufferedBytes} bytes), passing through`);
        } else if (result.failure !== null) {
          log.warn(`[${id}] Redaction failed, passing body through: ${result.failure}`);
        } else if (result.redacted) {
          log.info(
            `[${id}] Redacted ${result.matchCount} match(es): ${result.matchedPatterns.join(", ")}`,
          );
        } else {
          log.debug(`[${id}] No PII patterns found in response`);
        }
        return action;
      },

      onStreamClosed() {
        if (scanner !== null && scanner.state === "buffering") {
          log.debug(`[${id}] Stream closed after ${scanner.bufferedBytes} bytes, discarding`);
          scanner.discard();
        }
      },
    };
  }

  return { name: "redact", createContext };
}

/**
 * Redact a string with a compiled config (default: built-in defaults).
 * No bypass or size checks; for one-off use and tooling.
 */
export function redactString(
  text: string,
  config: CompiledRedactConfig = parseRedactConfig({}),
): string {
  return redactText(text, config.table, createStats());
}

// Public API
export type { PiiPattern, PatternTable } from "./rules.js";
export { enabledPatterns } from "./rules.js";
export type { BuiltinPattern, BuiltinPatternName } from "./presets.js";
export { BUILTIN_PATTERNS, BUILTIN_PATTERN_NAMES } from "./presets.js";
export type { CompiledRedactConfig, CustomPatternJson, RedactConfigJson } from "./policy.js";
export {
  DEFAULT_BYPASS_PATHS,
  DEFAULT_MAX_BODY_SIZE_BYTES,
  buildPatternTable,
  loadRedactConfigFile,
  parseRedactConfig,
} from "./policy.js";
export type {
  BodyMeta,
  BypassReason,
  RedactionResult,
  RedactionStats,
  ScrubStatus,
} from "./redact.js";
export {
  classifyResponse,
  createStats,
  isBypassPath,
  isScannableContentType,
  redactBuffer,
  redactText,
  scanBody,
} from "./redact.js";
export type { BodyScanner, ScannerState } from "./stream.js";
export {
  PII_REDACTED_HEADER,
  REDACTION_COUNT_HEADER,
  attributionHeaders,
  createBodyScanner,
} from "./stream.js";
