/**
 * Redaction filter configuration.
 *
 * Config JSON format (every field optional):
 * {
 *   "log_level": "info",
 *   "patterns": {                   // built-in toggles
 *     "credit_card": true,
 *     "ssn": true,
 *     "email": true,
 *     "phone_us": false
 *   },
 *   "custom_patterns": [            // applied after the built-ins, in order
 *     {
 *       "name": "employee_id",
 *       "regex": "EMP-\\d{3}(\\d{2})",
 *       "replacement": "EMP-XXX$1",
 *       "example": "EMP-12345"      // required when the replacement keeps groups
 *     }
 *   ],
 *   "bypass_paths": ["/health", "/internal/*"],
 *   "max_body_size_bytes": 1048576
 * }
 */

import {
  ConfigError,
  compilePattern,
  expectArray,
  expectInteger,
  expectObject,
  expectString,
  optionalBoolean,
  optionalString,
  optionalStringArray,
  parseLogLevel,
  readJsonFile,
} from "@edgeward/core";
import type { LogLevel } from "@edgeward/core";

import {
  BUILTIN_PATTERNS,
  BUILTIN_PATTERN_NAMES,
  isBuiltinPatternName,
  type BuiltinPatternName,
} from "./presets.js";
import { enabledPatterns, type PatternTable, type PiiPattern } from "./rules.js";

// --- Config JSON schema types ---

export interface CustomPatternJson {
  name: string;
  /** Regex source. A leading (?i) makes it case-insensitive. */
  regex: string;
  /** Replacement template; $1, $<name> keep captured groups. */
  replacement: string;
  /**
   * Text the regex matches. Required when `replacement` keeps captured
   * text, so the redacted output can be checked at load time.
   */
  example?: string;
  /** Default: true. */
  enabled?: boolean;
}

export interface RedactConfigJson {
  log_level?: string;
  patterns?: Partial<Record<BuiltinPatternName, boolean>>;
  custom_patterns?: CustomPatternJson[];
  bypass_paths?: string[];
  max_body_size_bytes?: number;
}

// --- Compiled config (ready for the engine) ---

export interface CompiledRedactConfig {
  readonly logLevel: LogLevel;
  readonly table: PatternTable;
  /** Exact paths, or prefixes when the entry ends in "*". */
  readonly bypassPaths: readonly string[];
  readonly maxBodySizeBytes: number;
}

export const DEFAULT_BYPASS_PATHS: readonly string[] = ["/health", "/metrics"];
export const DEFAULT_MAX_BODY_SIZE_BYTES = 1_048_576; // 1 MiB

// --- Compilation ---

/**
 * Remove group references from a replacement template, leaving the
 * text the template always writes. "$$" is a literal "$".
 */
function literalTemplateText(template: string): string {
  return template.replace(/\$(\$|\d{1,2}|&|`|'|<[^>]*>)/g, (_m, ref: string) =>
    ref === "$" ? "$" : "",
  );
}

/** Whether a replacement template writes any captured text back. */
function keepsCapturedText(template: string): boolean {
  return /\$(\d{1,2}|&|`|'|<[^>]*>)/.test(template.replace(/\$\$/g, ""));
}

interface CustomPatternEntry {
  pattern: PiiPattern;
  example: string | null;
}

/**
 * Compile one custom pattern.
 *
 * Rejects patterns that can match the empty string (they would insert
 * the replacement between every character), and templates that keep
 * captured text but give no example to check them against.
 */
function compileCustomPattern(value: unknown, field: string): CustomPatternEntry {
  const json = expectObject(value, field);
  const name = expectString(json.name, `${field}.name`);
  const source = expectString(json.regex, `${field}.regex`);
  if (typeof json.replacement !== "string") {
    throw new ConfigError("expected a string", `${field}.replacement`);
  }
  const replacement = json.replacement;
  const enabled = optionalBoolean(json.enabled, `${field}.enabled`, true);
  const example =
    json.example === undefined || json.example === null
      ? null
      : expectString(json.example, `${field}.example`);

  const pattern = compilePattern(source, `${field}.regex`, "g");
  if ("".search(pattern) !== -1) {
    throw new ConfigError("pattern must not match the empty string", `${field}.regex`);
  }
  if (example === null && keepsCapturedText(replacement)) {
    throw new ConfigError(
      "replacement keeps captured text; add an example the pattern matches",
      `${field}.example`,
    );
  }
  if (example !== null && example.search(pattern) === -1) {
    throw new ConfigError("example is not matched by the pattern", `${field}.example`);
  }

  return {
    pattern: Object.freeze({ name, pattern, replacement, enabled, builtin: false }),
    example,
  };
}

function applyPatterns(text: string, patterns: readonly PiiPattern[]): string {
  return patterns.reduce((acc, p) => acc.replace(p.pattern, p.replacement), text);
}

/**
 * Reject enabled custom patterns that would make a second redaction
 * pass change the output. No pattern that runs at or before a custom
 * pattern may match its literal replacement text, and redacting its
 * example twice must give the same result as redacting it once.
 */
function checkIdempotent(table: PatternTable, custom: readonly CustomPatternEntry[]): void {
  const active = enabledPatterns(table);
  custom.forEach(({ pattern, example }, i) => {
    if (!pattern.enabled) return;
    const field = `custom_patterns[${i}]`;
    const upTo = active.slice(0, active.indexOf(pattern) + 1);

    const literal = literalTemplateText(pattern.replacement);
    const clash = upTo.find((p) => literal.search(p.pattern) !== -1);
    if (clash !== undefined) {
      const by = clash === pattern ? "its own pattern" : `pattern "${clash.name}"`;
      throw new ConfigError(
        `replacement text is matched by ${by}; redaction would not be idempotent`,
        `${field}.replacement`,
      );
    }

    if (example === null) return;
    const once = applyPatterns(example, upTo);
    const twice = applyPatterns(once, upTo);
    if (twice !== once) {
      throw new ConfigError(
        `redacting the example again changes "${once}" to "${twice}"; redaction would not be idempotent`,
        `${field}.replacement`,
      );
    }
  });
}

/**
 * Build the pattern table: built-ins in their fixed order (each
 * enabled per `toggles` or its default), then custom patterns.
 */
export function buildPatternTable(
  toggles: Partial<Record<BuiltinPatternName, boolean>>,
  custom: readonly PiiPattern[] = [],
): PatternTable {
  const patterns: PiiPattern[] = BUILTIN_PATTERNS.map((b) =>
    Object.freeze({
      name: b.name,
      pattern: b.pattern,
      replacement: b.replacement,
      enabled: toggles[b.name] ?? b.enabledByDefault,
      builtin: true,
    }),
  );

  const seen = new Set<string>(BUILTIN_PATTERN_NAMES);
  for (const p of custom) {
    if (seen.has(p.name)) {
      throw new ConfigError(`duplicate pattern name "${p.name}"`);
    }
    seen.add(p.name);
    patterns.push(p);
  }

  return Object.freeze({ patterns: Object.freeze(patterns) });
}

function parseToggles(
  value: unknown,
): Partial<Record<BuiltinPatternName, boolean>> {
  if (value === undefined || value === null) return {};
  const obj = expectObject(value, "patterns");
  const toggles: Partial<Record<BuiltinPatternName, boolean>> = {};
  for (const [key, val] of Object.entries(obj)) {
    if (!isBuiltinPatternName(key)) {
      throw new ConfigError(
        `unknown built-in pattern. Available: ${BUILTIN_PATTERN_NAMES.join(", ")}`,
        `patterns.${key}`,
      );
    }
    toggles[key] = optionalBoolean(val, `patterns.${key}`, true);
  }
  return toggles;
}

/**
 * Validate and compile a redaction config. Accepts the parsed JSON
 * document (or an object literal of the same shape).
 *
 * @throws ConfigError when any field is malformed.
 */
export function parseRedactConfig(value: unknown = {}): CompiledRedactConfig {
  const json = expectObject(value, "config");

  const logLevel = parseLogLevel(optionalString(json.log_level, "log_level", "info"));
  const toggles = parseToggles(json.patterns);

  const custom =
    json.custom_patterns === undefined || json.custom_patterns === null
      ? []
      : expectArray(json.custom_patterns, "custom_patterns").map((p, i) =>
          compileCustomPattern(p, `custom_patterns[${i}]`),
        );

  let table: PatternTable;
  try {
    table = buildPatternTable(
      toggles,
      custom.map((c) => c.pattern),
    );
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      throw new ConfigError(err.message, "custom_patterns");
    }
    throw err;
  }
  checkIdempotent(table, custom);

  const bypassPaths =
    json.bypass_paths === undefined || json.bypass_paths === null
      ? DEFAULT_BYPASS_PATHS
      : optionalStringArray(json.bypass_paths, "bypass_paths");

  const maxBodySizeBytes =
    json.max_body_size_bytes === undefined || json.max_body_size_bytes === null
      ? DEFAULT_MAX_BODY_SIZE_BYTES
      : expectInteger(json.max_body_size_bytes, "max_body_size_bytes", 0);

  return Object.freeze({
    logLevel,
    table,
    bypassPaths: Object.freeze([...bypassPaths]),
    maxBodySizeBytes,
  });
}

/**
 * Load a redaction config from a JSON file. Supports // comments and
 * trailing commas.
 */
export function loadRedactConfigFile(filePath: string): CompiledRedactConfig {
  return parseRedactConfig(readJsonFile(filePath));
}
