/**
 * Routing conditions.
 *
 * A condition is one predicate against a request attribute:
 *
 *   { "type": "header", "key": "User-Agent", "operator": "contains", "value": "iPhone" }
 *
 * Attribute lookup:
 * - header: name matched case-insensitively
 * - cookie: name matched case-sensitively, from the Cookie header
 * - query:  name matched case-sensitively, values URL-decoded, first wins
 * - path:   the request path without query string; `key` is ignored
 *
 * Value comparison is case-sensitive unless `ignore_case` is set. An
 * absent attribute fails every operator, `exists` included. `negate`
 * inverts the final result, which is how "does not exist" or "does not
 * contain" is written.
 */

import {
  ConfigError,
  compilePattern,
  expectObject,
  expectString,
  normalizeHeaders,
  optionalBoolean,
  type RequestHeadersEvent,
} from "@edgeward/core";

import { CookieJar } from "./cookies.js";

export type ConditionType = "header" | "cookie" | "path" | "query";

export type ConditionOperator =
  | "equals"
  | "contains"
  | "prefix"
  | "suffix"
  | "regex"
  | "exists";

const CONDITION_TYPES: readonly string[] = ["header", "cookie", "path", "query"];
const OPERATORS: readonly string[] = [
  "equals",
  "contains",
  "prefix",
  "suffix",
  "regex",
  "exists",
];

function isConditionType(value: string): value is ConditionType {
  return CONDITION_TYPES.includes(value);
}

function isOperator(value: string): value is ConditionOperator {
  return OPERATORS.includes(value);
}

// --- Config JSON ---

export interface ConditionJson {
  /** header | cookie | path | query (case-insensitive). */
  type: string;
  /** Attribute name. Not needed for "path". */
  key?: string;
  /** equals | contains | prefix | suffix | regex | exists (case-insensitive). */
  operator: string;
  /** Required for every operator except "exists". */
  value?: string;
  /** Compare values case-insensitively. Default: false. */
  ignore_case?: boolean;
  /** Invert the result. Default: false. */
  negate?: boolean;
}

// --- Compiled condition ---

export interface Condition {
  readonly type: ConditionType;
  readonly key: string;
  readonly operator: ConditionOperator;
  /** Null for "exists". Lowercased when `ignoreCase` is set. */
  readonly value: string | null;
  readonly ignoreCase: boolean;
  readonly negate: boolean;
  /** Compiled pattern for the "regex" operator. */
  readonly regex: RegExp | null;
}

/**
 * Validate and compile one condition. Regex patterns are compiled
 * here, once; an invalid one is a config error.
 */
export function compileCondition(value: unknown, field: string): Condition {
  const json = expectObject(value, field);

  const type = expectString(json.type, `${field}.type`).toLowerCase();
  if (!isConditionType(type)) {
    throw new ConfigError(
      `unknown condition type "${type}". Available: ${CONDITION_TYPES.join(", ")}`,
      `${field}.type`,
    );
  }

  const operator = expectString(json.operator, `${field}.operator`).toLowerCase();
  if (!isOperator(operator)) {
    throw new ConfigError(
      `unknown operator "${operator}". Available: ${OPERATORS.join(", ")}`,
      `${field}.operator`,
    );
  }

  const key = type === "path" ? "" : expectString(json.key, `${field}.key`);
  const ignoreCase = optionalBoolean(json.ignore_case, `${field}.ignore_case`, false);
  const negate = optionalBoolean(json.negate, `${field}.negate`, false);

  let conditionValue: string | null = null;
  let regex: RegExp | null = null;
  if (operator !== "exists") {
    const raw = json.value;
    if (typeof raw !== "string") {
      throw new ConfigError(`operator "${operator}" requires a string value`, `${field}.value`);
    }
    conditionValue = ignoreCase ? raw.toLowerCase() : raw;
    if (operator === "regex") {
      regex = compilePattern(
        expectString(raw, `${field}.value`),
        `${field}.value`,
        ignoreCase ? "i" : "",
      );
    }
  }

  return Object.freeze({
    type,
    key,
    operator,
    value: conditionValue,
    ignoreCase,
    negate,
    regex,
  });
}

// --- Attribute source ---

/**
 * Request attributes a condition can read. Lookups return undefined
 * for absent attributes.
 */
export interface RequestAttributes {
  /** Request path without query string. */
  readonly path: string;
  header: (name: string) => string | undefined;
  cookie: (name: string) => string | undefined;
  query: (name: string) => string | undefined;
}

/**
 * Build the attribute source for one request. Headers are normalized
 * up front; the cookie jar and query parameters are parsed on first
 * use only.
 */
export function createRequestAttributes(event: RequestHeadersEvent): RequestAttributes {
  const headers = normalizeHeaders(event.headers);
  const q = event.path.indexOf("?");
  const path = q === -1 ? event.path : event.path.slice(0, q);
  const search = q === -1 ? "" : event.path.slice(q + 1);

  let jar: CookieJar | null = null;
  let params: URLSearchParams | null = null;

  return {
    path,
    header: (name) => headers.get(name.toLowerCase()),
    cookie(name) {
      if (jar === null) jar = new CookieJar(headers.get("cookie"));
      return jar.get(name);
    },
    query(name) {
      if (params === null) params = new URLSearchParams(search);
      return params.get(name) ?? undefined;
    },
  };
}

// --- Evaluation ---

function lookup(condition: Condition, attributes: RequestAttributes): string | undefined {
  switch (condition.type) {
    case "header":
      return attributes.header(condition.key);
    case "cookie":
      return attributes.cookie(condition.key);
    case "query":
      return attributes.query(condition.key);
    case "path":
      return attributes.path;
  }
}

function compare(condition: Condition, actual: string): boolean {
  if (condition.operator === "exists") return true;
  if (condition.regex !== null) return condition.regex.test(actual);

  const expected = condition.value ?? "";
  const subject = condition.ignoreCase ? actual.toLowerCase() : actual;
  switch (condition.operator) {
    case "equals":
      return subject === expected;
    case "contains":
      return subject.includes(expected);
    case "prefix":
      return subject.startsWith(expected);
    case "suffix":
      return subject.endsWith(expected);
    case "regex":
      return false;
  }
}

/**
 * Evaluate one condition against a request. Pure: no I/O, no
 * mutation of the condition or the request.
 */
export function evaluateCondition(
  condition: Condition,
  attributes: RequestAttributes,
): boolean {
  const actual = lookup(condition, attributes);
  const result = actual === undefined ? false : compare(condition, actual);
  return condition.negate ? !result : result;
}
