/**
 * @edgeward/core
 *
 * Shared types and helpers for the edgeward filters. This is the
 * contract layer: every other `@edgeward/*` package depends on it.
 *
 * Zero npm dependencies. No HTTP server, no host bindings. Just types
 * and pure functions.
 *
 * @packageDocumentation
 */

// Header helpers: case-insensitive lookup, mutation application
export {
  applyMutations,
  getHeader,
  noMutations,
  normalizeHeaders,
} from "./headers.js";

// Config loading: JSON(C) parsing, field validation, ConfigError
export {
  ConfigError,
  compilePattern,
  expectArray,
  expectInteger,
  expectObject,
  expectString,
  isJsonObject,
  optionalBoolean,
  optionalString,
  optionalStringArray,
  optionalStringRecord,
  parseJsonText,
  readJsonFile,
  stripJsonComments,
} from "./config.js";

// Logging: leveled [name]-prefixed lines on stderr
export {
  LOG_LEVELS,
  createLogger,
  errorMessage,
  isLogLevel,
  parseLogLevel,
  type LogLevel,
  type LogSink,
  type Logger,
} from "./log.js";

// Fail-open hook execution for host adapters
export { guardContext, type GuardedContext } from "./pipeline.js";

// Core types used across all packages
export type {
  BodyAction,
  EdgeFilter,
  FilterContext,
  HeaderMap,
  HeaderMutations,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  RequestHeadersEvent,
  ResponseHeadersEvent,
} from "./types.js";
