/**
 * Routing filter configuration.
 *
 * Config JSON format (every field optional):
 * {
 *   "log_level": "info",
 *   "default_target": "v1",
 *   "rules": [ ... ],                 // see rules.ts
 *   "path_rewrites": { "v2": "/v2" }  // prefix the path when routed to a target
 * }
 */

import {
  ConfigError,
  expectObject,
  expectString,
  optionalString,
  optionalStringRecord,
  parseLogLevel,
  readJsonFile,
} from "@edgeward/core";
import type { LogLevel } from "@edgeward/core";

import type { RoutingRuleJson, RoutingRuleSet } from "./rules.js";
import { compileRuleSet } from "./rules.js";

export interface RoutingConfigJson {
  log_level?: string;
  default_target?: string;
  rules?: RoutingRuleJson[];
  path_rewrites?: Record<string, string>;
}

export interface CompiledRoutingConfig {
  readonly logLevel: LogLevel;
  readonly ruleSet: RoutingRuleSet;
  /** Target -> path prefix. */
  readonly pathRewrites: Readonly<Record<string, string>>;
}

export const DEFAULT_TARGET = "v1";

function parsePathRewrites(value: unknown): Record<string, string> {
  const rewrites = optionalStringRecord(value, "path_rewrites");
  for (const [target, prefix] of Object.entries(rewrites)) {
    expectString(prefix, `path_rewrites.${target}`);
    if (!prefix.startsWith("/")) {
      throw new ConfigError('prefix must start with "/"', `path_rewrites.${target}`);
    }
  }
  return rewrites;
}

/**
 * Validate and compile a routing config.
 *
 * @throws ConfigError when any field is malformed.
 */
export function parseRoutingConfig(value: unknown = {}): CompiledRoutingConfig {
  const json = expectObject(value, "config");
  const logLevel = parseLogLevel(optionalString(json.log_level, "log_level", "info"));
  const defaultTarget = optionalString(json.default_target, "default_target", DEFAULT_TARGET);

  return Object.freeze({
    logLevel,
    ruleSet: compileRuleSet(json.rules, defaultTarget),
    pathRewrites: Object.freeze(parsePathRewrites(json.path_rewrites)),
  });
}

/**
 * Load a routing config from a JSON file. Supports // comments and
 * trailing commas.
 */
export function loadRoutingConfigFile(filePath: string): CompiledRoutingConfig {
  return parseRoutingConfig(readJsonFile(filePath));
}
