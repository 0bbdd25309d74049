/**
 * Route command: print the routing decision for a request as JSON.
 */

import { errorMessage } from "@edgeward/core";
import {
  loadRoutingConfigFile,
  parseRoutingConfig,
  routeRequest,
  type CompiledRoutingConfig,
} from "@edgeward/router";

import type { RouteArgs } from "./args.js";
import type { CommandIO } from "./io.js";

/** The JSON printed by `edgeward route`. */
export interface RouteReport {
  target: string;
  matched_rule: string | null;
  path: string;
  add_headers: Record<string, string>;
  remove_headers: string[];
  error?: string;
}

/** Evaluate one request and describe the outcome. */
export function describeRoute(config: CompiledRoutingConfig, args: RouteArgs): RouteReport {
  // Repeated -H flags for one name become a multi-valued header.
  const headers: Record<string, string[]> = {};
  for (const [name, value] of args.headers) {
    (headers[name] ??= []).push(value);
  }

  const { decision, mutations } = routeRequest(config, { path: args.path, headers });
  const report: RouteReport = {
    target: decision.target,
    matched_rule: decision.matchedRule,
    path: mutations.path ?? args.path,
    add_headers: mutations.add,
    remove_headers: mutations.remove,
  };
  if (decision.error !== undefined) report.error = decision.error;
  return report;
}

/**
 * @returns Exit code (0 on success, 1 on a config error).
 */
export function runRoute(args: RouteArgs, io: CommandIO): number {
  let config: CompiledRoutingConfig;
  try {
    config = args.config ? loadRoutingConfigFile(args.config) : parseRoutingConfig({});
  } catch (err: unknown) {
    io.error(`Invalid routing config: ${errorMessage(err)}`);
    return 1;
  }

  io.write(`${JSON.stringify(describeRoute(config, args), null, 2)}\n`);
  return 0;
}
