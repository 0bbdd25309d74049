/**
 * @edgeward/router - Request routing filter.
 *
 * Classifies requests into upstream targets with ordered,
 * multi-condition rules over headers, cookies, query parameters and
 * the path. Used for A/B tests and canary releases.
 *
 * ```typescript
 * import { createRouterFilter } from '@edgeward/router';
 *
 * const router = createRouterFilter({ configFile: "routes.json" });
 * const ctx = router.createContext();
 * const mutations = ctx.onRequestHeaders?.({ path: "/", headers });
 * // mutations.target, mutations.add, mutations.remove, mutations.path
 * ```
 */

import {
  createLogger,
  type EdgeFilter,
  type FilterContext,
  type HeaderMutations,
  type LogSink,
  type RequestHeadersEvent,
} from "@edgeward/core";

import { createRequestAttributes } from "./conditions.js";
import type { CompiledRoutingConfig } from "./config.js";
import { loadRoutingConfigFile, parseRoutingConfig } from "./config.js";
import { decide, type RoutingDecision } from "./decide.js";

/** Configuration for {@link createRouterFilter}. */
export interface RouterFilterOptions {
  /** Config document (parsed JSON). Default: no rules, target "v1". */
  config?: unknown;
  /** Path to a config JSON(C) file. Overrides `config`. */
  configFile?: string;
  /** Pre-compiled config. Overrides both `config` and `configFile`. */
  compiled?: CompiledRoutingConfig;
  /** Where log lines go. Default: stderr. */
  logSink?: LogSink;
}

/** Request headers the filter adds. */
export const ROUTED_BY_HEADER = "X-Routed-By";
export const ROUTE_REASON_HEADER = "X-Route-Reason";
export const ROUTED_BY_VALUE = "edgeward-router";
/** X-Route-Reason value when no rule matched. */
export const DEFAULT_REASON = "default";
/** Response header marking that the router handled the request. */
export const ROUTER_ACTIVE_HEADER = "X-Edgeward-Router";

export interface RouteOutcome {
  decision: RoutingDecision;
  mutations: HeaderMutations;
}

/** Resolve effective config: compiled > file > document > defaults. */
function resolveConfig(options?: RouterFilterOptions): CompiledRoutingConfig {
  if (options?.compiled) return options.compiled;
  if (options?.configFile) return loadRoutingConfigFile(options.configFile);
  return parseRoutingConfig(options?.config ?? {});
}

/**
 * Decide a request and translate the decision into header mutations:
 * the rule's removals, the rule's additions, then X-Routed-By and
 * X-Route-Reason (which rules cannot override). When the target has a
 * path rewrite prefix and the path does not already start with it,
 * the path is rewritten.
 */
export function routeRequest(
  config: CompiledRoutingConfig,
  event: RequestHeadersEvent,
): RouteOutcome {
  const decision = decide(config.ruleSet, createRequestAttributes(event));

  const reserved = new Set([ROUTED_BY_HEADER.toLowerCase(), ROUTE_REASON_HEADER.toLowerCase()]);
  const add: Record<string, string> = {};
  for (const [name, value] of Object.entries(decision.addHeaders)) {
    if (!reserved.has(name.toLowerCase())) add[name] = value;
  }
  add[ROUTED_BY_HEADER] = ROUTED_BY_VALUE;
  add[ROUTE_REASON_HEADER] = decision.matchedRule ?? DEFAULT_REASON;

  const mutations: HeaderMutations = {
    add,
    remove: [...decision.removeHeaders],
    target: decision.target,
  };

  const prefix = Object.hasOwn(config.pathRewrites, decision.target)
    ? config.pathRewrites[decision.target]
    : undefined;
  if (prefix !== undefined && !event.path.startsWith(prefix)) {
    mutations.path = prefix + event.path;
  }

  return { decision, mutations };
}

/**
 * Create a routing filter.
 *
 * Configuration is compiled here, once, and the sorted rule set is
 * shared read-only by every request context. A malformed config throws
 * ConfigError and no filter is created.
 */
export function createRouterFilter(options?: RouterFilterOptions): EdgeFilter {
  const config = resolveConfig(options);
  const log = createLogger("router", config.logLevel, options?.logSink);

  const { rules, defaultTarget, usesCookies } = config.ruleSet;
  log.info(
    `Configured with ${rules.length} rule(s), default_target=${defaultTarget}` +
      (usesCookies ? ", cookie conditions present" : ""),
  );

  let nextId = 1;

  function createContext(): FilterContext {
    const id = nextId++;
    return {
      onRequestHeaders(event) {
        const { decision, mutations } = routeRequest(config, event);
        if (decision.error !== undefined) {
          log.warn(`[${id}] Rule evaluation failed, using default target: ${decision.error}`);
        }
        log.info(
          `[${id}] Routing decision: target=${decision.target} reason=${decision.matchedRule ?? DEFAULT_REASON}`,
        );
        if (mutations.path !== undefined) {
          log.info(`[${id}] Rewrote path from ${event.path} to ${mutations.path}`);
        }
        return mutations;
      },

      onResponseHeaders() {
        return { add: { [ROUTER_ACTIVE_HEADER]: "active" }, remove: [] };
      },
    };
  }

  return { name: "router", createContext };
}

// Public API
export { CookieJar, parseCookies } from "./cookies.js";
export type {
  Condition,
  ConditionJson,
  ConditionOperator,
  ConditionType,
  RequestAttributes,
} from "./conditions.js";
export {
  compileCondition,
  createRequestAttributes,
  evaluateCondition,
} from "./conditions.js";
export type { RoutingRule, RoutingRuleJson, RoutingRuleSet } from "./rules.js";
export { compileRule, compileRuleSet } from "./rules.js";
export type { RoutingDecision } from "./decide.js";
export { decide, defaultDecision, matchRule } from "./decide.js";
export type { CompiledRoutingConfig, RoutingConfigJson } from "./config.js";
export { DEFAULT_TARGET, loadRoutingConfigFile, parseRoutingConfig } from "./config.js";
