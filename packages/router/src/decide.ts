/**
 * Routing decisions.
 *
 * Walks the sorted rule set and returns the first rule whose conditions
 * all hold. Deterministic: the same attributes and rule set always give
 * the same decision. The engine only decides; selecting the upstream
 * and mutating live headers is the host's job.
 */

import { errorMessage } from "@edgeward/core";

import type { RequestAttributes } from "./conditions.js";
import { evaluateCondition } from "./conditions.js";
import type { RoutingRule, RoutingRuleSet } from "./rules.js";

export interface RoutingDecision {
  target: string;
  /** Name of the winning rule; null when the default target was used. */
  matchedRule: string | null;
  addHeaders: Record<string, string>;
  removeHeaders: string[];
  /** Set when evaluation failed and the default target was used instead. */
  error?: string;
}

/** Decision for a request no rule matched. */
export function defaultDecision(ruleSet: RoutingRuleSet): RoutingDecision {
  return {
    target: ruleSet.defaultTarget,
    matchedRule: null,
    addHeaders: {},
    removeHeaders: [],
  };
}

/**
 * Check every condition of a rule, in order, stopping at the first
 * that fails.
 */
export function matchRule(rule: RoutingRule, attributes: RequestAttributes): boolean {
  for (const condition of rule.conditions) {
    if (!evaluateCondition(condition, attributes)) return false;
  }
  return true;
}

/**
 * Decide where a request goes.
 *
 * Never throws: if a condition throws during evaluation, the default
 * decision comes back with `error` set.
 */
export function decide(
  ruleSet: RoutingRuleSet,
  attributes: RequestAttributes,
): RoutingDecision {
  try {
    for (const rule of ruleSet.rules) {
      if (!matchRule(rule, attributes)) continue;
      return {
        target: rule.target,
        matchedRule: rule.name,
        addHeaders: { ...rule.addHeaders },
        removeHeaders: [...rule.removeHeaders],
      };
    }
    return defaultDecision(ruleSet);
  } catch (err: unknown) {
    return { ...defaultDecision(ruleSet), error: errorMessage(err) };
  }
}
