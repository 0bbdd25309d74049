/**
 * Routing rules and the rule set.
 *
 * A rule names a target and the header changes that go with it, and
 * applies when every one of its conditions holds:
 *
 * {
 *   "name": "beta-testers",
 *   "priority": 1,
 *   "conditions": [
 *     { "type": "header", "key": "X-Geo-Country", "operator": "equals", "value": "DE" },
 *     { "type": "cookie", "key": "beta-tester", "operator": "equals", "value": "true" }
 *   ],
 *   "target": "v2",
 *   "add_headers": { "X-Canary": "true" },
 *   "remove_headers": ["X-Debug"]
 * }
 *
 * Lower priority numbers are evaluated first. Rules with equal priority
 * keep their order from the config file.
 */

import {
  ConfigError,
  expectArray,
  expectInteger,
  expectObject,
  expectString,
  optionalStringArray,
  optionalStringRecord,
} from "@edgeward/core";

import type { Condition, ConditionJson } from "./conditions.js";
import { compileCondition } from "./conditions.js";

export interface RoutingRuleJson {
  name: string;
  priority: number;
  /** AND-ed. An empty list matches every request. */
  conditions?: ConditionJson[];
  target: string;
  add_headers?: Record<string, string>;
  remove_headers?: string[];
}

export interface RoutingRule {
  readonly name: string;
  readonly priority: number;
  readonly conditions: readonly Condition[];
  readonly target: string;
  readonly addHeaders: Readonly<Record<string, string>>;
  readonly removeHeaders: readonly string[];
}

/**
 * Rules sorted for evaluation, plus the fallback target. Built once
 * and never mutated.
 */
export interface RoutingRuleSet {
  readonly rules: readonly RoutingRule[];
  readonly defaultTarget: string;
  /** Whether any rule has a cookie condition. */
  readonly usesCookies: boolean;
}

/** Validate and compile one rule. */
export function compileRule(value: unknown, field: string): RoutingRule {
  const json = expectObject(value, field);
  const name = expectString(json.name, `${field}.name`);
  const priority = expectInteger(json.priority, `${field}.priority`);
  const target = expectString(json.target, `${field}.target`);

  const conditions =
    json.conditions === undefined || json.conditions === null
      ? []
      : expectArray(json.conditions, `${field}.conditions`).map((c, i) =>
          compileCondition(c, `${field}.conditions[${i}]`),
        );

  return Object.freeze({
    name,
    priority,
    conditions: Object.freeze(conditions),
    target,
    addHeaders: Object.freeze(optionalStringRecord(json.add_headers, `${field}.add_headers`)),
    removeHeaders: Object.freeze(
      optionalStringArray(json.remove_headers, `${field}.remove_headers`),
    ),
  });
}

/**
 * Compile rules into a rule set. Sorts ascending by priority exactly
 * once; `Array.prototype.sort` is stable, so equal priorities keep
 * source order.
 *
 * @throws ConfigError on a malformed rule or a duplicate rule name.
 */
export function compileRuleSet(rules: unknown, defaultTarget: string): RoutingRuleSet {
  const list =
    rules === undefined || rules === null ? [] : expectArray(rules, "rules");
  const compiled = list.map((r, i) => compileRule(r, `rules[${i}]`));

  const seen = new Set<string>();
  compiled.forEach((rule, i) => {
    if (seen.has(rule.name)) {
      throw new ConfigError(`duplicate rule name "${rule.name}"`, `rules[${i}].name`);
    }
    seen.add(rule.name);
  });

  const sorted = [...compiled].sort((a, b) => a.priority - b.priority);

  return Object.freeze({
    rules: Object.freeze(sorted),
    defaultTarget,
    usesCookies: sorted.some((r) => r.conditions.some((c) => c.type === "cookie")),
  });
}
