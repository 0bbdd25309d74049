/**
 * Validate command: load a config file and report the first problem.
 */

import { errorMessage } from "@edgeward/core";
import { loadRedactConfigFile } from "@edgeward/redact";
import { loadRoutingConfigFile } from "@edgeward/router";

import type { ValidateArgs } from "./args.js";
import type { CommandIO } from "./io.js";

function summarize(args: ValidateArgs): string {
  if (args.kind === "redact") {
    const config = loadRedactConfigFile(args.file);
    const enabled = config.table.patterns.filter((p) => p.enabled).map((p) => p.name);
    return `${enabled.length} pattern(s) enabled: ${enabled.join(", ") || "(none)"}`;
  }
  const { ruleSet } = loadRoutingConfigFile(args.file);
  return `${ruleSet.rules.length} rule(s), default_target=${ruleSet.defaultTarget}`;
}

/**
 * @returns Exit code (0 when valid, 1 otherwise).
 */
export function runValidate(args: ValidateArgs, io: CommandIO): number {
  try {
    io.write(`OK: ${args.file}: ${summarize(args)}\n`);
    return 0;
  } catch (err: unknown) {
    io.error(`Invalid ${args.kind} config: ${errorMessage(err)}`);
    return 1;
  }
}
