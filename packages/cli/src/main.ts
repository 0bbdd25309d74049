#!/usr/bin/env node

/**
 * edgeward CLI entry point.
 *
 * Runs the filters outside a proxy: redact a body from stdin, print
 * the routing decision for a request, or check a config file before
 * deploying it.
 */

import { isError, parseArgs } from "./args.js";
import { dispatchCommand } from "./dispatch.js";
import { processIO } from "./io.js";
import { runRedact } from "./redact.js";
import { runRoute } from "./route.js";
import { runValidate } from "./validate.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  const result = parseArgs(process.argv);

  if (isError(result)) {
    console.error(result.error);
    process.exit(1);
  }

  // exitCode rather than exit(): stdout may still be draining into a pipe.
  process.exitCode = await dispatchCommand(
    result,
    processIO(),
    { runRedact, runRoute, runValidate },
    VERSION,
  );
}

main().catch((err) => {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
