import type { ParsedArgs, RedactArgs, RouteArgs, ValidateArgs } from "./args.js";
import { getHelp } from "./args.js";
import type { CommandIO } from "./io.js";

interface CommandHandlers {
  runRedact: (args: RedactArgs, io: CommandIO) => Promise<number>;
  runRoute: (args: RouteArgs, io: CommandIO) => number;
  runValidate: (args: ValidateArgs, io: CommandIO) => number;
}

export async function dispatchCommand(
  result: ParsedArgs,
  io: CommandIO,
  handlers: CommandHandlers,
  version: string,
): Promise<number> {
  switch (result.command) {
    case "help":
      io.write(`${getHelp(result.topic)}\n`);
      return 0;
    case "version":
      io.write(`edgeward v${version}\n`);
      return 0;
    case "redact":
      return handlers.runRedact(result, io);
    case "route":
      return handlers.runRoute(result, io);
    case "validate":
      return handlers.runValidate(result, io);
  }
}
