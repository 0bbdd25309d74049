/**
 * Argument parser for the edgeward CLI.
 *
 * Hand-rolled to keep the project zero external dependencies.
 * Supports subcommands, options that take a value, and repeatable -H headers.
 */

export interface RedactArgs {
  command: "redact";
  /** Config file; null means built-in defaults. */
  config: string | null;
  /** Request path, checked against bypass paths. */
  path: string;
  contentType: string | null;
  /** Feed the body in chunks of this many bytes (0 = one chunk). */
  chunkSize: number;
}

export interface RouteArgs {
  command: "route";
  /** Config file; null means no rules (everything to the default target). */
  config: string | null;
  /** Request path including query string. */
  path: string;
  /** Request headers in the order given. */
  headers: [string, string][];
}

export interface ValidateArgs {
  command: "validate";
  kind: "redact" | "route";
  file: string;
}

export interface HelpArgs {
  command: "help";
  topic: string | null;
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs =
  | RedactArgs
  | RouteArgs
  | ValidateArgs
  | HelpArgs
  | VersionArgs;

export interface ParseError {
  error: string;
}

export type ParseResult = ParsedArgs | ParseError;

export function isError(result: ParseResult): result is ParseError {
  return "error" in result;
}

const REDACT_HELP = `
edgeward redact [options] < body

Run the redaction filter over a response body read from stdin. The
(possibly redacted) body goes to stdout; the scrub status and
attribution values go to stderr.

Options:
  --config <path>         Redaction config JSON file (default: built-in defaults)
  --path <path>           Request path, checked against bypass_paths (default: /)
  --content-type <type>   Response content type (default: none, scanned as text)
  --chunk-size <bytes>    Feed the body in chunks of this size (default: 0 = one chunk)
  -h, --help              Show this help

Examples:
  echo 'Card: 4111-1111-1111-1111' | edgeward redact
  edgeward redact --config redact.json --content-type application/json < resp.json
`.trim();

const ROUTE_HELP = `
edgeward route [options]

Evaluate the routing rules against a request and print the decision
as JSON.

Options:
  --config <path>         Routing config JSON file (default: no rules)
  --path <path>           Request path with query string (default: /)
  -H, --header <h: v>     Request header, repeatable
  -h, --help              Show this help

Examples:
  edgeward route --config routes.json -H 'X-Geo-Country: DE' \\
    -H 'Cookie: beta-tester=true'
`.trim();

const VALIDATE_HELP = `
edgeward validate <redact|route> <file>

Load a config file and report the first problem, if any. Exits 1 on an
invalid config.
`.trim();

const MAIN_HELP = `
edgeward - edge HTTP traffic-policy filters

Usage:
  edgeward <command> [options]

Commands:
  redact     Redact a response body from stdin
  route      Print the routing decision for a request
  validate   Check a redact or route config file
  version    Show version
  help       Show help for a command

Run 'edgeward help <command>' for details on a specific command.
`.trim();

export function getHelp(topic: string | null): string {
  if (topic === "redact") return REDACT_HELP;
  if (topic === "route") return ROUTE_HELP;
  if (topic === "validate") return VALIDATE_HELP;
  return MAIN_HELP;
}

export function parseArgs(argv: string[]): ParseResult {
  // Strip node and script path
  const args = argv.slice(2);

  if (args.length === 0) {
    return { command: "help", topic: null };
  }

  const sub = args[0];

  if (sub === "--version" || sub === "-v" || sub === "version") {
    return { command: "version" };
  }

  if (sub === "--help" || sub === "-h" || sub === "help") {
    return { command: "help", topic: args[1] ?? null };
  }

  if (sub === "redact") {
    return parseRedactArgs(args.slice(1));
  }

  if (sub === "route") {
    return parseRouteArgs(args.slice(1));
  }

  if (sub === "validate") {
    return parseValidateArgs(args.slice(1));
  }

  return { error: `Unknown command: ${sub}\n\n${MAIN_HELP}` };
}

function parseRedactArgs(args: string[]): ParseResult {
  const result: RedactArgs = {
    command: "redact",
    config: null,
    path: "/",
    contentType: null,
    chunkSize: 0,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help", topic: "redact" };
    }

    if (arg === "--config") {
      i++;
      if (i >= args.length) return { error: "--config requires a value" };
      result.config = args[i];
    } else if (arg === "--path") {
      i++;
      if (i >= args.length) return { error: "--path requires a value" };
      result.path = args[i];
    } else if (arg === "--content-type") {
      i++;
      if (i >= args.length) return { error: "--content-type requires a value" };
      result.contentType = args[i];
    } else if (arg === "--chunk-size") {
      i++;
      if (i >= args.length) return { error: "--chunk-size requires a value" };
      const n = parseInt(args[i], 10);
      if (isNaN(n) || n < 0) {
        return { error: `Invalid value for --chunk-size: ${args[i]}` };
      }
      result.chunkSize = n;
    } else if (arg.startsWith("-")) {
      return { error: `Unknown option: ${arg}\n\n${REDACT_HELP}` };
    } else {
      return { error: `Unexpected argument: ${arg}\n\n${REDACT_HELP}` };
    }

    i++;
  }

  return result;
}

/** Split "Name: value" at the first colon. */
function parseHeader(raw: string): [string, string] | null {
  const colon = raw.indexOf(":");
  if (colon <= 0) return null;
  const name = raw.slice(0, colon).trim();
  if (name.length === 0) return null;
  return [name, raw.slice(colon + 1).trim()];
}

function parseRouteArgs(args: string[]): ParseResult {
  const result: RouteArgs = {
    command: "route",
    config: null,
    path: "/",
    headers: [],
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help", topic: "route" };
    }

    if (arg === "--config") {
      i++;
      if (i >= args.length) return { error: "--config requires a value" };
      result.config = args[i];
    } else if (arg === "--path") {
      i++;
      if (i >= args.length) return { error: "--path requires a value" };
      result.path = args[i];
    } else if (arg === "--header" || arg === "-H") {
      i++;
      if (i >= args.length) return { error: `${arg} requires a value` };
      const header = parseHeader(args[i]);
      if (!header) {
        return { error: `Invalid header: ${args[i]} (expected "Name: value")` };
      }
      result.headers.push(header);
    } else if (arg.startsWith("-")) {
      return { error: `Unknown option: ${arg}\n\n${ROUTE_HELP}` };
    } else {
      return { error: `Unexpected argument: ${arg}\n\n${ROUTE_HELP}` };
    }

    i++;
  }

  return result;
}

function parseValidateArgs(args: string[]): ParseResult {
  if (args[0] === "--help" || args[0] === "-h") {
    return { command: "help", topic: "validate" };
  }
  const kind = args[0];
  if (kind !== "redact" && kind !== "route") {
    return { error: `validate requires one of: redact, route\n\n${VALIDATE_HELP}` };
  }
  const file = args[1];
  if (file === undefined) {
    return { error: `No config file specified\n\n${VALIDATE_HELP}` };
  }
  if (args.length > 2) {
    return { error: `Unexpected argument: ${args[2]}\n\n${VALIDATE_HELP}` };
  }
  return { command: "validate", kind, file };
}
