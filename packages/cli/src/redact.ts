/**
 * Redact command: run the redaction filter over a body from stdin.
 *
 * Drives a filter context through the same hook sequence a host
 * would (request headers, response headers, body chunks) so the
 * output matches what a client behind the filter would receive.
 */

import {
  createLogger,
  errorMessage,
  guardContext,
  type BodyAction,
  type GuardedContext,
  type HeaderMap,
} from "@edgeward/core";
import {
  WASM_SCRUB_HEADER,
  createRedactFilter,
  loadRedactConfigFile,
  parseRedactConfig,
  type CompiledRedactConfig,
} from "@edgeward/redact";

import type { RedactArgs } from "./args.js";
import type { CommandIO } from "./io.js";

/** Split a body into chunks of `size` bytes. Always at least one chunk. */
export function splitChunks(body: Buffer, size: number): Buffer[] {
  if (size <= 0 || body.length <= size) return [body];
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < body.length; offset += size) {
    chunks.push(body.subarray(offset, offset + size));
  }
  return chunks;
}

/**
 * Feed chunks through a context's body hook, writing whatever the
 * filter releases. Returns the trailers of the last flush.
 */
export function feedBody(
  ctx: GuardedContext,
  chunks: Buffer[],
  write: (data: Buffer) => void,
): Record<string, string> {
  let trailers: Record<string, string> = {};
  chunks.forEach((chunk, i) => {
    const action: BodyAction = ctx.onResponseBody(chunk, i === chunks.length - 1);
    if (action.type === "continue") {
      write(chunk);
    } else if (action.type === "flush") {
      write(action.body);
      trailers = action.trailers;
    }
  });
  return trailers;
}

function loadConfig(path: string | null): CompiledRedactConfig {
  return path ? loadRedactConfigFile(path) : parseRedactConfig({});
}

/**
 * @returns Exit code (0 on success, 1 on a config error).
 */
export async function runRedact(args: RedactArgs, io: CommandIO): Promise<number> {
  let config: CompiledRedactConfig;
  try {
    config = loadConfig(args.config);
  } catch (err: unknown) {
    io.error(`Invalid redact config: ${errorMessage(err)}`);
    return 1;
  }

  const filter = createRedactFilter({ compiled: config, logSink: io.error });
  const log = createLogger("edgeward", config.logLevel, io.error);
  const ctx = guardContext(filter.createContext(), filter.name, log);

  const body = await io.readInput();

  ctx.onRequestHeaders({ path: args.path, method: "GET", headers: {} });

  const responseHeaders: HeaderMap = { "content-length": String(body.length) };
  if (args.contentType !== null) responseHeaders["content-type"] = args.contentType;
  const mutations = ctx.onResponseHeaders({ status: 200, headers: responseHeaders });

  const trailers = feedBody(ctx, splitChunks(body, args.chunkSize), io.write);

  io.error(`${WASM_SCRUB_HEADER}: ${mutations.add[WASM_SCRUB_HEADER] ?? "none"}`);
  for (const [name, value] of Object.entries(trailers)) {
    io.error(`${name}: ${value}`);
  }
  return 0;
}
