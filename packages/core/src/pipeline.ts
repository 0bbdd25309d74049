/**
 * Fail-open hook execution for host adapters.
 *
 * A filter fault must never drop or stall a request. Each hook runs
 * inside a guard: if it throws, the error is logged and the host gets
 * a neutral result (no header changes, chunk forwarded as received).
 */

import { noMutations } from "./headers.js";
import type { Logger } from "./log.js";
import { errorMessage } from "./log.js";
import type {
  BodyAction,
  FilterContext,
  HeaderMutations,
  RequestHeadersEvent,
  ResponseHeadersEvent,
} from "./types.js";

/** Per-request guarded view of a filter context. */
export interface GuardedContext {
  onRequestHeaders: (event: RequestHeadersEvent) => HeaderMutations;
  onResponseHeaders: (event: ResponseHeadersEvent) => HeaderMutations;
  onResponseBody: (chunk: Buffer, endOfStream: boolean) => BodyAction;
  onStreamClosed: () => void;
}

function guard<T>(
  log: Logger,
  filterName: string,
  hook: string,
  fallback: () => T,
  fn: () => T,
): T {
  try {
    return fn();
  } catch (err: unknown) {
    log.error(`Filter "${filterName}" ${hook} error: ${errorMessage(err)}`);
    return fallback();
  }
}

/**
 * Wrap a filter context so every hook is present and fails open.
 *
 * The guard keeps references to the chunks a filter asked to buffer.
 * If a body hook throws, those chunks and the current one are flushed
 * unmodified and the rest of the stream passes through untouched.
 */
export function guardContext(
  ctx: FilterContext,
  filterName: string,
  log: Logger,
): GuardedContext {
  let bodyFailed = false;
  let held: Buffer[] = [];

  function releaseHeld(chunk: Buffer): BodyAction {
    bodyFailed = true;
    if (held.length === 0) return { type: "continue" };
    const body = Buffer.concat([...held, chunk]);
    held = [];
    return { type: "flush", body, trailers: {} };
  }

  return {
    onRequestHeaders(event) {
      const hook = ctx.onRequestHeaders;
      if (!hook) return noMutations();
      return guard(log, filterName, "onRequestHeaders", noMutations, () => hook(event));
    },

    onResponseHeaders(event) {
      const hook = ctx.onResponseHeaders;
      if (!hook) return noMutations();
      return guard(log, filterName, "onResponseHeaders", noMutations, () => hook(event));
    },

    onResponseBody(chunk, endOfStream) {
      const hook = ctx.onResponseBody;
      if (!hook || bodyFailed) return { type: "continue" };
      const action = guard<BodyAction | null>(
        log,
        filterName,
        "onResponseBody",
        () => null,
        () => hook(chunk, endOfStream),
      );
      if (action === null) return releaseHeld(chunk);
      if (action.type === "buffer") held.push(chunk);
      else if (action.type === "flush") held = [];
      return action;
    },

    onStreamClosed() {
      held = [];
      const hook = ctx.onStreamClosed;
      if (!hook) return;
      guard(log, filterName, "onStreamClosed", () => undefined, hook);
    },
  };
}
