/**
 * Core types for the edgeward filter ecosystem.
 *
 * These are the public types that filters and host adapters depend on.
 * Zero external dependencies.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];
export type JsonObject = { [key: string]: JsonValue };

/**
 * Header map as handed over by a host. Node's `IncomingHttpHeaders`
 * fits this shape; multi-valued headers arrive as `string[]`.
 */
export type HeaderMap = Record<string, string | string[] | undefined>;

// --- Per-event inputs ---

/**
 * Request headers event.
 *
 * `path` is the raw request target (`:path` pseudo-header), query
 * string included.
 */
export interface RequestHeadersEvent {
  path: string;
  method?: string;
  headers: HeaderMap;
}

/** Response headers event. */
export interface ResponseHeadersEvent {
  status: number;
  headers: HeaderMap;
}

// --- Per-event outputs ---

/**
 * Header changes a filter asks the host to apply.
 *
 * The host applies `remove` first, then `add`, so a filter can replace
 * a header by naming it in both.
 */
export interface HeaderMutations {
  add: Record<string, string>;
  remove: string[];
  /** Rewritten request path, when the filter changes it. */
  path?: string;
  /** Upstream target selected for this request (routing filters). */
  target?: string;
}

/**
 * What the host should do with a response body chunk.
 *
 * - `continue`: forward the chunk as received.
 * - `buffer`: hold the chunk; the filter owns it until a later flush.
 * - `flush`: forward `body` in place of everything held so far plus
 *   this chunk. `trailers` are attribution values the host may send as
 *   HTTP trailers (response headers are already on the wire by then).
 */
export type BodyAction =
  | { type: "continue" }
  | { type: "buffer" }
  | { type: "flush"; body: Buffer; trailers: Record<string, string> };

// --- Filter contract ---

/**
 * Per-request filter state. One context is created for each HTTP
 * exchange and discarded when it completes. Every hook is optional.
 */
export interface FilterContext {
  onRequestHeaders?: (event: RequestHeadersEvent) => HeaderMutations;
  onResponseHeaders?: (event: ResponseHeadersEvent) => HeaderMutations;
  onResponseBody?: (chunk: Buffer, endOfStream: boolean) => BodyAction;
  /** The host tore the stream down before it completed. */
  onStreamClosed?: () => void;
}

/**
 * A configured edge filter.
 *
 * Built once from configuration (Unconfigured -> Configured) and then
 * shared read-only: `createContext()` is the only thing called per
 * request.
 */
export interface EdgeFilter {
  name: string;
  createContext: () => FilterContext;
}
