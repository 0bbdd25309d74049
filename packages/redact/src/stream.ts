/**
 * Incremental body accumulation.
 *
 * The patterns can span chunk boundaries (a card number split across
 * two network reads), so nothing is redacted until the terminal chunk
 * arrives. Until then every chunk is held. If the held size passes
 * `max_body_size_bytes` the scanner gives up at once: it releases the
 * held bytes unmodified and lets the rest of the stream through, so a
 * large body is never stalled waiting for an end that would be
 * skipped anyway.
 *
 * The host may tear the stream down at any point; `discard()` drops
 * the held chunks and turns the scanner into a pass-through.
 */

import type { BodyAction } from "@edgeward/core";

import type { CompiledRedactConfig } from "./policy.js";
import { redactBuffer, type RedactionResult } from "./redact.js";

export type ScannerState = "buffering" | "overflowed" | "done" | "discarded";

export interface BodyScanner {
  /** Feed one chunk; `endOfStream` marks the terminal chunk. */
  onChunk: (chunk: Buffer, endOfStream: boolean) => BodyAction;
  /** Drop partial state after the host closed the stream. */
  discard: () => void;
  readonly state: ScannerState;
  /** Bytes held so far (or seen before overflow). */
  readonly bufferedBytes: number;
  /** Outcome once the body is complete or overflowed; null before. */
  readonly result: RedactionResult | null;
}

/** Names of the attribution values sent with a redacted body. */
export const PII_REDACTED_HEADER = "X-PII-Redacted";
export const REDACTION_COUNT_HEADER = "X-Redaction-Count";

/**
 * Attribution values for a redaction result: matched pattern names
 * (comma-joined, table order) and the replacement count. Empty when
 * nothing was redacted.
 */
export function attributionHeaders(result: RedactionResult): Record<string, string> {
  if (!result.redacted) return {};
  return {
    [PII_REDACTED_HEADER]: result.matchedPatterns.join(","),
    [REDACTION_COUNT_HEADER]: String(result.matchCount),
  };
}

/**
 * Create a scanner for one response body.
 *
 * @param config - Compiled redaction config (pattern table and size cap).
 * @returns Chunk and teardown handlers plus the final result.
 */
export function createBodyScanner(config: CompiledRedactConfig): BodyScanner {
  let state: ScannerState = "buffering";
  let held: Buffer[] = [];
  let size = 0;
  let result: RedactionResult | null = null;

  function onChunk(chunk: Buffer, endOfStream: boolean): BodyAction {
    if (state !== "buffering") return { type: "continue" };

    held.push(chunk);
    size += chunk.length;

    if (size > config.maxBodySizeBytes) {
      const body = Buffer.concat(held);
      held = [];
      state = "overflowed";
      result = {
        redacted: false,
        matchCount: 0,
        matchedPatterns: [],
        content: body,
        bypass: "too-large",
        failure: null,
      };
      return { type: "flush", body, trailers: {} };
    }

    if (!endOfStream) return { type: "buffer" };

    const body = held.length === 1 ? held[0] : Buffer.concat(held);
    held = [];
    state = "done";
    result = redactBuffer(body, config.table);
    return { type: "flush", body: result.content, trailers: attributionHeaders(result) };
  }

  return {
    onChunk,
    discard() {
      held = [];
      if (state === "buffering") state = "discarded";
    },
    get state() {
      return state;
    },
    get bufferedBytes() {
      return size;
    },
    get result() {
      return result;
    },
  };
}
