/**
 * Redaction pattern types.
 *
 * Patterns are the atomic unit of the redaction engine. Each pattern
 * has a global regex and a replacement template. The template can use
 * $1, $2, $<name> to keep captured segments, e.g. the last four digits
 * of a card number.
 */

export interface PiiPattern {
  /** Unique identifier, reported in attribution headers and logs. */
  readonly name: string;
  /** Pattern to match. Always has the global flag. */
  readonly pattern: RegExp;
  /** Replacement template in `String.prototype.replace` syntax. */
  readonly replacement: string;
  /** Disabled patterns stay in the table but are never applied. */
  readonly enabled: boolean;
  /** True for the built-in structural patterns. */
  readonly builtin: boolean;
}

/**
 * Ordered set of patterns, built once from configuration and shared
 * read-only by every request. Order is application order: built-ins
 * first, then custom patterns in configuration order.
 */
export interface PatternTable {
  readonly patterns: readonly PiiPattern[];
}

/** The patterns that will actually run, in application order. */
export function enabledPatterns(table: PatternTable): PiiPattern[] {
  return table.patterns.filter((p) => p.enabled);
}
