/**
 * Built-in structural patterns.
 *
 * Each one recognizes a fixed shape (digit groups, an email-like token)
 * rather than arbitrary text. Replacements keep only the segments they
 * are documented to keep and never produce text that any built-in
 * pattern matches again, so a second pass over redacted output is a
 * no-op.
 */

export type BuiltinPatternName = "credit_card" | "ssn" | "email" | "phone_us";

export interface BuiltinPattern {
  name: BuiltinPatternName;
  pattern: RegExp;
  replacement: string;
  /** Enabled when the config does not mention the pattern. */
  enabledByDefault: boolean;
}

/**
 * Built-ins in application order. Cards run before SSNs so the
 * 3-2-4 shape never bites into a dashed card number.
 */
export const BUILTIN_PATTERNS: readonly BuiltinPattern[] = [
  {
    // 4111-1111-1111-1111 -> XXXX-XXXX-XXXX-1111
    // 4111111111111111    -> XXXXXXXXXXXX1111
    // The separator group is either "-" everywhere or empty everywhere.
    name: "credit_card",
    pattern: /(?<!\d)\d{4}(-?)\d{4}\1\d{4}\1(\d{4})(?!\d)/g,
    replacement: "XXXX$1XXXX$1XXXX$1$2",
    enabledByDefault: true,
  },
  {
    // 123-45-6789 -> XXX-XX-XXXX
    name: "ssn",
    pattern: /(?<![\p{L}\p{N}])\d{3}-\d{2}-\d{4}(?![\p{L}\p{N}])/gu,
    replacement: "XXX-XX-XXXX",
    enabledByDefault: true,
  },
  {
    // Local part of letters, digits and . _ % + -; domain labels of
    // letters, digits and -, at least two of them. A trailing sentence
    // period is left in place.
    name: "email",
    pattern: /[\p{L}\p{N}._%+-]+@[\p{L}\p{N}-]+(?:\.[\p{L}\p{N}-]+)+/gu,
    replacement: "[EMAIL REDACTED]",
    enabledByDefault: true,
  },
  {
    // 555-123-4567 or 555.123.4567 -> (XXX) XXX-4567
    name: "phone_us",
    pattern: /(?<![\p{L}\p{N}])\d{3}([-.])\d{3}\1(\d{4})(?![\p{L}\p{N}])/gu,
    replacement: "(XXX) XXX-$2",
    enabledByDefault: false,
  },
];

export const BUILTIN_PATTERN_NAMES: readonly string[] = BUILTIN_PATTERNS.map(
  (p) => p.name,
);

export function isBuiltinPatternName(name: string): name is BuiltinPatternName {
  return BUILTIN_PATTERN_NAMES.includes(name);
}
