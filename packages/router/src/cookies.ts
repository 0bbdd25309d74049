/**
 * Cookie header parsing.
 *
 * Conventions:
 * - pairs split on ";", then on the first "=", name and value trimmed
 * - pairs without "=" or with an empty name are skipped
 * - duplicate names: the first occurrence wins
 * - no URL-decoding; "%3D" stays "%3D"
 * - names are case-sensitive
 */

/** Parse a raw `Cookie` header into a name -> value map. */
export function parseCookies(raw: string): Map<string, string> {
  const cookies = new Map<string, string>();
  for (const part of raw.split(";")) {
    const pair = part.trim();
    const eq = pair.indexOf("=");
    if (eq === -1) continue;
    const name = pair.slice(0, eq).trim();
    if (name.length === 0 || cookies.has(name)) continue;
    cookies.set(name, pair.slice(eq + 1).trim());
  }
  return cookies;
}

/**
 * Lazily parsed view of one request's cookies. Nothing is parsed until
 * the first lookup, so requests whose rules never reach a cookie
 * condition pay nothing.
 */
export class CookieJar {
  private readonly raw: string;
  private cookies: Map<string, string> | null = null;

  constructor(raw: string | undefined) {
    this.raw = raw ?? "";
  }

  private parsed(): Map<string, string> {
    if (this.cookies === null) this.cookies = parseCookies(this.raw);
    return this.cookies;
  }

  get(name: string): string | undefined {
    return this.parsed().get(name);
  }

  has(name: string): boolean {
    return this.parsed().has(name);
  }

  /** Whether the header has been parsed yet. */
  get isParsed(): boolean {
    return this.cookies !== null;
  }
}
