/**
 * URL canonicalization, validity checks and same-domain classification.
 *
 * The canonical string is the dedup key for the whole crawl, so every URL
 * that reaches the frontier or the fetch gateway passes through here first.
 */

export type UrlRejection =
  | "empty"
  | "fragment-only"
  | "unsupported-scheme"
  | "malformed";

export type UrlCheck =
  | { ok: true; url: string }
  | { ok: false; reason: UrlRejection };

const FETCHABLE_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Parses a raw (possibly relative) link and returns its canonical form,
 * or the reason it can never be fetched.
 */
export function validateUrl(raw: string, base?: string): UrlCheck {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { ok: false, reason: "empty" };
  }
  if (trimmed.startsWith("#")) {
    return { ok: false, reason: "fragment-only" };
  }

  let parsed: URL;
  try {
    parsed = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return { ok: false, reason: "malformed" };
  }

  if (!FETCHABLE_PROTOCOLS.has(parsed.protocol)) {
    return { ok: false, reason: "unsupported-scheme" };
  }
  if (!parsed.hostname) {
    return { ok: false, reason: "malformed" };
  }

  return { ok: true, url: canonicalize(parsed) };
}

/**
 * Canonical form of an absolute URL. Throws when the URL is not fetchable.
 *
 * Host is lower-cased and default ports dropped (both done by the WHATWG
 * parser), the fragment and a non-root trailing slash are removed, and the
 * query string is kept in its original order.
 */
export function canonicalizeUrl(raw: string): string {
  const check = validateUrl(raw);
  if (!check.ok) {
    throw new TypeError(`Cannot canonicalize "${raw}": ${check.reason}`);
  }
  return check.url;
}

function canonicalize(parsed: URL): string {
  const url = new URL(parsed.href);
  url.hash = "";
  if (url.search === "") {
    // drops a dangling "?"
    url.search = "";
  }
  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "") || "/";
  }
  return url.toString();
}

/**
 * Host equality that treats "www.example.com" and "example.com" as one site.
 * Symmetric in its arguments.
 */
export function isSameDomain(host: string, reference: string): boolean {
  const h = host.toLowerCase();
  const d = reference.toLowerCase();
  return h === d || h === `www.${d}` || d === `www.${h}`;
}

/**
 * Dedup key for a canonical URL within one crawl: a same-domain host is
 * replaced by `referenceHost`, so the "www." and bare forms share a key.
 */
export function siteKey(url: string, referenceHost: string): string {
  const parsed = new URL(url);
  if (parsed.hostname === referenceHost || !isSameDomain(parsed.hostname, referenceHost)) {
    return url;
  }
  parsed.hostname = referenceHost;
  return parsed.toString();
}

export function hostOf(url: string): string {
  return new URL(url).hostname;
}

/**
 * Turns the raw links reported for a page into the canonical same-domain
 * URLs worth enqueueing, in first-seen order and without duplicates.
 */
export function filterLinks(
  links: readonly string[],
  pageUrl: string,
  referenceHost: string,
  isAllowed: (url: string) => boolean = () => true
): string[] {
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const link of links) {
    const check = validateUrl(link, pageUrl);
    if (!check.ok) continue;

    const url = check.url;
    if (seen.has(url)) continue;
    seen.add(url);

    if (!isSameDomain(hostOf(url), referenceHost)) continue;
    if (!isAllowed(url)) continue;

    kept.push(url);
  }

  return kept;
}
