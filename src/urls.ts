const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'mc_cid', 'mc_eid', '_ga']);

const DEFAULT_LINK_PATTERNS = [
  /itemId=\d+/,
  /\/item\/\d+/,
  /\/rent\/\d+/,
  /\/realestate\/item/,
  /\/realestate\/rent\/.+\/\d+/,
  /\/nadlan\/.+\/\d+/,
];

function isTrackingParam(name: string): boolean {
  return name.startsWith('utm_') || TRACKING_PARAMS.has(name);
}

/**
 * Turns an href found on a search page into the listing's identity: absolute,
 * http(s) only, without fragment or tracking parameters. Returns null for
 * anything that is not a navigable link.
 */
export function normalizeUrl(baseUrl: string, href: string | undefined): string | null {
  const trimmed = href?.trim();
  if (!trimmed) return null;
  if (/^(javascript|mailto|tel):/i.test(trimmed) || trimmed.startsWith('#')) return null;

  let url: URL;
  try {
    url = new URL(trimmed, baseUrl);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  url.hash = '';
  const kept = [...url.searchParams.entries()].filter(([name]) => !isTrackingParam(name));
  // Always reserialize so "?q=a%20b" and "?q=a+b&utm_source=x" share one identity.
  url.search = new URLSearchParams(kept).toString();
  return url.toString();
}

export function compileLinkPatterns(patterns: string[] | undefined): RegExp[] {
  return patterns ? patterns.map((p) => new RegExp(p)) : DEFAULT_LINK_PATTERNS;
}

export function isListingLink(url: string, patterns: RegExp[], domainHint?: string): boolean {
  const parsed = new URL(url);
  if (domainHint && !parsed.hostname.includes(domainHint)) return false;

  const pathAndQuery = `${parsed.pathname}?${parsed.search.slice(1)}`;
  return patterns.some((pattern) => pattern.test(pathAndQuery));
}
