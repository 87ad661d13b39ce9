import { load, type CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import type { Listing, Source } from './types.js';
import { compileLinkPatterns, isListingLink, normalizeUrl } from './urls.js';

const CONTEXT_MAX_LENGTH = 400;
const IMAGE_BLOCKLIST = ['placeholder', 'icon', 'logo', 'avatar', 'data:image'];

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    out.push(node.data);
    return;
  }
  if (isTag(node) && (node.name === 'script' || node.name === 'style')) return;
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, out);
  }
}

export function contextText(node: AnyNode): string {
  const pieces: string[] = [];
  collectText(node, pieces);
  const text = pieces.join(' ').split(/\s+/).filter(Boolean).join(' ');
  // Cut by code point so an emoji at the boundary is not split in half.
  return Array.from(text).slice(0, CONTEXT_MAX_LENGTH).join('');
}

function absoluteImageUrl(src: string, baseUrl: string): string | null {
  const trimmed = src.trim();
  if (trimmed.startsWith('data:')) return trimmed;
  try {
    return new URL(trimmed.startsWith('//') ? `https:${trimmed}` : trimmed, baseUrl).toString();
  } catch {
    return null;
  }
}

function imageNearby($: CheerioAPI, container: AnyNode, baseUrl: string): string | undefined {
  for (const img of $(container).find('img').toArray()) {
    const src = img.attribs['data-src'] || img.attribs['data-lazy-src'] || img.attribs['src'];
    if (!src) continue;
    const url = absoluteImageUrl(src, baseUrl);
    if (!url || url.length <= 20) continue;
    const lower = url.toLowerCase();
    if (IMAGE_BLOCKLIST.some((word) => lower.includes(word))) continue;
    return url;
  }

  // Some sites paint the thumbnail as a CSS background instead of an <img>.
  for (const el of $(container).find('[style]').toArray()) {
    const match = /url\(["']?([^"')]+)["']?\)/.exec(el.attribs['style'] ?? '');
    if (!match) continue;
    const url = absoluteImageUrl(match[1], baseUrl);
    if (url && !url.toLowerCase().includes('placeholder')) return url;
  }

  return undefined;
}

/**
 * Pulls candidate listings out of a search-result page. Site-agnostic: every
 * anchor whose normalized URL looks like a listing is kept, with the text of
 * its closest card-like ancestor as context.
 */
export function extractListings(html: string, source: Source): Listing[] {
  const $ = load(html);
  const patterns = compileLinkPatterns(source.linkPatterns);
  const seen = new Set<string>();
  const listings: Listing[] = [];

  $('a[href]').each((_, anchor) => {
    const url = normalizeUrl(source.url, anchor.attribs['href']);
    if (!url || seen.has(url)) return;
    if (!isListingLink(url, patterns, source.domainHint)) return;
    seen.add(url);

    const container: AnyNode = $(anchor).closest('article, li, div').get(0) ?? anchor;
    const image = imageNearby($, container, source.url);

    listings.push({
      url,
      text: contextText(container),
      source: source.name,
      ...(image ? { image } : {}),
    });
  });

  return listings;
}
