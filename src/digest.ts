import type { DigestGroup, Listing } from './types.js';

const SNIPPET_LIMIT = 320;
const SNIPPET_CUT = 300;

export interface Digest {
  text: string;
  html: string;
  count: number;
  isEmpty: boolean;
}

export interface DigestOptions {
  date: string;
  warnings?: string[];
}

export function snippet(text: string): string {
  const chars = Array.from(text);
  return chars.length > SNIPPET_LIMIT ? `${chars.slice(0, SNIPPET_CUT).join('')}…` : text;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function listingCardHTML(listing: Listing): string {
  const image = listing.image
    ? `<img src="${escapeHtml(listing.image)}" alt="" style="width:100%;height:180px;object-fit:cover;display:block;">`
    : '';
  const text = listing.text ? escapeHtml(snippet(listing.text)) : escapeHtml(listing.url);

  return `
    <a href="${escapeHtml(listing.url)}" style="display:block;text-decoration:none;color:inherit;border:1px solid #e0e0e0;border-radius:8px;margin-bottom:16px;background:#fff;overflow:hidden;">
      ${image}
      <div style="padding:16px;">
        <div style="font-size:14px;color:#333;line-height:1.6;margin-bottom:8px;">${text}</div>
        <span style="font-size:13px;color:#2196F3;font-weight:bold;">View listing</span>
      </div>
    </a>`;
}

function groupHTML(group: DigestGroup): string {
  return `
    <h2 style="font-size:17px;color:#333;margin:20px 0 12px;">${escapeHtml(group.source)} (${group.listings.length})</h2>
    ${group.listings.map((l) => listingCardHTML(l)).join('')}`;
}

function warningsHTML(warnings: string[]): string {
  if (warnings.length === 0) return '';
  return `
    <div style="margin-top:24px;padding:12px;border-radius:6px;background:#fff8e1;font-size:13px;color:#8a6d3b;">
      <b>Warnings:</b><br>${warnings.map((w) => escapeHtml(w)).join('<br>')}
    </div>`;
}

function digestText(groups: DigestGroup[], options: DigestOptions): string {
  const lines: string[] = [`New listings – ${options.date}`];
  for (const group of groups) {
    lines.push('', `${group.source} (${group.listings.length})`);
    for (const listing of group.listings) {
      lines.push(`- ${listing.url}`);
      if (listing.text) lines.push(`  ${snippet(listing.text)}`);
    }
  }
  const warnings = options.warnings ?? [];
  if (warnings.length > 0) {
    lines.push('', 'Warnings:', ...warnings.map((w) => `- ${w}`));
  }
  return lines.join('\n');
}

function digestHTML(groups: DigestGroup[], options: DigestOptions): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width,initial-scale=1">
</head>
<body style="margin:0;padding:0;background:#f5f5f5;font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif;">
  <div style="max-width:600px;margin:0 auto;padding:20px;">
    <h1 style="font-size:22px;color:#1a1a1a;margin-bottom:4px;">New listings</h1>
    <p style="font-size:14px;color:#666;margin-top:0;">${escapeHtml(options.date)}</p>
    ${groups.map((g) => groupHTML(g)).join('')}
    ${warningsHTML(options.warnings ?? [])}
  </div>
</body>
</html>`;
}

/**
 * Groups keep the order they are given in (configuration order) and sources
 * with nothing new are left out. An empty digest must not be sent.
 */
export function buildDigest(groups: DigestGroup[], options: DigestOptions): Digest {
  const nonEmpty = groups.filter((g) => g.listings.length > 0);
  const count = nonEmpty.reduce((sum, g) => sum + g.listings.length, 0);

  return {
    text: digestText(nonEmpty, options),
    html: digestHTML(nonEmpty, options),
    count,
    isEmpty: count === 0,
  };
}

export function generateSubject(date: string, time: string, count: number): string {
  return `New listings – ${date} ${time} (${count})`;
}

function zonedParts(now: Date, timeZone: string): Record<string, string> {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);
  return Object.fromEntries(parts.map((p) => [p.type, p.value]));
}

export function formatRunDate(now: Date, timeZone: string): { date: string; time: string } {
  const p = zonedParts(now, timeZone);
  return { date: `${p['day']}.${p['month']}.${p['year']}`, time: `${p['hour']}:${p['minute']}` };
}
