import { describe, expect, it } from 'vitest';
import { buildDigest, formatRunDate, generateSubject, snippet } from '../src/digest.js';
import type { DigestGroup } from '../src/types.js';

const groups: DigestGroup[] = [
  {
    source: 'Yad2',
    listings: [
      { url: 'https://www.example.com/item/1', text: '3 rooms, 5000 NIS', source: 'Yad2' },
      { url: 'https://www.example.com/item/3', text: '', source: 'Yad2' },
    ],
  },
  { source: 'Empty', listings: [] },
  {
    source: 'Madlan',
    listings: [
      {
        url: 'https://www.example.org/listings/ab',
        text: 'Roof <b>& terrace</b>',
        source: 'Madlan',
        image: 'https://cdn.example.org/ab.jpg',
      },
    ],
  },
];

describe('buildDigest', () => {
  it('lists new listings per source in the given order and skips empty sources', () => {
    const digest = buildDigest(groups, { date: '01.03.2026' });

    expect(digest.count).toBe(3);
    expect(digest.isEmpty).toBe(false);
    expect(digest.text).toBe(
      [
        'New listings – 01.03.2026',
        '',
        'Yad2 (2)',
        '- https://www.example.com/item/1',
        '  3 rooms, 5000 NIS',
        '- https://www.example.com/item/3',
        '',
        'Madlan (1)',
        '- https://www.example.org/listings/ab',
        '  Roof <b>& terrace</b>',
      ].join('\n'),
    );
  });

  it('escapes listing text and links in the html body', () => {
    const { html } = buildDigest(groups, { date: '01.03.2026' });

    expect(html).toContain('Roof &lt;b&gt;&amp; terrace&lt;/b&gt;');
    expect(html).toContain('<a href="https://www.example.org/listings/ab"');
    expect(html).toContain('<img src="https://cdn.example.org/ab.jpg"');
    expect(html).not.toContain('Empty (0)');
  });

  it('appends fetch warnings', () => {
    const digest = buildDigest(groups.slice(0, 1), {
      date: '01.03.2026',
      warnings: ['Madlan returned HTTP 503'],
    });

    expect(digest.text.split('\n').slice(-3)).toEqual(['', 'Warnings:', '- Madlan returned HTTP 503']);
    expect(digest.html).toContain('<b>Warnings:</b><br>Madlan returned HTTP 503');
  });

  it('reports an empty digest when no source has anything new', () => {
    const digest = buildDigest([{ source: 'Yad2', listings: [] }], { date: '01.03.2026', warnings: ['x'] });
    expect(digest.isEmpty).toBe(true);
    expect(digest.count).toBe(0);
  });
});

describe('snippet', () => {
  it('keeps short text and cuts long text to 300 characters', () => {
    expect(snippet('a'.repeat(320))).toBe('a'.repeat(320));
    expect(snippet('a'.repeat(321))).toBe(`${'a'.repeat(300)}…`);
  });

  it('counts an emoji as one character and never cuts it in half', () => {
    const text = `${'a'.repeat(299)}🏠${'b'.repeat(30)}`;
    expect(snippet(text)).toBe(`${'a'.repeat(299)}🏠…`);
    expect(snippet(`${'a'.repeat(319)}🏠`)).toBe(`${'a'.repeat(319)}🏠`);
  });
});

describe('subject and date', () => {
  it('formats the run time in the configured zone', () => {
    const now = new Date('2026-03-01T22:30:00.000Z');
    expect(formatRunDate(now, 'UTC')).toEqual({ date: '01.03.2026', time: '22:30' });
    expect(formatRunDate(now, 'Asia/Jerusalem')).toEqual({ date: '02.03.2026', time: '00:30' });
  });

  it('names the date, time and count', () => {
    expect(generateSubject('02.03.2026', '00:30', 4)).toBe('New listings – 02.03.2026 00:30 (4)');
  });
});
