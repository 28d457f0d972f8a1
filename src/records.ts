// Record identity and pure record transforms.
// Pure functions — no side effects, no state.

import type { MovieRecord } from './types.js';

/** Canonical form of a title for identity comparison */
export function normalizeTitle(title: string): string {
  return title.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Map key for a record identity: normalized title + year */
export function identityKey(title: string, year: number): string {
  return `${normalizeTitle(title)}|${year}`;
}

export function recordKey(record: Pick<MovieRecord, 'title' | 'year'>): string {
  return identityKey(record.title, record.year);
}

/** Document file name for a record: letters, digits, spaces and dashes of the title, then the year.
 *  `suffix` disambiguates titles that slug to the same name. */
export function recordFileName(title: string, year: number, suffix?: number): string {
  const slug = Array.from(title.normalize('NFKC'))
    .filter(c => /[\p{L}\p{N} -]/u.test(c))
    .join('')
    .trim()
    .replace(/\s+/g, '-')
    || 'untitled';
  return suffix === undefined ? `${slug}-${year}.md` : `${slug}-${year}-${suffix}.md`;
}

/** Strip a record down to a to-watch entry */
export function markToWatch(record: MovieRecord): MovieRecord {
  const { rating: _rating, dateWatched: _dateWatched, ...rest } = record;
  return { ...rest, status: 'to-watch' };
}

export function markWatched(record: MovieRecord, rating: number, dateWatched: string): MovieRecord {
  return { ...record, status: 'watched', rating, dateWatched };
}

/** Today's date as YYYY-MM-DD in UTC */
export function isoDate(date: Date): string {
  return date.toISOString().substring(0, 10);
}

/** De-duplicate a list of labels, keeping first occurrence order. Case-insensitive. */
export function uniqueLabels(labels: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of labels) {
    const label = raw.trim();
    if (label.length === 0) continue;
    const key = label.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(label);
  }
  return result;
}

/** Ordinal string comparison — locale-independent, so orderings are stable across machines */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
