// Aggregate views over a record snapshot.
//
// Pure functions — no side effects, no state. StatsEngine binds them to a
// RecordSource and recomputes from the current snapshot on every call.

import type { MovieRecord, RecordSource } from './types.js';
import { UNKNOWN_DIRECTOR } from './types.js';
import { compareText } from './records.js';

export interface DirectorCount {
  readonly director: string;
  readonly count: number;
}

export interface GenreCount {
  readonly genre: string;
  readonly count: number;
}

/** Half-open bucket [start, end) */
export interface RatingBucket {
  readonly start: number;
  readonly end: number;
  readonly count: number;
}

export interface DecadeCount {
  readonly decade: number;       // e.g. 1990
  readonly count: number;
}

export interface WatchSummary {
  readonly watched: number;
  readonly toWatch: number;
  readonly totalHours: number;
  readonly averageRating: number | null;   // null when nothing is rated
}

function watchedOnly(records: readonly MovieRecord[]): MovieRecord[] {
  return records.filter(r => r.status === 'watched');
}

/** Counts sorted by count descending, then label ascending */
function rankCounts(counts: ReadonlyMap<string, number>): Array<[string, number]> {
  return Array.from(counts.entries()).sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]));
}

function take<T>(items: readonly T[], n: number): T[] {
  return items.slice(0, Math.max(0, Math.floor(n)));
}

/** Float-safe bucket edges: 0.1 * 3 is 0.3, not 0.30000000000000004 */
function roundEdge(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

/** Watched movies per director, excluding the "Unknown" placeholder */
export function topDirectors(records: readonly MovieRecord[], n: number): DirectorCount[] {
  const counts = new Map<string, number>();
  for (const r of watchedOnly(records)) {
    if (r.director === UNKNOWN_DIRECTOR) continue;
    counts.set(r.director, (counts.get(r.director) ?? 0) + 1);
  }
  return take(rankCounts(counts), n).map(([director, count]) => ({ director, count }));
}

/** Watched movies per genre. A movie with k genres adds 1 to each of them. */
export function genreDistribution(records: readonly MovieRecord[]): GenreCount[] {
  const counts = new Map<string, number>();
  for (const r of watchedOnly(records)) {
    for (const genre of r.genres) {
      counts.set(genre, (counts.get(genre) ?? 0) + 1);
    }
  }
  return rankCounts(counts).map(([genre, count]) => ({ genre, count }));
}

/** Rated watched movies per [b, b + bucketWidth) bucket, ascending, empty buckets omitted */
export function ratingHistogram(records: readonly MovieRecord[], bucketWidth: number): RatingBucket[] {
  if (!Number.isFinite(bucketWidth) || bucketWidth <= 0) {
    throw new RangeError(`bucketWidth must be a positive number, got ${bucketWidth}`);
  }

  const counts = new Map<number, number>();
  for (const r of watchedOnly(records)) {
    if (r.rating === undefined) continue;
    // Epsilon keeps 0.3 / 0.1 (= 2.9999999999999996) in bucket 3
    const index = Math.floor(r.rating / bucketWidth + 1e-9);
    counts.set(index, (counts.get(index) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .sort((a, b) => a[0] - b[0])
    .map(([index, count]) => ({
      start: roundEdge(index * bucketWidth),
      end: roundEdge((index + 1) * bucketWidth),
      count,
    }));
}

/** Most recently watched first; same-day ties by title */
export function recentlyWatched(records: readonly MovieRecord[], n: number): MovieRecord[] {
  const dated = watchedOnly(records).filter(r => r.dateWatched !== undefined);
  dated.sort((a, b) => compareText(b.dateWatched ?? '', a.dateWatched ?? '') || compareText(a.title, b.title));
  return take(dated, n);
}

/** The to-watch list, oldest films first; same-year ties by title */
export function toWatchList(records: readonly MovieRecord[]): MovieRecord[] {
  return records
    .filter(r => r.status === 'to-watch')
    .sort((a, b) => a.year - b.year || compareText(a.title, b.title));
}

/** Headline numbers for the stats dashboard */
export function watchSummary(records: readonly MovieRecord[]): WatchSummary {
  const watched = watchedOnly(records);
  const rated = watched.filter(r => r.rating !== undefined);
  const totalMinutes = watched.reduce((sum, r) => sum + r.runtime, 0);
  const ratingSum = rated.reduce((sum, r) => sum + (r.rating ?? 0), 0);

  return {
    watched: watched.length,
    toWatch: records.length - watched.length,
    totalHours: totalMinutes / 60,
    averageRating: rated.length > 0 ? ratingSum / rated.length : null,
  };
}

/** Watched movies per release decade, newest decade first */
export function decadeBreakdown(records: readonly MovieRecord[]): DecadeCount[] {
  const counts = new Map<number, number>();
  for (const r of watchedOnly(records)) {
    const decade = Math.floor(r.year / 10) * 10;
    counts.set(decade, (counts.get(decade) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .sort((a, b) => b[0] - a[0])
    .map(([decade, count]) => ({ decade, count }));
}

/** Stats views over a live record source */
export class StatsEngine {
  constructor(private readonly source: RecordSource) {}

  topDirectors(n: number): DirectorCount[] {
    return topDirectors(this.source.list(), n);
  }

  genreDistribution(): GenreCount[] {
    return genreDistribution(this.source.list());
  }

  ratingHistogram(bucketWidth: number): RatingBucket[] {
    return ratingHistogram(this.source.list(), bucketWidth);
  }

  recentlyWatched(n: number): MovieRecord[] {
    return recentlyWatched(this.source.list(), n);
  }

  toWatchList(): MovieRecord[] {
    return toWatchList(this.source.list());
  }

  summary(): WatchSummary {
    return watchSummary(this.source.list());
  }

  decadeBreakdown(): DecadeCount[] {
    return decadeBreakdown(this.source.list());
  }
}
