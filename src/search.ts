// Multi-field search over the store's current snapshot.
// No persistent index: every call filters RecordSource.list() afresh, so
// results can never go stale after a mutation.

import type { MovieRecord, RecordSource, WatchStatus } from './types.js';

/** Optional predicates, combined with AND. Blank strings count as absent. */
export interface SearchFilters {
  readonly title?: string;       // case-insensitive substring
  readonly director?: string;    // case-insensitive substring (an exact name matches too)
  readonly actor?: string;       // case-insensitive substring of any cast member
  readonly genre?: string;       // case-insensitive equality with any genre
  readonly status?: WatchStatus;
  readonly keyword?: string;     // substring of title, director, any genre or any cast member
}

function needle(value: string | undefined): string | null {
  const trimmed = value?.trim().toLowerCase();
  return trimmed ? trimmed : null;
}

function contains(haystack: string, term: string): boolean {
  return haystack.toLowerCase().includes(term);
}

/** True when the record satisfies every supplied filter */
export function matchesFilters(record: MovieRecord, filters: SearchFilters): boolean {
  const title = needle(filters.title);
  if (title && !contains(record.title, title)) return false;

  const director = needle(filters.director);
  if (director && !contains(record.director, director)) return false;

  const actor = needle(filters.actor);
  if (actor && !record.cast.some(a => contains(a, actor))) return false;

  const genre = needle(filters.genre);
  if (genre && !record.genres.some(g => g.toLowerCase() === genre)) return false;

  if (filters.status && record.status !== filters.status) return false;

  const keyword = needle(filters.keyword);
  if (keyword) {
    const hit = contains(record.title, keyword)
      || contains(record.director, keyword)
      || record.genres.some(g => contains(g, keyword))
      || record.cast.some(a => contains(a, keyword));
    if (!hit) return false;
  }

  return true;
}

export class SearchIndex {
  constructor(private readonly source: RecordSource) {}

  /** Matching records in store order; no filters returns the whole collection */
  search(filters: SearchFilters = {}): MovieRecord[] {
    return this.source.list().filter(record => matchesFilters(record, filters));
  }
}
