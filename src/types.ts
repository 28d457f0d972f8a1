// Core types for the movie log
//
// Design principles:
//   - Validate at boundaries, trust inside: documents, tool arguments and
//     external lookups are parsed once, then flow as typed records
//   - Results are discriminated unions; only the external lookup throws
//   - Explicit domain types over primitives where meaning matters

/** Viewing status of a movie */
export type WatchStatus = 'to-watch' | 'watched';

const WATCH_STATUSES: readonly WatchStatus[] = ['to-watch', 'watched'];

/** Parse a raw string into a WatchStatus, returning null for invalid input */
export function parseWatchStatus(raw: string): WatchStatus | null {
  return WATCH_STATUSES.find(s => s === raw) ?? null;
}

/** Injectable clock for deterministic time in tests */
export interface Clock {
  now(): Date;
  isoNow(): string;
}

/** Production clock using real wall time */
export const realClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

/** A single movie, persisted as one Markdown document */
export interface MovieRecord {
  readonly title: string;
  readonly year: number;
  readonly director: string;               // "Unknown" when the lookup had no director
  readonly genres: readonly string[];
  readonly runtime: number;                // minutes, 0 when unknown
  readonly cast: readonly string[];
  readonly status: WatchStatus;
  readonly rating?: number;                // 0-10, watched only
  readonly dateWatched?: string;           // YYYY-MM-DD, watched only
  readonly notes: string;
  readonly externalId?: number;            // TMDB id, used for dedup, never identity
  readonly originalLanguage?: string;
  readonly countries?: readonly string[];
  readonly releaseDate?: string;
  readonly posterUrl?: string;
  readonly overview?: string;
  readonly created?: string;               // ISO 8601, orders the collection
}

/** Placeholder director when the external service has none */
export const UNKNOWN_DIRECTOR = 'Unknown';

/** How closely a candidate matched the query */
export type MatchConfidence = 'exact' | 'fuzzy';

/** One result of an external title search, in the service's order */
export interface ServiceCandidate {
  readonly externalId: number;
  readonly title: string;
  readonly year: number | null;
  readonly director: string | null;
  readonly genres: readonly string[];
  readonly runtime: number | null;
  readonly cast: readonly string[];
  readonly originalLanguage?: string;
  readonly countries: readonly string[];
  readonly releaseDate?: string;
  readonly posterUrl?: string;
  readonly overview?: string;
}

/** The candidate chosen by the matcher — transient, never persisted as-is */
export interface CandidateMetadata extends ServiceCandidate {
  readonly match: MatchConfidence;
}

/** External lookup boundary — injected to keep the matcher testable and swappable */
export interface MetadataService {
  searchTitles(query: string, year?: number): Promise<readonly ServiceCandidate[]>;
}

/** Anything that can hand out the current snapshot of records */
export interface RecordSource {
  list(): readonly MovieRecord[];
}

/** The fields a user supplies when logging a movie */
export interface PersonalFields {
  readonly status: WatchStatus;
  readonly rating?: number;
  readonly dateWatched?: string;
  readonly notes?: string;
}

/** Configuration for the movie log */
export interface MovielogConfig {
  readonly moviesPath: string;             // absolute path to the record directory
  readonly tmdbApiKey?: string;
  readonly preserveLocalEdits: boolean;    // refresh only fills blank metadata
  readonly lookupTimeoutMs: number;
  readonly maxCandidates: number;          // search results enriched with details
  readonly castSize: number;               // cast members kept per record
}

export const DEFAULT_LOOKUP_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_CANDIDATES = 5;
export const DEFAULT_CAST_SIZE = 5;
