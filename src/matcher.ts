// Metadata matching: choose one external candidate for a title query and
// map it onto the record schema. One lookup per call — no retries, no re-ranking.

import type {
  CandidateMetadata, MatchConfidence, MetadataService, MovieRecord, PersonalFields, ServiceCandidate,
} from './types.js';
import { UNKNOWN_DIRECTOR } from './types.js';
import type { MovieError } from './errors.js';
import { invalidField } from './errors.js';
import { normalizeTitle, uniqueLabels } from './records.js';

export type MatchResult =
  | { readonly ok: true; readonly candidate: CandidateMetadata }
  | { readonly ok: false; readonly error: MovieError };

export type RecordResult =
  | { readonly ok: true; readonly record: MovieRecord }
  | { readonly ok: false; readonly error: MovieError };

export interface RefreshOptions {
  /** Keep locally set metadata; the candidate only fills blanks */
  readonly preserveLocalEdits: boolean;
}

/** Exact when the title matches and, given a hint, the year does too */
function confidenceOf(candidate: ServiceCandidate, queryTitle: string, yearHint?: number): MatchConfidence {
  const titleMatches = normalizeTitle(candidate.title) === normalizeTitle(queryTitle);
  const yearMatches = yearHint === undefined || candidate.year === yearHint;
  return titleMatches && yearMatches ? 'exact' : 'fuzzy';
}

export class MetadataMatcher {
  constructor(private readonly service: MetadataService) {}

  /** Search once and pick a candidate. A year hint picks the first candidate from that year;
   *  otherwise (or when none has that year) the service's top result wins.
   *  ExternalServiceError from the service propagates. */
  async match(queryTitle: string, yearHint?: number): Promise<MatchResult> {
    const candidates = await this.service.searchTitles(queryTitle, yearHint);
    const noMatch: MatchResult = {
      ok: false,
      error: yearHint === undefined
        ? { kind: 'no-match', query: queryTitle }
        : { kind: 'no-match', query: queryTitle, yearHint },
    };
    if (candidates.length === 0) return noMatch;

    const byYear = yearHint === undefined ? undefined : candidates.find(c => c.year === yearHint);
    const chosen = byYear ?? candidates[0];
    if (!chosen) return noMatch;

    return { ok: true, candidate: { ...chosen, match: confidenceOf(chosen, queryTitle, yearHint) } };
  }
}

type OptionalMetadata = Pick<
  MovieRecord, 'externalId' | 'countries' | 'originalLanguage' | 'releaseDate' | 'posterUrl' | 'overview'
>;

/** Optional metadata fields carried over from a candidate, omitting the absent ones */
function optionalMetadata(candidate: ServiceCandidate): OptionalMetadata {
  return {
    externalId: candidate.externalId,
    countries: uniqueLabels(candidate.countries),
    ...(candidate.originalLanguage !== undefined && { originalLanguage: candidate.originalLanguage }),
    ...(candidate.releaseDate !== undefined && { releaseDate: candidate.releaseDate }),
    ...(candidate.posterUrl !== undefined && { posterUrl: candidate.posterUrl }),
    ...(candidate.overview !== undefined && { overview: candidate.overview }),
  };
}

/** Turn a candidate plus the user's own fields into a record ready for upsert.
 *  Validation of rating/date against status is the store's job. */
export function candidateToRecord(candidate: ServiceCandidate, personal: PersonalFields): RecordResult {
  if (candidate.year === null) {
    return { ok: false, error: invalidField('year', `"${candidate.title}" has no release year`) };
  }

  const record: MovieRecord = {
    title: candidate.title.trim(),
    year: candidate.year,
    director: candidate.director?.trim() || UNKNOWN_DIRECTOR,
    genres: uniqueLabels(candidate.genres),
    runtime: candidate.runtime ?? 0,
    cast: uniqueLabels(candidate.cast),
    status: personal.status,
    ...(personal.rating !== undefined && { rating: personal.rating }),
    ...(personal.dateWatched !== undefined && { dateWatched: personal.dateWatched }),
    notes: personal.notes ?? '',
    ...optionalMetadata(candidate),
  };
  return { ok: true, record };
}

/** Apply refreshed metadata to an existing record.
 *  Identity, status, rating, date watched, notes and creation time never change. */
export function refreshRecord(existing: MovieRecord, candidate: ServiceCandidate, options: RefreshOptions): MovieRecord {
  const fresh = optionalMetadata(candidate);
  const director = candidate.director?.trim() || UNKNOWN_DIRECTOR;
  const genres = uniqueLabels(candidate.genres);
  const cast = uniqueLabels(candidate.cast);
  const runtime = candidate.runtime ?? 0;

  if (!options.preserveLocalEdits) {
    return {
      ...existing,
      ...fresh,
      director: candidate.director ? director : existing.director,
      genres: genres.length > 0 ? genres : existing.genres,
      runtime: runtime > 0 ? runtime : existing.runtime,
      cast: cast.length > 0 ? cast : existing.cast,
    };
  }

  return {
    ...fresh,
    ...existing,
    director: existing.director === UNKNOWN_DIRECTOR ? director : existing.director,
    genres: existing.genres.length > 0 ? existing.genres : genres,
    runtime: existing.runtime > 0 ? existing.runtime : runtime,
    cast: existing.cast.length > 0 ? existing.cast : cast,
    countries: existing.countries && existing.countries.length > 0 ? existing.countries : fresh.countries ?? [],
  };
}
