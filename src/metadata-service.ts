// External metadata boundary — isolates network calls from matching logic.
// Inject fakeMetadataService in tests for determinism; createTmdbService in production.

import { z } from 'zod';
import type { MetadataService, ServiceCandidate } from './types.js';
import { DEFAULT_CAST_SIZE, DEFAULT_LOOKUP_TIMEOUT_MS, DEFAULT_MAX_CANDIDATES } from './types.js';
import { ExternalServiceError } from './errors.js';

const TMDB_BASE = 'https://api.themoviedb.org/3';
const TMDB_POSTER_BASE = 'https://image.tmdb.org/t/p/w500';

export interface TmdbOptions {
  readonly apiKey: string;
  readonly timeoutMs?: number;
  readonly maxCandidates?: number;
  readonly castSize?: number;
  readonly baseUrl?: string;
  readonly fetch?: typeof fetch;      // injectable for tests
}

const searchResponseSchema = z.object({
  results: z.array(z.object({ id: z.number() })).default([]),
});

const namedSchema = z.object({ name: z.string() });

const detailsSchema = z.object({
  id: z.number(),
  title: z.string(),
  release_date: z.string().nullish(),
  runtime: z.number().nullish(),
  overview: z.string().nullish(),
  original_language: z.string().nullish(),
  poster_path: z.string().nullish(),
  genres: z.array(namedSchema).default([]),
  production_countries: z.array(namedSchema).default([]),
  credits: z.object({
    cast: z.array(namedSchema).default([]),
    crew: z.array(z.object({ name: z.string(), job: z.string().nullish() })).default([]),
  }).optional(),
});

type TmdbDetails = z.infer<typeof detailsSchema>;

function parseYear(date: string | null | undefined): number | null {
  if (!date) return null;
  const year = parseInt(date.substring(0, 4), 10);
  return isNaN(year) ? null : year;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

/** Map a TMDB details payload onto a service candidate */
export function detailsToCandidate(details: TmdbDetails, castSize: number): ServiceCandidate {
  const credits = details.credits ?? { cast: [], crew: [] };
  const director = credits.crew.find(member => member.job === 'Director')?.name ?? null;
  const originalLanguage = nonEmpty(details.original_language)?.toUpperCase();
  const releaseDate = nonEmpty(details.release_date);
  const overview = nonEmpty(details.overview);

  return {
    externalId: details.id,
    title: details.title,
    year: parseYear(details.release_date),
    director,
    genres: details.genres.map(g => g.name),
    runtime: details.runtime ?? null,
    cast: credits.cast.slice(0, castSize).map(a => a.name),
    countries: details.production_countries.map(c => c.name),
    ...(originalLanguage !== undefined && { originalLanguage }),
    ...(releaseDate !== undefined && { releaseDate }),
    ...(details.poster_path ? { posterUrl: `${TMDB_POSTER_BASE}${details.poster_path}` } : {}),
    ...(overview !== undefined && { overview }),
  };
}

/** TMDB-backed metadata service: one search, then details + credits for the top results */
function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createTmdbService(options: TmdbOptions): MetadataService {
  const baseUrl = options.baseUrl ?? TMDB_BASE;
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOOKUP_TIMEOUT_MS;
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
  const castSize = options.castSize ?? DEFAULT_CAST_SIZE;
  const fetchFn = options.fetch ?? fetch;

  async function tmdbFetch(apiPath: string, params: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(`${baseUrl}${apiPath}`);
    url.searchParams.set('api_key', options.apiKey);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

    let res: Response;
    try {
      res = await fetchFn(url.toString(), { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error: unknown) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const message = timedOut
        ? `timed out after ${timeoutMs}ms`
        : errorMessage(error);
      throw new ExternalServiceError(`TMDB request ${apiPath} failed: ${message}`, undefined, { cause: error });
    }

    if (!res.ok) {
      const body = await res.text().catch((error: unknown) => `(unreadable body: ${errorMessage(error)})`);
      throw new ExternalServiceError(`TMDB API error ${res.status}: ${body}`, res.status);
    }
    try {
      return await res.json();
    } catch (error: unknown) {
      throw new ExternalServiceError(`TMDB request ${apiPath} returned invalid JSON: ${errorMessage(error)}`, res.status, { cause: error });
    }
  }

  function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown, what: string): z.infer<S> {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ExternalServiceError(`Unexpected TMDB ${what} response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  return {
    async searchTitles(query: string, year?: number): Promise<readonly ServiceCandidate[]> {
      const params: Record<string, string> = { query, include_adult: 'false' };
      if (year !== undefined) params['year'] = String(year);

      const search = parsePayload(searchResponseSchema, await tmdbFetch('/search/movie', params), 'search');
      const top = search.results.slice(0, maxCandidates);

      // Details in parallel; Promise.all keeps the service's ranking order
      return Promise.all(top.map(async ({ id }) => {
        const payload = await tmdbFetch(`/movie/${id}`, { append_to_response: 'credits' });
        return detailsToCandidate(parsePayload(detailsSchema, payload, 'details'), castSize);
      }));
    },
  };
}

/** Fake metadata service for deterministic testing — no network calls.
 *  Records every query so tests can assert on lookup counts. */
export function fakeMetadataService(
  results: readonly ServiceCandidate[] | ((query: string, year?: number) => readonly ServiceCandidate[]),
): MetadataService & { readonly calls: Array<{ query: string; year?: number }> } {
  const calls: Array<{ query: string; year?: number }> = [];
  return {
    calls,
    async searchTitles(query: string, year?: number): Promise<readonly ServiceCandidate[]> {
      calls.push(year === undefined ? { query } : { query, year });
      return typeof results === 'function' ? results(query, year) : results;
    },
  };
}
