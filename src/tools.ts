// MCP tool definitions and handlers.
//
// handleToolCall is the whole tool surface: normalize args, validate with Zod,
// run the operation, format the response. The server in index.ts only wires
// it to the transport, so tests drive tools without a process boundary.

import { z } from 'zod';
import type { Clock, MovieRecord, MovielogConfig } from './types.js';
import type { MovieError } from './errors.js';
import { describeError, ExternalServiceError } from './errors.js';
import type { MarkdownRecordStore } from './store.js';
import type { MetadataMatcher } from './matcher.js';
import { candidateToRecord, refreshRecord } from './matcher.js';
import { SearchIndex } from './search.js';
import { StatsEngine } from './stats.js';
import { importRows, parseTitleWithYear } from './importer.js';
import type { ImportRow } from './importer.js';
import { isoDate, markToWatch, markWatched } from './records.js';
import { normalizeArgs } from './normalize.js';
import {
  formatImportReport, formatLoadErrors, formatRecordDetail, formatRecordLine, formatRecordList, formatStats,
} from './formatters.js';

/** MCP tool result — a type alias so it stays assignable to the SDK's passthrough result */
export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolDeps = {
  readonly store: MarkdownRecordStore;
  /** Null when no TMDB key is configured; lookup tools then refuse */
  readonly matcher: MetadataMatcher | null;
  readonly config: MovielogConfig;
  readonly clock: Clock;
  /** Progress sink for bulk import; defaults to stderr */
  readonly log?: (line: string) => void;
};

function ok(text: string): ToolResponse {
  return { content: [{ type: 'text', text }] };
}

function fail(text: string): ToolResponse {
  return { content: [{ type: 'text', text }], isError: true };
}

function failWith(error: MovieError): ToolResponse {
  return fail(describeError(error));
}

const NO_API_KEY = 'No TMDB API key configured. Set TMDB_API_KEY (or tmdbApiKey in movielog-config.json) to look up movies.';

// --- Argument schemas ---

const statusSchema = z.enum(['to-watch', 'watched']);
const ratingSchema = z.number().min(0).max(10);
const yearSchema = z.number().int();

const identitySchema = z.object({
  title: z.string().min(1),
  year: yearSchema,
});

const logSchema = z.object({
  title: z.string().min(1),
  year: yearSchema.optional(),
  status: statusSchema.default('to-watch'),
  rating: ratingSchema.optional(),
  dateWatched: z.string().optional(),
  notes: z.string().optional(),
});

const updateSchema = identitySchema.extend({
  status: statusSchema.optional(),
  rating: ratingSchema.optional(),
  dateWatched: z.string().optional(),
  notes: z.string().optional(),
});

const listSchema = z.object({
  view: z.enum(['all', 'to-watch', 'recent']).default('all'),
  limit: z.number().int().min(1).max(500).default(10),
});

const searchSchema = z.object({
  title: z.string().optional(),
  director: z.string().optional(),
  actor: z.string().optional(),
  genre: z.string().optional(),
  status: statusSchema.optional(),
  keyword: z.string().optional(),
});

const statsSchema = z.object({
  limit: z.number().int().min(1).max(100).default(5),
  bucketWidth: z.number().positive().default(1),
});

const importSchema = z.object({
  rows: z.array(z.object({
    title: z.string(),
    year: yearSchema.optional(),
    status: statusSchema.default('to-watch'),
    rating: ratingSchema.optional(),
    dateWatched: z.string().optional(),
  })).min(1),
});

// --- Tool definitions (JSON Schema for tools/list) ---

const identityProperties = {
  title: { type: 'string', description: 'Movie title as logged' },
  year: { type: 'number', description: 'Release year as logged' },
};

const personalProperties = {
  status: { type: 'string', enum: ['to-watch', 'watched'], description: 'Viewing status' },
  rating: { type: 'number', description: 'Your rating, 0-10 (watched only)' },
  dateWatched: { type: 'string', description: 'YYYY-MM-DD (watched only; defaults to today)' },
  notes: { type: 'string', description: 'Free-text notes, stored as the document body' },
};

export const TOOL_DEFINITIONS = [
  {
    name: 'movie_log',
    description: 'Look a movie up on TMDB and log it. Example: movie_log(title: "Parasite", year: 2019, status: "watched", rating: 9)',
    inputSchema: {
      type: 'object' as const,
      properties: {
        title: { type: 'string', description: 'Title to search for' },
        year: { type: 'number', description: 'Release year hint, picks among remakes' },
        ...personalProperties,
      },
      required: ['title'],
    },
  },
  {
    name: 'movie_get',
    description: 'Show one logged movie in full.',
    inputSchema: { type: 'object' as const, properties: identityProperties, required: ['title', 'year'] },
  },
  {
    name: 'movie_update',
    description: 'Change status, rating, date watched or notes. Setting status "to-watch" clears rating and date.',
    inputSchema: {
      type: 'object' as const,
      properties: { ...identityProperties, ...personalProperties },
      required: ['title', 'year'],
    },
  },
  {
    name: 'movie_delete',
    description: 'Remove a movie and its document.',
    inputSchema: { type: 'object' as const, properties: identityProperties, required: ['title', 'year'] },
  },
  {
    name: 'movie_list',
    description: 'List movies. view: "all" (creation order), "to-watch" (oldest films first) or "recent" (latest watched first).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        view: { type: 'string', enum: ['all', 'to-watch', 'recent'], default: 'all' },
        limit: { type: 'number', description: 'Max movies for the "recent" view', default: 10 },
      },
    },
  },
  {
    name: 'movie_search',
    description: 'Search logged movies. All filters are optional and combined with AND. Example: movie_search(director: "villeneuve", status: "to-watch")',
    inputSchema: {
      type: 'object' as const,
      properties: {
        title: { type: 'string', description: 'Substring of the title' },
        director: { type: 'string', description: 'Substring of the director' },
        actor: { type: 'string', description: 'Substring of any cast member' },
        genre: { type: 'string', description: 'Exact genre, case-insensitive' },
        status: { type: 'string', enum: ['to-watch', 'watched'] },
        keyword: { type: 'string', description: 'Substring of title, director, genres or cast' },
      },
    },
  },
  {
    name: 'movie_stats',
    description: 'Watch stats: totals, top directors, genre distribution, rating histogram, decades.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: { type: 'number', description: 'How many top directors', default: 5 },
        bucketWidth: { type: 'number', description: 'Rating histogram bucket width', default: 1 },
      },
    },
  },
  {
    name: 'movie_refresh',
    description: 'Re-fetch TMDB metadata for a logged movie. Personal fields are never touched.',
    inputSchema: { type: 'object' as const, properties: identityProperties, required: ['title', 'year'] },
  },
  {
    name: 'movie_import',
    description: 'Bulk import. Each row: title (may end in "(YYYY)"), optional year, status, rating, dateWatched. Already-logged movies are skipped.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        rows: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              title: { type: 'string' },
              year: { type: 'number' },
              status: { type: 'string', enum: ['to-watch', 'watched'] },
              rating: { type: 'number' },
              dateWatched: { type: 'string' },
            },
            required: ['title'],
          },
        },
      },
      required: ['rows'],
    },
  },
  {
    name: 'movie_reload',
    description: 'Reload the record directory from disk (after editing documents by hand) and report unreadable ones.',
    inputSchema: { type: 'object' as const, properties: {} },
  },
];

// --- Handlers ---

async function logMovie(raw: Record<string, unknown>, deps: ToolDeps): Promise<ToolResponse> {
  const args = logSchema.parse(raw);
  if (!deps.matcher) return fail(NO_API_KEY);

  const matched = await deps.matcher.match(args.title, args.year);
  if (!matched.ok) return failWith(matched.error);

  const dateWatched = args.status === 'watched' ? args.dateWatched ?? isoDate(deps.clock.now()) : args.dateWatched;
  const converted = candidateToRecord(matched.candidate, {
    status: args.status,
    rating: args.rating,
    dateWatched,
    notes: args.notes,
  });
  if (!converted.ok) return failWith(converted.error);

  const { record } = converted;
  if (deps.store.findByIdentity(record.title, record.year).ok) {
    return fail(`"${record.title}" (${record.year}) is already logged. Use movie_update to change it.`);
  }

  const saved = await deps.store.upsert(record);
  if (!saved.ok) return failWith(saved.error);

  const fuzzy = matched.candidate.match === 'fuzzy'
    ? `\n\nClosest match for "${args.title}"${args.year === undefined ? '' : ` (${args.year})`}. If this is the wrong film, movie_delete it and retry with a year.`
    : '';
  return ok(`Logged ${formatRecordLine(saved.record)} → ${saved.file}${fuzzy}\n\n${formatRecordDetail(saved.record)}`);
}

/** Apply personal-field changes; the store's validation reports an inconsistent result */
function applyUpdate(existing: MovieRecord, args: z.infer<typeof updateSchema>, clock: Clock): MovieRecord {
  const base: MovieRecord = args.notes === undefined ? existing : { ...existing, notes: args.notes };
  const status = args.status ?? existing.status;

  if (status === 'to-watch') {
    return {
      ...markToWatch(base),
      ...(args.rating !== undefined && { rating: args.rating }),
      ...(args.dateWatched !== undefined && { dateWatched: args.dateWatched }),
    };
  }

  const rating = args.rating ?? existing.rating;
  const dateWatched = args.dateWatched ?? existing.dateWatched ?? isoDate(clock.now());
  if (rating !== undefined) return markWatched(base, rating, dateWatched);

  // No rating anywhere: left for validation to reject
  const { rating: _rating, ...rest } = base;
  return { ...rest, status: 'watched', dateWatched };
}

async function updateMovie(raw: Record<string, unknown>, deps: ToolDeps): Promise<ToolResponse> {
  const args = updateSchema.parse(raw);
  const found = deps.store.findByIdentity(args.title, args.year);
  if (!found.ok) return failWith(found.error);

  const saved = await deps.store.upsert(applyUpdate(found.record, args, deps.clock));
  if (!saved.ok) return failWith(saved.error);
  return ok(`Updated ${formatRecordLine(saved.record)}`);
}

async function refreshMovie(raw: Record<string, unknown>, deps: ToolDeps): Promise<ToolResponse> {
  const { title, year } = identitySchema.parse(raw);
  if (!deps.matcher) return fail(NO_API_KEY);

  const found = deps.store.findByIdentity(title, year);
  if (!found.ok) return failWith(found.error);

  const matched = await deps.matcher.match(found.record.title, found.record.year);
  if (!matched.ok) return failWith(matched.error);

  const refreshed = refreshRecord(found.record, matched.candidate, {
    preserveLocalEdits: deps.config.preserveLocalEdits,
  });
  const saved = await deps.store.upsert(refreshed);
  if (!saved.ok) return failWith(saved.error);

  const mode = deps.config.preserveLocalEdits ? 'blank fields filled' : 'metadata replaced';
  return ok(`Refreshed ${formatRecordLine(saved.record)} (${mode})\n\n${formatRecordDetail(saved.record, saved.file)}`);
}

async function importMovies(raw: Record<string, unknown>, deps: ToolDeps): Promise<ToolResponse> {
  const args = importSchema.parse(raw);
  if (!deps.matcher) return fail(NO_API_KEY);

  const rows: ImportRow[] = args.rows.map(row => {
    const parsed = parseTitleWithYear(row.title);
    const yearHint = row.year ?? parsed.yearHint;
    return {
      title: parsed.title,
      status: row.status,
      ...(yearHint !== undefined && { yearHint }),
      ...(row.rating !== undefined && { rating: row.rating }),
      ...(row.dateWatched !== undefined && { dateWatched: row.dateWatched }),
    };
  });

  const report = await importRows(rows, {
    matcher: deps.matcher,
    store: deps.store,
    ...(deps.log !== undefined && { log: deps.log }),
  });
  return ok(formatImportReport(report));
}

function listMovies(raw: Record<string, unknown>, deps: ToolDeps): ToolResponse {
  const { view, limit } = listSchema.parse(raw);
  const stats = new StatsEngine(deps.store);

  switch (view) {
    case 'all':
      return ok(formatRecordList('All Movies', deps.store.list(), 'No movies logged yet. Use movie_log to add one.'));
    case 'to-watch':
      return ok(formatRecordList('To Watch', stats.toWatchList(), 'Nothing on the to-watch list.'));
    case 'recent':
      return ok(formatRecordList('Recently Watched', stats.recentlyWatched(limit), 'Nothing watched yet.'));
  }
}

function showStats(raw: Record<string, unknown>, deps: ToolDeps): ToolResponse {
  const { limit, bucketWidth } = statsSchema.parse(raw);
  const stats = new StatsEngine(deps.store);
  return ok(formatStats({
    summary: stats.summary(),
    directors: stats.topDirectors(limit),
    genres: stats.genreDistribution(),
    histogram: stats.ratingHistogram(bucketWidth),
    decades: stats.decadeBreakdown(),
  }));
}

async function dispatch(name: string, args: Record<string, unknown>, deps: ToolDeps): Promise<ToolResponse> {
  switch (name) {
    case 'movie_log':
      return logMovie(args, deps);

    case 'movie_get': {
      const { title, year } = identitySchema.parse(args);
      const found = deps.store.findByIdentity(title, year);
      if (!found.ok) return failWith(found.error);
      return ok(formatRecordDetail(found.record, found.file));
    }

    case 'movie_update':
      return updateMovie(args, deps);

    case 'movie_delete': {
      const { title, year } = identitySchema.parse(args);
      const removed = await deps.store.delete(title, year);
      if (!removed.ok) return failWith(removed.error);
      return ok(`Deleted ${removed.record.title} (${removed.record.year}) and ${removed.file}.`);
    }

    case 'movie_list':
      return listMovies(args, deps);

    case 'movie_search': {
      const filters = searchSchema.parse(args);
      const results = new SearchIndex(deps.store).search(filters);
      return ok(formatRecordList('Search Results', results, 'No movies match.'));
    }

    case 'movie_stats':
      return showStats(args, deps);

    case 'movie_refresh':
      return refreshMovie(args, deps);

    case 'movie_import':
      return importMovies(args, deps);

    case 'movie_reload': {
      const { records, errors } = await deps.store.load();
      const warning = formatLoadErrors(errors);
      const text = `Reloaded ${records.length} movie(s) from ${deps.store.path}.`;
      return ok(warning ? `${text}\n\n${warning}` : text);
    }

    default:
      return fail(`Unknown tool: ${name}`);
  }
}

function describeValidation(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(arguments)'}: ${issue.message}`)
    .join('; ');
}

/** Handle one tool call. Failures come back as isError responses, never as throws. */
export async function handleToolCall(
  name: string,
  rawArgs: Record<string, unknown> | undefined,
  deps: ToolDeps,
): Promise<ToolResponse> {
  const args = normalizeArgs(name, rawArgs);
  try {
    return await dispatch(name, args, deps);
  } catch (error) {
    if (error instanceof z.ZodError) return fail(`Invalid arguments: ${describeValidation(error)}`);
    if (error instanceof ExternalServiceError) return fail(`TMDB lookup failed: ${error.message}`);
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[movielog] Tool ${name} failed: ${message}\n`);
    return fail(`Error: ${message}`);
  }
}
