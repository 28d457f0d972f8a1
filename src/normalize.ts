// Argument normalization for MCP tool calls.
//
// Agents frequently guess wrong param names and formats. This module resolves
// common aliases and coerces loose values before Zod validation.
// Pure functions — no side effects, no state.

/** Canonical param name aliases — maps guessed names to their correct form */
const PARAM_ALIASES: Record<string, string> = {
  name: 'title',
  movie: 'title',
  film: 'title',
  release_year: 'year',
  yearHint: 'year',
  year_hint: 'year',
  score: 'rating',
  stars: 'rating',
  date_watched: 'dateWatched',
  watched_on: 'dateWatched',
  date: 'dateWatched',
  note: 'notes',
  comment: 'notes',
  review: 'notes',
  actors: 'actor',
  cast: 'actor',
  star: 'actor',
  directed_by: 'director',
  bucket_width: 'bucketWidth',
  bucket: 'bucketWidth',
  top: 'limit',
  n: 'limit',
  count: 'limit',
};

/** Per-tool aliases that only make sense for one tool */
const TOOL_ALIASES: Record<string, Record<string, string>> = {
  movie_search: { query: 'keyword', q: 'keyword', text: 'keyword', search: 'keyword' },
  movie_log: { query: 'title', search: 'title' },
  movie_import: { movies: 'rows', items: 'rows', entries: 'rows' },
};

/** Loose status spellings — the CLI of old accepted "w" and "tw" */
const STATUS_ALIASES: Record<string, string> = {
  w: 'watched',
  watched: 'watched',
  seen: 'watched',
  done: 'watched',
  tw: 'to-watch',
  'to-watch': 'to-watch',
  'to watch': 'to-watch',
  towatch: 'to-watch',
  to_watch: 'to-watch',
  watchlist: 'to-watch',
  want: 'to-watch',
  planned: 'to-watch',
};

const NUMERIC_KEYS = ['year', 'rating', 'limit', 'bucketWidth'];

/** Normalize a status value, leaving unknown spellings for Zod to reject */
export function normalizeStatus(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  return STATUS_ALIASES[raw.trim().toLowerCase()] ?? raw;
}

function coerceNumber(raw: unknown): unknown {
  if (typeof raw !== 'string' || raw.trim() === '') return raw;
  const n = Number(raw.trim());
  return isNaN(n) ? raw : n;
}

function resolveAliases(args: Record<string, unknown>, aliases: Record<string, string>): void {
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (alias in args && !(canonical in args)) {
      args[canonical] = args[alias];
      delete args[alias];
    }
  }
}

/** Normalize one flat argument object (a tool call, or one import row) */
function normalizeFields(raw: Record<string, unknown>, extraAliases: Record<string, string> = {}): Record<string, unknown> {
  const args: Record<string, unknown> = { ...raw };

  // 1. Tool-specific aliases first, so they win over the generic ones
  resolveAliases(args, extraAliases);
  resolveAliases(args, PARAM_ALIASES);

  // 2. Status spellings
  if ('status' in args) args['status'] = normalizeStatus(args['status']);

  // 3. Numbers passed as strings
  for (const key of NUMERIC_KEYS) {
    if (key in args) args[key] = coerceNumber(args[key]);
  }

  return args;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Normalize args before Zod validation: resolve aliases, fix status spellings, coerce numbers */
export function normalizeArgs(toolName: string, raw: Record<string, unknown> | undefined): Record<string, unknown> {
  const args = normalizeFields(raw ?? {}, TOOL_ALIASES[toolName]);

  // Import rows get the same treatment, row by row
  if (toolName === 'movie_import' && Array.isArray(args['rows'])) {
    args['rows'] = args['rows'].map((row: unknown) => isPlainObject(row) ? normalizeFields(row) : row);
  }

  return args;
}
