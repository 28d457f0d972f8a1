// Response formatters for MCP tool handlers.
//
// Pure functions — no side effects, no state. Each takes structured data
// and returns a formatted string for the tool response.

import type { MovieRecord } from './types.js';
import type { MovieError } from './errors.js';
import { describeError } from './errors.js';
import type { DecadeCount, DirectorCount, GenreCount, RatingBucket, WatchSummary } from './stats.js';
import type { ImportReport } from './importer.js';

/** One-line summary: `Parasite (2019) — Bong Joon Ho — watched, 9/10 on 2024-03-01` */
export function formatRecordLine(record: MovieRecord): string {
  const status = record.status === 'watched'
    ? `watched, ${record.rating ?? '?'}/10 on ${record.dateWatched ?? '?'}`
    : 'to-watch';
  return `${record.title} (${record.year}) — ${record.director} — ${status}`;
}

/** Full record view for movie_get / movie_log responses */
export function formatRecordDetail(record: MovieRecord, file?: string): string {
  const lines = [`## ${record.title} (${record.year})`, ''];
  lines.push(`**Director:** ${record.director}`);
  if (record.runtime > 0) lines.push(`**Runtime:** ${record.runtime} min`);
  lines.push(`**Genres:** ${record.genres.length > 0 ? record.genres.join(', ') : '(none)'}`);
  if (record.cast.length > 0) lines.push(`**Cast:** ${record.cast.join(', ')}`);
  if (record.countries && record.countries.length > 0) lines.push(`**Countries:** ${record.countries.join(', ')}`);
  if (record.originalLanguage) lines.push(`**Language:** ${record.originalLanguage}`);
  lines.push(`**Status:** ${record.status}`);
  if (record.rating !== undefined) lines.push(`**Rating:** ${record.rating}/10`);
  if (record.dateWatched) lines.push(`**Watched:** ${record.dateWatched}`);
  if (record.externalId !== undefined) lines.push(`**TMDB id:** ${record.externalId}`);
  if (file) lines.push(`**File:** ${file}`);
  if (record.overview) lines.push('', record.overview);
  if (record.notes.length > 0) lines.push('', '### Notes', '', record.notes);
  return lines.join('\n');
}

/** A numbered list of records under a heading, or a placeholder when empty */
export function formatRecordList(heading: string, records: readonly MovieRecord[], empty: string): string {
  if (records.length === 0) return `## ${heading}\n\n${empty}`;
  const lines = records.map((r, i) => `${i + 1}. ${formatRecordLine(r)}`);
  return [`## ${heading} (${records.length})`, '', ...lines].join('\n');
}

/** Format load errors as a warning block, empty string when there are none */
export function formatLoadErrors(errors: readonly MovieError[]): string {
  if (errors.length === 0) return '';
  return [
    `⚠ ${errors.length} document${errors.length === 1 ? '' : 's'} could not be loaded:`,
    ...errors.map(e => `  - ${describeError(e)}`),
  ].join('\n');
}

function formatHistogram(buckets: readonly RatingBucket[]): string[] {
  if (buckets.length === 0) return ['  (no rated movies)'];
  return buckets.map(b => `  - [${b.start}, ${b.end}): ${b.count}`);
}

export interface StatsView {
  readonly summary: WatchSummary;
  readonly directors: readonly DirectorCount[];
  readonly genres: readonly GenreCount[];
  readonly histogram: readonly RatingBucket[];
  readonly decades: readonly DecadeCount[];
}

/** Format the stats dashboard */
export function formatStats(view: StatsView): string {
  const { summary } = view;
  const average = summary.averageRating === null ? 'n/a' : summary.averageRating.toFixed(2);

  return [
    '## Movie Stats',
    '',
    `**Watched:** ${summary.watched}`,
    `**To watch:** ${summary.toWatch}`,
    `**Hours watched:** ${summary.totalHours.toFixed(1)}`,
    `**Average rating:** ${average}`,
    '',
    '### Top Directors',
    ...(view.directors.length > 0
      ? view.directors.map(d => `  - ${d.director}: ${d.count}`)
      : ['  (none)']),
    '',
    '### Genres',
    ...(view.genres.length > 0
      ? view.genres.map(g => `  - ${g.genre}: ${g.count}`)
      : ['  (none)']),
    '',
    '### Ratings',
    ...formatHistogram(view.histogram),
    '',
    '### Decades',
    ...(view.decades.length > 0
      ? view.decades.map(d => `  - ${d.decade}s: ${d.count}`)
      : ['  (none)']),
  ].join('\n');
}

/** Format a bulk import report */
export function formatImportReport(report: ImportReport): string {
  const lines = [
    `## Import: ${report.created} created, ${report.skipped} skipped, ${report.failed} failed`,
    '',
  ];
  for (const outcome of report.outcomes) {
    const label = outcome.row.yearHint === undefined
      ? `"${outcome.row.title}"`
      : `"${outcome.row.title}" (${outcome.row.yearHint})`;
    switch (outcome.status) {
      case 'created':
        lines.push(`  ✓ ${label} → ${outcome.title} (${outcome.year}) [${outcome.file}]`);
        break;
      case 'skipped':
        lines.push(`  - ${label}: skipped — ${outcome.reason}`);
        break;
      case 'failed':
        lines.push(`  ✗ ${label}: ${outcome.error}`);
        break;
    }
  }
  return lines.join('\n');
}
