// Bulk import: feed (title, year hint, status) rows through the matcher into the store.
// One bad row never aborts the batch; every row gets an outcome.

import type { WatchStatus } from './types.js';
import { describeError, ExternalServiceError } from './errors.js';
import type { MetadataMatcher } from './matcher.js';
import { candidateToRecord } from './matcher.js';
import type { MarkdownRecordStore } from './store.js';

export interface ImportRow {
  readonly title: string;
  readonly yearHint?: number;
  readonly status: WatchStatus;
  // A watched row needs both, since every watched record carries a rating and a date
  readonly rating?: number;
  readonly dateWatched?: string;
}

export type ImportOutcome =
  | { readonly row: ImportRow; readonly status: 'created'; readonly title: string; readonly year: number; readonly file: string }
  | { readonly row: ImportRow; readonly status: 'skipped'; readonly reason: string }
  | { readonly row: ImportRow; readonly status: 'failed'; readonly error: string };

export interface ImportReport {
  readonly outcomes: readonly ImportOutcome[];
  readonly created: number;
  readonly skipped: number;
  readonly failed: number;
}

export interface ImportDeps {
  readonly matcher: MetadataMatcher;
  readonly store: MarkdownRecordStore;
  /** Progress sink; defaults to stderr */
  readonly log?: (line: string) => void;
}

const YEAR_SUFFIX = /\((\d{4})\)\s*$/;

/** Split a trailing "(YYYY)" off a title: "Parasite (2019)" -> { title: "Parasite", yearHint: 2019 } */
export function parseTitleWithYear(raw: string): { title: string; yearHint?: number } {
  const text = raw.trim();
  const m = YEAR_SUFFIX.exec(text);
  if (!m || m.index === 0) return { title: text };
  return { title: text.slice(0, m.index).trim(), yearHint: Number(m[1]) };
}

async function importRow(row: ImportRow, deps: ImportDeps): Promise<ImportOutcome> {
  const title = row.title.trim();
  if (title.length === 0) return { row, status: 'skipped', reason: 'no title' };

  const matched = await deps.matcher.match(title, row.yearHint);
  if (!matched.ok) return { row, status: 'failed', error: describeError(matched.error) };

  const converted = candidateToRecord(matched.candidate, {
    status: row.status,
    rating: row.rating,
    dateWatched: row.dateWatched,
  });
  if (!converted.ok) return { row, status: 'failed', error: describeError(converted.error) };

  const { record } = converted;
  if (deps.store.findByIdentity(record.title, record.year).ok) {
    return { row, status: 'skipped', reason: `"${record.title}" (${record.year}) is already logged` };
  }

  const saved = await deps.store.upsert(record);
  if (!saved.ok) return { row, status: 'failed', error: describeError(saved.error) };
  return { row, status: 'created', title: saved.record.title, year: saved.record.year, file: saved.file };
}

/** Import rows in order. Service errors fail only their row and are reported in the outcome. */
export async function importRows(rows: readonly ImportRow[], deps: ImportDeps): Promise<ImportReport> {
  const log = deps.log ?? ((line: string) => { process.stderr.write(`[movielog] ${line}\n`); });
  const outcomes: ImportOutcome[] = [];

  for (const [index, row] of rows.entries()) {
    let outcome: ImportOutcome;
    try {
      outcome = await importRow(row, deps);
    } catch (error: unknown) {
      if (!(error instanceof ExternalServiceError)) throw error;
      outcome = { row, status: 'failed', error: error.message };
    }
    outcomes.push(outcome);

    const label = `row ${index + 1} "${row.title}"`;
    if (outcome.status === 'created') log(`Import ${label}: created ${outcome.file}`);
    else if (outcome.status === 'skipped') log(`Import ${label}: skipped — ${outcome.reason}`);
    else log(`Import ${label}: failed — ${outcome.error}`);
  }

  return {
    outcomes,
    created: outcomes.filter(o => o.status === 'created').length,
    skipped: outcomes.filter(o => o.status === 'skipped').length,
    failed: outcomes.filter(o => o.status === 'failed').length,
  };
}
