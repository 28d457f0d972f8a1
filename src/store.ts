// Markdown-backed record store — one document per movie
// Sole writer of the record directory; every mutation is written through
// before the in-memory snapshot changes.

import { promises as fs } from 'fs';
import path from 'path';
import type { Clock, MovieRecord, RecordSource } from './types.js';
import { realClock } from './types.js';
import type { MovieError } from './errors.js';
import { inFile, parseError } from './errors.js';
import { decodeRecord, encodeRecord } from './codec.js';
import { validateRecord } from './validation.js';
import { compareText, identityKey, recordFileName, recordKey } from './records.js';

export interface StoreConfig {
  readonly moviesPath: string;
  readonly clock?: Clock;
}

/** Result of a directory load — partial failure: good documents load, bad ones are reported */
export interface LoadResult {
  readonly records: readonly MovieRecord[];
  readonly errors: readonly MovieError[];
}

export type UpsertResult =
  | { readonly ok: true; readonly action: 'created' | 'updated'; readonly record: MovieRecord; readonly file: string }
  | { readonly ok: false; readonly error: MovieError };

export type DeleteResult =
  | { readonly ok: true; readonly record: MovieRecord; readonly file: string }
  | { readonly ok: false; readonly error: MovieError };

export type FindResult =
  | { readonly ok: true; readonly record: MovieRecord; readonly file: string }
  | { readonly ok: false; readonly error: MovieError };

/** A loaded record and the document that backs it (file name within the directory) */
interface StoredRecord {
  readonly record: MovieRecord;
  readonly file: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class MarkdownRecordStore implements RecordSource {
  private readonly moviesPath: string;
  private readonly clock: Clock;
  // Map iteration order is the collection order: creation order, stable across runs
  private records: Map<string, StoredRecord> = new Map();
  private loadErrors: readonly MovieError[] = [];
  // Latest creation time handed out or loaded, in ms; new records are stamped strictly after it
  private lastCreatedMs = Number.NEGATIVE_INFINITY;

  constructor(config: StoreConfig) {
    this.moviesPath = config.moviesPath;
    this.clock = config.clock ?? realClock;
  }

  get path(): string {
    return this.moviesPath;
  }

  /** Initialize the store: create the record directory and load existing documents */
  async init(): Promise<LoadResult> {
    await fs.mkdir(this.moviesPath, { recursive: true });
    return this.load();
  }

  /** Load every .md document in the directory, replacing the in-memory snapshot.
   *  Malformed documents and duplicate identities are reported, never fatal. */
  async load(): Promise<LoadResult> {
    const errors: MovieError[] = [];
    const loaded: StoredRecord[] = [];

    for (const file of await this.listDocuments()) {
      let text: string;
      try {
        text = await fs.readFile(path.join(this.moviesPath, file), 'utf-8');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        errors.push(parseError(`could not read document: ${message}`, file));
        continue;
      }
      const decoded = decodeRecord(text, this.clock);
      if (decoded.ok) {
        loaded.push({ record: decoded.record, file });
      } else {
        errors.push(inFile(decoded.error, file));
      }
    }

    // Creation order: dated records first by timestamp, undated ones after, file name breaks ties
    loaded.sort((a, b) => {
      const ca = a.record.created;
      const cb = b.record.created;
      if (ca !== undefined && cb !== undefined && ca !== cb) return compareText(ca, cb);
      if (ca !== undefined && cb === undefined) return -1;
      if (ca === undefined && cb !== undefined) return 1;
      return compareText(a.file, b.file);
    });

    const records = new Map<string, StoredRecord>();
    for (const stored of loaded) {
      const key = recordKey(stored.record);
      const first = records.get(key);
      if (first) {
        errors.push(parseError(
          `duplicate identity "${stored.record.title}" (${stored.record.year}), already loaded from ${first.file}`,
          stored.file,
        ));
        continue;
      }
      records.set(key, stored);
    }

    this.records = records;
    this.loadErrors = errors;
    this.lastCreatedMs = Number.NEGATIVE_INFINITY;
    for (const stored of records.values()) this.noteCreated(stored.record.created);
    return { records: this.list(), errors };
  }

  /** Errors reported by the most recent load */
  lastLoadErrors(): readonly MovieError[] {
    return this.loadErrors;
  }

  /** All records in creation order */
  list(): readonly MovieRecord[] {
    return Array.from(this.records.values(), s => s.record);
  }

  get size(): number {
    return this.records.size;
  }

  findByIdentity(title: string, year: number): FindResult {
    const stored = this.records.get(identityKey(title, year));
    if (!stored) return { ok: false, error: { kind: 'not-found', title, year } };
    return { ok: true, record: stored.record, file: stored.file };
  }

  /** Create or replace the record with the same identity.
   *  A replacement keeps its document, its position, its stored title and its creation timestamp. */
  async upsert(record: MovieRecord): Promise<UpsertResult> {
    const problem = validateRecord(record, this.clock);
    if (problem) return { ok: false, error: problem };

    const key = recordKey(record);
    const existing = this.records.get(key);

    if (existing) {
      const { created: _ignored, ...fields } = record;
      const kept: MovieRecord = { ...fields, title: existing.record.title };
      const updated: MovieRecord = existing.record.created === undefined
        ? kept
        : { ...kept, created: existing.record.created };
      await this.persist(existing.file, updated);
      this.records.set(key, { record: updated, file: existing.file });
      return { ok: true, action: 'updated', record: updated, file: existing.file };
    }

    const created: MovieRecord = { ...record, created: record.created ?? this.nextCreated() };
    this.noteCreated(created.created);
    const file = await this.allocateFileName(created);
    await this.persist(file, created);
    this.records.set(key, { record: created, file });
    return { ok: true, action: 'created', record: created, file };
  }

  /** Remove a record and its document */
  async delete(title: string, year: number): Promise<DeleteResult> {
    const key = identityKey(title, year);
    const stored = this.records.get(key);
    if (!stored) return { ok: false, error: { kind: 'not-found', title, year } };

    try {
      await fs.unlink(path.join(this.moviesPath, stored.file));
    } catch (error: unknown) {
      if (!isMissingFile(error)) throw error;
    }
    this.records.delete(key);
    return { ok: true, record: stored.record, file: stored.file };
  }

  // --- Private helpers ---

  /** Clock time, bumped past the last stamp so creation order survives a reload */
  private nextCreated(): string {
    const now = Date.parse(this.clock.isoNow());
    const ms = now > this.lastCreatedMs ? now : this.lastCreatedMs + 1;
    return new Date(ms).toISOString();
  }

  private noteCreated(created: string | undefined): void {
    if (created === undefined) return;
    const ms = Date.parse(created);
    if (!Number.isNaN(ms) && ms > this.lastCreatedMs) this.lastCreatedMs = ms;
  }

  /** Document file names in the directory, sorted. A missing directory is an empty collection. */
  private async listDocuments(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.moviesPath, { withFileTypes: true });
      return entries
        .filter(e => e.isFile() && e.name.endsWith('.md'))
        .map(e => e.name)
        .sort(compareText);
    } catch (error: unknown) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  /** Pick a file name not used by a loaded record nor by any document on disk
   *  (a malformed document still owns its name). */
  private async allocateFileName(record: MovieRecord): Promise<string> {
    const taken = new Set(Array.from(this.records.values(), s => s.file));
    for (let suffix = 1; ; suffix++) {
      const name = recordFileName(record.title, record.year, suffix === 1 ? undefined : suffix);
      if (taken.has(name)) continue;
      try {
        await fs.access(path.join(this.moviesPath, name));
      } catch (error: unknown) {
        if (isMissingFile(error)) return name;
        throw error;
      }
    }
  }

  /** Write one whole document */
  private async persist(file: string, record: MovieRecord): Promise<void> {
    await fs.mkdir(this.moviesPath, { recursive: true });
    await fs.writeFile(path.join(this.moviesPath, file), encodeRecord(record), 'utf-8');
  }
}
