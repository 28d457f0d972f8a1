// Document codec: one MovieRecord <-> one Markdown document.
//
// Format: a front-matter block of `key: value` lines fenced by `---`, then the
// free-text notes. Strings are double-quoted with backslash escapes and lists
// are flow sequences, so the header is also valid YAML for dashboard tooling
// that queries the directory.
//
//   ---
//   title: "Parasite"
//   year: 2019
//   genres: ["Comedy", "Thriller"]
//   status: "watched"
//   rating: 9
//   date_watched: 2024-03-01
//   ---
//
//   notes...

import type { Clock, MovieRecord, WatchStatus } from './types.js';
import { parseWatchStatus, realClock, UNKNOWN_DIRECTOR } from './types.js';
import type { MovieError } from './errors.js';
import { parseError } from './errors.js';
import { validateRecord } from './validation.js';

export type DecodeResult =
  | { readonly ok: true; readonly record: MovieRecord }
  | { readonly ok: false; readonly error: MovieError };

const FENCE = '---';

const ESCAPES: Record<string, string> = { '"': '\\"', '\\': '\\\\', '\n': '\\n', '\r': '\\r', '\t': '\\t' };
const UNESCAPES: Record<string, string> = { '"': '"', '\\': '\\', n: '\n', r: '\r', t: '\t' };

/** Quote a string value, escaping the reserved characters */
export function quote(value: string): string {
  return `"${value.replace(/["\\\n\r\t]/g, c => ESCAPES[c] ?? c)}"`;
}

function quoteList(values: readonly string[]): string {
  return `[${values.map(quote).join(', ')}]`;
}

/** Serialize a record. Optional fields are omitted when absent. */
export function encodeRecord(record: MovieRecord): string {
  const lines = [
    `title: ${quote(record.title)}`,
    `year: ${record.year}`,
    `director: ${quote(record.director)}`,
    `runtime: ${record.runtime}`,
    `genres: ${quoteList(record.genres)}`,
    `cast: ${quoteList(record.cast)}`,
    `status: ${quote(record.status)}`,
  ];
  if (record.rating !== undefined) lines.push(`rating: ${record.rating}`);
  if (record.dateWatched !== undefined) lines.push(`date_watched: ${record.dateWatched}`);
  if (record.externalId !== undefined) lines.push(`external_id: ${record.externalId}`);
  if (record.originalLanguage !== undefined) lines.push(`original_language: ${quote(record.originalLanguage)}`);
  if (record.countries !== undefined) lines.push(`countries: ${quoteList(record.countries)}`);
  if (record.releaseDate !== undefined) lines.push(`release_date: ${quote(record.releaseDate)}`);
  if (record.posterUrl !== undefined) lines.push(`poster_url: ${quote(record.posterUrl)}`);
  if (record.overview !== undefined) lines.push(`overview: ${quote(record.overview)}`);
  if (record.created !== undefined) lines.push(`created: ${quote(record.created)}`);

  const body = record.notes.length > 0 ? `\n${record.notes}\n` : '';
  return `${FENCE}\n${lines.join('\n')}\n${FENCE}\n${body}`;
}

// --- Decoding ---

/** Raised inside the decoder only; decodeRecord turns it into a parse-error result */
class DecodeFailure extends Error {}

/** Read a double-quoted string starting at `start`. Returns the value and the index after the closing quote. */
function readQuoted(text: string, start: number): { value: string; end: number } {
  let value = '';
  let i = start + 1;
  while (i < text.length) {
    const c = text[i];
    if (c === '\\') {
      const next = text[i + 1];
      const unescaped = next === undefined ? undefined : UNESCAPES[next];
      if (unescaped === undefined) {
        throw new DecodeFailure(`malformed escape sequence "\\${next ?? ''}"`);
      }
      value += unescaped;
      i += 2;
    } else if (c === '"') {
      return { value, end: i + 1 };
    } else {
      value += c;
      i++;
    }
  }
  throw new DecodeFailure('unterminated string');
}

/** Decode a scalar string: quoted with escapes, or bare */
function decodeString(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith('"')) return text;
  const { value, end } = readQuoted(text, 0);
  if (text.slice(end).trim().length > 0) {
    throw new DecodeFailure(`unexpected text after closing quote: ${text.slice(end).trim()}`);
  }
  return value;
}

/** Decode a flow sequence: ["a", "b"] (bare items allowed) */
function decodeFlowList(raw: string): string[] {
  const text = raw.trim();
  const items: string[] = [];
  let i = 1;
  const skipSpace = () => { while (i < text.length && /\s/.test(text[i] ?? '')) i++; };

  skipSpace();
  if (text[i] === ']') {
    i++;
  } else {
    for (;;) {
      skipSpace();
      if (text[i] === '"') {
        const { value, end } = readQuoted(text, i);
        items.push(value);
        i = end;
      } else {
        const start = i;
        while (i < text.length && text[i] !== ',' && text[i] !== ']') i++;
        const bare = text.slice(start, i).trim();
        if (bare.length === 0) throw new DecodeFailure('empty list item');
        items.push(bare);
      }
      skipSpace();
      if (text[i] === ',') { i++; continue; }
      if (text[i] === ']') { i++; break; }
      throw new DecodeFailure(i >= text.length ? 'unterminated list' : `unexpected "${text[i]}" in list`);
    }
  }

  if (text.slice(i).trim().length > 0) {
    throw new DecodeFailure(`unexpected text after list: ${text.slice(i).trim()}`);
  }
  return items;
}

interface RawField {
  readonly value: string;
  readonly items: string[];    // block-sequence lines (`  - item`) under an empty value
}

/** Typed access to the parsed header, raising DecodeFailure on malformed values */
class Header {
  constructor(private readonly fields: ReadonlyMap<string, RawField>) {}

  private present(key: string): RawField | undefined {
    const field = this.fields.get(key);
    if (!field) return undefined;
    if (field.value.trim().length === 0 && field.items.length === 0) return undefined;
    return field;
  }

  string(key: string): string | undefined {
    const field = this.present(key);
    if (!field) return undefined;
    if (field.items.length > 0) throw new DecodeFailure(`${key}: expected a value, got a list`);
    return decodeString(field.value);
  }

  requiredString(key: string): string {
    const value = this.string(key);
    if (value === undefined || value.length === 0) throw new DecodeFailure(`missing required field "${key}"`);
    return value;
  }

  number(key: string, integer: boolean): number | undefined {
    const text = this.string(key);
    if (text === undefined) return undefined;
    const pattern = integer ? /^-?\d+$/ : /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;
    if (!pattern.test(text)) {
      throw new DecodeFailure(`${key}: expected ${integer ? 'an integer' : 'a number'}, got "${text}"`);
    }
    return Number(text);
  }

  list(key: string): string[] | undefined {
    const field = this.present(key);
    if (!field) return undefined;
    // Block sequences come from hand-written headers; a bare `-` is an empty list slot
    if (field.items.length > 0) return field.items.map(decodeString).filter(item => item.length > 0);
    if (!field.value.trim().startsWith('[')) throw new DecodeFailure(`${key}: expected a list`);
    return decodeFlowList(field.value);
  }
}

/** Split a document into header fields and the notes body */
function splitDocument(text: string): { fields: Map<string, RawField>; body: string } {
  const lines = text.split('\n');
  if (lines[0]?.trimEnd() !== FENCE) throw new DecodeFailure('missing front-matter block');

  const end = lines.findIndex((line, i) => i > 0 && line.trimEnd() === FENCE);
  if (end === -1) throw new DecodeFailure('unterminated front-matter block');

  const fields = new Map<string, RawField>();
  let lastKey: string | undefined;

  for (let i = 1; i < end; i++) {
    const line = (lines[i] ?? '').replace(/\r$/, '');
    if (line.trim().length === 0 || line.trimStart().startsWith('#')) continue;

    const item = /^\s+-(?:\s+(.*))?$/.exec(line);
    if (item) {
      const owner = lastKey === undefined ? undefined : fields.get(lastKey);
      if (!owner || owner.value.trim().length > 0) {
        throw new DecodeFailure(`line ${i + 1}: list item without a list key`);
      }
      owner.items.push(item[1] ?? '');
      continue;
    }

    const pair = /^([A-Za-z_][A-Za-z0-9_]*):(.*)$/.exec(line);
    if (!pair) throw new DecodeFailure(`line ${i + 1}: expected "key: value", got "${line}"`);
    const [, key = '', value = ''] = pair;
    if (fields.has(key)) throw new DecodeFailure(`duplicate field "${key}"`);
    fields.set(key, { value, items: [] });
    lastKey = key;
  }

  let body = lines.slice(end + 1).join('\n');
  if (body.startsWith('\n')) body = body.slice(1);
  if (body.endsWith('\n')) body = body.slice(0, -1);
  return { fields, body };
}

function readStatus(header: Header): WatchStatus {
  const raw = header.requiredString('status');
  const status = parseWatchStatus(raw);
  if (!status) throw new DecodeFailure(`unknown status "${raw}" (expected "to-watch" or "watched")`);
  return status;
}

/** Parse a document into a validated record */
export function decodeRecord(text: string, clock: Clock = realClock): DecodeResult {
  let record: MovieRecord;
  try {
    const { fields, body } = splitDocument(text);
    const header = new Header(fields);

    const title = header.requiredString('title');
    const year = header.number('year', true);
    if (year === undefined) throw new DecodeFailure('missing required field "year"');
    const status = readStatus(header);

    const rating = header.number('rating', false);
    const dateWatched = header.string('date_watched');
    const externalId = header.number('external_id', true);
    const originalLanguage = header.string('original_language');
    const countries = header.list('countries');
    const releaseDate = header.string('release_date');
    const posterUrl = header.string('poster_url');
    const overview = header.string('overview');
    const created = header.string('created');

    record = {
      title,
      year,
      director: header.string('director') || UNKNOWN_DIRECTOR,
      genres: header.list('genres') ?? [],
      runtime: header.number('runtime', true) ?? 0,
      cast: header.list('cast') ?? header.list('actors') ?? [],
      status,
      ...(rating !== undefined && { rating }),
      ...(dateWatched !== undefined && { dateWatched }),
      notes: body,
      ...(externalId !== undefined && { externalId }),
      ...(originalLanguage !== undefined && { originalLanguage }),
      ...(countries !== undefined && { countries }),
      ...(releaseDate !== undefined && { releaseDate }),
      ...(posterUrl !== undefined && { posterUrl }),
      ...(overview !== undefined && { overview }),
      ...(created !== undefined && { created }),
    };
  } catch (error) {
    if (error instanceof DecodeFailure) return { ok: false, error: parseError(error.message) };
    throw error;
  }

  const problem = validateRecord(record, clock);
  if (problem) {
    return {
      ok: false,
      error: problem.kind === 'invalid-field' ? parseError(`${problem.field}: ${problem.message}`) : problem,
    };
  }
  return { ok: true, record };
}
