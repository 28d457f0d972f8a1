// Record validation shared by the codec (on decode) and the store (on upsert).

import type { Clock, MovieRecord } from './types.js';
import type { MovieError } from './errors.js';
import { invalidField, invariantViolation } from './errors.js';

/** Earliest year a film can carry (Roundhay Garden Scene) */
export const MIN_YEAR = 1888;
/** How far past the current year an announced film may be dated */
export const MAX_YEARS_AHEAD = 5;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True when `raw` is a real calendar date written as YYYY-MM-DD */
export function isCalendarDate(raw: string): boolean {
  const m = DATE_PATTERN.exec(raw);
  if (!m) return false;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/** rating and dateWatched are present if and only if the movie was watched */
export function checkStatusInvariant(record: MovieRecord): MovieError | null {
  const hasRating = record.rating !== undefined;
  const hasDate = record.dateWatched !== undefined;

  if (record.status === 'watched') {
    if (!hasRating && !hasDate) return invariantViolation('watched movie needs rating and date_watched');
    if (!hasRating) return invariantViolation('watched movie needs a rating');
    if (!hasDate) return invariantViolation('watched movie needs a date_watched');
    return null;
  }
  if (hasRating && hasDate) return invariantViolation('to-watch movie cannot have rating or date_watched');
  if (hasRating) return invariantViolation('to-watch movie cannot have a rating');
  if (hasDate) return invariantViolation('to-watch movie cannot have a date_watched');
  return null;
}

/** Validate every field and the status invariant. Returns the first problem, or null. */
export function validateRecord(record: MovieRecord, clock: Clock): MovieError | null {
  const invariant = checkStatusInvariant(record);
  if (invariant) return invariant;

  if (record.title.trim().length === 0) return invalidField('title', 'must not be empty');

  const maxYear = clock.now().getUTCFullYear() + MAX_YEARS_AHEAD;
  if (!Number.isInteger(record.year) || record.year < MIN_YEAR || record.year > maxYear) {
    return invalidField('year', `must be an integer between ${MIN_YEAR} and ${maxYear}, got ${record.year}`);
  }

  if (record.director.trim().length === 0) return invalidField('director', 'must not be empty');

  if (!Number.isInteger(record.runtime) || record.runtime < 0) {
    return invalidField('runtime', `must be a non-negative integer, got ${record.runtime}`);
  }

  const seen = new Set<string>();
  for (const genre of record.genres) {
    const key = genre.toLowerCase();
    if (genre.trim().length === 0) return invalidField('genres', 'must not contain empty entries');
    if (seen.has(key)) return invalidField('genres', `duplicate genre "${genre}"`);
    seen.add(key);
  }

  if (record.rating !== undefined && (!Number.isFinite(record.rating) || record.rating < 0 || record.rating > 10)) {
    return invalidField('rating', `must be between 0 and 10, got ${record.rating}`);
  }

  if (record.dateWatched !== undefined && !isCalendarDate(record.dateWatched)) {
    return invalidField('date_watched', `must be a YYYY-MM-DD date, got "${record.dateWatched}"`);
  }

  if (record.externalId !== undefined && (!Number.isInteger(record.externalId) || record.externalId <= 0)) {
    return invalidField('external_id', `must be a positive integer, got ${record.externalId}`);
  }

  return null;
}
