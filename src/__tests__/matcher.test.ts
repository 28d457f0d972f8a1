import { describe, it } from 'node:test';
import assert from 'node:assert';
import { candidateToRecord, MetadataMatcher, refreshRecord } from '../matcher.js';
import { fakeMetadataService } from '../metadata-service.js';
import { ExternalServiceError } from '../errors.js';
import type { MetadataService } from '../types.js';
import { makeCandidate, makeRecord, makeWatched } from './helpers.js';

describe('MetadataMatcher.match', () => {
  it('prefers the candidate from the hinted year even when it is not first', async () => {
    const service = fakeMetadataService([
      makeCandidate({ externalId: 2, title: 'Parasite', year: 2020 }),
      makeCandidate({ externalId: 1, title: 'Parasite', year: 2019 }),
    ]);
    const result = await new MetadataMatcher(service).match('Parasite', 2019);

    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.candidate.externalId, 1);
    assert.strictEqual(result.candidate.match, 'exact');
    assert.deepStrictEqual(service.calls, [{ query: 'Parasite', year: 2019 }]);
  });

  it('takes the first candidate of the hinted year when several share it', async () => {
    const service = fakeMetadataService([
      makeCandidate({ externalId: 5, year: 1999 }),
      makeCandidate({ externalId: 6, year: 2001 }),
      makeCandidate({ externalId: 7, year: 2001 }),
    ]);
    const result = await new MetadataMatcher(service).match('Test Movie', 2001);
    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.candidate.externalId, 6);
  });

  it('takes the top-ranked candidate without a hint', async () => {
    const service = fakeMetadataService([
      makeCandidate({ externalId: 10, title: 'Heat', year: 1995 }),
      makeCandidate({ externalId: 11, title: 'Heat', year: 1986 }),
    ]);
    const result = await new MetadataMatcher(service).match('heat');
    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.candidate.externalId, 10);
    assert.strictEqual(result.candidate.match, 'exact');
    assert.deepStrictEqual(service.calls, [{ query: 'heat' }]);
  });

  it('falls back to the top candidate, marked fuzzy, when no year matches the hint', async () => {
    const service = fakeMetadataService([makeCandidate({ externalId: 3, title: 'Heat', year: 1995 })]);
    const result = await new MetadataMatcher(service).match('Heat', 2005);
    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.candidate.externalId, 3);
    assert.strictEqual(result.candidate.match, 'fuzzy');
  });

  it('marks a different title as fuzzy', async () => {
    const service = fakeMetadataService([makeCandidate({ title: 'The Godfather Part II', year: 1974 })]);
    const result = await new MetadataMatcher(service).match('godfather 2');
    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.candidate.match, 'fuzzy');
  });

  it('returns no-match when the service finds nothing', async () => {
    const result = await new MetadataMatcher(fakeMetadataService([])).match('Nothing Here', 1999);
    assert.deepStrictEqual(result, { ok: false, error: { kind: 'no-match', query: 'Nothing Here', yearHint: 1999 } });
  });

  it('looks up exactly once per call', async () => {
    const service = fakeMetadataService([makeCandidate({ year: 1990 })]);
    await new MetadataMatcher(service).match('Test Movie', 2000);
    assert.strictEqual(service.calls.length, 1);
  });

  it('propagates external service errors', async () => {
    const failing: MetadataService = {
      searchTitles: async () => { throw new ExternalServiceError('TMDB API error 503: down', 503); },
    };
    await assert.rejects(new MetadataMatcher(failing).match('Heat'), ExternalServiceError);
  });
});

describe('candidateToRecord', () => {
  it('combines metadata with the personal fields', () => {
    const result = candidateToRecord(
      makeCandidate({
        externalId: 496243,
        title: ' Parasite ',
        year: 2019,
        director: 'Bong Joon Ho',
        genres: ['Comedy', 'comedy', 'Thriller'],
        cast: ['Song Kang-ho'],
        countries: ['South Korea'],
        originalLanguage: 'KO',
      }),
      { status: 'watched', rating: 9, dateWatched: '2024-03-01', notes: 'Wow.' },
    );

    assert.deepStrictEqual(result, {
      ok: true,
      record: {
        title: 'Parasite',
        year: 2019,
        director: 'Bong Joon Ho',
        genres: ['Comedy', 'Thriller'],
        runtime: 100,
        cast: ['Song Kang-ho'],
        status: 'watched',
        rating: 9,
        dateWatched: '2024-03-01',
        notes: 'Wow.',
        externalId: 496243,
        countries: ['South Korea'],
        originalLanguage: 'KO',
      },
    });
  });

  it('uses placeholders for a missing director and runtime', () => {
    const result = candidateToRecord(makeCandidate({ director: null, runtime: null }), { status: 'to-watch' });
    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.record.director, 'Unknown');
    assert.strictEqual(result.record.runtime, 0);
    assert.strictEqual(result.record.notes, '');
  });

  it('fails for a candidate without a release year', () => {
    const result = candidateToRecord(makeCandidate({ title: 'Someday', year: null }), { status: 'to-watch' });
    assert.deepStrictEqual(result, {
      ok: false,
      error: { kind: 'invalid-field', field: 'year', message: '"Someday" has no release year' },
    });
  });
});

describe('refreshRecord', () => {
  const candidate = makeCandidate({
    externalId: 42,
    title: 'Heat',
    year: 1995,
    director: 'Michael Mann',
    genres: ['Crime', 'Thriller'],
    runtime: 170,
    cast: ['Al Pacino', 'Robert De Niro'],
    countries: ['United States of America'],
    overview: 'A heist.',
  });

  const existing = makeWatched({
    title: 'Heat',
    year: 1995,
    director: 'M. Mann',
    genres: ['Crime'],
    runtime: 0,
    cast: [],
    rating: 8,
    dateWatched: '2024-02-02',
    notes: 'mine',
    created: '2024-01-01T00:00:00.000Z',
  });

  it('fills only blank metadata when preserving local edits', () => {
    const refreshed = refreshRecord(existing, candidate, { preserveLocalEdits: true });

    assert.strictEqual(refreshed.director, 'M. Mann');
    assert.deepStrictEqual(refreshed.genres, ['Crime']);
    assert.strictEqual(refreshed.runtime, 170);
    assert.deepStrictEqual(refreshed.cast, ['Al Pacino', 'Robert De Niro']);
    assert.strictEqual(refreshed.externalId, 42);
    assert.deepStrictEqual(refreshed.countries, ['United States of America']);
    assert.strictEqual(refreshed.overview, 'A heist.');
  });

  it('replaces metadata when not preserving local edits', () => {
    const refreshed = refreshRecord(existing, candidate, { preserveLocalEdits: false });

    assert.strictEqual(refreshed.director, 'Michael Mann');
    assert.deepStrictEqual(refreshed.genres, ['Crime', 'Thriller']);
    assert.strictEqual(refreshed.runtime, 170);
    assert.deepStrictEqual(refreshed.cast, ['Al Pacino', 'Robert De Niro']);
  });

  it('replaces an Unknown director even when preserving local edits', () => {
    const refreshed = refreshRecord(makeRecord({ director: 'Unknown' }), candidate, { preserveLocalEdits: true });
    assert.strictEqual(refreshed.director, 'Michael Mann');
  });

  for (const preserveLocalEdits of [true, false]) {
    it(`never touches identity or personal fields (preserveLocalEdits: ${preserveLocalEdits})`, () => {
      const refreshed = refreshRecord(existing, makeCandidate({ title: 'HEAT', year: 1996 }), { preserveLocalEdits });
      assert.strictEqual(refreshed.title, 'Heat');
      assert.strictEqual(refreshed.year, 1995);
      assert.strictEqual(refreshed.status, 'watched');
      assert.strictEqual(refreshed.rating, 8);
      assert.strictEqual(refreshed.dateWatched, '2024-02-02');
      assert.strictEqual(refreshed.notes, 'mine');
      assert.strictEqual(refreshed.created, '2024-01-01T00:00:00.000Z');
    });
  }

  it('keeps existing metadata when the candidate has none', () => {
    const bare = makeCandidate({ director: null, genres: [], runtime: null, cast: [] });
    const refreshed = refreshRecord(existing, bare, { preserveLocalEdits: false });
    assert.strictEqual(refreshed.director, 'M. Mann');
    assert.deepStrictEqual(refreshed.genres, ['Crime']);
  });
});
