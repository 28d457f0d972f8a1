import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  decadeBreakdown, genreDistribution, ratingHistogram, recentlyWatched, StatsEngine, topDirectors, toWatchList,
  watchSummary,
} from '../stats.js';
import type { MovieRecord } from '../types.js';
import { makeRecord, makeWatched } from './helpers.js';

describe('topDirectors', () => {
  const records: MovieRecord[] = [
    makeWatched({ title: 'B1', director: 'B' }),
    makeWatched({ title: 'A1', director: 'A' }),
    makeWatched({ title: 'B2', director: 'B' }),
    makeWatched({ title: 'A2', director: 'A' }),
    ...[1, 2, 3, 4, 5].map(i => makeWatched({ title: `U${i}`, director: 'Unknown' })),
    makeRecord({ title: 'C1', director: 'C' }),
  ];

  it('excludes Unknown and breaks count ties by name', () => {
    assert.deepStrictEqual(topDirectors(records, 1), [{ director: 'A', count: 2 }]);
    assert.deepStrictEqual(topDirectors(records, 5), [{ director: 'A', count: 2 }, { director: 'B', count: 2 }]);
  });

  it('counts watched records only', () => {
    assert.ok(!topDirectors(records, 10).some(d => d.director === 'C'));
  });

  it('returns nothing for n = 0', () => {
    assert.deepStrictEqual(topDirectors(records, 0), []);
  });
});

describe('genreDistribution', () => {
  it('counts each genre of a record once', () => {
    const records = [
      makeWatched({ title: 'One', genres: ['Drama'] }),
      makeWatched({ title: 'Two', genres: ['Drama', 'Comedy'] }),
      makeWatched({ title: 'Three', genres: ['Comedy'] }),
      makeRecord({ title: 'Four', genres: ['Horror'] }),
    ];
    assert.deepStrictEqual(genreDistribution(records), [
      { genre: 'Comedy', count: 2 },
      { genre: 'Drama', count: 2 },
    ]);
  });
});

describe('ratingHistogram', () => {
  const records = [
    makeWatched({ title: 'a', rating: 0 }),
    makeWatched({ title: 'b', rating: 7 }),
    makeWatched({ title: 'c', rating: 7.9 }),
    makeWatched({ title: 'd', rating: 8 }),
    makeWatched({ title: 'e', rating: 10 }),
  ];

  it('counts rated watched records per half-open bucket, skipping empty buckets', () => {
    assert.deepStrictEqual(ratingHistogram(records, 2), [
      { start: 0, end: 2, count: 1 },
      { start: 6, end: 8, count: 2 },
      { start: 8, end: 10, count: 1 },
      { start: 10, end: 12, count: 1 },
    ]);
  });

  it('keeps float bucket edges exact', () => {
    const histogram = ratingHistogram([makeWatched({ rating: 0.3 })], 0.1);
    assert.deepStrictEqual(histogram, [{ start: 0.3, end: 0.4, count: 1 }]);
  });

  it('rejects a non-positive bucket width', () => {
    assert.throws(() => ratingHistogram(records, 0), RangeError);
  });
});

describe('recentlyWatched', () => {
  it('sorts by date descending, then title ascending', () => {
    const records = [
      makeWatched({ title: 'Old', dateWatched: '2023-01-01' }),
      makeWatched({ title: 'Zeta', dateWatched: '2024-05-01' }),
      makeWatched({ title: 'Alpha', dateWatched: '2024-05-01' }),
      makeRecord({ title: 'Unseen' }),
    ];
    assert.deepStrictEqual(recentlyWatched(records, 2).map(r => r.title), ['Alpha', 'Zeta']);
    assert.deepStrictEqual(recentlyWatched(records, 10).map(r => r.title), ['Alpha', 'Zeta', 'Old']);
  });
});

describe('toWatchList', () => {
  it('lists to-watch records by year, then title', () => {
    const records = [
      makeRecord({ title: 'Later', year: 2010 }),
      makeWatched({ title: 'Seen', year: 1950 }),
      makeRecord({ title: 'Beta', year: 1990 }),
      makeRecord({ title: 'Alpha', year: 1990 }),
    ];
    assert.deepStrictEqual(toWatchList(records).map(r => r.title), ['Alpha', 'Beta', 'Later']);
  });
});

describe('watchSummary and decadeBreakdown', () => {
  const records = [
    makeWatched({ title: 'a', year: 1994, runtime: 90, rating: 6 }),
    makeWatched({ title: 'b', year: 1999, runtime: 150, rating: 9 }),
    makeWatched({ title: 'c', year: 2010, runtime: 120, rating: 7.5 }),
    makeRecord({ title: 'd', year: 2020, runtime: 100 }),
  ];

  it('totals watched, to-watch, hours and the average rating', () => {
    assert.deepStrictEqual(watchSummary(records), { watched: 3, toWatch: 1, totalHours: 6, averageRating: 7.5 });
  });

  it('reports no average when nothing is watched', () => {
    assert.deepStrictEqual(watchSummary([makeRecord()]), { watched: 0, toWatch: 1, totalHours: 0, averageRating: null });
  });

  it('groups watched records by decade, newest first', () => {
    assert.deepStrictEqual(decadeBreakdown(records), [{ decade: 2010, count: 1 }, { decade: 1990, count: 2 }]);
  });
});

describe('StatsEngine', () => {
  it('recomputes from the current snapshot on every call', () => {
    const records: MovieRecord[] = [makeWatched({ title: 'One', director: 'A' })];
    const engine = new StatsEngine({ list: () => records });
    assert.deepStrictEqual(engine.topDirectors(3), [{ director: 'A', count: 1 }]);

    records.push(makeWatched({ title: 'Two', director: 'A' }));
    assert.deepStrictEqual(engine.topDirectors(3), [{ director: 'A', count: 2 }]);
    assert.strictEqual(engine.summary().watched, 2);
  });
});
