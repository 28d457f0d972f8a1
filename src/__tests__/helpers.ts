// Shared fixtures for the test suites

import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import type { Clock, MovieRecord, ServiceCandidate } from '../types.js';

export async function createTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'movielog-test-'));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Clock frozen at `iso` */
export function fixedClock(iso: string): Clock {
  return {
    now: () => new Date(iso),
    isoNow: () => new Date(iso).toISOString(),
  };
}

/** Clock that advances one second on every isoNow() call, starting at `iso` */
export function tickingClock(iso: string): Clock {
  let ms = new Date(iso).getTime();
  return {
    now: () => new Date(ms),
    isoNow: () => {
      const stamp = new Date(ms).toISOString();
      ms += 1000;
      return stamp;
    },
  };
}

export function makeRecord(overrides: Partial<MovieRecord> = {}): MovieRecord {
  return {
    title: 'Test Movie',
    year: 2000,
    director: 'Some Director',
    genres: ['Drama'],
    runtime: 100,
    cast: [],
    status: 'to-watch',
    notes: '',
    ...overrides,
  };
}

export function makeWatched(overrides: Partial<MovieRecord> = {}): MovieRecord {
  return makeRecord({ status: 'watched', rating: 7, dateWatched: '2024-01-01', ...overrides });
}

export function makeCandidate(overrides: Partial<ServiceCandidate> = {}): ServiceCandidate {
  return {
    externalId: 1,
    title: 'Test Movie',
    year: 2000,
    director: 'Some Director',
    genres: ['Drama'],
    runtime: 100,
    cast: ['Actor One'],
    countries: ['France'],
    ...overrides,
  };
}
