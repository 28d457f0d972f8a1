import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { clampSetting, loadConfig, parseBooleanFlag } from '../config.js';
import { cleanupTempDir, createTempDir } from './helpers.js';

describe('loadConfig', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    configPath = path.join(tempDir, 'movielog-config.json');
  });

  afterEach(async () => {
    if (tempDir) await cleanupTempDir(tempDir).catch(() => {});
  });

  async function writeConfig(content: unknown): Promise<void> {
    const text = typeof content === 'string' ? content : JSON.stringify(content);
    await fs.writeFile(configPath, text, 'utf-8');
  }

  it('uses defaults without a file or env vars', () => {
    const { config, origin } = loadConfig({ configPath, env: {}, cwd: '/work' });

    assert.deepStrictEqual(origin, { source: 'default' });
    assert.deepStrictEqual(config, {
      moviesPath: path.resolve('/work', 'movies'),
      preserveLocalEdits: true,
      lookupTimeoutMs: 10_000,
      maxCandidates: 5,
      castSize: 5,
    });
  });

  it('reads env vars when there is no file', () => {
    const { config, origin } = loadConfig({
      configPath,
      cwd: '/work',
      env: {
        MOVIELOG_DIR: 'films',
        TMDB_API_KEY: 'test-secret',
        MOVIELOG_PRESERVE_LOCAL_EDITS: 'no',
        MOVIELOG_LOOKUP_TIMEOUT_MS: '5000',
      },
    });

    assert.deepStrictEqual(origin, { source: 'env' });
    assert.strictEqual(config.moviesPath, path.resolve('/work', 'films'));
    assert.strictEqual(config.tmdbApiKey, 'test-secret');
    assert.strictEqual(config.preserveLocalEdits, false);
    assert.strictEqual(config.lookupTimeoutMs, 5000);
  });

  it('expands a leading ~ in the record directory', () => {
    const { config } = loadConfig({ configPath, cwd: '/work', env: { MOVIELOG_DIR: '~/films' } });
    assert.strictEqual(config.moviesPath, path.join(os.homedir(), 'films'));
  });

  it('prefers file values over env vars and resolves the directory beside the file', async () => {
    await writeConfig({
      moviesDir: 'library',
      tmdbApiKey: 'file-secret',
      preserveLocalEdits: false,
      maxCandidates: 3,
      castSize: 0,
    });

    const { config, origin } = loadConfig({
      configPath,
      cwd: '/work',
      env: { TMDB_API_KEY: 'env-secret', MOVIELOG_DIR: 'elsewhere', MOVIELOG_PRESERVE_LOCAL_EDITS: 'true' },
    });

    assert.deepStrictEqual(origin, { source: 'file', path: configPath });
    assert.strictEqual(config.moviesPath, path.join(tempDir, 'library'));
    assert.strictEqual(config.tmdbApiKey, 'file-secret');
    assert.strictEqual(config.preserveLocalEdits, false);
    assert.strictEqual(config.maxCandidates, 3);
    assert.strictEqual(config.castSize, 0);
  });

  it('falls back to env vars for settings the file leaves out', async () => {
    await writeConfig({ moviesDir: '/data/movies' });
    const { config } = loadConfig({ configPath, cwd: '/work', env: { TMDB_API_KEY: 'env-secret' } });

    assert.strictEqual(config.moviesPath, '/data/movies');
    assert.strictEqual(config.tmdbApiKey, 'env-secret');
  });

  it('replaces out-of-range numbers with defaults', async () => {
    await writeConfig({ lookupTimeoutMs: 50, maxCandidates: 100, castSize: 'lots' });
    const { config } = loadConfig({ configPath, cwd: '/work', env: {} });

    assert.strictEqual(config.lookupTimeoutMs, 10_000);
    assert.strictEqual(config.maxCandidates, 5);
    assert.strictEqual(config.castSize, 5);
  });

  it('ignores a file that is not valid JSON', async () => {
    await writeConfig('{ not json');
    const { config, origin } = loadConfig({ configPath, cwd: '/work', env: { TMDB_API_KEY: 'test-secret' } });

    assert.deepStrictEqual(origin, { source: 'env' });
    assert.strictEqual(config.tmdbApiKey, 'test-secret');
  });

  it('ignores a file with a wrongly typed value', async () => {
    await writeConfig({ preserveLocalEdits: 'sometimes' });
    const { origin } = loadConfig({ configPath, cwd: '/work', env: {} });
    assert.deepStrictEqual(origin, { source: 'default' });
  });

  it('keeps a file with unknown keys', async () => {
    await writeConfig({ moviesDir: 'library', moviesDirectory: 'typo' });
    const { config, origin } = loadConfig({ configPath, cwd: '/work', env: {} });

    assert.strictEqual(origin.source, 'file');
    assert.strictEqual(config.moviesPath, path.join(tempDir, 'library'));
  });
});

describe('clampSetting', () => {
  it('returns the default for missing values', () => {
    assert.strictEqual(clampSetting('x', undefined, 7, 0, 10), 7);
    assert.strictEqual(clampSetting('x', '', 7, 0, 10), 7);
  });

  it('accepts numeric strings and rounds', () => {
    assert.strictEqual(clampSetting('x', '2.6', 7, 0, 10), 3);
  });

  it('returns the default for values out of range or not numbers', () => {
    assert.strictEqual(clampSetting('x', 11, 7, 0, 10), 7);
    assert.strictEqual(clampSetting('x', 'abc', 7, 0, 10), 7);
  });
});

describe('parseBooleanFlag', () => {
  it('understands common spellings', () => {
    assert.strictEqual(parseBooleanFlag('X', 'yes'), true);
    assert.strictEqual(parseBooleanFlag('X', 'ON'), true);
    assert.strictEqual(parseBooleanFlag('X', '0'), false);
    assert.strictEqual(parseBooleanFlag('X', 'false'), false);
  });

  it('returns undefined for unset or unrecognized values', () => {
    assert.strictEqual(parseBooleanFlag('X', undefined), undefined);
    assert.strictEqual(parseBooleanFlag('X', 'maybe'), undefined);
  });
});
