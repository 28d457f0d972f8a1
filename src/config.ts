// Configuration loading for the movie log.
//
// Priority per setting: movielog-config.json → env vars → defaults.
// Graceful degradation: a broken file or an out-of-range value warns on
// stderr and falls through to the next source.

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import type { MovielogConfig } from './types.js';
import { DEFAULT_CAST_SIZE, DEFAULT_LOOKUP_TIMEOUT_MS, DEFAULT_MAX_CANDIDATES } from './types.js';

/** Where the config file came from — path only exists when one was read */
export type ConfigOrigin =
  | { readonly source: 'file'; readonly path: string }
  | { readonly source: 'env' }
  | { readonly source: 'default' };

export interface LoadedConfig {
  readonly config: MovielogConfig;
  readonly origin: ConfigOrigin;
}

export interface LoadConfigOptions {
  readonly configPath?: string;          // defaults to movielog-config.json beside the package
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
}

export const DEFAULT_CONFIG_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'movielog-config.json',
);

const configFileSchema = z.object({
  moviesDir: z.string().min(1).optional(),
  tmdbApiKey: z.string().min(1).optional(),
  preserveLocalEdits: z.boolean().optional(),
  lookupTimeoutMs: z.unknown().optional(),
  maxCandidates: z.unknown().optional(),
  castSize: z.unknown().optional(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

const KNOWN_KEYS = new Set<string>(Object.keys(configFileSchema.shape));

/** Validate and clamp a numeric setting. Returns the default if the value is missing, NaN, or out of range. */
export function clampSetting(name: string, value: unknown, defaultValue: number, min: number, max: number): number {
  if (value === undefined || value === null || value === '') return defaultValue;
  const n = Number(value);
  if (isNaN(n) || n < min || n > max) {
    process.stderr.write(`[movielog] ${name} out of range [${min}, ${max}]: ${String(value)} — using default ${defaultValue}\n`);
    return defaultValue;
  }
  return Math.round(n);
}

/** Parse a boolean env value; undefined when unset or unrecognized */
export function parseBooleanFlag(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  process.stderr.write(`[movielog] ${name} is not a boolean: "${raw}" — ignored\n`);
  return undefined;
}

function expandHome(dir: string): string {
  return dir
    .replace(/^\$HOME\b/, os.homedir())
    .replace(/^~(?=$|\/)/, os.homedir());
}

function resolveDir(dir: string, base: string): string {
  const expanded = expandHome(dir);
  return path.isAbsolute(expanded) ? expanded : path.resolve(base, expanded);
}

/** Read and validate the config file. Null when it is absent or unusable. */
function readConfigFile(configPath: string): ConfigFile | null {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (error: unknown) {
    // ENOENT = no config file, which is expected — silently fall through
    const isFileNotFound = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (!isFileNotFound) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[movielog] Failed to read ${configPath}: ${message}\n`);
    }
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[movielog] Failed to parse ${configPath}: ${message}\n`);
    return null;
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    process.stderr.write(`[movielog] Invalid ${configPath}: ${issue ? `${issue.path.join('.') || '(root)'} ${issue.message}` : 'invalid'}\n`);
    return null;
  }

  // Warn on unrecognized keys so typos don't silently produce defaults
  if (json !== null && typeof json === 'object') {
    for (const key of Object.keys(json)) {
      if (!KNOWN_KEYS.has(key)) {
        process.stderr.write(
          `[movielog] Unknown config key "${key}" — ignored. Valid keys: ${Array.from(KNOWN_KEYS).join(', ')}\n`,
        );
      }
    }
  }
  return parsed.data;
}

/** Load the configuration: file values win over env vars, env vars over defaults */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const file = readConfigFile(configPath);
  const fileDir = path.dirname(configPath);

  const envKeys = ['MOVIELOG_DIR', 'TMDB_API_KEY', 'MOVIELOG_PRESERVE_LOCAL_EDITS', 'MOVIELOG_LOOKUP_TIMEOUT_MS'];
  const origin: ConfigOrigin = file
    ? { source: 'file', path: configPath }
    : envKeys.some(k => env[k] !== undefined && env[k] !== '') ? { source: 'env' } : { source: 'default' };

  const moviesPath = file?.moviesDir
    ? resolveDir(file.moviesDir, fileDir)
    : env['MOVIELOG_DIR']
      ? resolveDir(env['MOVIELOG_DIR'], cwd)
      : path.resolve(cwd, 'movies');

  const tmdbApiKey = file?.tmdbApiKey ?? (env['TMDB_API_KEY'] || undefined);

  const config: MovielogConfig = {
    moviesPath,
    ...(tmdbApiKey !== undefined && { tmdbApiKey }),
    preserveLocalEdits: file?.preserveLocalEdits
      ?? parseBooleanFlag('MOVIELOG_PRESERVE_LOCAL_EDITS', env['MOVIELOG_PRESERVE_LOCAL_EDITS'])
      ?? true,
    lookupTimeoutMs: clampSetting(
      'lookupTimeoutMs', file?.lookupTimeoutMs ?? env['MOVIELOG_LOOKUP_TIMEOUT_MS'], DEFAULT_LOOKUP_TIMEOUT_MS, 100, 120_000,
    ),
    maxCandidates: clampSetting('maxCandidates', file?.maxCandidates, DEFAULT_MAX_CANDIDATES, 1, 20),
    castSize: clampSetting('castSize', file?.castSize, DEFAULT_CAST_SIZE, 0, 20),
  };

  return { config, origin };
}
