/**
 * Defaults and environment overrides.
 *
 * Precedence: CLI flag > environment variable > default.
 */

import * as os from 'os';
import * as path from 'path';
import { OutputFormat } from './core/types';

export const DEFAULT_BASE_URL = 'https://my.glove80.com/api/layouts/v1/';
export const CACHE_FILE_NAME = 'layout-scout-cache.json';
export const DEFAULT_LIMIT = 10;
export const DEFAULT_OFFSET = 0;

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'markdown'];

type Env = Record<string, string | undefined>;

/**
 * Per-user cache directory for the current platform.
 * XDG_CACHE_HOME wins everywhere when it is set.
 */
export function cacheDir(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string {
  if (env.XDG_CACHE_HOME) return env.XDG_CACHE_HOME;

  switch (platform) {
    case 'darwin':
      return path.join(home, 'Library', 'Caches');
    case 'win32':
      return env.LOCALAPPDATA ?? path.join(home, 'AppData', 'Local');
    default:
      return path.join(home, '.cache');
  }
}

export function resolveCachePath(flag?: string, env: Env = process.env): string {
  if (flag) return flag;
  if (env.LAYOUT_SCOUT_CACHE) return env.LAYOUT_SCOUT_CACHE;
  return path.join(cacheDir(env), CACHE_FILE_NAME);
}

export function resolveBaseUrl(flag?: string, env: Env = process.env): string {
  return flag || env.LAYOUT_SCOUT_BASE_URL || DEFAULT_BASE_URL;
}

/**
 * Parse a non-negative integer option value.
 */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Expected a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Split a comma-separated tag list, dropping blanks.
 */
export function parseTags(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
