/**
 * Typed error classes. Callers (the browser's skip-errors path, the CLI, tests)
 * tell failure categories apart by class rather than by message text.
 */

import { z } from 'zod';

export class LayoutFetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, status: number | null = null) {
    super(message);
    this.name = 'LayoutFetchError';
    this.url = url;
    this.status = status;
  }
}

export class CacheReadError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'CacheReadError';
    this.path = path;
  }
}

export class CacheWriteError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'CacheWriteError';
    this.path = path;
  }
}

/**
 * Formats a zod issue path as a dot/bracket string.
 *
 *   []                        → "(root)"
 *   ["layout_meta", "title"]  → "layout_meta.title"
 *   ["abc", "layout_meta", "tags", 0] → "abc.layout_meta.tags[0]"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)';
  return path
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('');
}

/**
 * One indented `path: message` line per issue.
 */
export function formatZodIssues(issues: readonly z.ZodIssue[]): string {
  return issues.map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`).join('\n');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
