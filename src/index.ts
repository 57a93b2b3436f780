/**
 * layout-scout
 *
 * Browse shared keyboard layouts through a persistent local cache.
 *
 * @example
 * ```typescript
 * import { LayoutBrowser } from 'layout-scout';
 *
 * const browser = new LayoutBrowser({ cache: './layouts-cache.json' });
 *
 * // First run fetches every layout; later runs answer from the cache
 * const result = await browser.browse({ tags: ['colemak'], limit: 10, offset: 0 });
 * console.log(browser.format(result.layouts, 'table'));
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { LayoutBrowser, LayoutBrowserOptions } from './browser';
export { LayoutFetcher } from './fetcher';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  JsonValue,
  LayoutRecord,
  LayoutStore,
  LayoutCacheStorage,
  LayoutSource,
  OutputFormat,
  BrowseQuery,
  BrowseResult,
} from './core/types';

// ─── Core Engines ───────────────────────────────────────────────────────────
export { dedupeLayouts, semanticKey } from './core/dedup';
export { selectWindow } from './core/window';
export { formatLayouts, formatDate } from './core/reporter';
export {
  layoutDocumentSchema,
  LayoutDocument,
  layoutFromDocument,
  layoutToDocument,
} from './core/schema';
export { LayoutFetchError, CacheReadError, CacheWriteError } from './core/errors';

// ─── Store & Client ─────────────────────────────────────────────────────────
export { LayoutCache } from './store/layout-cache';
export { FileCacheStorage } from './store/file-store';
export { HttpLayoutSource, HttpLayoutSourceOptions, FetchLike } from './client/http-source';

// ─── Logging ────────────────────────────────────────────────────────────────
export { Logger, createConsoleLogger, silentLogger } from './logger';
