/**
 * LayoutBrowser: main API
 *
 * One browse run: load the cache, list ids, window them, resolve each id
 * through the cache, deduplicate, and write the cache back.
 */

import {
  BrowseQuery,
  BrowseResult,
  LayoutCacheStorage,
  LayoutRecord,
  LayoutSource,
  LayoutStore,
  OutputFormat,
} from './core/types';
import { dedupeLayouts } from './core/dedup';
import { selectWindow } from './core/window';
import { formatLayouts } from './core/reporter';
import { LayoutFetchError, errorMessage } from './core/errors';
import { FileCacheStorage } from './store/file-store';
import { HttpLayoutSource } from './client/http-source';
import { LayoutFetcher } from './fetcher';
import { Logger, silentLogger } from './logger';

// ─── Options ────────────────────────────────────────────────────────────────

export interface LayoutBrowserOptions {
  /** Path of the cache file or a custom LayoutCacheStorage */
  cache: string | LayoutCacheStorage;

  /** Where layouts come from (default: HttpLayoutSource on `baseUrl`) */
  source?: LayoutSource;

  /** Service base URL, used when no `source` is given */
  baseUrl?: string;

  /** Skip layouts that fail to fetch instead of aborting (default: false) */
  skipErrors?: boolean;

  logger?: Logger;
}

// ─── LayoutBrowser Class ────────────────────────────────────────────────────

export class LayoutBrowser {
  private storage: LayoutCacheStorage;
  private source: LayoutSource;
  private skipErrors: boolean;
  private logger: Logger;

  constructor(options: LayoutBrowserOptions) {
    this.logger = options.logger ?? silentLogger;

    if (typeof options.cache === 'string') {
      this.storage = new FileCacheStorage(options.cache);
    } else {
      this.storage = options.cache;
    }

    this.source =
      options.source ?? new HttpLayoutSource({ baseUrl: options.baseUrl, logger: this.logger });
    this.skipErrors = options.skipErrors ?? false;
  }

  /**
   * Run one query.
   *
   * The cache is written back even when listing or fetching throws, so that
   * records fetched before the failure are kept. A failed write is logged and
   * does not affect the result.
   */
  async browse(query: BrowseQuery): Promise<BrowseResult> {
    const store = await this.storage.load();
    this.logger.debug(`Loaded ${store.size} cached layouts from ${this.storage.location}`);

    try {
      return await this.collect(store, query);
    } finally {
      await this.persist(store);
    }
  }

  /**
   * Render layouts for output.
   */
  format(layouts: LayoutRecord[], format: OutputFormat = 'table'): string {
    return formatLayouts(layouts, format);
  }

  getStorage(): LayoutCacheStorage {
    return this.storage;
  }

  // ─── Private Helpers ────────────────────────────────────────────────────

  private async collect(store: LayoutStore, query: BrowseQuery): Promise<BrowseResult> {
    const fetcher = new LayoutFetcher(store, this.source, this.logger);

    const ids = await this.source.listLayoutIds(query.tags ?? []);
    const selected = selectWindow(ids, query.offset, query.limit);
    this.logger.debug(
      `Service listed ${ids.length} layouts; resolving ${selected.length} from offset ${query.offset}`
    );

    const resolved: LayoutRecord[] = [];
    const skipped: string[] = [];

    for (const id of selected) {
      try {
        resolved.push(await fetcher.resolve(id));
      } catch (error) {
        if (!this.skipErrors || !(error instanceof LayoutFetchError)) throw error;
        this.logger.warn(`Skipping layout ${id}: ${errorMessage(error)}`);
        skipped.push(id);
      }
    }

    const layouts = dedupeLayouts(resolved, query.redupe ?? false);
    if (layouts.length < resolved.length) {
      this.logger.debug(`Dropped ${resolved.length - layouts.length} duplicate layouts`);
    }

    return {
      layouts,
      total: ids.length,
      hits: fetcher.hits,
      misses: fetcher.misses,
      skipped,
    };
  }

  private async persist(store: LayoutStore): Promise<void> {
    try {
      await this.storage.save(store);
      this.logger.debug(`Wrote ${store.size} layouts to ${this.storage.location}`);
    } catch (error) {
      this.logger.warn(`Could not write cache to disk: ${errorMessage(error)}`);
    }
  }
}
