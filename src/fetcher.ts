/**
 * Layout Fetcher
 *
 * Resolves layout ids through the store. A cached record is trusted forever;
 * a miss costs exactly one request and is written through to the store.
 */

import { LayoutRecord, LayoutSource, LayoutStore } from './core/types';
import { Logger, silentLogger } from './logger';

export class LayoutFetcher {
  private readonly store: LayoutStore;
  private readonly source: LayoutSource;
  private readonly logger: Logger;
  private hitCount = 0;
  private missCount = 0;

  constructor(store: LayoutStore, source: LayoutSource, logger: Logger = silentLogger) {
    this.store = store;
    this.source = source;
    this.logger = logger;
  }

  async resolve(id: string): Promise<LayoutRecord> {
    const cached = this.store.get(id);
    if (cached) {
      this.hitCount++;
      this.logger.debug(`Cache hit: ${id}`);
      return cached;
    }

    const record = await this.source.fetchLayout(id);
    this.missCount++;
    this.store.put(id, record);
    return record;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }
}
