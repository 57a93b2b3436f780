/**
 * File-based Layout Cache
 *
 * Persists the layout store as a single JSON file:
 *
 *   {
 *     "<layout id>": { "layout_meta": { ... }, "config": ..., "compiler_input": ... },
 *     ...
 *   }
 *
 * The file is read once at startup and written once at shutdown. Writes go to
 * a temporary sibling first and are renamed over the target.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LayoutCacheStorage, LayoutRecord, LayoutStore } from '../core/types';
import { cacheFileSchema, layoutFromDocument, layoutToDocument } from '../core/schema';
import { CacheReadError, CacheWriteError, errorMessage, formatZodIssues } from '../core/errors';
import { parseJson } from '../formats/json';
import { LayoutCache } from './layout-cache';

export class FileCacheStorage implements LayoutCacheStorage {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  get location(): string {
    return this.filePath;
  }

  /**
   * Load the cache. A missing file is an empty cache; anything unreadable or
   * malformed throws CacheReadError.
   */
  async load(): Promise<LayoutStore> {
    if (!fs.existsSync(this.filePath)) return new LayoutCache();

    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      throw new CacheReadError(
        `Could not read layout cache ${this.filePath}: ${errorMessage(error)}`,
        this.filePath
      );
    }

    let raw: unknown;
    try {
      raw = parseJson(text);
    } catch (error) {
      throw new CacheReadError(
        `Layout cache ${this.filePath} is corrupt: ${errorMessage(error)}`,
        this.filePath
      );
    }

    const result = cacheFileSchema.safeParse(raw);
    if (!result.success) {
      throw new CacheReadError(
        `Layout cache ${this.filePath} is corrupt:\n${formatZodIssues(result.error.issues)}`,
        this.filePath
      );
    }

    return new LayoutCache(
      Object.entries(result.data).map(([id, doc]): [string, LayoutRecord] => [
        id,
        layoutFromDocument(doc, id),
      ])
    );
  }

  /**
   * Write every entry of the store to disk, replacing the previous file.
   */
  async save(store: LayoutStore): Promise<void> {
    const contents = Object.fromEntries(
      store.entries().map(([id, record]) => [id, layoutToDocument(record)])
    );
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(contents), { encoding: 'utf-8', mode: 0o644 });
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      fs.rmSync(tmpPath, { force: true });
      throw new CacheWriteError(
        `Could not write layout cache ${this.filePath}: ${errorMessage(error)}`,
        this.filePath
      );
    }
  }
}
