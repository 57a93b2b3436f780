/**
 * Shared test data
 */

import { LayoutCacheStorage, LayoutRecord, LayoutSource, LayoutStore } from '../src/core/types';
import { LayoutCache } from '../src/store/layout-cache';

export function makeLayout(overrides: Partial<LayoutRecord> = {}): LayoutRecord {
  return {
    id: 'layout-1',
    createdAt: 1700000000,
    creator: 'Alice',
    title: 'Foo',
    notes: '',
    tags: [],
    unlisted: false,
    deleted: false,
    compiled: true,
    searchable: true,
    parentId: '',
    firmwareApiVersion: '1',
    config: null,
    compilerInput: null,
    ...overrides,
  };
}

/**
 * In-process stand-in for the layout service.
 */
export class FakeLayoutSource implements LayoutSource {
  readonly listCalls: string[][] = [];
  readonly fetchCalls: string[] = [];
  private readonly ids: string[];
  private readonly layouts: Map<string, LayoutRecord>;
  private readonly failing: Map<string, Error>;

  constructor(layouts: LayoutRecord[], failing: Record<string, Error> = {}) {
    this.ids = layouts.map((l) => l.id).concat(Object.keys(failing));
    this.layouts = new Map(layouts.map((l): [string, LayoutRecord] => [l.id, l]));
    this.failing = new Map(Object.entries(failing));
  }

  async listLayoutIds(tags: string[] = []): Promise<string[]> {
    this.listCalls.push(tags);
    return [...this.ids];
  }

  async fetchLayout(id: string): Promise<LayoutRecord> {
    this.fetchCalls.push(id);
    const failure = this.failing.get(id);
    if (failure) throw failure;
    const layout = this.layouts.get(id);
    if (!layout) throw new Error(`unknown layout ${id}`);
    return layout;
  }
}

/**
 * Cache storage kept in memory, recording every save.
 */
export class MemoryCacheStorage implements LayoutCacheStorage {
  readonly location = 'memory';
  readonly saved: LayoutStore[] = [];
  private readonly initial: Array<[string, LayoutRecord]>;
  private readonly saveError: Error | null;

  constructor(initial: LayoutRecord[] = [], saveError: Error | null = null) {
    this.initial = initial.map((l): [string, LayoutRecord] => [l.id, l]);
    this.saveError = saveError;
  }

  async load(): Promise<LayoutStore> {
    return new LayoutCache(this.initial);
  }

  async save(store: LayoutStore): Promise<void> {
    if (this.saveError) throw this.saveError;
    this.saved.push(new LayoutCache(store.entries()));
  }
}
