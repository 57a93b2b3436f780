/**
 * In-memory Layout Store
 *
 * Write-through, never-expiring mapping from layout id to record. Records are
 * immutable once published, so an entry stays valid for the life of the cache.
 */

import { LayoutRecord, LayoutStore } from '../core/types';

export class LayoutCache implements LayoutStore {
  private readonly records = new Map<string, LayoutRecord>();

  constructor(entries: Iterable<[string, LayoutRecord]> = []) {
    for (const [id, record] of entries) {
      this.records.set(id, record);
    }
  }

  get(id: string): LayoutRecord | null {
    return this.records.get(id) ?? null;
  }

  put(id: string, record: LayoutRecord): void {
    this.records.set(id, record);
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get size(): number {
    return this.records.size;
  }

  entries(): Array<[string, LayoutRecord]> {
    return [...this.records.entries()];
  }
}
