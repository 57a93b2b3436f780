/**
 * Layout Deduplication
 *
 * The service lists every saved revision of a layout under its own id, so the
 * same layout tends to show up many times in a row. Two records are treated as
 * the same layout when they share a title and a creator.
 */

import { LayoutRecord } from './types';

/**
 * Key identifying a layout regardless of its id. Encoded as a JSON pair so
 * that ("a-b", "c") and ("a", "b-c") stay distinct.
 */
export function semanticKey(record: Pick<LayoutRecord, 'title' | 'creator'>): string {
  return JSON.stringify([record.title, record.creator]);
}

/**
 * Drop every record whose semantic key was already seen, keeping the first
 * occurrence and the original order. With `redupe` the input is returned as is.
 */
export function dedupeLayouts(records: LayoutRecord[], redupe = false): LayoutRecord[] {
  if (redupe) return records;

  const seen = new Set<string>();
  const result: LayoutRecord[] = [];

  for (const record of records) {
    const key = semanticKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(record);
  }

  return result;
}
