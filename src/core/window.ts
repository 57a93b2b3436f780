/**
 * Skip `offset` identifiers, then take at most `limit` of the rest.
 * An offset past the end yields an empty window. Negative values count as 0.
 */
export function selectWindow<T>(items: readonly T[], offset: number, limit: number): T[] {
  const start = Math.max(0, Math.trunc(offset));
  const count = Math.max(0, Math.trunc(limit));
  if (start >= items.length) return [];
  return items.slice(start, start + count);
}
