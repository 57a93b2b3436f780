/**
 * Canonical type definitions for layout-scout.
 * These types describe layouts as the rest of the tool sees them, independent
 * of the remote service's wire format (see ./schema).
 */

// ─── Opaque Payloads ────────────────────────────────────────────────────────

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ─── Layout Record ──────────────────────────────────────────────────────────

export interface LayoutRecord {
  /** Opaque identifier assigned by the service; the cache key */
  id: string;

  /** Publication time, seconds since the epoch */
  createdAt: number;

  /** Display name of the publisher; may be empty */
  creator: string;

  /** Layout title; together with `creator` it identifies duplicates */
  title: string;

  /** Free-form description; may be empty or span several lines */
  notes: string;

  /** Tags the service filters on */
  tags: string[];

  /** Hidden from public listings but reachable by id */
  unlisted: boolean;

  /** Removed by its creator */
  deleted: boolean;

  /** Firmware has been built from this layout */
  compiled: boolean;

  /** Included in tag searches */
  searchable: boolean;

  /** Identifier of the layout this one was derived from, or '' */
  parentId: string;

  /** Firmware API version the layout targets; may be empty */
  firmwareApiVersion: string;

  /** Keymap configuration. Never inspected, only carried through the cache. */
  config: JsonValue;

  /** Compiler input. Never inspected, only carried through the cache. */
  compilerInput: JsonValue;
}

// ─── Store Interfaces ───────────────────────────────────────────────────────

export interface LayoutStore {
  /** Look up a cached record */
  get(id: string): LayoutRecord | null;

  /** Insert or overwrite the record for an id */
  put(id: string, record: LayoutRecord): void;

  /** Whether an id is cached */
  has(id: string): boolean;

  /** Number of cached records */
  readonly size: number;

  /** All entries in insertion order */
  entries(): Array<[string, LayoutRecord]>;
}

export interface LayoutCacheStorage {
  /** Read the persisted store. An absent cache yields an empty store. */
  load(): Promise<LayoutStore>;

  /** Persist the full store, replacing what was there */
  save(store: LayoutStore): Promise<void>;

  /** Human-readable location, used in log lines */
  readonly location: string;
}

// ─── Remote Source ──────────────────────────────────────────────────────────

export interface LayoutSource {
  /** Ordered identifiers, optionally restricted to layouts carrying the tags */
  listLayoutIds(tags?: string[]): Promise<string[]>;

  /** Metadata for one layout */
  fetchLayout(id: string): Promise<LayoutRecord>;
}

// ─── Output ─────────────────────────────────────────────────────────────────

export type OutputFormat = 'table' | 'json' | 'markdown';

// ─── Browse ─────────────────────────────────────────────────────────────────

export interface BrowseQuery {
  /** Tag filter; empty or absent means every layout */
  tags?: string[];

  /** Maximum number of identifiers to resolve */
  limit: number;

  /** Number of identifiers to skip */
  offset: number;

  /** Keep layouts that share a title and creator with an earlier one */
  redupe?: boolean;
}

export interface BrowseResult {
  /** Layouts in listing order, after the window and deduplication */
  layouts: LayoutRecord[];

  /** Number of identifiers the service listed before windowing */
  total: number;

  /** Identifiers answered from the cache */
  hits: number;

  /** Identifiers fetched from the service */
  misses: number;

  /** Identifiers dropped because fetching them failed (skipErrors only) */
  skipped: string[];
}
