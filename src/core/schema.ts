/**
 * Wire format of the layout service.
 *
 * The same document shape is used for the service's metadata responses and for
 * the values of the cache file, so a cache written by one version of the tool
 * stays readable as long as the service format holds.
 */

import { z } from 'zod';
import { JsonValue, LayoutRecord } from './types';

// ─── Opaque JSON ────────────────────────────────────────────────────────────

/**
 * True for anything JSON.parse can produce: finite numbers, strings, booleans,
 * null, and arrays or plain objects of those.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object': {
      if (Array.isArray(value)) return value.every(isJsonValue);
      const proto: unknown = Object.getPrototypeOf(value);
      if (proto !== Object.prototype && proto !== null) return false;
      return Object.values(value).every(isJsonValue);
    }
    default:
      return false;
  }
}

// Checked in place and passed through untouched, so every own key survives,
// `__proto__` included.
export const jsonValueSchema = z.custom<JsonValue>(isJsonValue, 'Expected a JSON value');

// ─── Layout Document ────────────────────────────────────────────────────────

// Fields the service omits decode to their zero value.
const layoutMetaSchema = z.object({
  uuid: z.string().default(''),
  date: z.number().int().default(0),
  creator: z.string().default(''),
  parent_uuid: z.string().default(''),
  firmware_api_version: z.string().default(''),
  title: z.string().default(''),
  notes: z.string().default(''),
  tags: z
    .array(z.string())
    .nullish()
    .transform((tags) => tags ?? []),
  unlisted: z.boolean().default(false),
  deleted: z.boolean().default(false),
  compiled: z.boolean().default(false),
  searchable: z.boolean().default(false),
});

export const layoutDocumentSchema = z.object({
  layout_meta: layoutMetaSchema.default({}),
  config: jsonValueSchema.default(null),
  compiler_input: jsonValueSchema.default(null),
});

export type LayoutDocument = z.infer<typeof layoutDocumentSchema>;

/** Body of the listing endpoint */
export const layoutIdListSchema = z.array(z.string());

/** Contents of the cache file: identifier → layout document */
export const cacheFileSchema = z.record(layoutDocumentSchema);

export type CacheFileContents = z.infer<typeof cacheFileSchema>;

// ─── Conversion ─────────────────────────────────────────────────────────────

/**
 * Convert a validated document into a record. `fallbackId` is used when the
 * document carries no uuid of its own.
 */
export function layoutFromDocument(doc: LayoutDocument, fallbackId: string): LayoutRecord {
  const meta = doc.layout_meta;
  return {
    id: meta.uuid || fallbackId,
    createdAt: meta.date,
    creator: meta.creator,
    title: meta.title,
    notes: meta.notes,
    tags: [...meta.tags],
    unlisted: meta.unlisted,
    deleted: meta.deleted,
    compiled: meta.compiled,
    searchable: meta.searchable,
    parentId: meta.parent_uuid,
    firmwareApiVersion: meta.firmware_api_version,
    config: doc.config,
    compilerInput: doc.compiler_input,
  };
}

export function layoutToDocument(record: LayoutRecord): LayoutDocument {
  return {
    layout_meta: {
      uuid: record.id,
      date: record.createdAt,
      creator: record.creator,
      parent_uuid: record.parentId,
      firmware_api_version: record.firmwareApiVersion,
      title: record.title,
      notes: record.notes,
      tags: [...record.tags],
      unlisted: record.unlisted,
      deleted: record.deleted,
      compiled: record.compiled,
      searchable: record.searchable,
    },
    config: record.config,
    compiler_input: record.compilerInput,
  };
}
