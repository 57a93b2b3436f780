/**
 * HTTP client for the layout sharing service.
 *
 * Endpoints (relative to the base URL):
 *   GET /               → ["<id>", ...]          optional ?tags=a,b
 *   GET /<id>/meta      → { layout_meta, config, compiler_input }
 *
 * Each request is attempted once. Every failure surfaces as a LayoutFetchError.
 */

import { z } from 'zod';
import { LayoutRecord, LayoutSource } from '../core/types';
import { layoutDocumentSchema, layoutFromDocument, layoutIdListSchema } from '../core/schema';
import { LayoutFetchError, errorMessage, formatZodIssues } from '../core/errors';
import { parseJson } from '../formats/json';
import { Logger, silentLogger } from '../logger';
import { DEFAULT_BASE_URL } from '../config';

/** The slice of the fetch API this client relies on */
export interface HttpResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string) => Promise<HttpResponseLike>;

export interface HttpLayoutSourceOptions {
  baseUrl?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

export class HttpLayoutSource implements LayoutSource {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;

  constructor(options: HttpLayoutSourceOptions = {}) {
    const base = options.baseUrl ?? DEFAULT_BASE_URL;
    this.baseUrl = base.endsWith('/') ? base : `${base}/`;
    this.fetchFn = options.fetch ?? ((url) => fetch(url));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * URL of the listing endpoint, with the tag filter when there is one.
   */
  listUrl(tags: string[] = []): string {
    const url = new URL(this.baseUrl);
    if (tags.length > 0) {
      url.searchParams.set('tags', tags.join(','));
    }
    return url.toString();
  }

  layoutUrl(id: string): string {
    return new URL(`${encodeURIComponent(id)}/meta`, this.baseUrl).toString();
  }

  async listLayoutIds(tags: string[] = []): Promise<string[]> {
    const url = this.listUrl(tags);
    this.logger.debug(`Requesting layout unique IDs: ${url}`);
    return this.getJson(url, layoutIdListSchema);
  }

  async fetchLayout(id: string): Promise<LayoutRecord> {
    const url = this.layoutUrl(id);
    this.logger.debug(`Requesting layout: ${url}`);
    const doc = await this.getJson(url, layoutDocumentSchema);
    return layoutFromDocument(doc, id);
  }

  // ─── Private Helpers ────────────────────────────────────────────────────

  private async getJson<T extends z.ZodTypeAny>(url: string, schema: T): Promise<z.output<T>> {
    let response: HttpResponseLike;
    let body: string;
    try {
      response = await this.fetchFn(url);
      body = await response.text();
    } catch (error) {
      throw new LayoutFetchError(`Request to ${url} failed: ${errorMessage(error)}`, url);
    }

    if (!response.ok) {
      throw new LayoutFetchError(
        `Request to ${url} failed: ${response.status} ${response.statusText}`.trimEnd(),
        url,
        response.status
      );
    }

    let raw: unknown;
    try {
      raw = parseJson(body);
    } catch (error) {
      throw new LayoutFetchError(
        `Invalid response from ${url}: ${errorMessage(error)}`,
        url,
        response.status
      );
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new LayoutFetchError(
        `Unexpected response from ${url}:\n${formatZodIssues(result.error.issues)}`,
        url,
        response.status
      );
    }
    return result.data;
  }
}
