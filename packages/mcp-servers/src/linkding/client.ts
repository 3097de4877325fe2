/**
 * Linkding REST API Client
 *
 * One instance per process; holds only immutable configuration, so
 * concurrent calls are safe. Calls are never retried.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { formatZodError } from '../shared/server.js';
import {
  BookmarkPageSchema,
  BookmarkSchema,
  TagPageSchema,
  DEFAULT_TIMEOUT_MS,
  type Bookmark,
  type BookmarkInput,
  type BookmarkPage,
  type ListBookmarksParams,
  type ListTagsParams,
  type TagPage,
} from './types.js';

export interface LinkdingClientOptions {
  baseUrl: string;
  apiToken: string;
  /** Per-request timeout. Defaults to 30s. */
  timeoutMs?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * - `transport`: no response was received (network failure, timeout, abort)
 * - `status`: the service answered with an unexpected status
 * - `decode`: the body was not the JSON shape expected
 */
export type LinkdingErrorKind = 'transport' | 'status' | 'decode';

export class LinkdingApiError extends Error {
  readonly kind: LinkdingErrorKind;
  /** HTTP status, set for `status` errors only. */
  readonly status: number | null;

  constructor(kind: LinkdingErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'LinkdingApiError';
    this.kind = kind;
    this.status = options.status ?? null;
  }
}

export function isLinkdingApiError(err: unknown): err is LinkdingApiError {
  return err instanceof LinkdingApiError;
}

/**
 * The operations the MCP tools depend on. Tests substitute their own.
 */
export interface LinkdingApi {
  listBookmarks(params: ListBookmarksParams, options?: RequestOptions): Promise<BookmarkPage>;
  createBookmark(input: BookmarkInput, options?: RequestOptions): Promise<Bookmark>;
  listTags(params: ListTagsParams, options?: RequestOptions): Promise<TagPage>;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Drop zero-valued optional fields so they don't reach the wire. */
function toRequestBody(input: BookmarkInput): Record<string, unknown> {
  const body: Record<string, unknown> = { url: input.url };
  if (input.title) { body.title = input.title; }
  if (input.description) { body.description = input.description; }
  if (input.notes) { body.notes = input.notes; }
  if (input.tag_names && input.tag_names.length > 0) { body.tag_names = input.tag_names; }
  if (input.unread) { body.unread = true; }
  if (input.shared) { body.shared = true; }
  if (input.is_archived) { body.is_archived = true; }
  if (input.disable_scraping) { body.disable_scraping = true; }
  return body;
}

function withQuery(endpoint: string, params: ListBookmarksParams): string {
  const search = new URLSearchParams();
  if (params.limit !== undefined && params.limit > 0) { search.set('limit', String(params.limit)); }
  if (params.offset !== undefined && params.offset > 0) { search.set('offset', String(params.offset)); }
  if (params.query) { search.set('q', params.query); }

  const query = search.toString();
  return query ? `${endpoint}?${query}` : endpoint;
}

async function drain(response: Response): Promise<void> {
  await response.arrayBuffer();
}

function decodeAs<T>(schema: ZodType<T, ZodTypeDef, unknown>): (response: Response) => Promise<T> {
  return async (response) => {
    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new LinkdingApiError('decode', `failed to decode response: ${message}`, { cause: err });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new LinkdingApiError('decode', `failed to decode response: ${formatZodError(parsed.error)}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  };
}

export class LinkdingClient implements LinkdingApi {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;

  constructor(options: LinkdingClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiToken = options.apiToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async listBookmarks(params: ListBookmarksParams = {}, options: RequestOptions = {}): Promise<BookmarkPage> {
    return this.send('GET', withQuery('/api/bookmarks/', params), undefined, 200, options, decodeAs(BookmarkPageSchema));
  }

  async createBookmark(input: BookmarkInput, options: RequestOptions = {}): Promise<Bookmark> {
    return this.send('POST', '/api/bookmarks/', toRequestBody(input), 201, options, decodeAs(BookmarkSchema));
  }

  async updateBookmark(id: number, input: BookmarkInput, options: RequestOptions = {}): Promise<Bookmark> {
    return this.send('PUT', `/api/bookmarks/${id}/`, toRequestBody(input), 200, options, decodeAs(BookmarkSchema));
  }

  async deleteBookmark(id: number, options: RequestOptions = {}): Promise<void> {
    return this.send('DELETE', `/api/bookmarks/${id}/`, undefined, 204, options, drain);
  }

  async archiveBookmark(id: number, options: RequestOptions = {}): Promise<void> {
    return this.send('POST', `/api/bookmarks/${id}/archive/`, undefined, 204, options, drain);
  }

  async unarchiveBookmark(id: number, options: RequestOptions = {}): Promise<void> {
    return this.send('POST', `/api/bookmarks/${id}/unarchive/`, undefined, 204, options, drain);
  }

  async listTags(params: ListTagsParams = {}, options: RequestOptions = {}): Promise<TagPage> {
    return this.send('GET', withQuery('/api/tags/', params), undefined, 200, options, decodeAs(TagPageSchema));
  }

  /**
   * Issue one request and read its body, all under the same timeout.
   * The body is always consumed so the connection goes back to the pool.
   */
  private async send<T>(
    method: HttpMethod,
    endpoint: string,
    body: Record<string, unknown> | undefined,
    expectedStatus: number,
    options: RequestOptions,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const headers: Record<string, string> = {
      Authorization: `Token ${this.apiToken}`,
      Accept: 'application/json',
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${endpoint}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (err) {
      throw this.transportError(err, timeout, options.signal);
    }

    if (response.status !== expectedStatus) {
      const drainError = await drain(response).then(() => undefined, (err: unknown) => err);
      throw new LinkdingApiError('status', `API request failed with status ${response.status}`, {
        status: response.status,
        cause: drainError,
      });
    }

    try {
      return await read(response);
    } catch (err) {
      if (timeout.aborted || options.signal?.aborted) {
        throw this.transportError(err, timeout, options.signal);
      }
      throw err;
    }
  }

  private transportError(err: unknown, timeout: AbortSignal, callerSignal: AbortSignal | undefined): LinkdingApiError {
    if (timeout.aborted) {
      return new LinkdingApiError('transport', `request timed out after ${this.timeoutMs}ms`, { cause: err });
    }
    if (callerSignal?.aborted) {
      return new LinkdingApiError('transport', 'request aborted', { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new LinkdingApiError('transport', `request failed: ${message}`, { cause: err });
  }
}
