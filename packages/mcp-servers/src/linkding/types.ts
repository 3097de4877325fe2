/**
 * Types for the Linkding MCP Server
 *
 * REST entities returned by the Linkding API, the tool argument schemas
 * (the single source for both `tools/list` and validation) and the
 * structured result of `create_bookmark`.
 */

import { z } from 'zod';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_TAGS_LIMIT = 50;
export const DEFAULT_TIMEOUT_MS = 30_000;

export const BOOKMARK_CREATED_MESSAGE = 'Bookmark created successfully';

// ============================================================================
// Linkding REST entities
// ============================================================================

// Linkding sends null for some unset text fields
const text = z.string().nullish().transform(value => value ?? '');
const flag = z.boolean().nullish().transform(value => value ?? false);

export const BookmarkSchema = z.object({
  id: z.number().int(),
  url: z.string(),
  title: text,
  description: text,
  notes: text,
  web_archive_snapshot_url: text,
  favicon_url: text,
  preview_image_url: text,
  is_archived: flag,
  unread: flag,
  shared: flag,
  tag_names: z.array(z.string()).nullish().transform(value => value ?? []),
  date_added: text,
  date_modified: text,
});

export const TagSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  date_added: text,
});

function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    count: z.number().int(),
    next: z.string().nullish().transform(value => value ?? null),
    previous: z.string().nullish().transform(value => value ?? null),
    results: z.array(item),
  });
}

export const BookmarkPageSchema = pageSchema(BookmarkSchema);
export const TagPageSchema = pageSchema(TagSchema);

export type Bookmark = z.infer<typeof BookmarkSchema>;
export type Tag = z.infer<typeof TagSchema>;
export type BookmarkPage = z.infer<typeof BookmarkPageSchema>;
export type TagPage = z.infer<typeof TagPageSchema>;

/** Payload for creating or replacing a bookmark. Only `url` is required. */
export interface BookmarkInput {
  url: string;
  title?: string;
  description?: string;
  notes?: string;
  tag_names?: string[];
  unread?: boolean;
  shared?: boolean;
  is_archived?: boolean;
  disable_scraping?: boolean;
}

export interface ListBookmarksParams {
  limit?: number;
  offset?: number;
  query?: string;
}

export interface ListTagsParams {
  limit?: number;
  offset?: number;
}

// ============================================================================
// Tool argument schemas
// ============================================================================

const limit = z.number().int();

export const SearchBookmarksArgsSchema = z.object({
  query: z.string().default('').describe('Search query'),
  limit: limit.default(DEFAULT_SEARCH_LIMIT).describe('Maximum number of results'),
});

/**
 * `url` defaults to '' so a missing value reaches the handler and is
 * reported as a tool error instead of a protocol error.
 */
export const CreateBookmarkArgsSchema = z.object({
  url: z.string().default('').describe('URL to bookmark'),
  title: z.string().default('').describe('Bookmark title'),
  description: z.string().default('').describe('Bookmark description'),
  tags: z.array(z.string()).default([]).describe('List of tags'),
});

export const GetTagsArgsSchema = z.object({
  limit: limit.default(DEFAULT_TAGS_LIMIT).describe('Maximum number of tags to return'),
});

export type SearchBookmarksArgs = z.infer<typeof SearchBookmarksArgsSchema>;
export type CreateBookmarkArgs = z.infer<typeof CreateBookmarkArgsSchema>;
export type GetTagsArgs = z.infer<typeof GetTagsArgsSchema>;

// ============================================================================
// Tool results
// ============================================================================

export const BookmarkResultSchema = z.object({
  id: z.number().int(),
  url: z.string(),
  title: z.string(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  success: z.boolean(),
  message: z.string().optional(),
});

export type BookmarkResult = z.infer<typeof BookmarkResultSchema>;
