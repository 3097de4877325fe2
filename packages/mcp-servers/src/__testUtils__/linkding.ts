/**
 * Fixtures and a substitute client for Linkding tests.
 *
 * @module __testUtils__/linkding
 */

import { vi } from 'vitest';
import type { LinkdingApi } from '../linkding/client.js';
import type { Bookmark, BookmarkPage, Tag, TagPage } from '../linkding/types.js';

export function makeBookmark(overrides: Partial<Bookmark> = {}): Bookmark {
  return {
    id: 1,
    url: 'https://example.test/article',
    title: 'Example article',
    description: '',
    notes: '',
    web_archive_snapshot_url: '',
    favicon_url: '',
    preview_image_url: '',
    is_archived: false,
    unread: false,
    shared: false,
    tag_names: [],
    date_added: '2024-01-01T00:00:00Z',
    date_modified: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

export function makeTag(overrides: Partial<Tag> = {}): Tag {
  return {
    id: 1,
    name: 'reading',
    date_added: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

export function bookmarkPage(results: Bookmark[] = []): BookmarkPage {
  return { count: results.length, next: null, previous: null, results };
}

export function tagPage(results: Tag[] = []): TagPage {
  return { count: results.length, next: null, previous: null, results };
}

/**
 * Substitute for LinkdingClient. Each method is a vi.fn so tests can
 * assert on calls and swap implementations.
 */
export function createFakeClient() {
  return {
    listBookmarks: vi.fn<LinkdingApi['listBookmarks']>(async () => bookmarkPage()),
    createBookmark: vi.fn<LinkdingApi['createBookmark']>(async input => makeBookmark({
      id: 7,
      url: input.url,
      title: input.title ?? '',
      description: input.description ?? '',
      tag_names: input.tag_names ?? [],
    })),
    listTags: vi.fn<LinkdingApi['listTags']>(async () => tagPage()),
  } satisfies LinkdingApi;
}
