/**
 * Text rendering for Linkding tool results. Pure functions; the same input
 * always renders to the same string.
 */

import type { Bookmark, Tag } from './types.js';

/** Tag lists render as `[a b c]`. */
export function formatTagNames(tagNames: readonly string[]): string {
  return `[${tagNames.join(' ')}]`;
}

export function formatBookmarkBlock(bookmark: Bookmark): string {
  let block = `• **${bookmark.title}**\n  URL: ${bookmark.url}\n`;
  if (bookmark.description) {
    block += `  Description: ${bookmark.description}\n`;
  }
  if (bookmark.tag_names.length > 0) {
    block += `  Tags: ${formatTagNames(bookmark.tag_names)}\n`;
  }
  return `${block}\n`;
}

export function formatBookmarkList(bookmarks: readonly Bookmark[]): string {
  return `Found ${bookmarks.length} bookmarks:\n\n${bookmarks.map(formatBookmarkBlock).join('')}`;
}

export function formatTagList(tags: readonly Tag[]): string {
  if (tags.length === 0) {
    return 'No tags found';
  }
  return `Found ${tags.length} tags:\n\n${tags.map(tag => `• ${tag.name} (ID: ${tag.id})\n`).join('')}`;
}

export function formatCreatedBookmark(bookmark: Bookmark): string {
  let text = `✅ Bookmark created successfully!\n\n• **${bookmark.title}**\n  URL: ${bookmark.url}\n  ID: ${bookmark.id}`;
  if (bookmark.description) {
    text += `\n  Description: ${bookmark.description}`;
  }
  if (bookmark.tag_names.length > 0) {
    text += `\n  Tags: ${formatTagNames(bookmark.tag_names)}`;
  }
  return text;
}
