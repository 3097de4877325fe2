/**
 * Tests for Linkding result rendering.
 */

import { describe, it, expect } from 'vitest';
import {
  formatBookmarkBlock,
  formatBookmarkList,
  formatCreatedBookmark,
  formatTagList,
  formatTagNames,
} from '../format.js';
import { makeBookmark, makeTag } from '../../__testUtils__/linkding.js';

describe('formatTagNames', () => {
  it('should render tags space-separated in brackets', () => {
    expect(formatTagNames(['dev', 'typescript'])).toBe('[dev typescript]');
  });
});

describe('formatBookmarkBlock', () => {
  it('should render only title and URL when description and tags are empty', () => {
    const block = formatBookmarkBlock(makeBookmark({ title: 'Plain', url: 'https://plain.test' }));

    expect(block).toBe('• **Plain**\n  URL: https://plain.test\n\n');
    expect(block.split('\n')).toEqual(['• **Plain**', '  URL: https://plain.test', '', '']);
  });

  it('should include description and tags when present', () => {
    const block = formatBookmarkBlock(makeBookmark({
      title: 'Full',
      url: 'https://full.test',
      description: 'Everything set',
      tag_names: ['a', 'b'],
    }));

    expect(block).toBe('• **Full**\n  URL: https://full.test\n  Description: Everything set\n  Tags: [a b]\n\n');
  });

  it('should include tags without a description', () => {
    const block = formatBookmarkBlock(makeBookmark({ title: 'T', url: 'https://t.test', tag_names: ['x'] }));

    expect(block).toBe('• **T**\n  URL: https://t.test\n  Tags: [x]\n\n');
  });
});

describe('formatBookmarkList', () => {
  it('should render an empty list as a zero-count header', () => {
    expect(formatBookmarkList([])).toBe('Found 0 bookmarks:\n\n');
  });

  it('should keep the order of the results', () => {
    const text = formatBookmarkList([
      makeBookmark({ title: 'A', url: 'https://a.test' }),
      makeBookmark({ title: 'B', url: 'https://b.test', description: 'second' }),
      makeBookmark({ title: 'C', url: 'https://c.test' }),
    ]);

    expect(text).toBe(
      'Found 3 bookmarks:\n\n' +
      '• **A**\n  URL: https://a.test\n\n' +
      '• **B**\n  URL: https://b.test\n  Description: second\n\n' +
      '• **C**\n  URL: https://c.test\n\n',
    );
  });

  it('should render the same input identically every time', () => {
    const bookmarks = [makeBookmark({ tag_names: ['one', 'two'], description: 'd' })];

    expect(formatBookmarkList(bookmarks)).toBe(formatBookmarkList(bookmarks));
  });
});

describe('formatTagList', () => {
  it('should say so when there are no tags', () => {
    expect(formatTagList([])).toBe('No tags found');
  });

  it('should list tags with their ids in order', () => {
    const text = formatTagList([
      makeTag({ id: 3, name: 'dev' }),
      makeTag({ id: 1, name: 'reading' }),
      makeTag({ id: 9, name: 'ts' }),
    ]);

    expect(text).toBe('Found 3 tags:\n\n• dev (ID: 3)\n• reading (ID: 1)\n• ts (ID: 9)\n');
  });
});

describe('formatCreatedBookmark', () => {
  it('should render id and no trailing blank line', () => {
    const text = formatCreatedBookmark(makeBookmark({ id: 7, title: '', url: 'https://x.test' }));

    expect(text).toBe('✅ Bookmark created successfully!\n\n• ****\n  URL: https://x.test\n  ID: 7');
  });

  it('should append description and tags lines when present', () => {
    const text = formatCreatedBookmark(makeBookmark({
      id: 8,
      title: 'Docs',
      url: 'https://docs.test',
      description: 'Reference',
      tag_names: ['ref', 'docs'],
    }));

    expect(text).toBe(
      '✅ Bookmark created successfully!\n\n• **Docs**\n  URL: https://docs.test\n  ID: 8' +
      '\n  Description: Reference\n  Tags: [ref docs]',
    );
  });
});
