#!/usr/bin/env node
/**
 * Linkding MCP Server
 *
 * Exposes bookmark search, bookmark creation and tag listing from a Linkding
 * instance as MCP tools. Each tool call is one REST call; failures reported by
 * Linkding come back as tool results flagged `isError`, never as JSON-RPC
 * errors.
 *
 * Protocol: JSON-RPC 2.0 over stdin/stdout (default) or HTTP (`--transport http`)
 *
 * Required env vars:
 * - LINKDING_URL: base URL of the Linkding instance
 * - LINKDING_API_TOKEN: API token (Settings > Integrations)
 * Optional:
 * - LINKDING_TIMEOUT_MS: per-request timeout (default 30000)
 * - MCP_TRANSPORT: stdio | http
 * - MCP_BIND_ADDRESS: host:port for the HTTP transport (default :8080)
 *
 * @version 1.0.0
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { McpServer, errorResult, textResult, type AnyToolHandler, type ToolCallContext } from '../shared/server.js';
import { listenHttp } from '../shared/http-transport.js';
import { LinkdingClient, isLinkdingApiError, type LinkdingApi } from './client.js';
import { loadConfig } from './config.js';
import { formatBookmarkList, formatCreatedBookmark, formatTagList } from './format.js';
import {
  BookmarkResultSchema,
  CreateBookmarkArgsSchema,
  GetTagsArgsSchema,
  SearchBookmarksArgsSchema,
  BOOKMARK_CREATED_MESSAGE,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_TAGS_LIMIT,
  type BookmarkResult,
  type CreateBookmarkArgs,
  type GetTagsArgs,
  type SearchBookmarksArgs,
} from './types.js';

export const SERVER_NAME = 'linkding-mcp';
export const SERVER_VERSION = '1.0.0';

export interface LinkdingServerConfig {
  client: LinkdingApi;
}

function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function logFailure(tool: string, err: unknown): void {
  const kind = isLinkdingApiError(err) ? err.kind : 'unexpected';
  process.stderr.write(`[${SERVER_NAME}] ${tool} failed (${kind}): ${describeFailure(err)}\n`);
}

// ============================================================================
// Factory Function
// ============================================================================

export function createLinkdingServer(config: LinkdingServerConfig): McpServer {
  const { client } = config;

  // limit: 0 means "not supplied"
  async function searchBookmarks(args: SearchBookmarksArgs, { signal }: ToolCallContext) {
    const limit = args.limit || DEFAULT_SEARCH_LIMIT;

    try {
      const page = await client.listBookmarks({ limit, offset: 0, query: args.query }, { signal });
      return textResult(formatBookmarkList(page.results));
    } catch (err) {
      logFailure('search_bookmarks', err);
      return errorResult(`Failed to search bookmarks: ${describeFailure(err)}`);
    }
  }

  async function createBookmark(args: CreateBookmarkArgs, { signal }: ToolCallContext) {
    if (!args.url) {
      return errorResult('URL is required');
    }

    try {
      const bookmark = await client.createBookmark({
        url: args.url,
        title: args.title,
        description: args.description,
        tag_names: args.tags,
      }, { signal });

      const structured: BookmarkResult = {
        id: bookmark.id,
        url: bookmark.url,
        title: bookmark.title,
        success: true,
        message: BOOKMARK_CREATED_MESSAGE,
      };
      if (bookmark.description) {
        structured.description = bookmark.description;
      }
      if (bookmark.tag_names.length > 0) {
        structured.tags = bookmark.tag_names;
      }

      return textResult(formatCreatedBookmark(bookmark), structured);
    } catch (err) {
      logFailure('create_bookmark', err);
      return errorResult(`Failed to create bookmark: ${describeFailure(err)}`);
    }
  }

  async function getTags(args: GetTagsArgs, { signal }: ToolCallContext) {
    const limit = args.limit || DEFAULT_TAGS_LIMIT;

    try {
      const page = await client.listTags({ limit, offset: 0 }, { signal });
      return textResult(formatTagList(page.results));
    } catch (err) {
      logFailure('get_tags', err);
      return errorResult(`Failed to get tags: ${describeFailure(err)}`);
    }
  }

  // ============================================================================
  // Tool Catalog
  // ============================================================================

  const tools: AnyToolHandler[] = [
    {
      name: 'search_bookmarks',
      description: 'Search bookmarks in Linkding. Returns title, URL, description and tags for each match.',
      schema: SearchBookmarksArgsSchema,
      handler: searchBookmarks,
    },
    {
      name: 'create_bookmark',
      description: 'Create a new bookmark in Linkding.',
      schema: CreateBookmarkArgsSchema,
      outputSchema: BookmarkResultSchema,
      required: ['url'],
      handler: createBookmark,
    },
    {
      name: 'get_tags',
      description: 'Get all available tags from Linkding.',
      schema: GetTagsArgsSchema,
      handler: getTags,
    },
  ];

  return new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    tools,
  });
}

// ============================================================================
// Auto-start Guard (Module Entry Point)
// ============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const client = new LinkdingClient({
    baseUrl: config.linkdingUrl,
    apiToken: config.apiToken,
    timeoutMs: config.timeoutMs,
  });
  const server = createLinkdingServer({ client });

  process.stderr.write(`[${SERVER_NAME}] Linkding base URL: ${config.linkdingUrl}\n`);

  if (config.transport === 'http') {
    process.on('SIGINT', () => process.exit(0));
    process.on('SIGTERM', () => process.exit(0));
    await listenHttp(server, config.bind.host, config.bind.port);
    return;
  }

  server.start();
}

const __filename = fileURLToPath(import.meta.url);

/** npm links the bin through a symlink, so compare real paths. */
function isEntryPoint(): boolean {
  if (!process.argv[1]) { return false; }
  try {
    return fs.realpathSync(path.resolve(process.argv[1])) === fs.realpathSync(__filename);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err: unknown) => {
    process.stderr.write(`Error: ${describeFailure(err)}\n`);
    process.exit(1);
  });
}
