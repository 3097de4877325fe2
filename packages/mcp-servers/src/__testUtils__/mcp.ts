/**
 * Helpers for driving an McpServer through processRequest() in tests.
 *
 * @module __testUtils__/mcp
 */

import { z } from 'zod';
import type { McpServer } from '../shared/server.js';
import { isErrorResponse, type JsonRpcErrorResponse, type JsonRpcResponse } from '../shared/types.js';

export const ToolCallResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional(),
  structuredContent: z.record(z.unknown()).optional(),
});

export type ToolCallResult = z.infer<typeof ToolCallResultSchema>;

let _nextId = 1;

function nextId(): number {
  return _nextId++;
}

export async function sendRequest(server: McpServer, method: string, params?: unknown): Promise<JsonRpcResponse> {
  const response = await server.processRequest({ jsonrpc: '2.0', id: nextId(), method, params });
  if (!response) {
    throw new Error(`No response for ${method}`);
  }
  return response;
}

export function expectResult(response: JsonRpcResponse | null): unknown {
  if (!response) {
    throw new Error('Expected a response, got none');
  }
  if (isErrorResponse(response)) {
    throw new Error(`Expected a result, got error ${response.error.code}: ${response.error.message}`);
  }
  return response.result;
}

export function expectError(response: JsonRpcResponse | null): JsonRpcErrorResponse['error'] {
  if (!response) {
    throw new Error('Expected a response, got none');
  }
  if (!isErrorResponse(response)) {
    throw new Error(`Expected an error, got result ${JSON.stringify(response.result)}`);
  }
  return response.error;
}

/** Send tools/call and return the raw JSON-RPC response. */
export function callToolRaw(server: McpServer, name: string, args?: Record<string, unknown>): Promise<JsonRpcResponse> {
  return sendRequest(server, 'tools/call', args === undefined ? { name } : { name, arguments: args });
}

/** Send tools/call and return the validated tool result. */
export async function callTool(server: McpServer, name: string, args: Record<string, unknown> = {}): Promise<ToolCallResult> {
  const response = await callToolRaw(server, name, args);
  return ToolCallResultSchema.parse(expectResult(response));
}

export function textOf(result: ToolCallResult): string {
  const [first] = result.content;
  if (!first) {
    throw new Error('Tool result has no content');
  }
  return first.text;
}
