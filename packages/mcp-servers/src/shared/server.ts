/**
 * Base MCP Server implementation
 *
 * Provides the protocol core every transport drives:
 * - JSON-RPC 2.0 envelope validation and error codes
 * - MCP protocol methods (initialize, ping, tools/list, tools/call)
 * - Tool catalog built from a static table of Zod schemas, used both for
 *   `tools/list` and for argument validation
 * - Line-delimited stdio transport
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { z, type ZodError, type ZodSchema, type ZodType, type ZodTypeDef } from 'zod';
import {
  InitializeParamsSchema,
  JsonRpcIdSchema,
  JsonRpcRequestSchema,
  McpToolCallParamsSchema,
  JSON_RPC_ERRORS,
  SUPPORTED_PROTOCOL_VERSIONS,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type JsonSchemaObject,
  type McpToolDefinition,
  type McpToolCallResult,
} from './types.js';

/**
 * Per-call context handed to tool handlers by the transport.
 * `signal` aborts when the caller goes away (HTTP transport only).
 */
export interface ToolCallContext {
  signal?: AbortSignal;
}

export interface ToolHandler<TArgs = unknown> {
  name: string;
  description: string;
  /** Input type is left open so schemas with `.default()` fit. */
  schema: ZodType<TArgs, ZodTypeDef, unknown>;
  /** Advertised as `outputSchema`; the handler fills `structuredContent` to match. */
  outputSchema?: ZodSchema;
  /**
   * Fields advertised as required on top of the ones the schema requires.
   * Used when the handler itself reports a missing value as a tool error.
   */
  required?: readonly string[];
  handler: (args: TArgs, context: ToolCallContext) => McpToolCallResult | Promise<McpToolCallResult>;
}

/**
 * Type alias for heterogeneous tool arrays.
 *
 * Each tool in the array has its own concrete TArgs; `unknown` would make the
 * handler parameter contravariant and reject every typed handler.
 */
export type AnyToolHandler = ToolHandler<any>;

export interface McpServerOptions {
  name: string;
  version: string;
  tools: AnyToolHandler[];
}

export interface ServerInfo {
  name: string;
  version: string;
}

export function textResult(text: string, structuredContent?: Record<string, unknown>): McpToolCallResult {
  const result: McpToolCallResult = { content: [{ type: 'text', text }] };
  if (structuredContent) {
    result.structuredContent = structuredContent;
  }
  return result;
}

export function errorResult(text: string): McpToolCallResult {
  return { content: [{ type: 'text', text }], isError: true };
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Convert a single Zod type to JSON Schema representation
 */
function zodTypeToJsonSchema(schema: ZodSchema): Record<string, unknown> {
  const withDescription = (result: Record<string, unknown>): Record<string, unknown> => {
    if (schema.description) {
      result.description = schema.description;
    }
    return result;
  };

  if (schema instanceof z.ZodOptional) {
    return withDescription(zodTypeToJsonSchema(schema.unwrap()));
  }

  if (schema instanceof z.ZodDefault) {
    const inner = zodTypeToJsonSchema(schema._def.innerType);
    return withDescription({ ...inner, default: schema._def.defaultValue() });
  }

  if (schema instanceof z.ZodString) {
    return withDescription({ type: 'string' });
  }

  if (schema instanceof z.ZodNumber) {
    return withDescription({ type: schema.isInt ? 'integer' : 'number' });
  }

  if (schema instanceof z.ZodBoolean) {
    return withDescription({ type: 'boolean' });
  }

  if (schema instanceof z.ZodArray) {
    return withDescription({
      type: 'array',
      items: zodTypeToJsonSchema(schema.element),
    });
  }

  if (schema instanceof z.ZodEnum) {
    return withDescription({
      type: 'string',
      enum: schema.options,
    });
  }

  if (schema instanceof z.ZodLiteral) {
    return withDescription({ const: schema.value });
  }

  if (schema instanceof z.ZodObject) {
    return withDescription({ ...zodToJsonSchema(schema) });
  }

  // Fallback
  return withDescription({ type: 'string' });
}

/**
 * Convert a Zod object schema to the JSON Schema MCP clients expect.
 * Fields wrapped in `.optional()` or `.default()` are not required unless
 * listed in `extraRequired`.
 */
export function zodToJsonSchema(schema: ZodSchema, extraRequired: readonly string[] = []): JsonSchemaObject {
  if (!(schema instanceof z.ZodObject)) {
    return { type: 'object', properties: {} };
  }

  const shape: Record<string, ZodSchema> = schema.shape;
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(shape)) {
    const property = zodTypeToJsonSchema(value);
    const isOptional = value instanceof z.ZodOptional || value instanceof z.ZodDefault;

    if (extraRequired.includes(key)) {
      // A required field advertises no default
      delete property.default;
      required.push(key);
    } else if (!isOptional) {
      required.push(key);
    }
    properties[key] = property;
  }

  const result: JsonSchemaObject = { type: 'object', properties };
  if (required.length > 0) {
    result.required = required;
  }
  return result;
}

const PartialIdSchema = z.object({ id: JsonRpcIdSchema });

export class McpServer {
  private readonly name: string;
  private readonly version: string;
  private readonly tools: Map<string, AnyToolHandler>;
  private readonly toolDefinitions: McpToolDefinition[];

  constructor(options: McpServerOptions) {
    this.name = options.name;
    this.version = options.version;
    this.tools = new Map();
    this.toolDefinitions = [];

    for (const tool of options.tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);

      const definition: McpToolDefinition = {
        name: tool.name,
        description: tool.description,
        inputSchema: zodToJsonSchema(tool.schema, tool.required),
      };
      if (tool.outputSchema) {
        definition.outputSchema = zodToJsonSchema(tool.outputSchema);
      }
      this.toolDefinitions.push(definition);
    }
  }

  public get info(): ServerInfo {
    return { name: this.name, version: this.version };
  }

  /**
   * Create a success JSON-RPC response object
   */
  private createSuccessResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
    return { jsonrpc: '2.0', id, result };
  }

  /**
   * Handle a validated JSON-RPC request and return the response.
   * Returns null for notifications.
   */
  private async handleRequest(request: JsonRpcRequest, context: ToolCallContext): Promise<JsonRpcResponse | null> {
    const { method, params } = request;

    // Notifications never get a response
    if (request.id === undefined || method.startsWith('notifications/')) {
      return null;
    }
    const id = request.id;

    try {
      switch (method) {
        case 'initialize':
          return this.createSuccessResponse(id, {
            protocolVersion: this.negotiateProtocolVersion(params),
            capabilities: { tools: {} },
            serverInfo: this.info,
          });

        case 'ping':
          return this.createSuccessResponse(id, {});

        case 'tools/list':
          return this.createSuccessResponse(id, { tools: this.toolDefinitions });

        case 'tools/call':
          return await this.handleToolCall(id, params, context);

        default:
          return createErrorResponse(id, JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Unknown method: ${method}`);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return createErrorResponse(id, JSON_RPC_ERRORS.INTERNAL_ERROR, message);
    }
  }

  private negotiateProtocolVersion(params: unknown): string {
    const parsed = InitializeParamsSchema.safeParse(params ?? {});
    const requested = parsed.success ? parsed.data.protocolVersion : undefined;
    const supported: readonly string[] = SUPPORTED_PROTOCOL_VERSIONS;
    if (requested && supported.includes(requested)) {
      return requested;
    }
    return SUPPORTED_PROTOCOL_VERSIONS[0];
  }

  /**
   * Handle a tool call and return the response
   */
  protected async handleToolCall(id: JsonRpcId, params: unknown, context: ToolCallContext): Promise<JsonRpcResponse> {
    const parseResult = McpToolCallParamsSchema.safeParse(params);
    if (!parseResult.success) {
      return createErrorResponse(
        id,
        JSON_RPC_ERRORS.INVALID_PARAMS,
        `Invalid tool call params: ${formatZodError(parseResult.error)}`,
      );
    }

    const { name, arguments: args } = parseResult.data;
    const tool = this.tools.get(name);

    if (!tool) {
      return createErrorResponse(id, JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Unknown tool: ${name}`);
    }

    const argsParseResult = tool.schema.safeParse(args ?? {});
    if (!argsParseResult.success) {
      return createErrorResponse(
        id,
        JSON_RPC_ERRORS.INVALID_PARAMS,
        `Invalid arguments for ${name}: ${formatZodError(argsParseResult.error)}`,
      );
    }

    try {
      const result = await tool.handler(argsParseResult.data, context);
      return this.createSuccessResponse(id, result);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[${this.name}] Tool ${name} threw: ${message}\n`);
      return this.createSuccessResponse(id, errorResult(message));
    }
  }

  /**
   * Process a JSON-RPC message and return the response.
   *
   * Transports call this with the decoded message. Thread-safe: no
   * instance-level mutable state is touched during request processing.
   *
   * Returns null for notifications, which don't produce a response.
   */
  public async processRequest(request: unknown, context: ToolCallContext = {}): Promise<JsonRpcResponse | null> {
    const parseResult = JsonRpcRequestSchema.safeParse(request);
    if (!parseResult.success) {
      const partial = PartialIdSchema.safeParse(request);
      return createErrorResponse(
        partial.success ? partial.data.id : null,
        JSON_RPC_ERRORS.INVALID_REQUEST,
        `Invalid request: ${formatZodError(parseResult.error)}`,
      );
    }

    return this.handleRequest(parseResult.data, context);
  }

  /**
   * Serve JSON-RPC over stdin/stdout until stdin ends.
   * Exits with status 1 if a line cannot be decoded.
   */
  public start(): void {
    process.stderr.write(`[${this.name}] ${this.name} MCP Server v${this.version} running on stdio\n`);

    process.on('SIGINT', () => process.exit(0));
    process.on('SIGTERM', () => process.exit(0));

    serveStdio(this, process.stdin, process.stdout).then(
      () => process.exit(0),
      (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`[${this.name}] Stdio session ended: ${message}\n`);
        process.exit(1);
      },
    );
  }
}

export function createErrorResponse(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

export class StdioDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StdioDecodeError';
  }
}

/**
 * Line-delimited JSON-RPC loop.
 *
 * Requests are handled one at a time in arrival order. Resolves at end of
 * input; rejects with StdioDecodeError on the first line that is not JSON,
 * after answering it with a parse error.
 */
export async function serveStdio(server: McpServer, input: Readable, output: Writable): Promise<void> {
  const rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
  const writeResponse = (response: JsonRpcResponse): void => {
    output.write(`${JSON.stringify(response)}\n`);
  };

  try {
    for await (const line of rl) {
      if (!line.trim()) { continue; }

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (jsonErr) {
        const message = jsonErr instanceof Error ? jsonErr.message : String(jsonErr);
        process.stderr.write(`[${server.info.name}] JSON parse error: ${message}\n`);
        writeResponse(createErrorResponse(null, JSON_RPC_ERRORS.PARSE_ERROR, 'Parse error'));
        throw new StdioDecodeError(`failed to decode request: ${message}`);
      }

      const response = await server.processRequest(parsed);
      if (response) {
        writeResponse(response);
      }
    }
  } finally {
    rl.close();
  }
}
