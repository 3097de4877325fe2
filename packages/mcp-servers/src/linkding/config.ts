/**
 * Process configuration for the Linkding MCP server, read from the
 * environment with command-line overrides.
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { formatZodError } from '../shared/server.js';
import { DEFAULT_TIMEOUT_MS } from './types.js';

export const MISSING_CREDENTIALS_ERROR =
  'LINKDING_URL and LINKDING_API_TOKEN environment variables are required';

export const TRANSPORTS = ['stdio', 'http'] as const;
export type Transport = (typeof TRANSPORTS)[number];

export interface BindAddress {
  host: string;
  port: number;
}

export interface LinkdingMcpConfig {
  linkdingUrl: string;
  apiToken: string;
  timeoutMs: number;
  transport: Transport;
  bind: BindAddress;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  LINKDING_URL: z.string().url('LINKDING_URL must be a valid URL'),
  LINKDING_API_TOKEN: z.string().min(1),
  LINKDING_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  MCP_TRANSPORT: z.enum(TRANSPORTS).default('stdio'),
  MCP_BIND_ADDRESS: z.string().default(':8080'),
});

/**
 * Parse `host:port` or `:port`. An empty host binds every interface.
 */
export function parseBindAddress(address: string): BindAddress {
  const separator = address.lastIndexOf(':');
  if (separator === -1) {
    throw new ConfigError(`Invalid bind address "${address}": expected host:port or :port`);
  }

  const host = address.slice(0, separator) || '0.0.0.0';
  const portText = address.slice(separator + 1);
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new ConfigError(`Invalid bind address "${address}": port must be 0-65535`);
  }

  return { host, port };
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv.slice(2),
): LinkdingMcpConfig {
  if (!env['LINKDING_URL'] || !env['LINKDING_API_TOKEN']) {
    throw new ConfigError(MISSING_CREDENTIALS_ERROR);
  }

  let values: { transport?: string; bind?: string };
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        transport: { type: 'string' },
        bind: { type: 'string' },
      },
      strict: true,
    }));
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }

  const parsed = EnvSchema.safeParse({
    ...env,
    MCP_TRANSPORT: values.transport ?? env['MCP_TRANSPORT'],
    MCP_BIND_ADDRESS: values.bind ?? env['MCP_BIND_ADDRESS'],
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }

  return {
    linkdingUrl: parsed.data.LINKDING_URL,
    apiToken: parsed.data.LINKDING_API_TOKEN,
    timeoutMs: parsed.data.LINKDING_TIMEOUT_MS,
    transport: parsed.data.MCP_TRANSPORT,
    bind: parseBindAddress(parsed.data.MCP_BIND_ADDRESS),
  };
}
