/**
 * Tests for Linkding MCP configuration loading.
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, MISSING_CREDENTIALS_ERROR, loadConfig, parseBindAddress } from '../config.js';

const BASE_ENV = {
  LINKDING_URL: 'https://links.example.test',
  LINKDING_API_TOKEN: 'test-token',
};

describe('loadConfig', () => {
  it.each<[string, Record<string, string>]>([
    ['no variables', {}],
    ['only the URL', { LINKDING_URL: 'https://links.example.test' }],
    ['only the token', { LINKDING_API_TOKEN: 'test-token' }],
    ['an empty token', { ...BASE_ENV, LINKDING_API_TOKEN: '' }],
  ])('should fail with the credentials message given %s', (_label, env) => {
    expect(() => loadConfig(env, [])).toThrow(MISSING_CREDENTIALS_ERROR);
  });

  it('should apply defaults', () => {
    expect(loadConfig(BASE_ENV, [])).toEqual({
      linkdingUrl: 'https://links.example.test',
      apiToken: 'test-token',
      timeoutMs: 30000,
      transport: 'stdio',
      bind: { host: '0.0.0.0', port: 8080 },
    });
  });

  it('should read transport, bind and timeout from the environment', () => {
    const config = loadConfig({
      ...BASE_ENV,
      LINKDING_TIMEOUT_MS: '5000',
      MCP_TRANSPORT: 'http',
      MCP_BIND_ADDRESS: 'localhost:3000',
    }, []);

    expect(config.timeoutMs).toBe(5000);
    expect(config.transport).toBe('http');
    expect(config.bind).toEqual({ host: 'localhost', port: 3000 });
  });

  it('should let flags override the environment', () => {
    const config = loadConfig(
      { ...BASE_ENV, MCP_TRANSPORT: 'stdio', MCP_BIND_ADDRESS: ':8080' },
      ['--transport', 'http', '--bind', '127.0.0.1:9000'],
    );

    expect(config.transport).toBe('http');
    expect(config.bind).toEqual({ host: '127.0.0.1', port: 9000 });
  });

  it('should reject an invalid URL', () => {
    expect(() => loadConfig({ ...BASE_ENV, LINKDING_URL: 'not a url' }, [])).toThrow(
      'Invalid configuration: LINKDING_URL: LINKDING_URL must be a valid URL',
    );
  });

  it('should reject an unknown transport', () => {
    expect(() => loadConfig(BASE_ENV, ['--transport', 'sse'])).toThrow(ConfigError);
  });

  it('should reject an unknown flag', () => {
    expect(() => loadConfig(BASE_ENV, ['--verbose'])).toThrow(ConfigError);
  });
});

describe('parseBindAddress', () => {
  it('should bind every interface when the host is empty', () => {
    expect(parseBindAddress(':8080')).toEqual({ host: '0.0.0.0', port: 8080 });
  });

  it.each(['8080', 'host:', 'host:http', ':70000'])('should reject %j', (address) => {
    expect(() => parseBindAddress(address)).toThrow(ConfigError);
  });
});
