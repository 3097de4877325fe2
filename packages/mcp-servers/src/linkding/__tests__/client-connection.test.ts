/**
 * LinkdingClient against a real HTTP server on the loopback interface,
 * for behaviour that depends on how response bodies are read.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { LinkdingClient } from '../client.js';

type Responder = (req: IncomingMessage, res: ServerResponse) => void;

describe('LinkdingClient over HTTP', () => {
  let httpServer: Server;
  let baseUrl: string;
  let respond: Responder;
  let connections: number;

  beforeAll(async () => {
    httpServer = createServer((req, res) => respond(req, res));
    httpServer.on('connection', () => {
      connections += 1;
    });
    await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
    const address = httpServer.address();
    if (!address || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    httpServer.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      httpServer.close(err => (err ? reject(err) : resolve()));
    });
  });

  beforeEach(() => {
    connections = 0;
  });

  it('should report a timeout while reading the body as a transport error', async () => {
    respond = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.write('{"count": 1, "results": [');
    };
    const client = new LinkdingClient({ baseUrl, apiToken: 'test-token', timeoutMs: 200 });

    const error = await client.listTags({}).catch((err: unknown) => err);

    expect(error).toMatchObject({
      kind: 'transport',
      status: null,
      message: 'request timed out after 200ms',
    });
  });

  it('should reuse one connection across repeated status errors', async () => {
    const largeBody = JSON.stringify({ detail: 'x'.repeat(1024 * 1024) });
    respond = (_req, res) => {
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(largeBody);
    };
    const client = new LinkdingClient({ baseUrl, apiToken: 'test-token' });

    for (let i = 0; i < 5; i++) {
      const error = await client.listTags({}).catch((err: unknown) => err);
      expect(error).toMatchObject({ kind: 'status', status: 500 });
    }

    expect(connections).toBe(1);
  });
});
