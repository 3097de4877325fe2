/**
 * MCP HTTP transport
 *
 * Accepts JSON-RPC messages as `POST /mcp` and answers each with a single
 * JSON response. Concurrent requests are processed concurrently.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import { createErrorResponse, type McpServer } from './server.js';
import { JSON_RPC_ERRORS } from './types.js';

export const MCP_ENDPOINT = '/mcp';

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createHttpApp(server: McpServer): express.Express {
  const app = express();
  const { name, version } = server.info;

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', name, version });
  });

  app.post(MCP_ENDPOINT, (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;

    if (body === null || typeof body !== 'object' || Array.isArray(body)) {
      res.status(400).json(createErrorResponse(
        null,
        JSON_RPC_ERRORS.INVALID_REQUEST,
        'Request body must be a single JSON-RPC object',
      ));
      return;
    }

    // Abort the remote call if the client disconnects first
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    server.processRequest(body, { signal: controller.signal })
      .then((response) => {
        if (res.headersSent || controller.signal.aborted) {
          return;
        }
        if (!response) {
          res.status(202).end();
          return;
        }
        res.json(response);
      })
      .catch(next);
  });

  app.get(MCP_ENDPOINT, (_req: Request, res: Response) => {
    res.status(405).set('Allow', 'POST').json({ error: 'Method not allowed' });
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', path: req.path });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json(createErrorResponse(null, JSON_RPC_ERRORS.PARSE_ERROR, 'Parse error'));
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[${name}] Unhandled HTTP error: ${message}\n`);
    res.status(500).json(createErrorResponse(null, JSON_RPC_ERRORS.INTERNAL_ERROR, message));
  });

  return app;
}

/**
 * Listen on `host:port`. Resolves once the socket is bound.
 */
export function listenHttp(server: McpServer, host: string, port: number): Promise<Server> {
  const app = createHttpApp(server);
  const { name } = server.info;

  return new Promise((resolve, reject) => {
    const httpServer = app.listen(port, host, () => {
      httpServer.off('error', reject);
      process.stderr.write(`[${name}] MCP HTTP transport listening on http://${host}:${port}${MCP_ENDPOINT}\n`);
      resolve(httpServer);
    });
    httpServer.once('error', reject);
  });
}
