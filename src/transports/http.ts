/**
 * transports/http.ts
 *
 * HTTP transport. Each request is synchronous: receive → dispatch → respond.
 *
 * Routes:
 *   GET  /commands/list    → Returns all registered command schemas
 *   POST /commands/call    → Executes a single command
 *   GET  /health           → Liveness check
 */

import express, { NextFunction, Request, Response } from 'express';
import { CommandRegistry } from '../core/registry';
import { generateCorrelationId } from '../core/types';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('transports/http');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createHttpTransport(registry: CommandRegistry): express.Application {
  const app = express();
  app.use(express.json());

  // -----------------------------------------------------------------------
  // GET /commands/list
  // -----------------------------------------------------------------------
  app.get('/commands/list', (_req: Request, res: Response) => {
    res.json({
      object: 'list',
      data: registry.list()
    });
  });

  // -----------------------------------------------------------------------
  // POST /commands/call
  // -----------------------------------------------------------------------
  app.post('/commands/call', async (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : generateCorrelationId();

    const name = isRecord(body) ? body.name : undefined;
    const args = isRecord(body) ? body.arguments ?? {} : undefined;
    if (typeof name !== 'string' || !isRecord(args)) {
      res.status(400).json({ error: 'Provide "name" and an optional "arguments" object' });
      return;
    }

    try {
      const result = await registry.invoke({
        command: name,
        args,
        meta: { source: 'http', timestamp: Date.now(), correlationId }
      });
      const status = result.success ? 200 : result.error?.code === 'UNKNOWN_COMMAND' ? 404 : 400;
      res.status(status).json({ object: 'command_result', correlationId, ...result });
    } catch (e) {
      next(e);
    }
  });

  // -----------------------------------------------------------------------
  // GET /health
  // -----------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', commands: registry.list().length });
  });

  // -----------------------------------------------------------------------
  // Error handler
  // -----------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    log.error({ error: err.message, path: req.path, method: req.method }, 'Unhandled error in HTTP transport');
    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal server error', message: err.message });
    }
  });

  return app;
}
