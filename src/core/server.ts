#!/usr/bin/env node
/**
 * core/server.ts
 *
 * The single entry point. Orchestrates startup in order:
 *   1. Load environment variables from .env
 *   2. Parse CLI args
 *   3. Load session config (CLI > env > config/session.json > defaults)
 *   4. Initialise the logger
 *   5. Load the engines, command modules and policies (runtime.ts)
 *   6. Start the selected transport
 *
 * Step 5 is a dynamic import: every module binds its scoped logger at
 * load time, so the root logger must exist with the configured level
 * before they load.
 */

import * as dotenv from 'dotenv';
import type { Server } from 'http';
import { loadSessionConfig, parseCli } from './config';
import { initLogger } from './logger';
import { errorMessage } from './errors';

dotenv.config();

let httpServer: Server | undefined;
let stopRuntime: (() => void) | undefined;

async function main(): Promise<void> {
  const cli = parseCli(process.argv.slice(2));
  const sessionConfig = loadSessionConfig({ cli });

  const root = initLogger(sessionConfig);
  const log = root.child({ module: 'core/server' });
  log.info(
    { transport: sessionConfig.transportMode, platform: sessionConfig.platform, port: sessionConfig.port },
    'stepwise-wm starting'
  );

  const { createRuntime } = await import('./runtime');
  const runtime = createRuntime(sessionConfig);
  stopRuntime = () => runtime.stop();

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Received shutdown signal');
    runtime.stop();
    if (!httpServer) process.exit(0);
    httpServer.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  switch (sessionConfig.transportMode) {
    case 'stdio': {
      const { startStdioTransport } = await import('../transports/stdio');
      startStdioTransport(runtime.registry);
      break;
    }
    case 'http': {
      const { createHttpTransport } = await import('../transports/http');
      const app = createHttpTransport(runtime.registry);
      const port = sessionConfig.port;
      httpServer = app.listen(port, () => {
        log.info({ port }, 'HTTP server listening');
      });
      break;
    }
  }
}

main().catch((e: unknown) => {
  stopRuntime?.();
  console.error('Fatal error during startup:', errorMessage(e));
  if (e instanceof Error && e.stack) console.error(e.stack);
  process.exit(1);
});
