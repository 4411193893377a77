/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('engine/focus');
 *
 * Child loggers are scoped with a `module` field so logs can be
 * filtered per-module. server.ts initialises the root before it loads
 * the engines and command modules, so their children see the
 * configured level.
 */

import pino from 'pino';
import { LogLevel } from './types';

let instance: pino.Logger | null = null;

export function initLogger(config: { logLevel?: LogLevel }): pino.Logger {
  instance = pino({
    level: config.logLevel ?? 'info'
  });
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = pino({ level: process.env.STEPWISE_LOG_LEVEL ?? 'info' });
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('engine/shrink');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  return getLogger().child({ module: moduleName });
}
