/**
 * core/hooks.ts
 *
 * Central registry for named hooks.
 * Policies reference hooks by string name (e.g. "log_action").
 * This module resolves those names to actual functions.
 *
 * Built-in hooks are registered at the bottom of this file.
 * Application code can add custom hooks via registerHook().
 */

import * as fs from 'fs';
import { HookModule, HookRef, PostHookFn, PreHookFn } from './types';
import { HookError, HookNotFoundError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/hooks');

// name → { pre?, post? }
const hookRegistry = new Map<string, HookModule>();

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerHook(name: string, mod: HookModule): void {
  hookRegistry.set(name, mod);
  log.debug({ name }, 'Hook registered');
}

export function unregisterHook(name: string): void {
  hookRegistry.delete(name);
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Inline refs ({ module, export }) may only name these modules. Each
 * maps export names onto hooks registered in this file.
 */
const INLINE_MODULES: Record<string, readonly string[]> = {
  builtin: ['log_action', 'normalize_direction']
};

function hookName(ref: HookRef): string {
  return typeof ref === 'string' ? ref : `${ref.module}#${ref.export}`;
}

/**
 * Given a HookRef (string name or { module, export } object),
 * return the HookModule. Throws if not found.
 */
export function resolveHook(ref: HookRef): HookModule {
  if (typeof ref === 'string') {
    const mod = hookRegistry.get(ref);
    if (!mod) throw new HookNotFoundError(ref);
    return mod;
  }

  const exports = INLINE_MODULES[ref.module];
  if (!exports) {
    log.error({ module: ref.module }, 'Hook module not in whitelist');
    throw new HookNotFoundError(`${hookName(ref)} - not in whitelist`);
  }
  const mod = exports.includes(ref.export) ? hookRegistry.get(ref.export) : undefined;
  if (!mod) throw new HookNotFoundError(hookName(ref));
  return mod;
}

function asError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/** Resolves the ref, calls .pre(), wraps errors. */
export async function runPreHook(
  ref: HookRef,
  ctx: Parameters<PreHookFn>[0]
): Promise<Record<string, unknown>> {
  const name = hookName(ref);
  const mod = resolveHook(ref);

  if (!mod.pre) {
    log.debug({ hookName: name }, 'Hook has no pre function, skipping');
    return ctx.args;
  }

  try {
    return await mod.pre(ctx);
  } catch (e) {
    throw new HookError(name, 'pre', asError(e));
  }
}

/** Resolves the ref, calls .post(), wraps errors. */
export async function runPostHook(
  ref: HookRef,
  ctx: Parameters<PostHookFn>[0]
): Promise<typeof ctx.result> {
  const name = hookName(ref);
  const mod = resolveHook(ref);

  if (!mod.post) {
    log.debug({ hookName: name }, 'Hook has no post function, skipping');
    return ctx.result;
  }

  try {
    return await mod.post(ctx);
  } catch (e) {
    throw new HookError(name, 'post', asError(e));
  }
}

export function listHooks(): string[] {
  return Array.from(hookRegistry.keys());
}

// ===========================================================================
// Built-in hooks
// ===========================================================================

/**
 * log_action (pre + post)
 * Appends a structured JSON line per phase to the session's audit log.
 */
registerHook('log_action', {
  pre: async (ctx) => {
    appendAuditLog(ctx.sessionConfig.auditLogPath, {
      phase: 'pre',
      command: ctx.command,
      args: ctx.args,
      timestamp: new Date().toISOString()
    });
    return ctx.args;
  },
  post: async (ctx) => {
    appendAuditLog(ctx.sessionConfig.auditLogPath, {
      phase: 'post',
      command: ctx.command,
      result: ctx.result,
      timestamp: new Date().toISOString()
    });
    return ctx.result;
  }
});

function appendAuditLog(logPath: string, entry: Record<string, unknown>): void {
  fs.appendFileSync(logPath, JSON.stringify(entry) + '\n');
}

/**
 * normalize_direction (pre)
 * Lets binding schemes send compass names or any casing:
 * "West" → "left", "NORTH" → "up". Applies to `direction` and `side`.
 */
const DIRECTION_ALIASES: Record<string, string> = {
  west: 'left',
  east: 'right',
  north: 'up',
  south: 'down'
};

registerHook('normalize_direction', {
  pre: async (ctx) => {
    const out = { ...ctx.args };
    for (const key of ['direction', 'side']) {
      const value = out[key];
      if (typeof value !== 'string') continue;
      const lower = value.trim().toLowerCase();
      out[key] = DIRECTION_ALIASES[lower] ?? lower;
    }
    return out;
  }
});
