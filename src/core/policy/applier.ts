/**
 * core/policy/applier.ts
 *
 * The execution wrapper that sits between the registry and a command
 * module's execute(). It reads the command's policy and applies it in
 * order:
 *
 *   1. Rate limit (held-down keys repeat at 30+/s)
 *   2. Input validation (the policy's stricter schema, if any)
 *   3. Pre-hook
 *   4. execute()
 *   5. Post-hook
 *
 * Stateful only for rate limiting (per-command call timestamps).
 */

import Ajv, { SchemaObject, ValidateFunction } from 'ajv';
import { CommandInvocation, CommandPolicy, CommandResult, SessionConfig } from '../types';
import { runPostHook, runPreHook } from '../hooks';
import { RateLimitError, ValidationError } from '../errors';
import { scopedLogger } from '../logger';

const log = scopedLogger('core/policy/applier');
const ajv = new Ajv({ allErrors: true });

// ---------------------------------------------------------------------------
// Rate limiting (1-second sliding window per command)
// ---------------------------------------------------------------------------

const STALE_AFTER_MS = 60000;

export class RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private lastCleanup: number;

  constructor(private readonly now: () => number = Date.now) {
    this.lastCleanup = now();
  }

  check(policy: CommandPolicy): void {
    if (!policy.rateLimits) return;

    const { maxCallsPerSecond, burstAllowance } = policy.rateLimits;
    const now = this.now();
    const windowStart = now - 1000;

    const timestamps = (this.windows.get(policy.command) ?? []).filter(ts => ts > windowStart);
    this.windows.set(policy.command, timestamps);
    this.cleanup(now);

    if (timestamps.length >= maxCallsPerSecond + burstAllowance) {
      throw new RateLimitError(policy.command);
    }
    timestamps.push(now);
  }

  private cleanup(now: number): void {
    if (now - this.lastCleanup <= STALE_AFTER_MS) return;
    this.lastCleanup = now;
    for (const [command, timestamps] of this.windows) {
      const last = timestamps[timestamps.length - 1];
      if (last === undefined || last < now - STALE_AFTER_MS) {
        this.windows.delete(command);
        log.debug({ command }, 'Dropped idle rate limit window');
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Input validation
// ---------------------------------------------------------------------------

const compiled = new WeakMap<SchemaObject, ValidateFunction>();

function validateInput(policy: CommandPolicy, args: Record<string, unknown>): void {
  if (!policy.inputValidation) return;

  let validate = compiled.get(policy.inputValidation);
  if (!validate) {
    validate = ajv.compile(policy.inputValidation);
    compiled.set(policy.inputValidation, validate);
  }
  if (!validate(args)) {
    throw new ValidationError(policy.command, validate.errors ?? []);
  }
}

// ---------------------------------------------------------------------------
// Main public API
// ---------------------------------------------------------------------------

export type ApplierExecuteFn = (command: string, args: Record<string, unknown>) => Promise<CommandResult>;

const defaultLimiter = new RateLimiter();

/**
 * Wrap a command's execute function with its policy. Policy failures
 * (rate limit, validation, hooks) are thrown; the registry turns them
 * into failed results.
 */
export async function applyPolicy(
  invocation: CommandInvocation,
  policy: CommandPolicy | undefined,
  sessionConfig: SessionConfig,
  executeFn: ApplierExecuteFn,
  limiter: RateLimiter = defaultLimiter
): Promise<CommandResult> {
  const command = invocation.command;

  if (!policy) {
    return executeFn(command, invocation.args);
  }

  limiter.check(policy);
  validateInput(policy, invocation.args);

  let args = invocation.args;
  if (policy.preHook) {
    args = await runPreHook(policy.preHook, { command, args, sessionConfig });
  }

  let result = await executeFn(command, args);

  if (policy.postHook) {
    result = await runPostHook(policy.postHook, { command, args, result, sessionConfig });
  }

  return result;
}
