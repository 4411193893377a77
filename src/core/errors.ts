/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what shows up in CommandError.code.
 *
 * Engines do not throw for the everyday soft cases (no focused window,
 * no screen in that direction, a shrink loop hitting its cap, a stale
 * window id). Those are no-ops. What lands here is configuration,
 * dispatch and platform failure.
 */

export class StepwiseError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

/** A config file exists but does not match its schema. */
export class ConfigError extends StepwiseError {
  constructor(file: string, violations: unknown[]) {
    super(`Invalid configuration in "${file}"`, 'CONFIG_ERROR', { file, violations });
  }
}

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

/** Arguments failed the command schema or the policy's stricter schema. */
export class ValidationError extends StepwiseError {
  constructor(command: string, violations: unknown[]) {
    super(
      `Validation failed for command "${command}"`,
      'VALIDATION_ERROR',
      { command, violations }
    );
  }
}

/** A required argument is missing entirely. */
export class MissingArgumentError extends StepwiseError {
  constructor(command: string, argName: string) {
    super(
      `Missing required argument "${argName}" for command "${command}"`,
      'MISSING_ARGUMENT',
      { command, argName }
    );
  }
}

// ---------------------------------------------------------------------------
// Registry / dispatch errors
// ---------------------------------------------------------------------------

/** A command name that no registered module exposes. */
export class UnknownCommandError extends StepwiseError {
  constructor(command: string) {
    super(`Unknown command: "${command}"`, 'UNKNOWN_COMMAND', { command });
  }
}

/** Command was called more frequently than its policy allows. */
export class RateLimitError extends StepwiseError {
  constructor(command: string) {
    super(`Rate limit exceeded for command "${command}"`, 'RATE_LIMIT_EXCEEDED', { command });
  }
}

// ---------------------------------------------------------------------------
// Platform errors
// ---------------------------------------------------------------------------

/** The underlying window-system call failed. */
export class PlatformError extends StepwiseError {
  constructor(platform: string, message: string, details?: Record<string, unknown>) {
    super(message, 'PLATFORM_ERROR', { platform, ...details });
  }
}

// ---------------------------------------------------------------------------
// Hook errors
// ---------------------------------------------------------------------------

/** A pre- or post-hook threw an error. */
export class HookError extends StepwiseError {
  constructor(hookName: string, phase: 'pre' | 'post', cause: Error) {
    super(
      `Hook "${hookName}" failed in ${phase} phase: ${cause.message}`,
      'HOOK_ERROR',
      { hookName, phase, originalError: cause.message }
    );
  }
}

/** A hook name referenced in a policy could not be found in the hook registry. */
export class HookNotFoundError extends StepwiseError {
  constructor(hookRef: string) {
    super(`Hook not found: "${hookRef}"`, 'HOOK_NOT_FOUND', { hookRef });
  }
}

/** Reads the taxonomy code off anything thrown. */
export function errorCode(e: unknown, fallback = 'EXECUTION_ERROR'): string {
  return e instanceof StepwiseError ? e.code : fallback;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
