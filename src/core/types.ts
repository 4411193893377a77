/**
 * core/types.ts
 *
 * Single source of truth for the shared types of the dispatcher layer.
 * Geometry lives in geometry/, platform contracts in platform/types.ts.
 */

import type { SchemaObject } from 'ajv';

// ---------------------------------------------------------------------------
// Utility: Correlation ID generation
// ---------------------------------------------------------------------------

export function generateCorrelationId(): string {
  return `cmd_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

// ---------------------------------------------------------------------------
// Command schema (what the dispatcher surfaces list)
// ---------------------------------------------------------------------------

export interface CommandParameter {
  type: string;
  properties?: Record<string, CommandParameter>;
  required?: string[];
  items?: CommandParameter;
  description?: string;
  enum?: string[];
  default?: unknown;
}

export interface CommandSchema {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, CommandParameter>;
    required?: string[];
    additionalProperties?: boolean;
  };
}

// ---------------------------------------------------------------------------
// Session configuration
// ---------------------------------------------------------------------------

export type TransportMode = 'stdio' | 'http';
export type PlatformKind = 'virtual' | 'win32';
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface AppOverride {
  minW?: number;                           // floor for shrink-to-minimum
  minH?: number;
  compactW?: number;                       // docked size for this app
  compactH?: number;
}

export interface PointerTimings {
  tickMs: number;                          // resize drain interval (~30fps)
  watchdogMs: number;                      // event-source liveness check interval
  staleAfterMs: number;                    // silence after which the source is restarted
}

export interface SessionConfig {
  transportMode: TransportMode;
  port: number;                            // HTTP only
  logLevel: LogLevel;
  platform: PlatformKind;
  desktopPath: string;                     // virtual desktop layout file
  policyDir: string;                       // per-command policy files
  auditLogPath: string;                    // file path for the audit trail hook
  snapTolerance: number;                   // px; edge-stuck detection
  cycleTolerance: number;                  // px; toggle/cycle step detection
  stepParts: number;                       // one step = screen dimension / stepParts
  shrinkMaxIterations: number;
  compactW: number;
  compactH: number;
  compactMaxRows: number;
  screenUndoWindowMs: number;              // repeat-to-undo window for screen moves
  highlightMs: number;                     // lifetime of a transient highlight
  pointer: PointerTimings;
  appOverrides: Record<string, AppOverride>;   // keyed by lower-cased app name
  screenNameOverrides: Record<string, string>; // role → name pattern
}

// ---------------------------------------------------------------------------
// Dispatcher input: the single normalised shape both transports emit
// ---------------------------------------------------------------------------

export interface CommandInvocation {
  command: string;                         // resolved command name (e.g. "window.center")
  args: Record<string, unknown>;
  meta: CallMeta;
}

export interface CallMeta {
  source: 'stdio' | 'http' | 'internal';   // which surface produced the call
  timestamp: number;                       // Date.now() when the invocation was received
  correlationId?: string;
}

// ---------------------------------------------------------------------------
// Command module contract: every command family implements this
// ---------------------------------------------------------------------------

export interface CommandModule {
  /** Unique registry key. */
  name: string;

  /**
   * All command schemas this module exposes. Most modules expose several
   * (e.g. window_layout exposes window.center, window.maximize …).
   */
  commands: CommandSchema[];

  /**
   * The single dispatcher. The registry calls this with the resolved schema
   * name so the module can fan out internally.
   */
  execute(commandName: string, args: Record<string, unknown>): Promise<CommandResult>;
}

// ---------------------------------------------------------------------------
// Result envelope: what execute() returns
// ---------------------------------------------------------------------------

export interface CommandResult {
  success: boolean;
  data?: unknown;
  error?: CommandError;
  durationMs: number;
}

export interface CommandError {
  code: string;                            // maps to our error taxonomy (see errors.ts)
  message: string;
  details?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Command policy
// ---------------------------------------------------------------------------

export interface RateLimitPolicy {
  maxCallsPerSecond: number;
  burstAllowance: number;                  // extra calls allowed above the steady rate (key repeat)
}

/**
 * Hook references can be either:
 *   - a string name resolved from the hook registry, or
 *   - an inline object naming a whitelisted module + export.
 */
export type HookRef =
  | string
  | { module: string; export: string };

export interface CommandPolicy {
  command: string;

  /** Tighter JSON Schema checked on top of the command's own schema. */
  inputValidation?: SchemaObject;

  /** Named or inline hook that runs BEFORE execute(). Can rewrite args. */
  preHook?: HookRef;

  /** Named or inline hook that runs AFTER execute(). Can rewrite the result. */
  postHook?: HookRef;

  rateLimits?: RateLimitPolicy;
}

// ---------------------------------------------------------------------------
// Hook contract
// ---------------------------------------------------------------------------

export interface PreHookContext {
  command: string;
  args: Record<string, unknown>;
  sessionConfig: SessionConfig;
}

export interface PostHookContext {
  command: string;
  args: Record<string, unknown>;
  result: CommandResult;
  sessionConfig: SessionConfig;
}

export type PreHookFn  = (ctx: PreHookContext)  => Promise<Record<string, unknown>>;
export type PostHookFn = (ctx: PostHookContext) => Promise<CommandResult>;

export interface HookModule {
  pre?:  PreHookFn;
  post?: PostHookFn;
}
