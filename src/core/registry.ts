/**
 * core/registry.ts
 *
 * Central dispatcher. Responsibilities:
 *   - Holds every registered CommandModule.
 *   - Exposes list() for the transports' command listings.
 *   - Resolves a command name to its module.
 *   - Validates arguments against the command's schema.
 *   - Dispatches invocations through the policy applier.
 *
 * invoke() never throws: every failure comes back as a result envelope
 * with success: false and a taxonomy code (see errors.ts).
 */

import Ajv, { ValidateFunction } from 'ajv';
import {
  CommandInvocation,
  CommandModule,
  CommandResult,
  CommandSchema,
  SessionConfig
} from './types';
import { MissingArgumentError, UnknownCommandError, ValidationError, errorCode, errorMessage } from './errors';
import { PolicyLoader } from './policy/loader';
import { RateLimiter, applyPolicy } from './policy/applier';
import { scopedLogger } from './logger';

const log = scopedLogger('core/registry');

interface IndexEntry {
  module: CommandModule;
  schema: CommandSchema;
  validate: ValidateFunction;
}

export class CommandRegistry {
  private static instance: CommandRegistry | null = null;

  /** module name → CommandModule */
  private readonly modules = new Map<string, CommandModule>();

  /** command name → module, schema and compiled validator */
  private readonly commandIndex = new Map<string, IndexEntry>();

  private readonly ajv = new Ajv({ allErrors: true, useDefaults: true });
  private policyLoader: PolicyLoader | undefined;
  private sessionConfig: SessionConfig | undefined;
  private limiter = new RateLimiter();

  static getInstance(): CommandRegistry {
    if (!CommandRegistry.instance) {
      CommandRegistry.instance = new CommandRegistry();
    }
    return CommandRegistry.instance;
  }

  /** Must be called once before any dispatch. */
  init(sessionConfig: SessionConfig, policyLoader: PolicyLoader, limiter?: RateLimiter): void {
    if (this.sessionConfig) {
      log.warn('Registry already initialized, ignoring duplicate init call');
      return;
    }
    this.sessionConfig = sessionConfig;
    this.policyLoader = policyLoader;
    if (limiter) this.limiter = limiter;
    log.info({ policies: policyLoader.listCommands().length }, 'Registry initialized');
  }

  isInitialized(): boolean {
    return this.sessionConfig !== undefined;
  }

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  register(mod: CommandModule): void {
    if (this.modules.has(mod.name)) {
      log.warn({ module: mod.name }, 'Module already registered, overwriting');
    }
    this.modules.set(mod.name, mod);

    for (const schema of mod.commands) {
      const validate = this.ajv.compile(schema.parameters);
      this.commandIndex.set(schema.name, { module: mod, schema, validate });
    }

    log.debug({ module: mod.name, commands: mod.commands.map(c => c.name) }, 'Command module registered');
  }

  // -----------------------------------------------------------------------
  // Listing
  // -----------------------------------------------------------------------

  list(): CommandSchema[] {
    const schemas: CommandSchema[] = [];
    for (const mod of this.modules.values()) {
      schemas.push(...mod.commands);
    }
    return schemas;
  }

  listCommandNames(): string[] {
    return Array.from(this.commandIndex.keys());
  }

  // -----------------------------------------------------------------------
  // Dispatch
  // -----------------------------------------------------------------------

  /**
   * Flow:
   *   1. Resolve the command
   *   2. Look up its policy
   *   3. Hand off to the applier, which wraps validate + execute with the policy
   */
  async invoke(invocation: CommandInvocation): Promise<CommandResult> {
    const start = Date.now();
    const command = invocation.command;

    try {
      if (!this.sessionConfig || !this.policyLoader) {
        throw new Error('CommandRegistry not initialized. Call init() before using the registry.');
      }
      const entry = this.commandIndex.get(command);
      if (!entry) throw new UnknownCommandError(command);

      const policy = this.policyLoader.get(command);
      log.debug(
        { command, hasPolicy: policy !== undefined, source: invocation.meta.source, correlationId: invocation.meta.correlationId },
        'Dispatching command'
      );

      const executeFn = async (name: string, args: Record<string, unknown>): Promise<CommandResult> => {
        const checked = this.validateArgs(entry, name, args);
        return entry.module.execute(name, checked);
      };

      const result = await applyPolicy(invocation, policy, this.sessionConfig, executeFn, this.limiter);
      return { ...result, durationMs: Date.now() - start };
    } catch (e) {
      const code = errorCode(e);
      if (code === 'EXECUTION_ERROR') {
        log.error({ command, error: errorMessage(e) }, 'Command failed');
      } else {
        log.debug({ command, code, error: errorMessage(e) }, 'Command rejected');
      }
      return {
        success: false,
        error: {
          code,
          message: errorMessage(e),
          ...(e instanceof Error && 'details' in e && isRecord(e.details) ? { details: e.details } : {})
        },
        durationMs: Date.now() - start
      };
    }
  }

  private validateArgs(entry: IndexEntry, command: string, args: Record<string, unknown>): Record<string, unknown> {
    for (const required of entry.schema.parameters.required ?? []) {
      if (args[required] === undefined) throw new MissingArgumentError(command, required);
    }
    // useDefaults writes into the object it validates
    const checked = { ...args };
    if (!entry.validate(checked)) {
      throw new ValidationError(command, entry.validate.errors ?? []);
    }
    return checked;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const registry = CommandRegistry.getInstance();
