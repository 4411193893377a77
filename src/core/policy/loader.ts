/**
 * core/policy/loader.ts
 *
 * Reads every .json file from the policy directory (config/policies/ by
 * default) at startup and builds a lookup map: command → CommandPolicy.
 *
 * Files are checked against POLICY_SCHEMA. Invalid files are logged and
 * skipped; a broken policy never stops the server from starting.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { CommandPolicy } from '../types';
import { scopedLogger } from '../logger';

const log = scopedLogger('core/policy/loader');

const hookRefSchema = {
  oneOf: [
    { type: 'string', minLength: 1 },
    {
      type: 'object',
      properties: { module: { type: 'string' }, export: { type: 'string' } },
      required: ['module', 'export'],
      additionalProperties: false
    }
  ]
};

export const POLICY_SCHEMA = {
  type: 'object',
  properties: {
    command: { type: 'string', minLength: 1 },
    inputValidation: { type: 'object' },
    preHook: hookRefSchema,
    postHook: hookRefSchema,
    rateLimits: {
      type: 'object',
      properties: {
        maxCallsPerSecond: { type: 'number', minimum: 0 },
        burstAllowance: { type: 'number', minimum: 0 }
      },
      required: ['maxCallsPerSecond', 'burstAllowance'],
      additionalProperties: false
    }
  },
  required: ['command'],
  additionalProperties: false
};

const ajv = new Ajv({ allErrors: true });
const validatePolicy = ajv.compile<CommandPolicy>(POLICY_SCHEMA);

export class PolicyLoader {
  private readonly policies = new Map<string, CommandPolicy>();
  private readonly policyDir: string;

  constructor(policyDir?: string) {
    this.policyDir = policyDir ?? path.resolve(process.cwd(), 'config', 'policies');
  }

  /** Scan the policy directory. Call once at startup. */
  load(): void {
    if (!fs.existsSync(this.policyDir)) {
      log.warn({ dir: this.policyDir }, 'Policy directory does not exist, no policies loaded');
      return;
    }

    const files = fs.readdirSync(this.policyDir).filter(f => f.endsWith('.json')).sort();
    log.info({ dir: this.policyDir, count: files.length }, 'Loading policies');

    for (const file of files) {
      const filePath = path.join(this.policyDir, file);
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      } catch (e) {
        log.error({ file, error: e instanceof Error ? e.message : String(e) }, 'Failed to parse policy file, skipped');
        continue;
      }
      if (!validatePolicy(raw)) {
        log.error({ file, errors: ajv.errorsText(validatePolicy.errors) }, 'Policy file does not match the schema, skipped');
        continue;
      }
      this.add(raw);
      log.debug({ file, command: raw.command }, 'Policy loaded');
    }

    log.info({ total: this.policies.size }, 'Policies loaded');
  }

  /** Programmatic registration, also used by the tests. */
  add(policy: CommandPolicy): void {
    if (this.policies.has(policy.command)) {
      log.warn({ command: policy.command }, 'Duplicate policy, the later one wins');
    }
    this.policies.set(policy.command, policy);
  }

  get(command: string): CommandPolicy | undefined {
    return this.policies.get(command);
  }

  getAll(): Map<string, CommandPolicy> {
    return new Map(this.policies);
  }

  listCommands(): string[] {
    return Array.from(this.policies.keys());
  }
}
