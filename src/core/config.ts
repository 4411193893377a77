/**
 * core/config.ts
 *
 * Session configuration. Precedence, highest first:
 *   CLI flags (--transport, --port, --platform, --config)
 *   environment (STEPWISE_LOG_LEVEL, STEPWISE_PLATFORM, STEPWISE_PORT, STEPWISE_CONFIG)
 *   config/session.json
 *   built-in defaults
 *
 * The file is validated against SESSION_FILE_SCHEMA; a file that exists
 * but does not match raises ConfigError rather than being ignored.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { AppOverride, LogLevel, PlatformKind, SessionConfig, TransportMode } from './types';
import { ConfigError } from './errors';
import { DEFAULT_ENGINE_SETTINGS, DEFAULT_POINTER_TIMINGS, EngineSettings } from '../engine/context';

export const TRANSPORT_MODES: readonly TransportMode[] = ['stdio', 'http'];
export const PLATFORM_KINDS: readonly PlatformKind[] = ['virtual', 'win32'];
export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  transportMode: 'stdio',
  port: 3000,
  logLevel: 'info',
  platform: 'virtual',
  desktopPath: 'config/desktop.json',
  policyDir: 'config/policies',
  auditLogPath: 'audit.log',
  snapTolerance: DEFAULT_ENGINE_SETTINGS.snapTolerance,
  cycleTolerance: DEFAULT_ENGINE_SETTINGS.cycleTolerance,
  stepParts: DEFAULT_ENGINE_SETTINGS.stepParts,
  shrinkMaxIterations: DEFAULT_ENGINE_SETTINGS.shrinkMaxIterations,
  compactW: DEFAULT_ENGINE_SETTINGS.compactW,
  compactH: DEFAULT_ENGINE_SETTINGS.compactH,
  compactMaxRows: DEFAULT_ENGINE_SETTINGS.compactMaxRows,
  screenUndoWindowMs: DEFAULT_ENGINE_SETTINGS.screenUndoWindowMs,
  highlightMs: 300,
  pointer: { ...DEFAULT_POINTER_TIMINGS },
  appOverrides: {},
  screenNameOverrides: {}
};

const positive = { type: 'number', exclusiveMinimum: 0 };
const nonNegative = { type: 'number', minimum: 0 };

export const SESSION_FILE_SCHEMA = {
  type: 'object',
  properties: {
    transportMode: { type: 'string', enum: TRANSPORT_MODES },
    port: { type: 'integer', minimum: 1, maximum: 65535 },
    logLevel: { type: 'string', enum: LOG_LEVELS },
    platform: { type: 'string', enum: PLATFORM_KINDS },
    desktopPath: { type: 'string' },
    policyDir: { type: 'string' },
    auditLogPath: { type: 'string' },
    snapTolerance: nonNegative,
    cycleTolerance: nonNegative,
    stepParts: { type: 'integer', minimum: 1 },
    shrinkMaxIterations: { type: 'integer', minimum: 1 },
    compactW: positive,
    compactH: positive,
    compactMaxRows: { type: 'integer', minimum: 0 },
    screenUndoWindowMs: nonNegative,
    highlightMs: nonNegative,
    pointer: {
      type: 'object',
      properties: {
        tickMs: positive,
        watchdogMs: positive,
        staleAfterMs: positive
      },
      additionalProperties: false
    },
    appOverrides: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          minW: nonNegative,
          minH: nonNegative,
          compactW: positive,
          compactH: positive
        },
        additionalProperties: false
      }
    },
    screenNameOverrides: {
      type: 'object',
      propertyNames: { enum: ['bottom', 'center', 'top', 'left', 'right'] },
      additionalProperties: { type: 'string' }
    }
  },
  additionalProperties: false
};

type SessionFile = Partial<Omit<SessionConfig, 'pointer'>> & { pointer?: Partial<SessionConfig['pointer']> };

const ajv = new Ajv({ allErrors: true });
const validateSessionFile = ajv.compile<SessionFile>(SESSION_FILE_SCHEMA);

// ---------------------------------------------------------------------------
// CLI
// ---------------------------------------------------------------------------

export interface CliOverrides {
  transport?: TransportMode;
  port?: number;
  platform?: PlatformKind;
  config?: string;
}

function isTransportMode(value: unknown): value is TransportMode {
  return typeof value === 'string' && (TRANSPORT_MODES as readonly string[]).includes(value);
}

function isPlatformKind(value: unknown): value is PlatformKind {
  return typeof value === 'string' && (PLATFORM_KINDS as readonly string[]).includes(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const port = parseInt(raw, 10);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : undefined;
}

export function parseCli(argv: string[]): CliOverrides {
  const out: CliOverrides = {};
  for (let i = 0; i < argv.length; i++) {
    const value = argv[i + 1];
    switch (argv[i]) {
      case '--transport':
        if (!isTransportMode(value)) throw new ConfigError('<cli>', [`--transport must be one of ${TRANSPORT_MODES.join(', ')}`]);
        out.transport = value;
        i++;
        break;
      case '--port':
        out.port = parsePort(value);
        if (out.port === undefined) throw new ConfigError('<cli>', ['--port must be an integer between 1 and 65535']);
        i++;
        break;
      case '--platform':
        if (!isPlatformKind(value)) throw new ConfigError('<cli>', [`--platform must be one of ${PLATFORM_KINDS.join(', ')}`]);
        out.platform = value;
        i++;
        break;
      case '--config':
        if (value === undefined) throw new ConfigError('<cli>', ['--config needs a path']);
        out.config = value;
        i++;
        break;
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadOptions {
  cli?: CliOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function readSessionFile(filePath: string): SessionFile {
  if (!fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e: unknown) {
    throw new ConfigError(filePath, [e instanceof Error ? e.message : String(e)]);
  }
  if (!validateSessionFile(raw)) {
    throw new ConfigError(filePath, validateSessionFile.errors ?? []);
  }
  return raw;
}

function lowerCaseKeys(overrides: Record<string, AppOverride>): Record<string, AppOverride> {
  const out: Record<string, AppOverride> = {};
  for (const [app, value] of Object.entries(overrides)) out[app.toLowerCase()] = value;
  return out;
}

export function loadSessionConfig(options: LoadOptions = {}): SessionConfig {
  const cli = options.cli ?? {};
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const configPath = path.resolve(cwd, cli.config ?? env.STEPWISE_CONFIG ?? path.join('config', 'session.json'));
  const file = readSessionFile(configPath);

  const envPlatform = env.STEPWISE_PLATFORM;
  if (envPlatform !== undefined && !isPlatformKind(envPlatform)) {
    throw new ConfigError('STEPWISE_PLATFORM', [`must be one of ${PLATFORM_KINDS.join(', ')}`]);
  }
  const envLogLevel = env.STEPWISE_LOG_LEVEL;
  if (envLogLevel !== undefined && !isLogLevel(envLogLevel)) {
    throw new ConfigError('STEPWISE_LOG_LEVEL', [`must be one of ${LOG_LEVELS.join(', ')}`]);
  }
  const envPort = parsePort(env.STEPWISE_PORT);
  if (env.STEPWISE_PORT !== undefined && envPort === undefined) {
    throw new ConfigError('STEPWISE_PORT', ['must be an integer between 1 and 65535']);
  }

  const d = DEFAULT_SESSION_CONFIG;
  return {
    transportMode: cli.transport ?? file.transportMode ?? d.transportMode,
    port: cli.port ?? envPort ?? file.port ?? d.port,
    logLevel: envLogLevel ?? file.logLevel ?? d.logLevel,
    platform: cli.platform ?? envPlatform ?? file.platform ?? d.platform,
    desktopPath: path.resolve(cwd, file.desktopPath ?? d.desktopPath),
    policyDir: path.resolve(cwd, file.policyDir ?? d.policyDir),
    auditLogPath: path.resolve(cwd, file.auditLogPath ?? d.auditLogPath),
    snapTolerance: file.snapTolerance ?? d.snapTolerance,
    cycleTolerance: file.cycleTolerance ?? d.cycleTolerance,
    stepParts: file.stepParts ?? d.stepParts,
    shrinkMaxIterations: file.shrinkMaxIterations ?? d.shrinkMaxIterations,
    compactW: file.compactW ?? d.compactW,
    compactH: file.compactH ?? d.compactH,
    compactMaxRows: file.compactMaxRows ?? d.compactMaxRows,
    screenUndoWindowMs: file.screenUndoWindowMs ?? d.screenUndoWindowMs,
    highlightMs: file.highlightMs ?? d.highlightMs,
    pointer: { ...d.pointer, ...file.pointer },
    appOverrides: lowerCaseKeys(file.appOverrides ?? d.appOverrides),
    screenNameOverrides: { ...(file.screenNameOverrides ?? d.screenNameOverrides) }
  };
}

export function engineSettingsFrom(config: SessionConfig): EngineSettings {
  return {
    snapTolerance: config.snapTolerance,
    cycleTolerance: config.cycleTolerance,
    stepParts: config.stepParts,
    shrinkMaxIterations: config.shrinkMaxIterations,
    compactW: config.compactW,
    compactH: config.compactH,
    compactMaxRows: config.compactMaxRows,
    screenUndoWindowMs: config.screenUndoWindowMs,
    appOverrides: config.appOverrides,
    screenNameOverrides: config.screenNameOverrides
  };
}
