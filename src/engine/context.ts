/**
 * engine/context.ts
 *
 * What every engine is constructed with. Nothing in engine/ reads
 * global state; the store, the platform and the settings all come in
 * through here so each engine can be exercised on its own.
 */

import { AppOverride, PointerTimings } from '../core/types';
import { HighlightSink, WindowPlatform } from '../platform/types';
import { UndoMemory } from './undo_memory';

export interface EngineSettings {
  snapTolerance: number;
  cycleTolerance: number;
  stepParts: number;
  shrinkMaxIterations: number;
  compactW: number;
  compactH: number;
  compactMaxRows: number;
  screenUndoWindowMs: number;
  appOverrides: Record<string, AppOverride>;
  screenNameOverrides: Record<string, string>;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  snapTolerance: 5,
  cycleTolerance: 10,
  stepParts: 30,
  shrinkMaxIterations: 30,
  compactW: 400,
  compactH: 300,
  compactMaxRows: 10,
  screenUndoWindowMs: 1500,
  appOverrides: {},
  screenNameOverrides: {}
};

export const DEFAULT_POINTER_TIMINGS: PointerTimings = {
  tickMs: 33,
  watchdogMs: 3000,
  staleAfterMs: 10000
};

export interface EngineContext {
  platform: WindowPlatform;
  memory: UndoMemory;
  highlighter: HighlightSink;
  settings: EngineSettings;
  now: () => number;
}

export function appOverride(settings: EngineSettings, appName: string): AppOverride {
  return settings.appOverrides[appName.toLowerCase()] ?? {};
}
