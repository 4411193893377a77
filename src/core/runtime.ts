/**
 * core/runtime.ts
 *
 * Wires a session config into a running command surface: platform,
 * undo memory, highlighter, engines, command modules, policies and the
 * pointer drag controller when the platform has an event source.
 */

import { SessionConfig } from './types';
import { CommandRegistry, registry as defaultRegistry } from './registry';
import { PolicyLoader } from './policy/loader';
import { engineSettingsFrom } from './config';
import { scopedLogger } from './logger';
import { EngineContext } from '../engine/context';
import { Engines, createEngines } from '../engine';
import { UndoMemory } from '../engine/undo_memory';
import { PointerDragController } from '../engine/pointer_drag';
import { TransientHighlighter } from '../platform/highlight';
import { WindowPlatform } from '../platform/types';
import { loadVirtualDesktop } from '../platform/virtual_desktop';
import { Win32Desktop } from '../platform/win32';
import { registerAllCommands } from '../commands';

const log = scopedLogger('core/runtime');

export interface Runtime {
  config: SessionConfig;
  registry: CommandRegistry;
  engines: Engines;
  pointer: PointerDragController | undefined;
  stop(): void;
}

export interface RuntimeOptions {
  registry?: CommandRegistry;
  platform?: WindowPlatform;
  now?: () => number;
}

export function createPlatform(config: SessionConfig): WindowPlatform {
  switch (config.platform) {
    case 'virtual':
      return loadVirtualDesktop(config.desktopPath);
    case 'win32':
      return new Win32Desktop();
  }
}

export function createRuntime(config: SessionConfig, options: RuntimeOptions = {}): Runtime {
  const now = options.now ?? Date.now;
  const registry = options.registry ?? defaultRegistry;
  const platform = options.platform ?? createPlatform(config);

  const ctx: EngineContext = {
    platform,
    memory: new UndoMemory(now),
    highlighter: new TransientHighlighter(config.highlightMs),
    settings: engineSettingsFrom(config),
    now
  };
  const engines = createEngines(ctx);
  registerAllCommands(registry, engines);

  const policies = new PolicyLoader(config.policyDir);
  policies.load();
  registry.init(config, policies);

  const source = platform.pointerEvents();
  const pointer = source ? new PointerDragController(ctx, source, config.pointer) : undefined;
  pointer?.start();

  log.info(
    { platform: config.platform, commands: registry.list().length, pointer: pointer !== undefined },
    'Runtime ready'
  );

  return {
    config,
    registry,
    engines,
    pointer,
    stop() {
      pointer?.stop();
    }
  };
}
