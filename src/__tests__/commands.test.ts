import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandRegistry } from '../core/registry';
import { PolicyLoader } from '../core/policy/loader';
import { DEFAULT_SESSION_CONFIG } from '../core/config';
import { Runtime, createRuntime } from '../core/runtime';
import { CommandInvocation } from '../core/types';
import { DesktopLayout, VirtualDesktop } from '../platform/virtual_desktop';
import { SINGLE_SCREEN } from './helpers';

const LAYOUT: DesktopLayout = {
  screens: SINGLE_SCREEN,
  windows: [
    { id: 1, app: 'A', frame: { x: 100, y: 100, w: 600, h: 400 } },
    { id: 2, app: 'B', frame: { x: 800, y: 100, w: 600, h: 400 } }
  ],
  focusedId: 1
};

function call(command: string, args: Record<string, unknown> = {}): CommandInvocation {
  return { command, args, meta: { source: 'internal', timestamp: Date.now() } };
}

describe('command surface', () => {
  let dir: string;
  let runtime: Runtime;
  let desktop: VirtualDesktop;

  function boot(layout: DesktopLayout = LAYOUT): CommandRegistry {
    desktop = new VirtualDesktop(layout);
    runtime = createRuntime(
      { ...DEFAULT_SESSION_CONFIG, policyDir: dir, auditLogPath: path.join(dir, 'audit.log') },
      { registry: new CommandRegistry(), platform: desktop }
    );
    return runtime.registry;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stepwise-commands-'));
    fs.writeFileSync(
      path.join(dir, 'focus.direction.json'),
      JSON.stringify({ command: 'focus.direction', preHook: 'normalize_direction' })
    );
  });

  afterEach(() => {
    runtime.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists every command', () => {
    const registry = boot();
    expect(registry.listCommandNames().sort()).toEqual([
      'focus.direction',
      'focus.highlight',
      'focus.screen',
      'screen.map',
      'screen.moveTo',
      'window.center',
      'window.compact',
      'window.edge.move',
      'window.edge.resize',
      'window.halfThird',
      'window.maximize',
      'window.shrink',
      'window.step.move',
      'window.step.resize'
    ]);
    expect(runtime.pointer).toBeDefined();
  });

  it('runs geometry commands against the focused window', async () => {
    const registry = boot();

    await expect(registry.invoke(call('window.center'))).resolves.toMatchObject({
      success: true,
      data: { applied: true, step: 'center-vertical', frame: { x: 100, y: 250, w: 600, h: 400 } }
    });
    await expect(registry.invoke(call('window.step.move', { direction: 'up' }))).resolves.toMatchObject({
      success: true,
      data: { frame: { x: 100, y: 220, w: 600, h: 400 } }
    });
    await expect(registry.invoke(call('window.halfThird', { side: 'left' }))).resolves.toMatchObject({
      success: true,
      data: { side: 'left', step: 'half', frame: { x: 0, y: 0, w: 750, h: 900 } }
    });
    await expect(registry.invoke(call('window.compact'))).resolves.toMatchObject({
      success: true,
      data: { action: 'docked', row: 0, frame: { x: 0, y: 600, w: 400, h: 300 } }
    });
    expect(desktop.window(1).frame()).toEqual({ x: 0, y: 600, w: 400, h: 300 });
  });

  it('runs the policy pre-hook before checking the command schema', async () => {
    const registry = boot();
    await expect(registry.invoke(call('focus.direction', { direction: 'East' }))).resolves.toMatchObject({
      success: true,
      data: { applied: true, id: 2, appName: 'B' }
    });
    expect(desktop.focusedWindow()?.id()).toBe(2);
  });

  it('reports nothing to do as a successful no-op', async () => {
    const registry = boot({ ...LAYOUT, focusedId: undefined });
    await expect(registry.invoke(call('window.maximize'))).resolves.toMatchObject({
      success: true,
      data: { applied: false, reason: 'no focused window' }
    });

    await expect(registry.invoke(call('screen.moveTo', { role: 'top' }))).resolves.toMatchObject({
      success: true,
      data: { applied: false, reason: 'no focused window' }
    });
  });

  it('reports a role no screen holds', async () => {
    const registry = boot();
    await expect(registry.invoke(call('screen.moveTo', { role: 'top' }))).resolves.toMatchObject({
      success: true,
      data: { applied: false, reason: 'no screen holds the top role' }
    });
  });

  it('describes the screen roles', async () => {
    const registry = boot();
    const result = await registry.invoke(call('screen.map'));
    expect(result.data).toEqual({
      applied: true,
      roles: { bottom: { id: 1, name: 'Built-in Display', frame: { x: 0, y: 0, w: 1500, h: 900 } } }
    });
  });

  it('turns dispatch failures into error envelopes', async () => {
    const registry = boot();

    await expect(registry.invoke(call('window.teleport'))).resolves.toMatchObject({
      success: false,
      error: { code: 'UNKNOWN_COMMAND', message: 'Unknown command: "window.teleport"' }
    });
    await expect(registry.invoke(call('window.step.move'))).resolves.toMatchObject({
      success: false,
      error: { code: 'MISSING_ARGUMENT', details: { command: 'window.step.move', argName: 'direction' } }
    });
    await expect(registry.invoke(call('window.step.move', { direction: 'sideways' }))).resolves.toMatchObject({
      success: false,
      error: { code: 'VALIDATION_ERROR' }
    });
    await expect(registry.invoke(call('window.center', { extra: true }))).resolves.toMatchObject({
      success: false,
      error: { code: 'VALIDATION_ERROR' }
    });
  });

  it('refuses to dispatch before init', async () => {
    const registry = new CommandRegistry();
    const result = await registry.invoke(call('window.center'));
    expect(result.success).toBe(false);
    expect(result.error?.message).toBe('CommandRegistry not initialized. Call init() before using the registry.');
  });

  it('ignores a second init', () => {
    const registry = boot();
    registry.init({ ...DEFAULT_SESSION_CONFIG, policyDir: path.join(dir, 'other') }, new PolicyLoader(path.join(dir, 'other')));
    expect(registry.isInitialized()).toBe(true);
  });
});
