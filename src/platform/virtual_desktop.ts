/**
 * platform/virtual_desktop.ts
 *
 * In-process window platform. Keeps screens, a front-to-back window
 * stack and the focused window in memory, and enforces per-window OS
 * minimum sizes the way a real window server refuses to shrink past
 * them. The test-suite and the `virtual` platform mode both run on it.
 *
 * Layout files (config/desktop.json) look like:
 *   {
 *     "screens": [{ "id": 1, "name": "Built-in Retina Display", "frame": {...}, "primary": true }],
 *     "windows": [{ "id": 10, "app": "Terminal", "frame": {...} }],
 *     "focusedId": 10
 *   }
 * Windows are listed front to back.
 */

import * as fs from 'fs';
import Ajv from 'ajv';
import { Rect, cloneRect } from '../geometry/rect';
import { ConfigError } from '../core/errors';
import { Compass, neighbourScreen, screenForFrame as locateScreen } from './screens';
import { scopedLogger } from '../core/logger';
import {
  PointerEvent,
  PointerEventSource,
  PointerHandler,
  ScreenId,
  ScreenRef,
  WindowId,
  WindowPlatform,
  WindowRef
} from './types';

const log = scopedLogger('platform/virtual_desktop');

// ---------------------------------------------------------------------------
// Layout description
// ---------------------------------------------------------------------------

export interface ScreenSpec {
  id: ScreenId;
  name: string;
  frame: Rect;
  primary?: boolean;
}

export interface WindowSpec {
  id: WindowId;
  app: string;
  frame: Rect;
  standard?: boolean;
  visible?: boolean;
  minW?: number;
  minH?: number;
}

export interface DesktopLayout {
  screens: ScreenSpec[];
  windows: WindowSpec[];
  focusedId?: WindowId;
}

const rectSchema = {
  type: 'object',
  properties: {
    x: { type: 'number' },
    y: { type: 'number' },
    w: { type: 'number', minimum: 0 },
    h: { type: 'number', minimum: 0 }
  },
  required: ['x', 'y', 'w', 'h'],
  additionalProperties: false
};

const layoutSchema = {
  type: 'object',
  properties: {
    screens: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          name: { type: 'string' },
          frame: rectSchema,
          primary: { type: 'boolean' }
        },
        required: ['id', 'name', 'frame'],
        additionalProperties: false
      }
    },
    windows: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          app: { type: 'string' },
          frame: rectSchema,
          standard: { type: 'boolean' },
          visible: { type: 'boolean' },
          minW: { type: 'number' },
          minH: { type: 'number' }
        },
        required: ['id', 'app', 'frame'],
        additionalProperties: false
      }
    },
    focusedId: { type: 'integer' }
  },
  required: ['screens', 'windows'],
  additionalProperties: false
};

const ajv = new Ajv({ allErrors: true });
const validateLayout = ajv.compile<DesktopLayout>(layoutSchema);

// ---------------------------------------------------------------------------
// Screens
// ---------------------------------------------------------------------------

class VirtualScreen implements ScreenRef {
  constructor(
    private readonly desktop: VirtualDesktop,
    private readonly props: ScreenSpec
  ) {}

  id(): ScreenId { return this.props.id; }
  name(): string { return this.props.name; }
  frame(): Rect { return cloneRect(this.props.frame); }

  toWest(): ScreenRef | undefined { return this.desktop.neighbour(this, 'west'); }
  toEast(): ScreenRef | undefined { return this.desktop.neighbour(this, 'east'); }
  toNorth(): ScreenRef | undefined { return this.desktop.neighbour(this, 'north'); }
  toSouth(): ScreenRef | undefined { return this.desktop.neighbour(this, 'south'); }
}

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

export class VirtualWindow implements WindowRef {
  private current: Rect;
  private minimized = false;

  constructor(
    private readonly desktop: VirtualDesktop,
    private readonly props: WindowSpec
  ) {
    this.current = cloneRect(props.frame);
  }

  id(): WindowId { return this.props.id; }
  appName(): string { return this.props.app; }
  frame(): Rect { return cloneRect(this.current); }

  /** Sizes below the window's own minimum are clamped, position is kept. */
  setFrame(frame: Rect): void {
    this.current = {
      x: frame.x,
      y: frame.y,
      w: Math.max(frame.w, this.props.minW ?? 0),
      h: Math.max(frame.h, this.props.minH ?? 0)
    };
  }

  screenOf(): ScreenRef {
    return this.desktop.screenForFrame(this.current);
  }

  isStandard(): boolean { return this.props.standard ?? true; }
  isVisible(): boolean { return (this.props.visible ?? true) && !this.minimized; }

  raise(): void { this.desktop.bringToFront(this.props.id); }
  focus(): void {
    this.desktop.bringToFront(this.props.id);
    this.desktop.setFocused(this.props.id);
  }

  minimize(): void { this.minimized = true; }
  unminimize(): void { this.minimized = false; }
}

// ---------------------------------------------------------------------------
// Pointer
// ---------------------------------------------------------------------------

/** Event source driven by emit(); disable() and hide() simulate a dead tap. */
export class VirtualPointer implements PointerEventSource {
  private handler: PointerHandler | undefined;
  private enabled = false;
  private active = true;
  starts = 0;

  start(handler: PointerHandler): void {
    this.handler = handler;
    this.enabled = true;
    this.starts++;
  }

  stop(): void {
    this.handler = undefined;
    this.enabled = false;
  }

  isEnabled(): boolean { return this.enabled; }
  pointerActive(): boolean { return this.active; }

  /** Delivered only while enabled, like a real tap. */
  emit(event: PointerEvent): void {
    if (this.enabled) this.handler?.(event);
  }

  disable(): void { this.enabled = false; }
  hide(): void { this.active = false; }
}

// ---------------------------------------------------------------------------
// Desktop
// ---------------------------------------------------------------------------

export class VirtualDesktop implements WindowPlatform {
  readonly kind = 'virtual';

  private readonly screens: VirtualScreen[] = [];
  private primaryId: ScreenId | undefined;
  /** Front to back. */
  private stack: VirtualWindow[] = [];
  private focusedId: WindowId | undefined;
  readonly pointer = new VirtualPointer();

  constructor(layout?: DesktopLayout) {
    if (!layout) return;
    for (const s of layout.screens) this.addScreen(s);
    // Added back to front so the first listed window ends up in front.
    for (const w of [...layout.windows].reverse()) this.addWindow(w);
    if (layout.focusedId !== undefined) this.setFocused(layout.focusedId);
  }

  // -----------------------------------------------------------------------
  // Building
  // -----------------------------------------------------------------------

  addScreen(props: ScreenSpec): ScreenRef {
    const screen = new VirtualScreen(this, { ...props, frame: cloneRect(props.frame) });
    this.screens.push(screen);
    if (props.primary || this.primaryId === undefined) this.primaryId = props.id;
    return screen;
  }

  /** New windows open in front, like real ones. */
  addWindow(props: WindowSpec): VirtualWindow {
    const win = new VirtualWindow(this, { ...props, frame: cloneRect(props.frame) });
    this.stack.unshift(win);
    return win;
  }

  close(id: WindowId): void {
    this.stack = this.stack.filter(w => w.id() !== id);
    if (this.focusedId === id) this.focusedId = this.stack[0]?.id();
  }

  window(id: WindowId): VirtualWindow {
    const win = this.stack.find(w => w.id() === id);
    if (!win) throw new Error(`No virtual window ${id}`);
    return win;
  }

  // -----------------------------------------------------------------------
  // WindowPlatform
  // -----------------------------------------------------------------------

  focusedWindow(): WindowRef | undefined {
    if (this.focusedId === undefined) return undefined;
    return this.stack.find(w => w.id() === this.focusedId);
  }

  orderedWindows(): WindowRef[] {
    return this.stack.filter(w => w.isStandard() && w.isVisible());
  }

  windowById(id: WindowId): WindowRef | undefined {
    return this.stack.find(w => w.id() === id);
  }

  allScreens(): ScreenRef[] {
    return [...this.screens];
  }

  primaryScreen(): ScreenRef | undefined {
    return this.screens.find(s => s.id() === this.primaryId);
  }

  pointerEvents(): PointerEventSource {
    return this.pointer;
  }

  // -----------------------------------------------------------------------
  // Internals used by the refs
  // -----------------------------------------------------------------------

  bringToFront(id: WindowId): void {
    const win = this.stack.find(w => w.id() === id);
    if (!win) return;
    this.stack = [win, ...this.stack.filter(w => w !== win)];
  }

  setFocused(id: WindowId): void {
    if (!this.stack.some(w => w.id() === id)) {
      log.warn({ id }, 'Cannot focus unknown window');
      return;
    }
    this.focusedId = id;
  }

  screenForFrame(frame: Rect): ScreenRef {
    const screen = locateScreen(frame, this.screens);
    if (!screen) throw new Error('Virtual desktop has no screens');
    return screen;
  }

  neighbour(from: ScreenRef, toward: Compass): ScreenRef | undefined {
    return neighbourScreen(from, this.screens, toward);
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function parseDesktopLayout(raw: unknown, source = '<inline>'): DesktopLayout {
  if (!validateLayout(raw)) {
    throw new ConfigError(source, validateLayout.errors ?? []);
  }
  return raw;
}

export function loadVirtualDesktop(filePath: string): VirtualDesktop {
  if (!fs.existsSync(filePath)) {
    log.warn({ file: filePath }, 'Desktop layout not found, starting with a single 1920x1080 screen');
    return new VirtualDesktop({
      screens: [{ id: 1, name: 'Virtual Display', frame: { x: 0, y: 0, w: 1920, h: 1080 }, primary: true }],
      windows: []
    });
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const layout = parseDesktopLayout(raw, filePath);
  log.info({ file: filePath, screens: layout.screens.length, windows: layout.windows.length }, 'Virtual desktop loaded');
  return new VirtualDesktop(layout);
}
