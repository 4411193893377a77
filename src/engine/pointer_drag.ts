/**
 * engine/pointer_drag.ts
 *
 * Mouse move/resize of the window under the pointer while a modifier
 * combination is held:
 *
 *   fn          move (deltas applied to the top-left as they arrive)
 *   fn + shift  resize from the grabbed third of the window; the centre
 *               third moves instead
 *
 * Some applications take hundreds of milliseconds to apply a frame. The
 * input callback therefore only accumulates resize deltas; a timer drains
 * them once per tick into a frame cached here and never reads the frame
 * back from the window, which could be stale.
 *
 * Event taps can die silently. A watchdog restarts the source when it
 * reports disabled or has gone quiet while the pointer is active.
 */

import { Rect, cloneRect } from '../geometry/rect';
import { scopedLogger } from '../core/logger';
import { PointerTimings } from '../core/types';
import { ModifierFlags, PointerEvent, PointerEventSource, WindowRef } from '../platform/types';
import { DEFAULT_POINTER_TIMINGS, EngineContext } from './context';

const log = scopedLogger('engine/pointer_drag');

export type DragCombo = 'move' | 'resize';
export type DragMode = 'idle' | 'move' | 'resize';
export type HorizontalGrip = 'left' | 'right' | 'none';
export type VerticalGrip = 'top' | 'bottom' | 'none';

export interface DragState {
  mode: DragMode;
  startedAs?: DragCombo;
  gripX: HorizontalGrip;
  gripY: VerticalGrip;
  window?: WindowRef;
  pendingDX: number;
  pendingDY: number;
  frame?: Rect;
}

/** fn alone → move, fn+shift → resize, anything else → none. */
export function comboOf(flags: ModifierFlags): DragCombo | undefined {
  if (!flags.fn || flags.cmd || flags.alt || flags.ctrl) return undefined;
  return flags.shift ? 'resize' : 'move';
}

/** Which third of the frame the point falls in, per axis. */
export function gripAt(frame: Rect, x: number, y: number): { gripX: HorizontalGrip; gripY: VerticalGrip } {
  const relX = x - frame.x;
  const relY = y - frame.y;
  const gripX: HorizontalGrip = relX < frame.w / 3 ? 'left' : relX > (2 * frame.w) / 3 ? 'right' : 'none';
  const gripY: VerticalGrip = relY < frame.h / 3 ? 'top' : relY > (2 * frame.h) / 3 ? 'bottom' : 'none';
  return { gripX, gripY };
}

function idle(): DragState {
  return { mode: 'idle', gripX: 'none', gripY: 'none', pendingDX: 0, pendingDY: 0 };
}

export class PointerDragController {
  private state: DragState = idle();
  private tickTimer: NodeJS.Timeout | undefined;
  private watchdogTimer: NodeJS.Timeout | undefined;
  private lastCallbackAt = 0;
  private restarts = 0;
  private readonly handler = (event: PointerEvent): void => this.onEvent(event);

  constructor(
    private readonly ctx: EngineContext,
    private readonly source: PointerEventSource,
    private readonly timings: PointerTimings = DEFAULT_POINTER_TIMINGS
  ) {}

  start(): void {
    this.startSource();
    this.stopWatchdog();
    this.watchdogTimer = setInterval(() => this.checkSource(), this.timings.watchdogMs);
    this.watchdogTimer.unref();
    log.info({ timings: this.timings }, 'Pointer drag started');
  }

  stop(): void {
    this.stopWatchdog();
    this.clear();
    this.source.stop();
  }

  snapshot(): Readonly<DragState> {
    return { ...this.state, frame: this.state.frame ? cloneRect(this.state.frame) : undefined };
  }

  restartCount(): number {
    return this.restarts;
  }

  private startSource(): void {
    this.source.stop();
    this.source.start(this.handler);
    this.lastCallbackAt = this.ctx.now();
  }

  private stopWatchdog(): void {
    if (this.watchdogTimer) clearInterval(this.watchdogTimer);
    this.watchdogTimer = undefined;
  }

  private checkSource(): void {
    const quietFor = this.ctx.now() - this.lastCallbackAt;
    const disabled = !this.source.isEnabled();
    const stale = quietFor > this.timings.staleAfterMs && this.source.pointerActive();
    if (disabled || stale) {
      this.restarts++;
      log.warn({ disabled, quietFor, restarts: this.restarts }, 'Pointer event source restarted');
      this.startSource();
    }
  }

  // -----------------------------------------------------------------------
  // Input side
  // -----------------------------------------------------------------------

  private onEvent(event: PointerEvent): void {
    this.lastCallbackAt = this.ctx.now();
    const combo = comboOf(event.flags);

    if (this.state.mode !== 'idle' && combo !== this.state.startedAs) {
      log.debug({ mode: this.state.mode }, 'Modifiers changed, drag ended');
      this.clear();
    }

    if (event.kind === 'flags') return;

    switch (this.state.mode) {
      case 'idle':
        if (combo) this.begin(combo, event.x, event.y);
        break;
      case 'move':
        this.moveBy(event.dx, event.dy);
        break;
      case 'resize':
        this.state.pendingDX += event.dx;
        this.state.pendingDY += event.dy;
        break;
    }
  }

  private begin(combo: DragCombo, x: number, y: number): void {
    const win = this.windowAt(x, y);
    if (!win) return;

    const frame = win.frame();
    const state: DragState = { ...idle(), mode: 'move', startedAs: combo, window: win };

    if (combo === 'resize') {
      const grip = gripAt(frame, x, y);
      if (grip.gripX !== 'none' || grip.gripY !== 'none') {
        state.mode = 'resize';
        state.gripX = grip.gripX;
        state.gripY = grip.gripY;
        state.frame = frame;
      }
    }

    this.state = state;
    win.raise();
    if (state.mode === 'resize') this.startTicking();
    log.debug({ id: win.id(), mode: state.mode, gripX: state.gripX, gripY: state.gripY }, 'Drag began');
  }

  private moveBy(dx: number, dy: number): void {
    const win = this.state.window;
    if (!win || !win.isVisible()) return;
    const f = win.frame();
    win.setFrame({ ...f, x: f.x + dx, y: f.y + dy });
  }

  private windowAt(x: number, y: number): WindowRef | undefined {
    return this.ctx.platform.orderedWindows().find(win => {
      if (!win.isStandard()) return false;
      const f = win.frame();
      return x >= f.x && x <= f.x + f.w && y >= f.y && y <= f.y + f.h;
    });
  }

  // -----------------------------------------------------------------------
  // Output side
  // -----------------------------------------------------------------------

  private startTicking(): void {
    this.stopTicking();
    this.tickTimer = setInterval(() => this.tick(), this.timings.tickMs);
    this.tickTimer.unref();
  }

  private stopTicking(): void {
    if (this.tickTimer) clearInterval(this.tickTimer);
    this.tickTimer = undefined;
  }

  private tick(): void {
    const s = this.state;
    if (s.mode !== 'resize' || !s.window || !s.frame) {
      this.stopTicking();
      return;
    }
    const dx = s.pendingDX;
    const dy = s.pendingDY;
    if (dx === 0 && dy === 0) return;
    s.pendingDX = 0;
    s.pendingDY = 0;

    const f = s.frame;
    if (s.gripX === 'left') {
      f.x += dx;
      f.w -= dx;
    } else if (s.gripX === 'right') {
      f.w += dx;
    }
    if (s.gripY === 'top') {
      f.y += dy;
      f.h -= dy;
    } else if (s.gripY === 'bottom') {
      f.h += dy;
    }

    s.window.setFrame(cloneRect(f));
  }

  private clear(): void {
    this.stopTicking();
    this.state = idle();
  }
}
