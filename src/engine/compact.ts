/**
 * engine/compact.ts
 *
 * Docks windows as small tiles along the bottom of their screen, left to
 * right, wrapping to the row above when a row is full. Docking an
 * already-docked window puts it back where it was.
 *
 * Rows are not stored. They are derived on every call from the y
 * position of the windows currently docked on the same screen. Placement
 * is greedy row-major; the dock only ever holds a handful of windows.
 */

import { Rect, cloneRect } from '../geometry/rect';
import { scopedLogger } from '../core/logger';
import { ScreenId, WindowId, WindowRef } from '../platform/types';
import { EngineContext, appOverride } from './context';

const log = scopedLogger('engine/compact');

export interface CompactSlot {
  originalFrame: Rect;
  screenId: ScreenId;
}

export type CompactOutcome =
  | { action: 'docked'; frame: Rect; row: number }
  | { action: 'restored'; frame: Rect }
  | { action: 'no-room' };

/** WindowId → slot for every window currently docked. */
export class CompactRegistry {
  private readonly slots = new Map<WindowId, CompactSlot>();

  get(id: WindowId): CompactSlot | undefined {
    return this.slots.get(id);
  }

  set(id: WindowId, slot: CompactSlot): void {
    this.slots.set(id, { originalFrame: cloneRect(slot.originalFrame), screenId: slot.screenId });
  }

  delete(id: WindowId): void {
    this.slots.delete(id);
  }

  entries(): [WindowId, CompactSlot][] {
    return [...this.slots.entries()];
  }

  get size(): number {
    return this.slots.size;
  }
}

interface Occupant {
  id: WindowId;
  frame: Rect;
}

export class CompactPlacer {
  constructor(
    private readonly ctx: EngineContext,
    private readonly registry: CompactRegistry = new CompactRegistry()
  ) {}

  docked(): CompactRegistry {
    return this.registry;
  }

  toggle(win: WindowRef): CompactOutcome {
    const id = win.id();
    const existing = this.registry.get(id);

    if (existing) {
      win.setFrame(existing.originalFrame);
      this.registry.delete(id);
      const frame = win.frame();
      log.debug({ id, frame }, 'Undocked');
      return { action: 'restored', frame };
    }

    const screen = win.screenOf();
    const s = screen.frame();
    const { w: targetW, h: targetH } = this.tileSize(win);
    const rowH = this.ctx.settings.compactH;
    const screenBottom = s.y + s.h;

    const rows = this.occupiedRows(screen.id(), screenBottom, rowH, id);

    for (let row = 0; row <= this.ctx.settings.compactMaxRows; row++) {
      const occupants = rows.get(row) ?? [];
      let x: number;
      if (occupants.length === 0) {
        x = s.x;
      } else {
        const rightmost = Math.max(...occupants.map(o => o.frame.x + o.frame.w));
        if (rightmost + targetW > s.x + s.w) continue;
        x = rightmost;
      }

      const frame: Rect = { x, y: screenBottom - row * rowH - targetH, w: targetW, h: targetH };
      this.registry.set(id, { originalFrame: win.frame(), screenId: screen.id() });
      win.setFrame(frame);
      const result = win.frame();
      log.debug({ id, row, frame: result }, 'Docked');
      return { action: 'docked', frame: result, row };
    }

    log.warn({ id, screen: screen.name() }, 'No room left in the dock');
    return { action: 'no-room' };
  }

  private tileSize(win: WindowRef): { w: number; h: number } {
    const override = appOverride(this.ctx.settings, win.appName());
    return {
      w: override.compactW ?? this.ctx.settings.compactW,
      h: override.compactH ?? this.ctx.settings.compactH
    };
  }

  /**
   * Prunes slots whose window is gone or hidden, then buckets the
   * survivors on this screen by row, each row sorted by x.
   */
  private occupiedRows(screenId: ScreenId, screenBottom: number, rowH: number, self: WindowId): Map<number, Occupant[]> {
    const rows = new Map<number, Occupant[]>();

    for (const [id, slot] of this.registry.entries()) {
      const other = this.ctx.platform.windowById(id);
      if (!other || !other.isVisible()) {
        this.registry.delete(id);
        log.debug({ id }, 'Pruned stale dock slot');
        continue;
      }
      if (id === self || slot.screenId !== screenId) continue;

      const f = other.frame();
      const row = Math.max(0, Math.floor((screenBottom - f.y - f.h + rowH / 2) / rowH));
      const bucket = rows.get(row) ?? [];
      bucket.push({ id, frame: f });
      rows.set(row, bucket);
    }

    for (const bucket of rows.values()) {
      bucket.sort((a, b) => a.frame.x - b.frame.x);
    }
    return rows;
  }
}
