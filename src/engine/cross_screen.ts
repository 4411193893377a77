/**
 * engine/cross_screen.ts
 *
 * Moves a window to the screen holding a role (see screen_map.ts),
 * keeping its apparent position and fitting it to the target.
 *
 * Crossing onto a smaller screen clamps the window and remembers its
 * natural size and offset (write-once); crossing back onto a screen where
 * they fit restores them. Repeating the same role shortly after a move
 * undoes it.
 */

import { Rect, rectsNear } from '../geometry/rect';
import { scopedLogger } from '../core/logger';
import { WindowRef } from '../platform/types';
import { EngineContext } from './context';
import { UndoSlot } from './undo_memory';
import { ScreenMap, ScreenRole, buildScreenMap } from './screen_map';

const log = scopedLogger('engine/cross_screen');

const EDGE_SNAP = 5;

export type ScreenMoveOutcome =
  | { action: 'moved'; frame: Rect; screen: string }
  | { action: 'undone'; frame: Rect }
  | { action: 'no-target' }
  | { action: 'same-screen' };

export class CrossScreenMover {
  constructor(private readonly ctx: EngineContext) {}

  screenMap(): ScreenMap {
    return buildScreenMap(this.ctx.platform, this.ctx.settings.screenNameOverrides);
  }

  moveTo(win: WindowRef, role: ScreenRole): ScreenMoveOutcome {
    const id = win.id();
    const memory = this.ctx.memory;
    const winFrame = win.frame();

    const pending = memory.get('screenMove', id);
    if (
      pending
      && pending.tag === role
      && pending.result
      && this.ctx.now() - pending.savedAt <= this.ctx.settings.screenUndoWindowMs
      && rectsNear(pending.result, winFrame, 1)
    ) {
      memory.clear('screenMove', id);
      for (const slot of pending.slots ?? []) memory.clear(slot, id);
      win.setFrame(pending.frame);
      const frame = win.frame();
      log.debug({ id, role, frame }, 'Screen move undone');
      this.ctx.highlighter.flash(frame);
      return { action: 'undone', frame };
    }

    const target = this.screenMap()[role];
    if (!target) {
      log.debug({ id, role }, 'No screen holds this role');
      return { action: 'no-target' };
    }

    const source = win.screenOf();
    if (source.id() === target.id()) {
      return { action: 'same-screen' };
    }

    const created: UndoSlot[] = [];
    const planned = this.plan(id, winFrame, source.frame(), target.frame(), created);
    win.setFrame(planned);
    const frame = win.frame();

    memory.save('screenMove', id, winFrame, { result: frame, tag: role, slots: created });
    log.debug({ id, role, from: source.name(), to: target.name(), frame }, 'Moved to screen');
    this.ctx.highlighter.flash(frame);
    return { action: 'moved', frame, screen: target.name() };
  }

  /** `created` collects the natural-* slots this move filled. */
  private plan(id: number, f: Rect, src: Rect, dst: Rect, created: UndoSlot[]): Rect {
    const memory = this.ctx.memory;

    // size
    let w = f.w;
    let h = f.h;
    const natural = memory.get('naturalSize', id);
    if (natural && natural.frame.w <= dst.w && natural.frame.h <= dst.h) {
      w = natural.frame.w;
      h = natural.frame.h;
      memory.clear('naturalSize', id);
    } else {
      if ((w > dst.w || h > dst.h) && !memory.has('naturalSize', id)) {
        memory.save('naturalSize', id, f);
        created.push('naturalSize');
      }
      w = Math.min(w, dst.w);
      h = Math.min(h, dst.h);
    }

    // position, as an offset from the screen origin
    const offsetX = f.x - src.x;
    const offsetY = f.y - src.y;
    const naturalPos = memory.get('naturalPosition', id);
    if (
      naturalPos
      && naturalPos.frame.x >= 0 && naturalPos.frame.x + w <= dst.w
      && naturalPos.frame.y >= 0 && naturalPos.frame.y + h <= dst.h
    ) {
      memory.clear('naturalPosition', id);
      return { x: dst.x + naturalPos.frame.x, y: dst.y + naturalPos.frame.y, w, h };
    }

    const atRight = f.x + f.w >= src.x + src.w - EDGE_SNAP && offsetX > EDGE_SNAP;
    const atBottom = f.y + f.h >= src.y + src.h - EDGE_SNAP && offsetY > EDGE_SNAP;
    let x = atRight ? dst.x + dst.w - w : dst.x + (offsetX / src.w) * dst.w;
    let y = atBottom ? dst.y + dst.h - h : dst.y + (offsetY / src.h) * dst.h;

    const needsClamp = x + w > dst.x + dst.w || x < dst.x || y + h > dst.y + dst.h || y < dst.y;
    if (needsClamp && !memory.has('naturalPosition', id)) {
      memory.save('naturalPosition', id, { x: offsetX, y: offsetY, w: f.w, h: f.h });
      created.push('naturalPosition');
    }
    if (x + w > dst.x + dst.w) x = dst.x + dst.w - w;
    if (x < dst.x) x = dst.x;
    if (y + h > dst.y + dst.h) y = dst.y + dst.h - h;
    if (y < dst.y) y = dst.y;

    return { x, y, w, h };
  }
}
