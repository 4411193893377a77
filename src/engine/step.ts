/**
 * engine/step.ts
 *
 * The one-step primitives everything else is built from, plus the
 * snap-to-edge toggles.
 *
 *   stepMove      shift the window by one grid step
 *   stepResize    move the bottom-right corner by one grid step
 *                 (left/up shrink, right/down grow, top-left fixed)
 *   moveToEdge    flush against an edge; again at that edge = restore
 *   resizeToEdge  stretch one side to an edge; again = restore
 *
 * One step is the screen dimension divided by `stepParts`.
 */

import { Rect, atBottomEdge, atLeftEdge, atRightEdge, atTopEdge } from '../geometry/rect';
import { Direction, edgeOf, isHorizontal } from '../geometry/direction';
import { scopedLogger } from '../core/logger';
import { WindowRef } from '../platform/types';
import { EngineContext } from './context';

const log = scopedLogger('engine/step');

export class StepEngine {
  constructor(private readonly ctx: EngineContext) {}

  private stepSize(win: WindowRef): { dx: number; dy: number } {
    const s = win.screenOf().frame();
    return { dx: s.w / this.ctx.settings.stepParts, dy: s.h / this.ctx.settings.stepParts };
  }

  stepMove(win: WindowRef, dir: Direction): Rect {
    const f = win.frame();
    const { dx, dy } = this.stepSize(win);
    switch (dir) {
      case 'left':  f.x -= dx; break;
      case 'right': f.x += dx; break;
      case 'up':    f.y -= dy; break;
      case 'down':  f.y += dy; break;
    }
    win.setFrame(f);
    return win.frame();
  }

  stepResize(win: WindowRef, dir: Direction): Rect {
    const f = win.frame();
    const { dx, dy } = this.stepSize(win);
    switch (dir) {
      case 'left':  f.w -= dx; break;
      case 'right': f.w += dx; break;
      case 'up':    f.h -= dy; break;
      case 'down':  f.h += dy; break;
    }
    win.setFrame(f);
    return win.frame();
  }

  private atEdge(f: Rect, s: Rect, dir: Direction): boolean {
    const tol = this.ctx.settings.snapTolerance;
    switch (dir) {
      case 'left':  return atLeftEdge(f, s, tol);
      case 'right': return atRightEdge(f, s, tol);
      case 'up':    return atTopEdge(f, s, tol);
      case 'down':  return atBottomEdge(f, s, tol);
    }
  }

  moveToEdge(win: WindowRef, dir: Direction): Rect {
    const f = win.frame();
    const s = win.screenOf().frame();
    const id = win.id();

    const saved = this.ctx.memory.get('edge', id);
    if (this.atEdge(f, s, dir) && saved) {
      if (isHorizontal(dir)) f.x = saved.frame.x;
      else f.y = saved.frame.y;
      this.ctx.memory.clear('edge', id);
      log.debug({ id, dir }, 'Edge move restored');
    } else {
      this.ctx.memory.save('edge', id, f);
      switch (dir) {
        case 'left':  f.x = s.x; break;
        case 'right': f.x = s.x + s.w - f.w; break;
        case 'up':    f.y = s.y; break;
        case 'down':  f.y = s.y + s.h - f.h; break;
      }
    }

    win.setFrame(f);
    const result = win.frame();
    this.ctx.highlighter.flash(result, [edgeOf(dir)]);
    return result;
  }

  resizeToEdge(win: WindowRef, dir: Direction): Rect {
    const f = win.frame();
    const s = win.screenOf().frame();
    const id = win.id();

    const saved = this.ctx.memory.get('edge', id);
    if (this.atEdge(f, s, dir) && saved) {
      if (isHorizontal(dir)) {
        f.x = saved.frame.x;
        f.w = saved.frame.w;
      } else {
        f.y = saved.frame.y;
        f.h = saved.frame.h;
      }
      this.ctx.memory.clear('edge', id);
      log.debug({ id, dir }, 'Edge resize restored');
    } else {
      this.ctx.memory.save('edge', id, f);
      switch (dir) {
        case 'left':
          // right edge stays where it is
          f.w = f.x + f.w - s.x;
          f.x = s.x;
          break;
        case 'right':
          f.w = s.x + s.w - f.x;
          break;
        case 'up':
          f.h = f.y + f.h - s.y;
          f.y = s.y;
          break;
        case 'down':
          f.h = s.y + s.h - f.y;
          break;
      }
    }

    win.setFrame(f);
    const result = win.frame();
    this.ctx.highlighter.flash(result, [edgeOf(dir)]);
    return result;
  }
}
