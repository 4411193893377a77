/**
 * engine/edge_resize.ts
 *
 * "Smart" step resize. Plain step resize moves the bottom-right corner,
 * which makes a window stuck to the right or bottom edge detach from it
 * (and, at the far edge, spill onto the next screen). This engine keeps
 * edge-stuck windows stuck:
 *
 *   key    window state              action
 *   left   at left edge only         grow rightward, x re-snapped to the left edge
 *   left   at right edge             shrink, x re-snapped so the right edge stays put
 *   right  at right edge only        grow leftward, right edge re-snapped
 *   right  at left edge              shrink, x re-snapped to the left edge
 *   (up/down mirror these on the vertical axis)
 *
 * Anything else is the plain step resize. The re-snap after every
 * compensating step cancels the fractional drift of the step size.
 */

import { Rect } from '../geometry/rect';
import { Direction, Edge } from '../geometry/direction';
import { scopedLogger } from '../core/logger';
import { WindowRef } from '../platform/types';
import { EngineContext } from './context';
import { StepEngine } from './step';

const log = scopedLogger('engine/edge_resize');

type Branch = 'grow-from-edge' | 'shrink-stuck' | 'plain';

export class EdgeResizeEngine {
  constructor(
    private readonly ctx: EngineContext,
    private readonly step: StepEngine
  ) {}

  resize(win: WindowRef, dir: Direction): Rect {
    const f = win.frame();
    const s = win.screenOf().frame();
    const eps = this.ctx.settings.snapTolerance;

    const rightEdge = s.x + s.w - f.w;
    const bottomEdge = s.y + s.h - f.h;
    const atLeft = f.x <= s.x + eps;
    const atRight = f.x >= rightEdge - eps;
    const atTop = f.y <= s.y + eps;
    const atBottom = f.y >= bottomEdge - eps;

    let branch: Branch = 'plain';
    let moved: Edge[] = [];

    switch (dir) {
      case 'left':
        if (atLeft && f.x < rightEdge - eps) {
          branch = 'grow-from-edge';
          this.step.stepResize(win, 'right');
          this.snapX(win, s.x);
          moved = ['right'];
        } else if (atRight) {
          branch = 'shrink-stuck';
          this.step.stepResize(win, 'left');
          this.snapX(win, s.x + s.w - win.frame().w);
          moved = ['left'];
        } else {
          this.step.stepResize(win, 'left');
          moved = ['right'];
        }
        break;

      case 'right':
        if (atRight && f.x > s.x + eps) {
          branch = 'grow-from-edge';
          this.step.stepResize(win, 'right');
          this.snapX(win, s.x + s.w - win.frame().w);
          moved = ['left'];
        } else if (atLeft) {
          branch = 'shrink-stuck';
          this.step.stepResize(win, 'left');
          this.snapX(win, s.x);
          moved = ['right'];
        } else {
          this.step.stepResize(win, 'right');
          moved = ['right'];
        }
        break;

      case 'up':
        if (atTop && f.y < bottomEdge - eps) {
          branch = 'grow-from-edge';
          this.step.stepResize(win, 'down');
          this.snapY(win, s.y);
          moved = ['bottom'];
        } else if (atBottom) {
          branch = 'shrink-stuck';
          this.step.stepResize(win, 'up');
          this.snapY(win, s.y + s.h - win.frame().h);
          moved = ['top'];
        } else {
          this.step.stepResize(win, 'up');
          moved = ['bottom'];
        }
        break;

      case 'down':
        if (atBottom && f.y > s.y + eps) {
          branch = 'grow-from-edge';
          this.step.stepResize(win, 'down');
          this.snapY(win, s.y + s.h - win.frame().h);
          moved = ['top'];
        } else if (atTop) {
          branch = 'shrink-stuck';
          this.step.stepResize(win, 'up');
          this.snapY(win, s.y);
          moved = ['bottom'];
        } else {
          this.step.stepResize(win, 'down');
          moved = ['bottom'];
        }
        break;
    }

    const result = win.frame();
    log.debug({ id: win.id(), dir, branch, frame: result }, 'Step resize');
    this.ctx.highlighter.flash(result, moved);
    return result;
  }

  private snapX(win: WindowRef, x: number): void {
    const f = win.frame();
    if (f.x !== x) win.setFrame({ ...f, x });
  }

  private snapY(win: WindowRef, y: number): void {
    const f = win.frame();
    if (f.y !== y) win.setFrame({ ...f, y });
  }
}
