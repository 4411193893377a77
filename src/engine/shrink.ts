/**
 * engine/shrink.ts
 *
 * Shrink-to-minimum and its undo on the same keys.
 *
 *   left / up    : step-resize until the window stops getting smaller
 *                  (the OS minimum) or reaches the app's configured
 *                  minimum, at most `shrinkMaxIterations` steps
 *   right / down : put the width (height) and x (y) back if the window
 *                  was shrunk; otherwise stretch to the screen edge
 *
 * The loop does not assume the resize primitive is invertible or that
 * the OS minimum is known up front: a fixed point ends it.
 */

import { Rect, rectsNear } from '../geometry/rect';
import { Direction } from '../geometry/direction';
import { scopedLogger } from '../core/logger';
import { WindowRef } from '../platform/types';
import { EngineContext, appOverride } from './context';
import { StepEngine } from './step';
import { UndoSlot } from './undo_memory';

const log = scopedLogger('engine/shrink');

export type ShrinkAction = 'shrink' | 'restore' | 'grow-to-edge';

export interface ShrinkOutcome {
  action: ShrinkAction;
  frame: Rect;
  iterations: number;
}

export class ShrinkToggle {
  constructor(
    private readonly ctx: EngineContext,
    private readonly step: StepEngine
  ) {}

  apply(win: WindowRef, dir: Direction): ShrinkOutcome {
    switch (dir) {
      case 'left': return this.shrink(win, 'horizontal');
      case 'up':   return this.shrink(win, 'vertical');
      case 'right': return this.unshrink(win, 'horizontal', dir);
      case 'down':  return this.unshrink(win, 'vertical', dir);
    }
  }

  private slot(axis: 'horizontal' | 'vertical'): UndoSlot {
    return axis === 'horizontal' ? 'shrink.horizontal' : 'shrink.vertical';
  }

  private shrink(win: WindowRef, axis: 'horizontal' | 'vertical'): ShrinkOutcome {
    const id = win.id();
    const slot = this.slot(axis);
    const start = win.frame();
    const memory = this.ctx.memory;

    // A window still sitting on the frame of an earlier shrink keeps its
    // original; anything else is a fresh start.
    const previous = memory.get(slot, id);
    const continuing = previous !== undefined && previous.result !== undefined && rectsNear(previous.result, start, 1);

    const override = appOverride(this.ctx.settings, win.appName());
    const floor = (axis === 'horizontal' ? override.minW : override.minH) ?? 0;
    const size = (r: Rect): number => (axis === 'horizontal' ? r.w : r.h);
    const stepDir: Direction = axis === 'horizontal' ? 'left' : 'up';

    let last = size(start);
    let iterations = 0;
    let converged = false;
    const cap = this.ctx.settings.shrinkMaxIterations;

    while (iterations < cap && last > floor) {
      iterations++;
      const current = size(this.step.stepResize(win, stepDir));

      if (current < floor) {
        const f = win.frame();
        win.setFrame(axis === 'horizontal' ? { ...f, w: floor } : { ...f, h: floor });
        log.debug({ id, axis, iterations, floor }, 'App minimum reached');
        converged = true;
        break;
      }
      if (current === last) {
        log.debug({ id, axis, iterations, size: current }, 'Minimum size reached');
        converged = true;
        break;
      }
      last = current;
    }

    if (!converged && iterations >= cap) {
      log.debug({ id, axis, cap }, 'Shrink stopped at iteration cap');
    }

    const result = win.frame();
    if (size(result) !== size(start)) {
      if (!continuing) memory.save(slot, id, start);
      memory.markResult(slot, id, result);
    } else if (!continuing) {
      // nothing shrank, so there is nothing for right/down to restore
      memory.clear(slot, id);
    }
    return { action: 'shrink', frame: result, iterations };
  }

  private unshrink(win: WindowRef, axis: 'horizontal' | 'vertical', dir: Direction): ShrinkOutcome {
    const id = win.id();
    const saved = this.ctx.memory.take(this.slot(axis), id);

    if (!saved) {
      const frame = this.step.resizeToEdge(win, dir);
      return { action: 'grow-to-edge', frame, iterations: 0 };
    }

    const f = win.frame();
    if (axis === 'horizontal') {
      f.w = saved.frame.w;
      f.x = saved.frame.x;
    } else {
      f.h = saved.frame.h;
      f.y = saved.frame.y;
    }
    win.setFrame(f);
    const result = win.frame();
    log.debug({ id, axis, frame: result }, 'Shrink undone');
    return { action: 'restore', frame: result, iterations: 0 };
  }
}
