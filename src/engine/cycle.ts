/**
 * engine/cycle.ts
 *
 * Progressive toggles: centre, maximize, and the half/third cycle.
 *
 * None of these keep a mode flag. Where the window "is" in a cycle is
 * recomputed on every call by comparing its frame to each candidate
 * target within `cycleTolerance`, so a window moved by something else
 * between presses simply re-enters the cycle. The price is that a
 * hand-sized window that happens to land within tolerance of a step is
 * treated as sitting on that step.
 */

import { Rect, near, rectsNear } from '../geometry/rect';
import { Side } from '../geometry/direction';
import { scopedLogger } from '../core/logger';
import { WindowRef } from '../platform/types';
import { EngineContext } from './context';

const log = scopedLogger('engine/cycle');

export type CenterStep = 'center-vertical' | 'center-horizontal' | 'restore' | 'none';
export type MaximizeStep = 'max-height' | 'max-full' | 'restore' | 'none';
export type HalfThirdStep = 'half' | 'third' | 'mid-third' | 'two-thirds' | 'restore';

export interface CycleOutcome<S extends string> {
  step: S;
  frame: Rect;
}

const WIDTH_FRACTION: Record<Exclude<HalfThirdStep, 'restore'>, number> = {
  'half': 1 / 2,
  'third': 1 / 3,
  'mid-third': 1 / 3,
  'two-thirds': 2 / 3
};

const HALF_THIRD_ORDER: readonly HalfThirdStep[] = ['half', 'third', 'mid-third', 'two-thirds', 'restore'];

export class CycleEngine {
  constructor(private readonly ctx: EngineContext) {}

  private get tol(): number {
    return this.ctx.settings.cycleTolerance;
  }

  // -----------------------------------------------------------------------
  // Centre: vertical → horizontal → restore
  // -----------------------------------------------------------------------

  toggleCenter(win: WindowRef): CycleOutcome<CenterStep> {
    const f = win.frame();
    const s = win.screenOf().frame();
    const id = win.id();
    const memory = this.ctx.memory;

    const centerX = s.x + (s.w - f.w) / 2;
    const centerY = s.y + (s.h - f.h) / 2;

    let step: CenterStep;
    if (!near(f.y, centerY, this.tol)) {
      memory.save('center', id, f);
      f.y = centerY;
      step = 'center-vertical';
    } else if (!near(f.x, centerX, this.tol)) {
      memory.saveOnce('center', id, f);
      f.x = centerX;
      step = 'center-horizontal';
    } else {
      const saved = memory.take('center', id);
      if (!saved) {
        log.debug({ id }, 'Already centred and nothing to restore');
        return { step: 'none', frame: f };
      }
      f.x = saved.frame.x;
      f.y = saved.frame.y;
      step = 'restore';
    }

    win.setFrame(f);
    const result = win.frame();
    log.debug({ id, step, frame: result }, 'Centre toggle');
    return { step, frame: result };
  }

  // -----------------------------------------------------------------------
  // Maximize: full height → full screen → restore
  // -----------------------------------------------------------------------

  isMaxHeight(f: Rect, s: Rect): boolean {
    return near(f.y, s.y, this.tol) && near(f.h, s.h, this.tol);
  }

  isFullyMaximized(f: Rect, s: Rect): boolean {
    return rectsNear(f, s, this.tol);
  }

  toggleMaximize(win: WindowRef): CycleOutcome<MaximizeStep> {
    const f = win.frame();
    const s = win.screenOf().frame();
    const id = win.id();
    const memory = this.ctx.memory;

    let step: MaximizeStep;
    if (!this.isMaxHeight(f, s)) {
      memory.save('maximize', id, f);
      f.y = s.y;
      f.h = s.h;
      step = 'max-height';
    } else if (!this.isFullyMaximized(f, s)) {
      memory.saveOnce('maximize', id, f);
      f.x = s.x;
      f.w = s.w;
      step = 'max-full';
    } else {
      const saved = memory.take('maximize', id);
      if (!saved) {
        log.debug({ id }, 'Already maximized and nothing to restore');
        return { step: 'none', frame: f };
      }
      win.setFrame(saved.frame);
      const restored = win.frame();
      log.debug({ id, step: 'restore', frame: restored }, 'Maximize cycle');
      return { step: 'restore', frame: restored };
    }

    win.setFrame(f);
    const result = win.frame();
    log.debug({ id, step, frame: result }, 'Maximize cycle');
    return { step, frame: result };
  }

  // -----------------------------------------------------------------------
  // Half / third: half → third → mid third → two thirds → restore
  // -----------------------------------------------------------------------

  /** Target frame of a cycle step on the given side, full screen height. */
  halfThirdTarget(s: Rect, side: Side, step: Exclude<HalfThirdStep, 'restore'>): Rect {
    const w = s.w * WIDTH_FRACTION[step];
    let x: number;
    if (step === 'mid-third') x = s.x + (s.w - w) / 2;
    else if (side === 'left') x = s.x;
    else x = s.x + s.w - w;
    return { x, y: s.y, w, h: s.h };
  }

  /** Which step of `side`'s cycle the frame sits on, if any. */
  detectHalfThird(f: Rect, s: Rect, side: Side): Exclude<HalfThirdStep, 'restore'> | undefined {
    // mid-third is side-independent and shares its width with third,
    // so alignment decides between them
    const steps: Exclude<HalfThirdStep, 'restore'>[] = ['half', 'third', 'mid-third', 'two-thirds'];
    return steps.find(step => rectsNear(f, this.halfThirdTarget(s, side, step), this.tol));
  }

  cycleHalfThird(win: WindowRef, side: Side): CycleOutcome<HalfThirdStep> {
    const f = win.frame();
    const s = win.screenOf().frame();
    const id = win.id();
    const memory = this.ctx.memory;

    const current = this.detectHalfThird(f, s, side);
    let next: HalfThirdStep = current
      ? HALF_THIRD_ORDER[HALF_THIRD_ORDER.indexOf(current) + 1]
      : 'half';

    if (next === 'restore') {
      const saved = memory.take('halfThird', id);
      if (saved) {
        win.setFrame(saved.frame);
        const restored = win.frame();
        log.debug({ id, side, step: next, frame: restored }, 'Half/third cycle');
        return { step: next, frame: restored };
      }
      // nothing to go back to: start over
      next = 'half';
    }

    if (!current) {
      // Entering the cycle. A window sitting on the other side's cycle is
      // still mid-cycle, so its pre-cycle frame is kept.
      const other: Side = side === 'left' ? 'right' : 'left';
      const inOtherCycle = this.detectHalfThird(f, s, other) !== undefined;
      if (inOtherCycle) memory.saveOnce('halfThird', id, f);
      else memory.save('halfThird', id, f);
    } else {
      memory.saveOnce('halfThird', id, f);
    }

    win.setFrame(this.halfThirdTarget(s, side, next));
    const result = win.frame();
    log.debug({ id, side, step: next, frame: result }, 'Half/third cycle');
    return { step: next, frame: result };
  }
}
