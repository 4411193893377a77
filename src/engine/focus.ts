/**
 * engine/focus.ts
 *
 * Directional focus. Same-screen navigation walks the visible windows of
 * the current screen sorted along the travel axis, preferring the ones in
 * the focused window's "shadow" (overlapping it on the other axis), and
 * wraps at the ends. Cross-screen navigation jumps to the neighbouring
 * screen and picks the window nearest the edge it was entered from.
 *
 * Nothing here changes geometry; the only side effects are raise, focus
 * and a highlight.
 */

import { Rect, containsPoint, center, overlapsHorizontally, overlapsVertically } from '../geometry/rect';
import { Direction, isBackward, isHorizontal } from '../geometry/direction';
import { scopedLogger } from '../core/logger';
import { ScreenRef, WindowId, WindowRef } from '../platform/types';
import { EngineContext } from './context';

const log = scopedLogger('engine/focus');

const SAMPLE_INSET = 5;

interface Candidate {
  win: WindowRef;
  frame: Rect;
}

export type FocusOutcome =
  | { action: 'focused'; id: WindowId; appName: string; frame: Rect }
  | { action: 'no-target'; reason: string };

/**
 * True if any of five sample points (the corners inset by 5px and the
 * centre) is not covered by a frame in front of it.
 */
export function isFrameVisible(frame: Rect, framesAbove: Rect[]): boolean {
  const samples = [
    { x: frame.x + SAMPLE_INSET, y: frame.y + SAMPLE_INSET },
    { x: frame.x + frame.w - SAMPLE_INSET, y: frame.y + SAMPLE_INSET },
    { x: frame.x + SAMPLE_INSET, y: frame.y + frame.h - SAMPLE_INSET },
    { x: frame.x + frame.w - SAMPLE_INSET, y: frame.y + frame.h - SAMPLE_INSET },
    center(frame)
  ];
  return samples.some(p => !framesAbove.some(above => containsPoint(above, p)));
}

export class FocusNavigator {
  private lastFocusedByUs: WindowId | undefined;

  constructor(private readonly ctx: EngineContext) {}

  /** Id of the window this navigator last focused, if it still remembers one. */
  trackedWindow(): WindowId | undefined {
    return this.lastFocusedByUs;
  }

  focusDirection(dir: Direction): FocusOutcome {
    const focused = this.ctx.platform.focusedWindow();
    if (!focused) return { action: 'no-target', reason: 'no focused window' };

    const current = this.correctFocusJump(focused);
    const screen = this.screenAtCenter(current);
    const candidates = this.visibleOn(screen.frame(), current.id());

    if (candidates.length <= 1) {
      return { action: 'no-target', reason: 'no other visible window on this screen' };
    }

    const currentFrame = current.frame();
    const horizontal = isHorizontal(dir);
    const inShadow = candidates.filter(c =>
      c.win.id() === current.id()
      || (horizontal ? overlapsVertically(c.frame, currentFrame) : overlapsHorizontally(c.frame, currentFrame))
    );
    const pool = inShadow.length > 1 ? inShadow : candidates;

    const pos = (c: Candidate): number => (horizontal ? c.frame.x : c.frame.y);
    pool.sort((a, b) => pos(a) - pos(b));

    const index = pool.findIndex(c => c.win.id() === current.id());
    if (index < 0) {
      log.warn({ id: current.id() }, 'Focused window missing from candidate list');
      return { action: 'no-target', reason: 'focused window not on its screen' };
    }

    const n = pool.length;
    const nextIndex = isBackward(dir) ? (index - 1 + n) % n : (index + 1) % n;
    const target = pool[nextIndex].win;

    log.debug(
      { dir, from: current.appName(), to: target.appName(), shadow: pool === inShadow, count: n },
      'Focus direction'
    );
    return this.activate(target, dir);
  }

  focusScreen(dir: Direction): FocusOutcome {
    const focused = this.ctx.platform.focusedWindow();
    const from = focused ? this.screenAtCenter(focused) : this.ctx.platform.primaryScreen();
    if (!from) return { action: 'no-target', reason: 'no screen' };

    const to = this.neighbour(from, dir);
    if (!to) return { action: 'no-target', reason: `no screen to the ${dir}` };

    const candidates = this.visibleOn(to.frame());
    if (candidates.length === 0) {
      return { action: 'no-target', reason: `no visible window on ${to.name()}` };
    }

    // the window whose trailing edge is nearest the screen we came from
    const score = (f: Rect): number => {
      switch (dir) {
        case 'left':  return f.x + f.w;
        case 'right': return -f.x;
        case 'up':    return f.y + f.h;
        case 'down':  return -f.y;
      }
    };
    let best = candidates[0];
    for (const c of candidates) {
      if (score(c.frame) > score(best.frame)) best = c;
    }

    log.debug({ dir, from: from.name(), to: to.name(), target: best.win.appName() }, 'Focus screen');
    return this.activate(best.win, dir);
  }

  highlightFocused(): FocusOutcome {
    const focused = this.ctx.platform.focusedWindow();
    if (!focused) return { action: 'no-target', reason: 'no focused window' };
    const frame = focused.frame();
    this.ctx.highlighter.flash(frame);
    return { action: 'focused', id: focused.id(), appName: focused.appName(), frame };
  }

  private activate(target: WindowRef, dir: Direction): FocusOutcome {
    target.raise();
    target.focus();
    this.lastFocusedByUs = target.id();
    const frame = target.frame();
    this.ctx.highlighter.flash(frame, dir);
    return { action: 'focused', id: target.id(), appName: target.appName(), frame };
  }

  /**
   * Some applications hand focus to another of their own windows on a
   * different screen. When that happens, navigate from the window we
   * focused last. Another application taking focus ends the tracking.
   */
  private correctFocusJump(focused: WindowRef): WindowRef {
    if (this.lastFocusedByUs === undefined) return focused;

    const last = this.ctx.platform.windowById(this.lastFocusedByUs);
    if (!last || !last.isVisible()) return focused;

    if (last.appName() !== focused.appName()) {
      this.lastFocusedByUs = undefined;
      return focused;
    }

    const lastScreen = this.screenAt(center(last.frame()));
    const focusedScreen = this.screenAt(center(focused.frame()));
    if (lastScreen && focusedScreen && lastScreen.id() !== focusedScreen.id()) {
      log.debug({ app: focused.appName(), tracked: last.id(), reported: focused.id() }, 'Focus jumped screens, using tracked window');
      return last;
    }
    return focused;
  }

  private screenAt(p: { x: number; y: number }): ScreenRef | undefined {
    return this.ctx.platform.allScreens().find(s => containsPoint(s.frame(), p));
  }

  private screenAtCenter(win: WindowRef): ScreenRef {
    return this.screenAt(center(win.frame())) ?? win.screenOf();
  }

  private neighbour(screen: ScreenRef, dir: Direction): ScreenRef | undefined {
    switch (dir) {
      case 'left':  return screen.toWest();
      case 'right': return screen.toEast();
      case 'up':    return screen.toNorth();
      case 'down':  return screen.toSouth();
    }
  }

  /** Standard windows centred on the screen that are not fully occluded, front to back. */
  private visibleOn(screenFrame: Rect, keep?: WindowId): Candidate[] {
    const above: Rect[] = [];
    const visible: Candidate[] = [];
    for (const win of this.ctx.platform.orderedWindows()) {
      if (!win.isStandard()) continue;
      const frame = win.frame();
      if (!containsPoint(screenFrame, center(frame))) continue;
      if (win.id() === keep || isFrameVisible(frame, above)) visible.push({ win, frame });
      above.push(frame);
    }
    return visible;
  }
}
