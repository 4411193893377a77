/**
 * platform/screens.ts
 *
 * Screen lookup for platforms that only know screen frames.
 */

import { Rect, center, containsPoint, intervalsOverlap } from '../geometry/rect';
import { ScreenRef } from './types';

export type Compass = 'west' | 'east' | 'north' | 'south';

/**
 * Nearest screen lying entirely beyond the given side of `from` and
 * sharing some extent with it on the perpendicular axis.
 */
export function neighbourScreen(from: ScreenRef, screens: ScreenRef[], toward: Compass): ScreenRef | undefined {
  const f = from.frame();
  const fc = center(f);
  let best: ScreenRef | undefined;
  let bestDistance = Infinity;

  for (const s of screens) {
    if (s.id() === from.id()) continue;
    const sf = s.frame();
    let beyond = false;
    switch (toward) {
      case 'west':  beyond = sf.x + sf.w <= f.x && intervalsOverlap(sf.y, sf.h, f.y, f.h); break;
      case 'east':  beyond = sf.x >= f.x + f.w && intervalsOverlap(sf.y, sf.h, f.y, f.h); break;
      case 'north': beyond = sf.y + sf.h <= f.y && intervalsOverlap(sf.x, sf.w, f.x, f.w); break;
      case 'south': beyond = sf.y >= f.y + f.h && intervalsOverlap(sf.x, sf.w, f.x, f.w); break;
    }
    if (!beyond) continue;

    const sc = center(sf);
    const distance = Math.hypot(sc.x - fc.x, sc.y - fc.y);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = s;
    }
  }
  return best;
}

/** The screen holding the frame's center, else the one it overlaps most. */
export function screenForFrame<S extends ScreenRef>(frame: Rect, screens: S[]): S | undefined {
  const c = center(frame);
  const holder = screens.find(s => containsPoint(s.frame(), c));
  if (holder) return holder;

  let best: S | undefined;
  let bestArea = -1;
  for (const s of screens) {
    const sf = s.frame();
    const ow = Math.max(0, Math.min(frame.x + frame.w, sf.x + sf.w) - Math.max(frame.x, sf.x));
    const oh = Math.max(0, Math.min(frame.y + frame.h, sf.y + sf.h) - Math.max(frame.y, sf.y));
    if (ow * oh > bestArea) {
      bestArea = ow * oh;
      best = s;
    }
  }
  return best;
}
