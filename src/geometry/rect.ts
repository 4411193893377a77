/**
 * geometry/rect.ts
 *
 * Pure rectangle math. Coordinates are screen pixels with Y growing
 * downward; every engine uses the same convention.
 */

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface Point {
  x: number;
  y: number;
}

export function rect(x: number, y: number, w: number, h: number): Rect {
  return { x, y, w, h };
}

export function cloneRect(r: Rect): Rect {
  return { x: r.x, y: r.y, w: r.w, h: r.h };
}

export function right(r: Rect): number {
  return r.x + r.w;
}

export function bottom(r: Rect): number {
  return r.y + r.h;
}

export function center(r: Rect): Point {
  return { x: r.x + r.w / 2, y: r.y + r.h / 2 };
}

/** |a - b| < tolerance; fractional-pixel drift from display scaling stays inside. */
export function near(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) < tolerance;
}

export function rectsNear(a: Rect, b: Rect, tolerance: number): boolean {
  return near(a.x, b.x, tolerance)
    && near(a.y, b.y, tolerance)
    && near(a.w, b.w, tolerance)
    && near(a.h, b.h, tolerance);
}

/** Half-open containment: the right and bottom edges belong to the neighbour. */
export function containsPoint(r: Rect, p: Point): boolean {
  return p.x >= r.x && p.x < r.x + r.w
    && p.y >= r.y && p.y < r.y + r.h;
}

/** Open-interval overlap of [a0, a0+alen) and [b0, b0+blen). */
export function intervalsOverlap(a0: number, alen: number, b0: number, blen: number): boolean {
  return a0 < b0 + blen && b0 < a0 + alen;
}

export function overlapsVertically(a: Rect, b: Rect): boolean {
  return intervalsOverlap(a.y, a.h, b.y, b.h);
}

export function overlapsHorizontally(a: Rect, b: Rect): boolean {
  return intervalsOverlap(a.x, a.w, b.x, b.w);
}

// ---------------------------------------------------------------------------
// Edge tests against a screen frame
// ---------------------------------------------------------------------------

export function atLeftEdge(f: Rect, s: Rect, tolerance: number): boolean {
  return f.x <= s.x + tolerance;
}

export function atRightEdge(f: Rect, s: Rect, tolerance: number): boolean {
  return f.x + f.w >= s.x + s.w - tolerance;
}

export function atTopEdge(f: Rect, s: Rect, tolerance: number): boolean {
  return f.y <= s.y + tolerance;
}

export function atBottomEdge(f: Rect, s: Rect, tolerance: number): boolean {
  return f.y + f.h >= s.y + s.h - tolerance;
}

/** Largest part of `r` that fits inside `bounds`, keeping the size where it can. */
export function clampInto(r: Rect, bounds: Rect): Rect {
  const w = Math.min(r.w, bounds.w);
  const h = Math.min(r.h, bounds.h);
  let x = r.x;
  let y = r.y;
  if (x + w > bounds.x + bounds.w) x = bounds.x + bounds.w - w;
  if (x < bounds.x) x = bounds.x;
  if (y + h > bounds.y + bounds.h) y = bounds.y + bounds.h - h;
  if (y < bounds.y) y = bounds.y;
  return { x, y, w, h };
}
