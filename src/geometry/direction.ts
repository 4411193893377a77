/**
 * geometry/direction.ts
 */

export type Direction = 'left' | 'right' | 'up' | 'down';
export type Side = 'left' | 'right';
export type Edge = 'left' | 'right' | 'top' | 'bottom';

export const DIRECTIONS: readonly Direction[] = ['left', 'right', 'up', 'down'];
export const SIDES: readonly Side[] = ['left', 'right'];

export function isHorizontal(dir: Direction): boolean {
  return dir === 'left' || dir === 'right';
}

/** left/up walk toward the start of a sorted list, right/down toward its end. */
export function isBackward(dir: Direction): boolean {
  return dir === 'left' || dir === 'up';
}

export function edgeOf(dir: Direction): Edge {
  switch (dir) {
    case 'left':  return 'left';
    case 'right': return 'right';
    case 'up':    return 'top';
    case 'down':  return 'bottom';
  }
}

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && (DIRECTIONS as readonly string[]).includes(value);
}

export function isSide(value: unknown): value is Side {
  return typeof value === 'string' && (SIDES as readonly string[]).includes(value);
}
