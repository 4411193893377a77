/**
 * engine/screen_map.ts
 *
 * Names screens by where they sit relative to the built-in display (or the
 * primary one when there is none): the anchor is `bottom`, the screens
 * stacked in its column are `center` and `top`, the rest are `left` and
 * `right`.
 */

import { center } from '../geometry/rect';
import { scopedLogger } from '../core/logger';
import { ScreenRef, WindowPlatform } from '../platform/types';

const log = scopedLogger('engine/screen_map');

export type ScreenRole = 'bottom' | 'center' | 'top' | 'left' | 'right';

export const SCREEN_ROLES: readonly ScreenRole[] = ['bottom', 'center', 'top', 'left', 'right'];

export type ScreenMap = Partial<Record<ScreenRole, ScreenRef>>;

export const BUILT_IN_MARKER = 'Built-in';

export function isScreenRole(value: unknown): value is ScreenRole {
  return typeof value === 'string' && (SCREEN_ROLES as readonly string[]).includes(value);
}

/** Case-insensitive regex match, or plain substring when the pattern is not a valid regex. */
export function screenNameMatches(name: string, pattern: string): boolean {
  try {
    return new RegExp(pattern, 'i').test(name);
  } catch {
    return name.toLowerCase().includes(pattern.toLowerCase());
  }
}

export function buildScreenMap(platform: WindowPlatform, nameOverrides: Record<string, string> = {}): ScreenMap {
  const map: ScreenMap = {};
  const screens = platform.allScreens();

  for (const [role, pattern] of Object.entries(nameOverrides)) {
    if (!isScreenRole(role)) {
      log.warn({ role }, 'Ignoring name override for unknown screen role');
      continue;
    }
    const match = screens.find(s => screenNameMatches(s.name(), pattern));
    if (match) map[role] = match;
  }

  if (!map.bottom) {
    map.bottom = screens.find(s => s.name().includes(BUILT_IN_MARKER)) ?? platform.primaryScreen();
  }
  const anchor = map.bottom;
  if (!anchor) return map;

  const af = anchor.frame();
  const assigned = new Set<number>();
  for (const role of SCREEN_ROLES) {
    const screen = map[role];
    if (screen) assigned.add(screen.id());
  }

  const column: ScreenRef[] = [];
  const sides: ScreenRef[] = [];
  for (const screen of screens) {
    if (assigned.has(screen.id())) continue;
    const cx = center(screen.frame()).x;
    if (cx >= af.x && cx <= af.x + af.w) column.push(screen);
    else sides.push(screen);
  }

  // closest to the anchor first
  column.sort((a, b) => b.frame().y - a.frame().y);
  if (column.length >= 1 && !map.center) map.center = column[0];
  if (!map.top) {
    if (column.length >= 2) map.top = column[1];
    else if (column.length === 1) map.top = column[0];
  }

  sides.sort((a, b) => center(a.frame()).x - center(b.frame()).x);
  if (sides.length >= 1 && !map.left) map.left = sides[0];
  if (sides.length >= 2 && !map.right) map.right = sides[sides.length - 1];

  log.trace({ roles: describeScreenMap(map) }, 'Screen map built');
  return map;
}

/** role → screen name, for logs and introspection. */
export function describeScreenMap(map: ScreenMap): Partial<Record<ScreenRole, string>> {
  const out: Partial<Record<ScreenRole, string>> = {};
  for (const role of SCREEN_ROLES) {
    const screen = map[role];
    if (screen) out[role] = screen.name();
  }
  return out;
}
