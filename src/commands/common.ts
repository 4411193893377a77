/**
 * commands/common.ts
 *
 * Shared plumbing for the command modules: argument schemas, argument
 * narrowing, the focused-window lookup and result envelopes.
 */

import { CommandParameter, CommandResult } from '../core/types';
import { ValidationError } from '../core/errors';
import { DIRECTIONS, Direction, SIDES, Side, isDirection, isSide } from '../geometry/direction';
import { WindowRef } from '../platform/types';
import { EngineContext } from '../engine/context';
import { SCREEN_ROLES, ScreenRole, isScreenRole } from '../engine/screen_map';

export const directionParam: CommandParameter = {
  type: 'string',
  enum: [...DIRECTIONS],
  description: 'left, right, up or down'
};

export const sideParam: CommandParameter = {
  type: 'string',
  enum: [...SIDES],
  description: 'Screen side the window is anchored to'
};

export const roleParam: CommandParameter = {
  type: 'string',
  enum: [...SCREEN_ROLES],
  description: 'Screen role relative to the built-in display'
};

export function directionArg(command: string, args: Record<string, unknown>): Direction {
  const value = args.direction;
  if (!isDirection(value)) throw new ValidationError(command, [`direction must be one of ${DIRECTIONS.join(', ')}`]);
  return value;
}

export function sideArg(command: string, args: Record<string, unknown>): Side {
  const value = args.side;
  if (!isSide(value)) throw new ValidationError(command, [`side must be one of ${SIDES.join(', ')}`]);
  return value;
}

export function roleArg(command: string, args: Record<string, unknown>): ScreenRole {
  const value = args.role;
  if (!isScreenRole(value)) throw new ValidationError(command, [`role must be one of ${SCREEN_ROLES.join(', ')}`]);
  return value;
}

export function ok(data: Record<string, unknown>): CommandResult {
  return { success: true, data: { applied: true, ...data }, durationMs: 0 };
}

/** Nothing to act on is not a failure. */
export function notApplied(reason: string): CommandResult {
  return { success: true, data: { applied: false, reason }, durationMs: 0 };
}

/**
 * Runs `fn` against the focused window, pruning undo entries of windows
 * that have gone away first.
 */
export function withFocusedWindow(ctx: EngineContext, fn: (win: WindowRef) => CommandResult): CommandResult {
  ctx.memory.prune(ctx.platform);
  const win = ctx.platform.focusedWindow();
  if (!win) return notApplied('no focused window');
  return fn(win);
}
