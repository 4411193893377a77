/**
 * commands/window_step.ts
 *
 * Small-step geometry: grid moves and resizes, snap-to-edge toggles and
 * shrink-to-minimum.
 */

import { CommandModule, CommandResult } from '../core/types';
import { UnknownCommandError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { Engines } from '../engine';
import { directionArg, directionParam, ok, withFocusedWindow } from './common';

const log = scopedLogger('commands/window_step');

export function createWindowStepCommands(engines: Engines): CommandModule {
  const { ctx } = engines;

  return {
    name: 'window_step',

    commands: [
      {
        name: 'window.step.move',
        description: 'Move the focused window one grid step.',
        parameters: { type: 'object', properties: { direction: directionParam }, required: ['direction'], additionalProperties: false }
      },
      {
        name: 'window.step.resize',
        description: 'Resize the focused window one grid step, keeping windows stuck to an edge on that edge.',
        parameters: { type: 'object', properties: { direction: directionParam }, required: ['direction'], additionalProperties: false }
      },
      {
        name: 'window.edge.move',
        description: 'Move the focused window flush against a screen edge; again at that edge moves it back.',
        parameters: { type: 'object', properties: { direction: directionParam }, required: ['direction'], additionalProperties: false }
      },
      {
        name: 'window.edge.resize',
        description: 'Stretch one side of the focused window to the screen edge; again at that edge undoes it.',
        parameters: { type: 'object', properties: { direction: directionParam }, required: ['direction'], additionalProperties: false }
      },
      {
        name: 'window.shrink',
        description: 'left/up: shrink to the minimum width/height. right/down: undo the shrink, or grow to the edge.',
        parameters: { type: 'object', properties: { direction: directionParam }, required: ['direction'], additionalProperties: false }
      }
    ],

    async execute(commandName: string, args: Record<string, unknown>): Promise<CommandResult> {
      const direction = directionArg(commandName, args);
      log.debug({ command: commandName, direction }, 'Step command');

      switch (commandName) {
        case 'window.step.move':
          return withFocusedWindow(ctx, win => ok({ frame: engines.step.stepMove(win, direction) }));
        case 'window.step.resize':
          return withFocusedWindow(ctx, win => ok({ frame: engines.edgeResize.resize(win, direction) }));
        case 'window.edge.move':
          return withFocusedWindow(ctx, win => ok({ frame: engines.step.moveToEdge(win, direction) }));
        case 'window.edge.resize':
          return withFocusedWindow(ctx, win => ok({ frame: engines.step.resizeToEdge(win, direction) }));
        case 'window.shrink':
          return withFocusedWindow(ctx, win => {
            const outcome = engines.shrink.apply(win, direction);
            return ok({ action: outcome.action, frame: outcome.frame, iterations: outcome.iterations });
          });
        default:
          throw new UnknownCommandError(commandName);
      }
    }
  };
}
