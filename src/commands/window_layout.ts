/**
 * commands/window_layout.ts
 *
 * Progressive toggles (centre, maximize, half/third) and the dock.
 */

import { CommandModule, CommandResult } from '../core/types';
import { UnknownCommandError } from '../core/errors';
import { Engines } from '../engine';
import { notApplied, ok, sideArg, sideParam, withFocusedWindow } from './common';

const noArgs = { type: 'object' as const, properties: {}, additionalProperties: false };

export function createWindowLayoutCommands(engines: Engines): CommandModule {
  const { ctx } = engines;

  return {
    name: 'window_layout',

    commands: [
      {
        name: 'window.center',
        description: 'Centre vertically, then horizontally, then restore.',
        parameters: noArgs
      },
      {
        name: 'window.maximize',
        description: 'Maximize height, then fully, then restore.',
        parameters: noArgs
      },
      {
        name: 'window.halfThird',
        description: 'Cycle half, third, middle third, two thirds of the screen width on one side, then restore.',
        parameters: { type: 'object', properties: { side: sideParam }, required: ['side'], additionalProperties: false }
      },
      {
        name: 'window.compact',
        description: 'Dock the focused window as a small tile along the bottom of its screen, or undock it.',
        parameters: noArgs
      }
    ],

    async execute(commandName: string, args: Record<string, unknown>): Promise<CommandResult> {
      switch (commandName) {
        case 'window.center':
          return withFocusedWindow(ctx, win => {
            const { step, frame } = engines.cycle.toggleCenter(win);
            return step === 'none' ? notApplied('already centred') : ok({ step, frame });
          });

        case 'window.maximize':
          return withFocusedWindow(ctx, win => {
            const { step, frame } = engines.cycle.toggleMaximize(win);
            return step === 'none' ? notApplied('already maximized') : ok({ step, frame });
          });

        case 'window.halfThird': {
          const side = sideArg(commandName, args);
          return withFocusedWindow(ctx, win => {
            const { step, frame } = engines.cycle.cycleHalfThird(win, side);
            return ok({ side, step, frame });
          });
        }

        case 'window.compact':
          return withFocusedWindow(ctx, win => {
            const outcome = engines.compact.toggle(win);
            if (outcome.action === 'no-room') return notApplied('no room left in the dock');
            return ok({ ...outcome });
          });

        default:
          throw new UnknownCommandError(commandName);
      }
    }
  };
}
