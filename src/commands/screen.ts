/**
 * commands/screen.ts
 *
 * Moving windows between screens by role, and the role map itself.
 */

import { CommandModule, CommandResult } from '../core/types';
import { UnknownCommandError } from '../core/errors';
import { Engines } from '../engine';
import { SCREEN_ROLES } from '../engine/screen_map';
import { notApplied, ok, roleArg, roleParam, withFocusedWindow } from './common';

export function createScreenCommands(engines: Engines): CommandModule {
  const { ctx } = engines;

  return {
    name: 'screen',

    commands: [
      {
        name: 'screen.moveTo',
        description: 'Move the focused window to the screen holding a role; repeating it right away moves it back.',
        parameters: { type: 'object', properties: { role: roleParam }, required: ['role'], additionalProperties: false }
      },
      {
        name: 'screen.map',
        description: 'List which screen holds each role.',
        parameters: { type: 'object', properties: {}, additionalProperties: false }
      }
    ],

    async execute(commandName: string, args: Record<string, unknown>): Promise<CommandResult> {
      switch (commandName) {
        case 'screen.moveTo': {
          const role = roleArg(commandName, args);
          return withFocusedWindow(ctx, win => {
            const outcome = engines.crossScreen.moveTo(win, role);
            switch (outcome.action) {
              case 'no-target':   return notApplied(`no screen holds the ${role} role`);
              case 'same-screen': return notApplied(`window is already on the ${role} screen`);
              default:            return ok({ role, ...outcome });
            }
          });
        }

        case 'screen.map': {
          const map = engines.crossScreen.screenMap();
          const roles: Record<string, { id: number; name: string; frame: unknown }> = {};
          for (const role of SCREEN_ROLES) {
            const screen = map[role];
            if (screen) roles[role] = { id: screen.id(), name: screen.name(), frame: screen.frame() };
          }
          return ok({ roles });
        }

        default:
          throw new UnknownCommandError(commandName);
      }
    }
  };
}
