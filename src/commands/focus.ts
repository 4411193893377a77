/**
 * commands/focus.ts
 */

import { CommandModule, CommandResult } from '../core/types';
import { UnknownCommandError } from '../core/errors';
import { Engines } from '../engine';
import { FocusOutcome } from '../engine/focus';
import { directionArg, directionParam, notApplied, ok } from './common';

function toResult(outcome: FocusOutcome): CommandResult {
  if (outcome.action === 'no-target') return notApplied(outcome.reason);
  return ok({ id: outcome.id, appName: outcome.appName, frame: outcome.frame });
}

export function createFocusCommands(engines: Engines): CommandModule {
  return {
    name: 'focus',

    commands: [
      {
        name: 'focus.direction',
        description: 'Focus the next visible window on this screen in a direction, wrapping at the ends.',
        parameters: { type: 'object', properties: { direction: directionParam }, required: ['direction'], additionalProperties: false }
      },
      {
        name: 'focus.screen',
        description: 'Focus the window on the neighbouring screen nearest the shared edge.',
        parameters: { type: 'object', properties: { direction: directionParam }, required: ['direction'], additionalProperties: false }
      },
      {
        name: 'focus.highlight',
        description: 'Flash a highlight around the focused window.',
        parameters: { type: 'object', properties: {}, additionalProperties: false }
      }
    ],

    async execute(commandName: string, args: Record<string, unknown>): Promise<CommandResult> {
      switch (commandName) {
        case 'focus.direction':
          return toResult(engines.focus.focusDirection(directionArg(commandName, args)));
        case 'focus.screen':
          return toResult(engines.focus.focusScreen(directionArg(commandName, args)));
        case 'focus.highlight':
          return toResult(engines.focus.highlightFocused());
        default:
          throw new UnknownCommandError(commandName);
      }
    }
  };
}
