/**
 * commands/index.ts
 *
 * Registers every command module against one set of engines.
 */

import { CommandRegistry } from '../core/registry';
import { Engines } from '../engine';
import { createWindowStepCommands } from './window_step';
import { createWindowLayoutCommands } from './window_layout';
import { createScreenCommands } from './screen';
import { createFocusCommands } from './focus';

export function registerAllCommands(registry: CommandRegistry, engines: Engines): void {
  registry.register(createWindowStepCommands(engines));
  registry.register(createWindowLayoutCommands(engines));
  registry.register(createScreenCommands(engines));
  registry.register(createFocusCommands(engines));
}
