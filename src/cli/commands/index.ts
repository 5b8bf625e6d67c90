import { Command } from 'commander';
import { registerOperationCommands } from './operations';
import { registerGenerationsCommand } from './generations';
import { registerCapabilitiesCommand } from './capabilities';
import { registerConfigCommand } from './config';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerOperationCommands(program);
  registerGenerationsCommand(program);
  registerCapabilitiesCommand(program);
  registerConfigCommand(program);
}
