#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './cli/commands';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('nix-engine')
    .description('Run NixOS system operations: install guidance, updates, rollbacks and generations')
    .version('0.1.0')
    .option('--no-native', 'Do not use the native system API, even when installed')
    .option('--no-sudo', 'Run command-line tools without sudo')
    .option('--timeout <ms>', 'Timeout for each command-line invocation')
    .option('--profile <path>', 'System profile to operate on')
    .option('-v, --verbose', 'Show detailed output');

  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
