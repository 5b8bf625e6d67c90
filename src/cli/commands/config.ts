import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader';
import { ConfigValidationError } from '../../engine/errors';
import { toConfigOverrides } from '../engine-context';
import type { GlobalOptions } from '../engine-context';

function reportConfigError(error: unknown): void {
  console.error(chalk.red('Failed to load configuration:'));
  if (error instanceof ConfigValidationError) {
    error.issues.forEach((issue) => console.error(chalk.red(`  - ${issue}`)));
  } else if (error instanceof Error) {
    console.error(chalk.red(error.message));
  }
  process.exitCode = 1;
}

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Inspect configuration');

  configCommand
    .command('validate')
    .description('Validate current configuration')
    .action(() => {
      try {
        loadConfig(toConfigOverrides(program.opts<GlobalOptions>()));
        console.log(chalk.green('✓ Configuration is valid.'));
      } catch (error) {
        reportConfigError(error);
      }
    });

  configCommand
    .command('show')
    .description('Show the effective configuration')
    .action(() => {
      try {
        const config = loadConfig(toConfigOverrides(program.opts<GlobalOptions>()));
        console.log(JSON.stringify(config, null, 2));
      } catch (error) {
        reportConfigError(error);
      }
    });
}
