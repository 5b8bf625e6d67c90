import { Command } from 'commander';
import { createCliContext } from '../engine-context';
import { formatError, formatExecutionResult, formatGuidance, formatProgress, formatStep, formatWarning } from '../formatters';
import { confirmOperation } from '../prompts';
import type { PackageGuidance } from '../../engine/install-guidance';
import type { Intent } from '../../engine/types';
import { isMutating } from '../../engine/types';
import { toOperation } from '../../engine/intent-mapper';
import { InvalidRequestError } from '../../engine/errors';
import type { Config } from '../../config/validator';

type RunOptions = {
  yes?: boolean;
  json?: boolean;
};

function isGuidance(value: unknown): value is PackageGuidance {
  return typeof value === 'object' && value !== null && 'snippet' in value && typeof value.snippet === 'string' && 'steps' in value && Array.isArray(value.steps) && 'file' in value && typeof value.file === 'string';
}

/** Invalid intents skip the prompt; the engine reports them */
function needsConfirmation(intent: Intent, config: Config): boolean {
  try {
    const operation = toOperation(intent, {
      profile: config.system.profile,
      configurationFile: config.system.configurationFile,
      flake: config.system.flake,
    });
    return isMutating(operation.kind) && !operation.dryRun;
  } catch (error) {
    if (error instanceof InvalidRequestError) return false;
    throw error;
  }
}

/**
 * Runs one intent through the engine, confirming mutating operations first
 * and streaming progress to the terminal.
 */
export async function runIntent(program: Command, intent: Intent, options: RunOptions): Promise<void> {
  const context = createCliContext(program);

  if (!options.yes && needsConfirmation(intent, context.config)) {
    const proceed = await confirmOperation(`${intent.action} will change your running system. Continue?`);
    if (!proceed) {
      console.log(formatWarning('Aborted. Nothing was changed.'));
      return;
    }
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    console.log(formatWarning('\nCtrl+C received. Stopping (operations on the native API finish first)...'));
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    if (!options.json) console.log(formatStep(`${intent.action}${intent.target ? ` ${intent.target}` : ''}`));

    const result = await context.dispatcher.execute(intent, options.json ? undefined : (event) => console.log(formatProgress(event)), { signal: controller.signal });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(formatExecutionResult(result, { verbose: context.verbose }));
      const instructions = result.data?.instructions;
      if (isGuidance(instructions)) console.log(formatGuidance(instructions));
    }

    if (!result.success) process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await context.dispatcher.close();
  }
}

function toRunOptions(value: unknown): RunOptions {
  if (typeof value !== 'object' || value === null) return {};
  return {
    yes: 'yes' in value && value.yes === true,
    json: 'json' in value && value.json === true,
  };
}

async function handle(program: Command, intent: Intent, options: unknown): Promise<void> {
  try {
    await runIntent(program, intent, toRunOptions(options));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(msg));
    process.exitCode = 1;
  }
}

export function registerOperationCommands(program: Command): void {
  program
    .command('install')
    .description('Show how to add a package to the system configuration')
    .argument('<package>', 'Package attribute name, e.g. firefox')
    .option('--json', 'Output the result as JSON', false)
    .action(async (pkg: string, options: unknown) => {
      await handle(program, { action: 'Install', target: pkg, params: {} }, options);
    });

  program
    .command('remove')
    .description('Show how to remove a package from the system configuration')
    .argument('<package>', 'Package attribute name')
    .option('--json', 'Output the result as JSON', false)
    .action(async (pkg: string, options: unknown) => {
      await handle(program, { action: 'Remove', target: pkg, params: {} }, options);
    });

  program
    .command('update')
    .description('Rebuild and switch to the current system configuration')
    .option('--dry-run', 'Build only, without activating', false)
    .option('--flake <ref>', 'Flake reference to build, e.g. /etc/nixos#myhost')
    .option('--mode <mode>', 'Activation: switch (now and at boot), boot (next boot only) or test (now, not at boot)')
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .option('--json', 'Output the result as JSON', false)
    .action(async (options: RunOptions & { dryRun?: boolean; flake?: string; mode?: string }) => {
      const params: Record<string, string> = {};
      if (options.dryRun) params.dryRun = 'true';
      if (options.flake) params.flake = options.flake;
      if (options.mode) params.mode = options.mode;
      await handle(program, { action: 'Update', target: null, params }, options);
    });

  program
    .command('rollback')
    .description('Switch back to the previous (or a given) generation')
    .option('--generation <id>', 'Generation to roll back to')
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .option('--json', 'Output the result as JSON', false)
    .action(async (options: RunOptions & { generation?: string }) => {
      const params: Record<string, string> = options.generation ? { generation: options.generation } : {};
      await handle(program, { action: 'Rollback', target: null, params }, options);
    });

  program
    .command('switch')
    .description('Switch to a specific generation')
    .argument('<generation>', 'Generation number')
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .option('--json', 'Output the result as JSON', false)
    .action(async (id: string, options: unknown) => {
      await handle(program, { action: 'SwitchGeneration', target: id, params: {} }, options);
    });

  program
    .command('gc')
    .description('Delete old generations and collect unused store paths')
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .option('--json', 'Output the result as JSON', false)
    .action(async (options: unknown) => {
      await handle(program, { action: 'GarbageCollect', target: null, params: {} }, options);
    });
}
