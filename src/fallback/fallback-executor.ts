import { ProcessExitError } from '../engine/errors';
import { buildPackageGuidance } from '../engine/install-guidance';
import { listOutcome, performSwitch, profileOf, updateOutcome } from '../engine/outcomes';
import type { OperationExecutor } from '../engine/executor';
import type { ProgressReporter } from '../engine/progress';
import type { Generation, Operation, OperationKind, OperationOutcome } from '../engine/types';
import { GenerationRepository } from '../generations/repository';
import { parseGenerationListing } from '../generations/parser';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { buildCommands, describeCommand } from './command-builder';
import type { CommandSpec } from './command-builder';
import { runProcess } from './process-runner';
import type { ProcessOutput, ProcessRunner } from './process-runner';

export interface FallbackExecutorOptions {
  timeoutMs: number;
  useSudo: boolean;
  runner?: ProcessRunner;
  logger?: Logger;
}

const ALL_KINDS: OperationKind[] = ['install', 'remove', 'update', 'rollback', 'list-generations', 'switch-generation', 'garbage-collect'];

// nixos-rebuild status lines that mark a phase change
const CHECKPOINTS: Array<{ pattern: RegExp; phase: string; percent: number }> = [
  { pattern: /^building the system configuration/, phase: 'build', percent: 10 },
  { pattern: /^activating the configuration/, phase: 'activation', percent: 80 },
];

/**
 * Runs operations through the NixOS command-line tools.
 *
 * Success of a mutating command is decided by its exit status alone; output
 * is parsed only when listing generations.
 */
export class FallbackExecutor implements OperationExecutor {
  readonly name = 'fallback';
  private runner: ProcessRunner;
  private logger: Logger;

  constructor(private options: FallbackExecutorOptions) {
    this.runner = options.runner ?? runProcess;
    this.logger = options.logger ?? silentLogger;
  }

  supportedKinds(): OperationKind[] {
    return [...ALL_KINDS];
  }

  supports(operation: Operation): boolean {
    return ALL_KINDS.includes(operation.kind);
  }

  async fetchGenerations(profile: string, signal?: AbortSignal): Promise<Generation[]> {
    const output = await this.run({ command: 'nix-env', args: ['--list-generations', '-p', profile] }, signal);
    return parseGenerationListing(output.stdout);
  }

  async execute(operation: Operation, progress: ProgressReporter, signal?: AbortSignal): Promise<OperationOutcome> {
    switch (operation.kind) {
      case 'install':
      case 'remove':
        progress.report('guidance', 0, 'Preparing configuration changes');
        progress.report('done', 100, 'Instructions ready');
        return buildPackageGuidance(operation, { useSudo: this.options.useSudo });

      case 'list-generations': {
        progress.report('query', 0, 'Reading system generations');
        const generations = await new GenerationRepository(this, profileOf(operation)).list();
        progress.report('done', 100, `Found ${generations.length} generations`);
        return listOutcome(generations);
      }

      case 'update':
        return this.update(operation, progress, signal);

      case 'rollback':
      case 'switch-generation': {
        const repository = new GenerationRepository(this, profileOf(operation));
        return performSwitch(repository, operation, progress, async () => {
          await this.runAll(buildCommands(operation, this.options), progress, signal);
        });
      }

      case 'garbage-collect': {
        const commands = buildCommands(operation, this.options);
        progress.report('collect', 0, 'Removing old generations and unused packages');
        await this.runAll(commands, progress, signal);
        progress.report('done', 100, 'Garbage collection complete');
        return { message: 'Removed old generations and unused packages', data: { commands: commands.map(describeCommand) } };
      }
    }
  }

  private async update(operation: Operation, progress: ProgressReporter, signal?: AbortSignal): Promise<OperationOutcome> {
    const repository = new GenerationRepository(this, profileOf(operation));
    const before = await repository.current();
    const commands = buildCommands(operation, this.options);

    progress.report('build', 0, `Running ${commands.map(describeCommand).join(' && ')}`);
    await this.runAll(commands, progress, signal);

    if (operation.dryRun) {
      progress.report('done', 100, 'Dry run complete');
      return updateOutcome(operation, before, before);
    }

    progress.report('verify', 95, 'Verifying system state');
    const after = await repository.current();
    progress.report('done', 100, 'System update complete');
    return updateOutcome(operation, before, after);
  }

  private async runAll(commands: CommandSpec[], progress: ProgressReporter, signal?: AbortSignal): Promise<void> {
    for (const spec of commands) {
      await this.run(spec, signal, (line) => {
        const checkpoint = CHECKPOINTS.find((c) => c.pattern.test(line));
        if (checkpoint) progress.report(checkpoint.phase, checkpoint.percent, line);
      });
    }
  }

  private async run(spec: CommandSpec, signal?: AbortSignal, onLine?: (line: string) => void): Promise<ProcessOutput> {
    const commandLine = describeCommand(spec);
    this.logger.debug('Running command', { command: commandLine });

    const output = await this.runner(spec, { timeoutMs: this.options.timeoutMs, signal, onLine });
    if (output.exitCode !== 0) {
      throw new ProcessExitError(commandLine, output.exitCode, output.stderr, output.stdout);
    }
    return output;
  }
}
