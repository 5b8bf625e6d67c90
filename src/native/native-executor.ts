import { EngineError, GenerationStateError, NativeCallError, PermissionDeniedError } from '../engine/errors';
import { buildPackageGuidance } from '../engine/install-guidance';
import { listOutcome, performSwitch, profileOf, updateOutcome } from '../engine/outcomes';
import type { OperationExecutor } from '../engine/executor';
import type { ProgressReporter } from '../engine/progress';
import type { Generation, Operation, OperationKind, OperationOutcome } from '../engine/types';
import { GenerationRepository } from '../generations/repository';
import { mapNativeGeneration } from '../generations/mapping';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import type { NativeBackend, NativeCall, NativeCallArgs } from './native-backend';
import { SingleSlotExecutor } from './single-slot-executor';

export interface NativeExecutorOptions {
  /** Skip the root check before mutating calls */
  allowUnprivileged: boolean;
  /** Used in the apply command of install/remove guidance */
  useSudo: boolean;
  maxQueuedCalls?: number;
  isPrivileged?: () => boolean;
  logger?: Logger;
}

const SUPPORTED_KINDS: OperationKind[] = ['install', 'remove', 'update', 'rollback', 'list-generations', 'switch-generation'];

const PERMISSION_PATTERN = /permission denied|operation not permitted|must be (?:run as )?root|requires? (?:root|administrator|superuser)/i;

function isPermissionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && (error.code === 'EACCES' || error.code === 'EPERM')) return true;
  return PERMISSION_PATTERN.test(error.message);
}

const runningAsRoot = (): boolean => typeof process.geteuid === 'function' && process.geteuid() === 0;

/**
 * Runs operations through the native API behind a NativeBackend.
 *
 * Every native call goes through a single-slot executor, so at most one is in
 * flight. The API reports no progress of its own; checkpoints are emitted
 * around each call. Calls cannot be interrupted once dispatched.
 */
export class NativeOperationExecutor implements OperationExecutor {
  readonly name = 'native';
  private slot: SingleSlotExecutor;
  private logger: Logger;
  private isPrivileged: () => boolean;

  constructor(
    private backend: NativeBackend,
    private options: NativeExecutorOptions,
  ) {
    this.slot = new SingleSlotExecutor(options.maxQueuedCalls ?? 4);
    this.logger = options.logger ?? silentLogger;
    this.isPrivileged = options.isPrivileged ?? runningAsRoot;
  }

  supportedKinds(): OperationKind[] {
    return [...SUPPORTED_KINDS];
  }

  supports(operation: Operation): boolean {
    if (!SUPPORTED_KINDS.includes(operation.kind)) return false;
    // Flake builds need the optional entry point
    if (operation.kind === 'update' && operation.flake !== null) {
      return this.backend.supportsFlakes;
    }
    return true;
  }

  async fetchGenerations(profile: string): Promise<Generation[]> {
    const records = await this.call('getGenerations', profile);
    if (!Array.isArray(records)) {
      throw new GenerationStateError('Native API returned no generation list');
    }
    return records.map((record: unknown) => mapNativeGeneration(record));
  }

  async execute(operation: Operation, progress: ProgressReporter): Promise<OperationOutcome> {
    switch (operation.kind) {
      case 'install':
      case 'remove':
        progress.report('guidance', 0, 'Preparing configuration changes');
        progress.report('done', 100, 'Instructions ready');
        return buildPackageGuidance(operation, { useSudo: this.options.useSudo });
      case 'list-generations':
        return this.listGenerations(operation, progress);
      case 'update':
        return this.update(operation, progress);
      case 'rollback':
      case 'switch-generation':
        return this.switchGeneration(operation, progress);
      default:
        throw new EngineError(`Native API cannot run '${operation.kind}'`, 'NativeUnavailable');
    }
  }

  /** Stops the backend's worker, if it has one */
  async close(): Promise<void> {
    await this.backend.close();
  }

  // ── Operations ──────────────────────────────────────────────────────

  private async listGenerations(operation: Operation, progress: ProgressReporter): Promise<OperationOutcome> {
    progress.report('query', 0, 'Reading system generations');
    const generations = await new GenerationRepository(this, profileOf(operation)).list();
    progress.report('done', 100, `Found ${generations.length} generations`);
    return listOutcome(generations);
  }

  private async update(operation: Operation, progress: ProgressReporter): Promise<OperationOutcome> {
    const profile = profileOf(operation);
    if (!operation.dryRun) this.requirePrivilege();

    const repository = new GenerationRepository(this, profile);
    const before = await repository.current();

    progress.report('build', 0, 'Build started');
    progress.report('build', 10, operation.flake ? `Building flake ${operation.flake.uri}` : `Building ${operation.attrs.file}`);

    const { flake, attrs } = operation;
    const storePath = flake ? await this.call('buildFlake', flake, attrs.attr) : await this.call('build', attrs.attr, attrs);
    if (typeof storePath !== 'string' || storePath === '') {
      throw new EngineError('Native build returned no store path');
    }
    progress.report('build', 70, 'Build complete');

    if (operation.dryRun) {
      progress.report('done', 100, 'Dry run complete');
      return updateOutcome(operation, before, before);
    }

    progress.report('activation', 80, 'Activating new configuration');
    await this.call('switchToConfiguration', storePath, operation.mode, profile);

    progress.report('verify', 95, 'Verifying system state');
    const after = await repository.current();
    progress.report('done', 100, 'System update complete');
    return updateOutcome(operation, before, after);
  }

  private async switchGeneration(operation: Operation, progress: ProgressReporter): Promise<OperationOutcome> {
    const profile = profileOf(operation);
    this.requirePrivilege();

    const repository = new GenerationRepository(this, profile);
    return performSwitch(repository, operation, progress, async (plan) => {
      const target = operation.generation === null ? undefined : plan.to.id;
      await this.call('rollback', profile, target);
    });
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private requirePrivilege(): void {
    if (!this.options.allowUnprivileged && !this.isPrivileged()) {
      throw new PermissionDeniedError();
    }
  }

  private async call<K extends NativeCall>(name: K, ...args: NativeCallArgs[K]): Promise<unknown> {
    this.logger.debug('Native call', { call: name, queued: this.slot.getQueueLength() });
    try {
      return await this.slot.run(() => this.backend.invoke(name, ...args));
    } catch (error) {
      if (isPermissionFailure(error)) {
        throw new PermissionDeniedError(undefined, error);
      }
      if (error instanceof EngineError) throw error;
      throw new NativeCallError(name, error);
    }
  }
}
