import type { Config } from '../config/validator';
import { FallbackExecutor } from '../fallback/fallback-executor';
import type { ProcessRunner } from '../fallback/process-runner';
import { discoverNativeApi } from '../native/discovery';
import type { NativeCapability } from '../native/discovery';
import { InProcessNativeBackend } from '../native/native-backend';
import type { NativeBackend } from '../native/native-backend';
import { NativeOperationExecutor } from '../native/native-executor';
import { WorkerNativeBackend } from '../native/worker-backend';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { OperationDispatcher } from './dispatcher';
import type { OperationLock } from './operation-lock';

export interface EngineOverrides {
  logger?: Logger;
  /** Pre-computed capability, skipping discovery */
  capability?: NativeCapability;
  runner?: ProcessRunner;
  lock?: OperationLock;
  isPrivileged?: () => boolean;
  /** Where native calls run; defaults to a worker thread over the discovered module */
  nativeBackend?: NativeBackend;
}

function defaultBackend(capability: NativeCapability, logger: Logger): NativeBackend | null {
  if (!capability.api) return null;
  if (capability.modulePath === null) return new InProcessNativeBackend(capability.api);
  return new WorkerNativeBackend(capability.modulePath, typeof capability.api.buildFlake === 'function', logger);
}

/**
 * Wires the engine from configuration: probes for the native API once,
 * builds both executors and hands them to a dispatcher. The discovered
 * module is loaded again on a worker thread, where its calls run.
 */
export function createEngine(config: Config, overrides: EngineOverrides = {}): OperationDispatcher {
  const logger = overrides.logger ?? silentLogger;

  const capability =
    overrides.capability ??
    discoverNativeApi({
      enabled: config.native.enabled,
      modulePath: config.native.modulePath,
      searchPaths: config.native.searchPaths,
      logger,
    });

  const backend = overrides.nativeBackend ?? defaultBackend(capability, logger);
  const native = backend
    ? new NativeOperationExecutor(backend, {
        allowUnprivileged: config.native.allowUnprivileged,
        useSudo: config.fallback.useSudo,
        maxQueuedCalls: config.native.maxQueuedCalls,
        isPrivileged: overrides.isPrivileged,
        logger,
      })
    : null;

  const fallback = config.fallback.enabled
    ? new FallbackExecutor({
        timeoutMs: config.fallback.timeoutMs,
        useSudo: config.fallback.useSudo,
        runner: overrides.runner,
        logger,
      })
    : null;

  return new OperationDispatcher({
    capability,
    native,
    fallback,
    defaults: {
      profile: config.system.profile,
      configurationFile: config.system.configurationFile,
      flake: config.system.flake,
    },
    lock: overrides.lock,
    logger,
  });
}

export { OperationDispatcher } from './dispatcher';
export type { DispatcherOptions, ExecuteOptions } from './dispatcher';
export { translateError } from './error-translator';
export { toOperation } from './intent-mapper';
export { ProgressReporter } from './progress';
export * from './errors';
export * from './types';
