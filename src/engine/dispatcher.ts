import crypto from 'crypto';
import { BusyError, NativeUnavailableError, OperationCancelledError } from './errors';
import { translateError } from './error-translator';
import type { OperationExecutor } from './executor';
import { toOperation } from './intent-mapper';
import type { OperationDefaults } from './intent-mapper';
import { OperationLock, processLock } from './operation-lock';
import { ProgressReporter, noopSink } from './progress';
import type { MonotonicClock } from './progress';
import { isMutating } from './types';
import type { Capabilities, ExecutionResult, ExecutorName, Generation, Intent, Operation, OperationKind, ProgressSink } from './types';
import { GenerationRepository } from '../generations/repository';
import type { NativeCapability } from '../native/discovery';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';

// ── Options ─────────────────────────────────────────────────────────────

export interface DispatcherOptions {
  /** Result of the start-up probe; never re-evaluated */
  capability: NativeCapability;
  /** Executor over the discovered native API (ignored when the capability is unavailable) */
  native: OperationExecutor | null;
  /** Command-line executor, or null when the fallback is disabled */
  fallback: OperationExecutor | null;
  defaults: OperationDefaults;
  /** Defaults to the process-wide lock */
  lock?: OperationLock;
  logger?: Logger;
  clock?: MonotonicClock;
}

export interface ExecuteOptions {
  /**
   * Honoured before dispatch on both paths and mid-run on the fallback path.
   * Native calls run to completion once started.
   */
  signal?: AbortSignal;
}

// ── Dispatcher ──────────────────────────────────────────────────────────

/**
 * Public entry point of the engine.
 *
 * Responsibilities:
 *  - Validates an Intent into an Operation before anything is locked
 *  - Lets at most one mutating operation run at a time, rejecting others as Busy
 *  - Prefers the native executor, falling back to command-line tools
 *  - Streams progress to the caller and always returns an ExecutionResult
 */
export class OperationDispatcher {
  private capability: NativeCapability;
  private native: OperationExecutor | null;
  private fallback: OperationExecutor | null;
  private defaults: OperationDefaults;
  private lock: OperationLock;
  private logger: Logger;
  private clock?: MonotonicClock;

  constructor(options: DispatcherOptions) {
    this.capability = options.capability;
    this.native = options.capability.available ? options.native : null;
    this.fallback = options.fallback;
    this.defaults = options.defaults;
    this.lock = options.lock ?? processLock;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock;
  }

  // ── Public API ──────────────────────────────────────────────────────

  async execute(intent: Intent, sink: ProgressSink = noopSink, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const startTime = Date.now();
    const runId = crypto.randomUUID();
    const { signal } = options;

    let operation: Operation;
    try {
      operation = toOperation(intent, this.defaults);
    } catch (error) {
      this.logger.warn('Rejected intent', { action: intent.action, error: error instanceof Error ? error.message : String(error) });
      return this.failure(error, startTime, null);
    }

    if (signal?.aborted) {
      return this.failure(new OperationCancelledError('The operation was cancelled before it started'), startTime, null, operation.kind);
    }

    const mutating = isMutating(operation.kind);
    if (mutating && !this.lock.tryAcquire(runId)) {
      this.logger.warn('Rejected concurrent operation', { kind: operation.kind, holder: this.lock.getHolder() });
      return this.failure(new BusyError(), startTime, null, operation.kind);
    }

    let executorName: ExecutorName | null = null;
    const onNativeAbort = (): void => {
      this.logger.warn('Cancellation ignored: a native operation runs to completion once started', { runId });
    };

    try {
      const executor = this.selectExecutor(operation);
      executorName = executor.name;

      this.logger.info(`Executing: ${operation.kind}`, { runId, executor: executor.name });
      const reporter = new ProgressReporter(sink, this.clock, this.logger);

      if (executor.name === 'native') {
        signal?.addEventListener('abort', onNativeAbort, { once: true });
      }

      const outcome = await executor.execute(operation, reporter, executor.name === 'fallback' ? signal : undefined);
      const durationMs = Date.now() - startTime;
      this.logger.info(`Completed: ${operation.kind} (${durationMs}ms)`, { runId });

      return { success: true, message: outcome.message, data: outcome.data, error: null, durationMs, executor: executor.name };
    } catch (error) {
      this.logger.error(`Failed: ${operation.kind}`, { runId, error: error instanceof Error ? error.message : String(error) });
      return this.failure(error, startTime, executorName, operation.kind);
    } finally {
      signal?.removeEventListener('abort', onNativeAbort);
      if (mutating) this.lock.release(runId);
    }
  }

  /** Current generation history of the configured profile, freshly queried */
  async listGenerations(): Promise<Generation[]> {
    const operation = toOperation({ action: 'ListGenerations', target: null, params: {} }, this.defaults);
    const executor = this.selectExecutor(operation);
    return new GenerationRepository(executor, this.defaults.profile).list();
  }

  capabilities(): Capabilities {
    const kinds = new Set<OperationKind>([...(this.native?.supportedKinds() ?? []), ...(this.fallback?.supportedKinds() ?? [])]);
    return {
      nativeAvailable: this.native !== null,
      nativeModulePath: this.capability.modulePath,
      supportedKinds: [...kinds],
      fallbackEnabled: this.fallback !== null,
      nativeCancellable: false,
    };
  }

  /** Stops the native worker, if one was started */
  async close(): Promise<void> {
    await this.native?.close?.();
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private selectExecutor(operation: Operation): OperationExecutor {
    if (this.native?.supports(operation)) return this.native;
    if (this.fallback?.supports(operation)) return this.fallback;
    throw new NativeUnavailableError(operation.kind);
  }

  private failure(error: unknown, startTime: number, executor: ExecutorName | null, kind?: OperationKind): ExecutionResult {
    const translated = translateError(error, { kind });
    return {
      success: false,
      message: translated.message,
      data: null,
      error: translated.error,
      durationMs: Date.now() - startTime,
      executor,
    };
  }
}
