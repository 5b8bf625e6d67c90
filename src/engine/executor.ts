import type { GenerationSource } from '../generations/repository';
import type { ProgressReporter } from './progress';
import type { ExecutorName, Operation, OperationKind, OperationOutcome } from './types';

/**
 * One way of carrying out operations: the in-process native API or the
 * external command-line tools. Both read generation history as well.
 */
export interface OperationExecutor extends GenerationSource {
  readonly name: ExecutorName;
  supportedKinds(): OperationKind[];
  supports(operation: Operation): boolean;
  /**
   * @param signal - honoured only by executors that can stop mid-call
   */
  execute(operation: Operation, progress: ProgressReporter, signal?: AbortSignal): Promise<OperationOutcome>;
  /** Releases anything the executor keeps running between calls */
  close?(): Promise<void>;
}
