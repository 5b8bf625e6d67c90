import { BusyError } from '../engine/errors';

/**
 * Lets one native call run at a time.
 *
 * Tasks chain FIFO, and each one starts on a later turn of the event loop,
 * so progress events queued before a call are delivered first. Up to
 * `maxQueued` tasks may wait behind the running one; beyond that `run`
 * rejects with BusyError.
 */
export class SingleSlotExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private maxQueued = 4) {}

  run<T>(task: () => T | Promise<T>): Promise<T> {
    if (this.pending > 0 && this.pending - 1 >= this.maxQueued) {
      return Promise.reject(new BusyError('Too many native calls are waiting'));
    }

    this.pending++;
    const result = this.tail
      .then(() => new Promise<void>((resolve) => setImmediate(resolve)))
      .then(task)
      .finally(() => {
        this.pending--;
      });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  isBusy(): boolean {
    return this.pending > 0;
  }

  getQueueLength(): number {
    return Math.max(0, this.pending - 1);
  }
}
