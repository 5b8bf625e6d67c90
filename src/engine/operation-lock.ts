/**
 * Non-blocking mutual exclusion for system-mutating operations.
 * Acquisition either succeeds immediately or fails; there is no waiting queue.
 */
export class OperationLock {
  private holder: string | null = null;

  tryAcquire(owner: string): boolean {
    if (this.holder !== null) return false;
    this.holder = owner;
    return true;
  }

  release(owner: string): void {
    if (this.holder === owner) {
      this.holder = null;
    }
  }

  isHeld(): boolean {
    return this.holder !== null;
  }

  getHolder(): string | null {
    return this.holder;
  }
}

/** Shared by every dispatcher in the process */
export const processLock = new OperationLock();
