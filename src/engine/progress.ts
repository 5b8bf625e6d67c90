import type { ProgressEvent, ProgressSink } from './types';
import type { Logger } from '../utils/logger';

export type MonotonicClock = () => number;

const defaultClock: MonotonicClock = () => performance.now();

/**
 * Ordered, push-only progress channel for a single operation.
 *
 * Percent values never go backwards (a lower checkpoint is raised to the
 * highest one already reported) and timestamps are strictly increasing even
 * when the clock returns the same reading twice.
 */
export class ProgressReporter {
  private lastPercent = 0;
  private lastTimestamp = Number.NEGATIVE_INFINITY;
  private emitted: ProgressEvent[] = [];

  constructor(
    private sink: ProgressSink,
    private clock: MonotonicClock = defaultClock,
    private logger?: Logger,
  ) {}

  report(phase: string, percent: number, message: string): ProgressEvent {
    const bounded = Math.min(100, Math.max(0, percent));
    this.lastPercent = Math.max(this.lastPercent, bounded);

    const now = this.clock();
    this.lastTimestamp = now > this.lastTimestamp ? now : this.lastTimestamp + 0.001;

    const event: ProgressEvent = { phase, percent: this.lastPercent, message, timestamp: this.lastTimestamp };
    this.emitted.push(event);

    try {
      this.sink(event);
    } catch (error) {
      // sink failures are logged, never propagated
      this.logger?.warn('Progress sink threw', { error: error instanceof Error ? error.message : String(error) });
    }

    return event;
  }

  /** Highest percent reported so far */
  getPercent(): number {
    return this.lastPercent;
  }

  getEvents(): readonly ProgressEvent[] {
    return this.emitted;
  }
}

/** Sink that drops every event */
export const noopSink: ProgressSink = () => undefined;
