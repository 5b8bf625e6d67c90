import { ProgressReporter } from '../../../src/engine/progress';
import type { ProgressEvent } from '../../../src/engine/types';
import type { Logger } from '../../../src/utils/logger';

const fixedClock = (readings: number[]) => {
  let i = 0;
  return () => readings[Math.min(i++, readings.length - 1)];
};

describe('ProgressReporter', () => {
  it('should deliver events to the sink in order', () => {
    const events: ProgressEvent[] = [];
    const reporter = new ProgressReporter((e) => events.push(e), fixedClock([1, 2, 3]));

    reporter.report('build', 0, 'Build started');
    reporter.report('build', 70, 'Build complete');
    reporter.report('done', 100, 'Done');

    expect(events.map((e) => [e.phase, e.percent, e.message, e.timestamp])).toEqual([
      ['build', 0, 'Build started', 1],
      ['build', 70, 'Build complete', 2],
      ['done', 100, 'Done', 3],
    ]);
  });

  it('should never let percent go backwards or out of range', () => {
    const reporter = new ProgressReporter(() => undefined, fixedClock([1, 2, 3, 4]));

    expect(reporter.report('a', 50, '').percent).toBe(50);
    expect(reporter.report('b', 20, '').percent).toBe(50);
    expect(reporter.report('c', 150, '').percent).toBe(100);
    expect(reporter.getPercent()).toBe(100);
  });

  it('should keep timestamps strictly increasing when the clock stalls', () => {
    const reporter = new ProgressReporter(() => undefined, fixedClock([5, 5, 4]));

    const stamps = [reporter.report('a', 0, ''), reporter.report('b', 10, ''), reporter.report('c', 20, '')].map((e) => e.timestamp);
    expect(stamps[0]).toBe(5);
    expect(stamps[1]).toBeGreaterThan(stamps[0]);
    expect(stamps[2]).toBeGreaterThan(stamps[1]);
  });

  it('should log and swallow sink failures', () => {
    const logger: Logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
    const reporter = new ProgressReporter(
      () => {
        throw new Error('ui gone');
      },
      fixedClock([1]),
      logger,
    );

    expect(() => reporter.report('build', 10, 'x')).not.toThrow();
    expect(logger.warn).toHaveBeenCalledWith('Progress sink threw', { error: 'ui gone' });
    expect(reporter.getEvents()).toHaveLength(1);
  });
});
