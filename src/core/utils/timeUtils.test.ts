import { describe, it, expect, vi, afterEach } from 'vitest';
import { createBenchmarkConfig } from '../config';
import { InvalidArgumentError } from '../errors';
import { benchmark, formatDuration, now, timer, timerAsync } from './timeUtils';

/**
 * Make performance.now() return the given timestamps (ms), in order
 */
const mockClock = (...timestamps: number[]) => {
  const spy = vi.spyOn(performance, 'now');
  for (const t of timestamps) {
    spy.mockReturnValueOnce(t);
  }
  return spy;
};

describe('timeUtils', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('timer', () => {
    it('returns the result and logs the elapsed seconds', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      mockClock(1000, 1250);

      expect(timer(() => 42, 'parse')).toBe(42);
      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith('parse: 0.250000s');
    });

    it('uses the default label', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      mockClock(0, 2);

      timer(() => undefined);
      expect(log).toHaveBeenCalledWith('Elapsed: 0.002000s');
    });

    it('logs and rethrows when the block throws', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      mockClock(0, 1);

      expect(() =>
        timer(() => {
          throw new Error('boom');
        }, 'failing')
      ).toThrow('boom');
      expect(log).toHaveBeenCalledWith('failing: 0.001000s');
    });
  });

  describe('timerAsync', () => {
    it('times until the promise settles', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      mockClock(0, 500);

      await expect(timerAsync(async () => 'done', 'fetch')).resolves.toBe('done');
      expect(log).toHaveBeenCalledWith('fetch: 0.500000s');
    });

    it('logs and rejects when the promise rejects', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      mockClock(0, 10);

      await expect(
        timerAsync(async () => {
          throw new Error('nope');
        })
      ).rejects.toThrow('nope');
      expect(log).toHaveBeenCalledWith('Elapsed: 0.010000s');
    });
  });

  describe('benchmark', () => {
    it('returns the average seconds per call', () => {
      mockClock(0, 10);
      expect(benchmark(() => undefined, { repeats: 5 })).toBeCloseTo(0.002, 12);
    });

    it('runs warm-up calls before the timed ones', () => {
      let calls = 0;
      benchmark(() => calls++, { repeats: 5, warmup: 2 });
      expect(calls).toBe(7);
    });

    it('defaults to the standard preset', () => {
      let calls = 0;
      benchmark(() => calls++);
      expect(calls).toBe(100);
    });

    it('accepts preset names', () => {
      let quick = 0;
      benchmark(() => quick++, 'quick');
      expect(quick).toBe(10);

      let thorough = 0;
      benchmark(() => thorough++, 'thorough');
      expect(thorough).toBe(1010);
    });

    it('rejects unknown preset names, including inherited keys', () => {
      expect(() => benchmark(() => undefined, 'turbo')).toThrow("benchmark(): unknown preset 'turbo'");
      expect(() => benchmark(() => undefined, 'toString')).toThrow(
        "benchmark(): unknown preset 'toString'"
      );
    });

    it('rejects invalid repeat counts', () => {
      expect(() => benchmark(() => undefined, { repeats: 0 })).toThrow(InvalidArgumentError);
      expect(() => benchmark(() => undefined, { repeats: 1.5 })).toThrow(InvalidArgumentError);
      expect(() => benchmark(() => undefined, { warmup: -1 })).toThrow(InvalidArgumentError);
    });
  });

  describe('createBenchmarkConfig', () => {
    it('merges overrides into a preset', () => {
      expect(createBenchmarkConfig('quick', { warmup: 3 })).toEqual({ repeats: 10, warmup: 3 });
      expect(createBenchmarkConfig()).toEqual({ repeats: 100, warmup: 0 });
    });
  });

  describe('now', () => {
    it('returns the current time', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-02T03:04:05Z'));
      expect(now().toISOString()).toBe('2026-01-02T03:04:05.000Z');
    });
  });

  describe('formatDuration', () => {
    it('formats sub-millisecond durations in microseconds', () => {
      expect(formatDuration(0.00085)).toBe('850.0µs');
      expect(formatDuration(0)).toBe('0.0µs');
    });

    it('formats sub-second durations in milliseconds', () => {
      expect(formatDuration(0.0125)).toBe('12.5ms');
    });

    it('formats sub-minute durations in seconds', () => {
      expect(formatDuration(3.2)).toBe('3.20s');
    });

    it('formats longer durations as minutes and hours', () => {
      expect(formatDuration(125)).toBe('2m 5s');
      expect(formatDuration(3607)).toBe('1h 0m 7s');
    });

    it('rejects negative and non-finite values', () => {
      expect(() => formatDuration(-1)).toThrow(InvalidArgumentError);
      expect(() => formatDuration(Number.NaN)).toThrow(InvalidArgumentError);
      expect(() => formatDuration(Number.POSITIVE_INFINITY)).toThrow(InvalidArgumentError);
    });
  });
});
