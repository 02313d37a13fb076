/**
 * Timing helpers: scoped timers, benchmarking, duration formatting
 */

import {
  type BenchmarkConfig,
  type BenchmarkPreset,
  BENCHMARK_PRESETS,
  DEFAULT_TIMER_LABEL,
  createBenchmarkConfig,
} from '../config';
import { InvalidArgumentError } from '../errors';

const elapsedSeconds = (start: number): number => (performance.now() - start) / 1000;

const logElapsed = (label: string, seconds: number): void => {
  console.log(`${label}: ${seconds.toFixed(6)}s`);
};

/**
 * Run fn and log how long it took as "<label>: 0.000123s".
 * The time is logged even when fn throws.
 *
 * @example
 * const rows = timer(() => parseRows(input), 'parse');
 */
export function timer<T>(fn: () => T, label: string = DEFAULT_TIMER_LABEL): T {
  const start = performance.now();
  try {
    return fn();
  } finally {
    logElapsed(label, elapsedSeconds(start));
  }
}

/**
 * Async variant of timer(); the clock stops when the promise settles
 */
export async function timerAsync<T>(
  fn: () => Promise<T>,
  label: string = DEFAULT_TIMER_LABEL
): Promise<T> {
  const start = performance.now();
  try {
    return await fn();
  } finally {
    logElapsed(label, elapsedSeconds(start));
  }
}

// Own keys only: 'toString' and friends are not presets
const isBenchmarkPreset = (name: string): name is BenchmarkPreset =>
  Object.hasOwn(BENCHMARK_PRESETS, name);

const resolveBenchmarkConfig = (
  options: string | Partial<BenchmarkConfig> | undefined
): BenchmarkConfig => {
  if (options === undefined) return createBenchmarkConfig();
  if (typeof options === 'string') {
    if (!isBenchmarkPreset(options)) {
      throw new InvalidArgumentError(`benchmark(): unknown preset '${options}'`);
    }
    return createBenchmarkConfig(options);
  }
  return createBenchmarkConfig('standard', options);
};

/**
 * Average wall time of one call to fn, in seconds
 */
export function benchmark(
  fn: () => unknown,
  options?: BenchmarkPreset | (string & {}) | Partial<BenchmarkConfig>
): number {
  const { repeats, warmup } = resolveBenchmarkConfig(options);
  if (!Number.isInteger(repeats) || repeats <= 0) {
    throw new InvalidArgumentError(`benchmark(): repeats must be positive (got ${repeats})`);
  }
  if (!Number.isInteger(warmup) || warmup < 0) {
    throw new InvalidArgumentError(`benchmark(): warmup must be non-negative (got ${warmup})`);
  }

  for (let i = 0; i < warmup; i++) {
    fn();
  }

  const start = performance.now();
  for (let i = 0; i < repeats; i++) {
    fn();
  }
  return elapsedSeconds(start) / repeats;
}

export const now = (): Date => new Date();

/**
 * Human-readable duration: "850.0µs", "12.5ms", "3.20s", "2m 5s", "1h 0m 7s"
 */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError(
      `formatDuration(): seconds must be a non-negative number (got ${seconds})`
    );
  }
  if (seconds < 1e-3) return `${(seconds * 1e6).toFixed(1)}µs`;
  if (seconds < 1) return `${(seconds * 1e3).toFixed(1)}ms`;
  if (seconds < 60) return `${seconds.toFixed(2)}s`;

  const total = Math.round(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return h > 0 ? `${h}h ${m}m ${s}s` : `${m}m ${s}s`;
}
