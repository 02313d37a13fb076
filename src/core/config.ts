/**
 * Library-wide policy constants and benchmark presets
 */

import type { AngleUnit } from './types';

/**
 * Pivot tolerance for elimination. A pivot whose magnitude does not exceed this
 * makes the determinant 0 and makes solve/inverse fail.
 */
export const LINALG_TOLERANCE = 1e-12;

export const DEFAULT_ANGLE_UNIT: AngleUnit = 'radians';

export const DEFAULT_TIMER_LABEL = 'Elapsed';

export const DEFAULT_NAME_LENGTH = 8;

export const DEFAULT_TOKEN_LENGTH = 16;

export const DEFAULT_TRUNCATE_SUFFIX = '...';

/**
 * Benchmark preset name
 */
export type BenchmarkPreset = 'quick' | 'standard' | 'thorough';

/**
 * Benchmark run parameters
 */
export interface BenchmarkConfig {
  /** Timed calls averaged into the result */
  repeats: number;
  /** Untimed calls made before timing starts */
  warmup: number;
}

/**
 * Presets for benchmark()
 */
export const BENCHMARK_PRESETS: Record<BenchmarkPreset, BenchmarkConfig> = {
  quick: {
    repeats: 10,
    warmup: 0,
  },
  standard: {
    repeats: 100,
    warmup: 0,
  },
  thorough: {
    repeats: 1000,
    warmup: 10,
  },
};

/**
 * Create a benchmark config from a preset, with optional overrides
 */
export function createBenchmarkConfig(
  preset: BenchmarkPreset = 'standard',
  overrides: Partial<BenchmarkConfig> = {}
): BenchmarkConfig {
  return {
    ...BENCHMARK_PRESETS[preset],
    ...overrides,
  };
}
