import { describe, expect, it } from 'vitest';

import { readBenchEnv } from '../src/env';
import { formatResult, runIncrementorBench, type PrecisionResult } from '../src/runner';

describe('runIncrementorBench', () => {
  it('measures every requested precision against the reference', () => {
    const result = runIncrementorBench({ values: 2_000, seed: 7, iterations: 2 });

    expect(result.values).toBe(2_000);
    expect(result.iterations).toBe(2);
    expect(result.range).toEqual({ min: 0, max: 1_000 });
    expect(typeof result.timestamp).toBe('string');
    expect(result.results.map((entry) => entry.precision)).toEqual(['f32', 'f64']);

    const [f32, f64] = result.results;
    for (const entry of result.results) {
      expect(entry.count).toBe(2_000);
      expect(entry.valuesPerMs).toBeGreaterThan(0);
    }
    expect(f64.meanRelativeError).toBeLessThan(1e-9);
    expect(f64.varianceRelativeError).toBeLessThan(1e-6);
    expect(f32.meanRelativeError).toBeLessThan(1e-3);
    expect(f32.varianceRelativeError).toBeLessThan(1e-2);
  });

  it('stays accurate on a sequence far from zero', () => {
    const result = runIncrementorBench({
      values: 1_000,
      min: 0,
      max: 1,
      offset: 1e6,
      seed: 11,
      iterations: 1,
      precisions: ['f64']
    });
    const [entry] = result.results;
    expect(entry.mean).toBeGreaterThan(1e6);
    expect(entry.mean).toBeLessThan(1e6 + 1);
    expect(Math.abs(entry.variance - 1 / 12)).toBeLessThan((1 / 12) * 0.15);
  });

  it('runs at least one pass', () => {
    const result = runIncrementorBench({ values: 10, iterations: 0, precisions: ['f64'] });
    expect(result.iterations).toBe(1);
    expect(result.results[0].count).toBe(10);
  });
});

describe('formatResult', () => {
  it('prints one summary line', () => {
    const entry: PrecisionResult = {
      precision: 'f64',
      count: 10,
      mean: 1,
      variance: 2,
      referenceMean: 1,
      referenceVariance: 2,
      meanRelativeError: 0.000123,
      varianceRelativeError: 0,
      addAvgMs: 1.234,
      valuesPerMs: 8.1
    };
    expect(formatResult(entry)).toBe('f64: count=10 avg=1.23 ms meanErr=1.23e-4 varErr=0.00e+0');
  });
});

describe('readBenchEnv', () => {
  it('falls back to defaults', () => {
    expect(readBenchEnv({})).toEqual({
      values: 1_000_000,
      min: 0,
      max: 1_000,
      offset: 0,
      seed: 1,
      iterations: 5,
      precisions: ['f32', 'f64'],
      output: undefined
    });
  });

  it('parses and clamps overrides', () => {
    const config = readBenchEnv({
      BENCH_VALUES: '2500.7',
      BENCH_ITERATIONS: '0',
      BENCH_OFFSET: 'abc',
      BENCH_PRECISIONS: 'f64, f16',
      BENCH_OUTPUT: 'out/result.json'
    });
    expect(config.values).toBe(2_500);
    expect(config.iterations).toBe(1);
    expect(config.offset).toBe(0);
    expect(config.precisions).toEqual(['f64']);
    expect(config.output).toBe('out/result.json');
  });
});
