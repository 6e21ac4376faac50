/**
 * @fileoverview Benchmark harness for the incrementors. It builds a seeded
 *   sequence with `datasets.ts`, streams it through a fresh
 *   `VarianceIncrementor` per timed pass and per precision, and compares the
 *   final statistics with the sums-based reference from `reference.ts`. The
 *   CLI wrapper in `main.ts` feeds it the environment and prints the result.
 */

import { VarianceIncrementor, type Precision } from '@runstat/core';

import { buildUniformSequence, type SequenceConfig } from './datasets';
import { RunningSums, relativeError } from './reference';

export type BenchConfig = SequenceConfig & {
  iterations?: number;
  precisions?: Precision[];
};

export type PrecisionResult = {
  precision: Precision;
  count: number;
  mean: number;
  variance: number;
  referenceMean: number;
  referenceVariance: number;
  meanRelativeError: number;
  varianceRelativeError: number;
  addAvgMs: number;
  valuesPerMs: number;
};

export type BenchResult = {
  values: number;
  range: { min: number; max: number };
  offset: number;
  seed: number;
  iterations: number;
  results: PrecisionResult[];
  timestamp: string;
};

const perfNow = () => performance.now();

export function runIncrementorBench(config: BenchConfig): BenchResult {
  const min = config.min ?? 0;
  const max = config.max ?? 1_000;
  const offset = config.offset ?? 0;
  const seed = config.seed ?? 1;
  const iterations = Math.max(1, config.iterations ?? 5);
  const precisions = config.precisions ?? ['f32', 'f64'];

  const sequence = buildUniformSequence({ values: config.values, min, max, offset, seed });

  const reference = new RunningSums();
  for (let i = 0; i < sequence.length; i++) {
    reference.add(sequence[i]);
  }
  const referenceMean = reference.mean();
  const referenceVariance = reference.sampleVariance();

  const results = precisions.map((precision): PrecisionResult => {
    let totalMs = 0;
    let last = new VarianceIncrementor({ precision });
    for (let pass = 0; pass < iterations; pass++) {
      const incrementor = new VarianceIncrementor({ precision });
      const start = perfNow();
      for (let i = 0; i < sequence.length; i++) {
        incrementor.add(sequence[i]);
      }
      totalMs += perfNow() - start;
      last = incrementor;
    }

    const addAvgMs = totalMs / iterations;
    return {
      precision,
      count: last.count(),
      mean: last.mean(),
      variance: last.variance(),
      referenceMean,
      referenceVariance,
      meanRelativeError: relativeError(last.mean(), referenceMean),
      varianceRelativeError: relativeError(last.variance(), referenceVariance),
      addAvgMs,
      valuesPerMs: addAvgMs > 0 ? sequence.length / addAvgMs : Number.POSITIVE_INFINITY
    };
  });

  return {
    values: sequence.length,
    range: { min, max },
    offset,
    seed,
    iterations,
    results,
    timestamp: new Date().toISOString()
  };
}

export function formatResult(result: PrecisionResult): string {
  return (
    `${result.precision}: count=${result.count} avg=${result.addAvgMs.toFixed(2)} ms ` +
    `meanErr=${result.meanRelativeError.toExponential(2)} ` +
    `varErr=${result.varianceRelativeError.toExponential(2)}`
  );
}
