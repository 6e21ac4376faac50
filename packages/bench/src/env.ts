import type { Precision } from '@runstat/core';

import type { BenchConfig } from './runner';

type Env = Record<string, string | undefined>;

export type BenchEnv = BenchConfig & { output?: string };

const PRECISIONS: readonly Precision[] = ['f32', 'f64'];

export function readBenchEnv(env: Env): BenchEnv {
  return {
    values: Math.max(1, Math.floor(numberOr(env.BENCH_VALUES, 1_000_000))),
    min: numberOr(env.BENCH_MIN, 0),
    max: numberOr(env.BENCH_MAX, 1_000),
    offset: numberOr(env.BENCH_OFFSET, 0),
    seed: numberOr(env.BENCH_SEED, 1),
    iterations: Math.max(1, Math.floor(numberOr(env.BENCH_ITERATIONS, 5))),
    precisions: parsePrecisions(env.BENCH_PRECISIONS),
    output: env.BENCH_OUTPUT || undefined
  };
}

function numberOr(raw: string | undefined, fallback: number) {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function parsePrecisions(raw: string | undefined): Precision[] {
  const requested = (raw ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter(isPrecision);
  return requested.length > 0 ? requested : [...PRECISIONS];
}

function isPrecision(value: string): value is Precision {
  return PRECISIONS.some((precision) => precision === value);
}
