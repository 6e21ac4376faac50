import type { IncrementorOptions } from '../src';

export function arithmeticMean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Two-pass, divide-by-(n-1) variance. */
export function sampleVariance(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = arithmeticMean(values);
  const squares = values.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  return squares / (values.length - 1);
}

export function relativeDifference(actual: number, expected: number): number {
  return expected === 0 ? Math.abs(actual) : Math.abs((actual - expected) / expected);
}

/** Options as an untyped caller (e.g. a JSON config) would hand them over. */
export function optionsFromJson(json: string): IncrementorOptions {
  return JSON.parse(json);
}
