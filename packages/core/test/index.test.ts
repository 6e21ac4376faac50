import { describe, expect, it } from 'vitest';

import { MeanIncrementor, VarianceIncrementor, roundingFor, type Incrementor } from '../src';

function feed(incrementor: Incrementor, values: number[]): Incrementor {
  values.forEach((value) => incrementor.add(value));
  return incrementor;
}

describe('runstat entry point', () => {
  it('lets both accumulators be driven through the shared interface', () => {
    const values = [2, 4, 6, 8];
    const mean = feed(new MeanIncrementor(), values);
    const variance = feed(new VarianceIncrementor(), values);

    expect(mean.count()).toBe(4);
    expect(variance.count()).toBe(4);
    expect(mean.mean()).toBeCloseTo(5, 12);
    expect(variance.mean()).toBe(mean.mean());
  });

  it('exposes the per-precision rounding', () => {
    expect(roundingFor('f32')(0.1)).toBe(Math.fround(0.1));
    expect(roundingFor('f64')(0.1)).toBe(0.1);
  });
});
