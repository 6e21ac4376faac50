import { DEFAULT_PRECISION, roundingFor, type Rounding } from '../numeric/precision';
import type { Incrementor, IncrementorOptions, Precision } from '../types';
import { createLogger } from '../utils/logger';
import { MeanIncrementor } from './mean';

const logger = createLogger('VarianceIncrementor');

/**
 * Running variance built on an owned {@link MeanIncrementor}.
 *
 * Each step rescales the previous estimate by (n-1)/n and adds the squared
 * deviation from the pre-update mean divided by n+1, where n is the count
 * before the step. This is the Bessel-corrected update, so {0, 1} yields 0.5
 * and {0, 1, 2} yields 1.
 */
export class VarianceIncrementor implements Incrementor {
  readonly precision: Precision;
  private readonly round: Rounding;
  private readonly means: MeanIncrementor;
  private current = 0;

  constructor(options: IncrementorOptions = {}) {
    this.precision = options.precision ?? DEFAULT_PRECISION;
    this.round = roundingFor(this.precision);
    this.means = new MeanIncrementor({ precision: this.precision });
  }

  add(value: number): void {
    const round = this.round;
    // Both must be read before the mean moves.
    const n = this.means.count();
    const previousMean = this.means.mean();
    this.means.add(value);

    if (n === 0) {
      this.current = 0;
      return;
    }

    const before = this.current;
    const deviation = round(round(value) - previousMean);
    const decay = round(round(n - 1) / round(n));
    const correction = round(round(deviation * deviation) / round(n + 1));
    this.current = round(round(decay * this.current) + correction);

    if (Number.isFinite(before) && !Number.isFinite(this.current)) {
      logger.log(`variance became ${this.current} at count=${n + 1}`);
    }
  }

  variance(): number {
    return this.current;
  }

  mean(): number {
    return this.means.mean();
  }

  count(): number {
    return this.means.count();
  }
}
