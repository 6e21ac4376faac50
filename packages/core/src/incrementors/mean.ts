import { DEFAULT_PRECISION, roundingFor, type Rounding } from '../numeric/precision';
import type { Incrementor, IncrementorOptions, Precision } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('MeanIncrementor');

/**
 * Running arithmetic mean over the values added so far, kept without
 * storing them.
 */
export class MeanIncrementor implements Incrementor {
  readonly precision: Precision;
  private readonly round: Rounding;
  private current = 0;
  private seen = 0;

  constructor(options: IncrementorOptions = {}) {
    this.precision = options.precision ?? DEFAULT_PRECISION;
    this.round = roundingFor(this.precision);
  }

  /**
   * Blends the value into the mean with weight 1 / (new count). The first
   * value becomes the mean as-is.
   */
  add(value: number): void {
    const round = this.round;
    const input = round(value);
    const before = this.current;

    if (this.seen === 0) {
      this.current = input;
    } else {
      const weight = round(1 / round(this.seen + 1));
      this.current = round(round(this.current * round(1 - weight)) + round(input * weight));
    }
    this.seen += 1;

    if (Number.isFinite(before) && !Number.isFinite(this.current)) {
      logger.log(`mean became ${this.current} at count=${this.seen}`);
    }
  }

  mean(): number {
    return this.current;
  }

  count(): number {
    return this.seen;
  }
}
