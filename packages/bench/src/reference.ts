/**
 * @fileoverview Plain-sums reference statistics the benchmark measures the
 *   incrementors against. Sums of squares lose precision on sequences with a
 *   large offset, which is part of what the benchmark reports.
 */

export class RunningSums {
  private sum = 0;
  private sumSquares = 0;
  private count = 0;

  add(value: number) {
    this.sum += value;
    this.sumSquares += value * value;
    this.count += 1;
  }

  size() {
    return this.count;
  }

  mean() {
    return this.count === 0 ? 0 : this.sum / this.count;
  }

  populationVariance() {
    if (this.count <= 1) return 0;
    const mean = this.mean();
    return this.sumSquares / this.count - mean * mean;
  }

  sampleVariance() {
    if (this.count <= 1) return 0;
    return (this.populationVariance() * this.count) / (this.count - 1);
  }
}

export function relativeError(actual: number, expected: number) {
  if (expected === 0) return Math.abs(actual);
  return Math.abs((actual - expected) / expected);
}
