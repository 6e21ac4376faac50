/**
 * @fileoverview Shared type definitions for runstat: the numeric width an
 *   accumulator computes in, the options both accumulators accept, and the
 *   read/write surface they have in common.
 */

/** Float width the arithmetic is carried in. */
export type Precision = 'f32' | 'f64';

export type IncrementorOptions = {
  precision?: Precision; // defaults to 'f64'
};

export interface Incrementor {
  readonly precision: Precision;
  add(value: number): void;
  mean(): number;
  count(): number;
}
