import type { Precision } from '../types';

export type Rounding = (value: number) => number;

export const DEFAULT_PRECISION: Precision = 'f64';

const keep: Rounding = (value) => value;

/**
 * Returns the function applied to the input and to every intermediate
 * result. Rounding each step of a double computation to 32 bits yields
 * exactly what native 32-bit arithmetic would.
 */
export function roundingFor(precision: Precision): Rounding {
  switch (precision) {
    case 'f32':
      return Math.fround;
    case 'f64':
      return keep;
    default: {
      const unknown: never = precision;
      throw new Error(`Unsupported precision "${String(unknown)}"; expected "f32" or "f64".`);
    }
  }
}
