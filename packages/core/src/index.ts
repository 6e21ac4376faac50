export { MeanIncrementor } from './incrementors/mean';
export { VarianceIncrementor } from './incrementors/variance';
export { DEFAULT_PRECISION, roundingFor } from './numeric/precision';
export type { Rounding } from './numeric/precision';
export { Logger, createLogger } from './utils/logger';
export type { Incrementor, IncrementorOptions, Precision } from './types';
