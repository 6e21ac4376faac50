export type SequenceConfig = {
  values: number;
  min?: number;
  max?: number;
  offset?: number;
  seed?: number;
};

/** Seeded PRNG (mulberry32) returning floats in [0, 1). */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

export function buildUniformSequence(config: SequenceConfig): Float64Array {
  const { values } = config;
  const min = config.min ?? 0;
  const max = config.max ?? 1_000;
  const offset = config.offset ?? 0;
  const span = max - min;
  const random = createRandom(config.seed ?? 1);

  const output = new Float64Array(values);
  for (let i = 0; i < values; i++) {
    output[i] = offset + min + random() * span;
  }
  return output;
}
