/**
 * Random sources for the projector. Seeded sources make trials reproducible;
 * without a seed Math.random is used.
 */

export interface RandomSource {
  random: () => number;
  /** Standard normal draw, N(0, 1) */
  randn: () => number;
}

/**
 * 32-bit mulberry-style generator
 */
function createSeededUniform(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Build a random source. Normal draws use the Box-Muller transform and keep the spare value.
 */
export function createRandomSource(seed?: number): RandomSource {
  const random = seed === undefined ? Math.random : createSeededUniform(seed);
  let spare: number | null = null;

  const randn = (): number => {
    if (spare !== null) {
      const value = spare;
      spare = null;
      return value;
    }
    let u = 0;
    let v = 0;
    while (u === 0) u = random();
    while (v === 0) v = random();
    const magnitude = Math.sqrt(-2 * Math.log(u));
    spare = magnitude * Math.sin(2 * Math.PI * v);
    return magnitude * Math.cos(2 * Math.PI * v);
  };

  return { random, randn };
}

/**
 * Draw from N(mean, stdDev²). A zero standard deviation returns the mean without consuming randomness.
 */
export function sampleNormal(source: RandomSource, mean: number, stdDev: number): number {
  if (stdDev === 0) {
    return mean;
  }
  return mean + stdDev * source.randn();
}

/**
 * Derive the seed for a batch of trials so batches can run independently and still reproduce.
 */
export function offsetSeed(base: number | undefined, offset: number): number | undefined {
  if (base === undefined) {
    return undefined;
  }
  return (base + offset) >>> 0;
}
