export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

/**
 * Deterministic xorshift32 source. Not suitable for anything but gameplay and tests.
 */
export function createSeededRandom(seed: number): RandomSource {
  // xorshift has a fixed point at zero
  let x = (seed >>> 0) || 0x9e3779b9;
  return {
    next() {
      x ^= x << 13;
      x ^= x >>> 17;
      x ^= x << 5;
      return (x >>> 0) / 4294967296;
    },
  };
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

// Integer in [min, maxExclusive)
export function randomInt(rng: RandomSource, min: number, maxExclusive: number): number {
  return min + Math.floor(rng.next() * (maxExclusive - min));
}
