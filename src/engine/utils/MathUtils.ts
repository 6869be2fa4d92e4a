/** Float in [0, 1). Inject a seeded one for replayable combats. */
export type RandomSource = () => number;

export const MathUtils = {
  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },

  /** Random integer in [min, max] inclusive */
  randInt(min: number, max: number, rng: RandomSource = Math.random): number {
    return Math.floor(rng() * (max - min + 1)) + min;
  },

  /** Sum of a numeric projection over a list */
  sumBy<T>(items: readonly T[], fn: (item: T) => number): number {
    let total = 0;
    for (const item of items) total += fn(item);
    return total;
  },
};

/** Small seedable PRNG (mulberry32). Same seed, same sequence. */
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
