/**
 * Source of uniform numbers in [0, 1). Injected wherever dispatch rolls dice.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Reproducible source (mulberry32) for demos and replayable runs.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
