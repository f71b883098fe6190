/** Uniform source in [0, 1), same contract as Math.random. */
export type RandomSource = () => number;

/**
 * Deterministic RNG for reproducible draw resolution in tests and replays.
 *
 * @param seed RNG seed value
 */
export function createSeededRng(seed: number): RandomSource {
  // mulberry32
  let state = seed;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Unweighted coin flip: true with probability 1/2. */
export function coinFlip(random: RandomSource): boolean {
  return random() < 0.5;
}
