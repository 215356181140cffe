/**
 * Seedable randomness for shuffling.
 *
 * Everything that shuffles takes a `() => number` source so games can be
 * replayed from a seed; `Math.random` is the default everywhere.
 */

export type RandomSource = () => number;

/**
 * Mulberry32: small, fast 32-bit PRNG.
 * Returns a function producing numbers in [0, 1).
 */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return function () {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Hash a string seed into a 32-bit integer (FNV-1a).
 */
export function stringToSeed(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Fisher-Yates shuffle. Returns a new array (does not mutate the input).
 */
export function fisherYates<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    // Swap by splicing so elements that are themselves undefined still move
    const picked = shuffled.slice(j, j + 1);
    shuffled.splice(j, 1, ...shuffled.slice(i, i + 1));
    shuffled.splice(i, 1, ...picked);
  }
  return shuffled;
}
