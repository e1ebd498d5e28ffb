import { randomInt } from 'node:crypto';

/** Returns an integer in [0, maxExclusive). */
export type RNG = (maxExclusive: number) => number;

export const cryptoRNG: RNG = (maxExclusive: number) => {
  if (maxExclusive <= 0) throw new RangeError('maxExclusive must be > 0');
  return randomInt(0, maxExclusive);
};

// Deterministic PRNG for tests
export function seededRNG(seed: number): RNG {
  let t = seed >>> 0;
  return (maxExclusive: number) => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    r = ((r ^ (r >>> 14)) >>> 0) / 4294967296;
    return Math.floor(r * maxExclusive);
  };
}

/** Fisher-Yates; returns a new array. */
export function shuffle<T>(items: readonly T[], rng: RNG = cryptoRNG): T[] {
  const a = items.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = rng(i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}
