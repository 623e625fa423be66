import { defaultRandomSource, type RandomSource } from '../utils/random.js';

/**
 * Uniformly random permutation of [0, n), built with the inside-out
 * Fisher-Yates shuffle.
 *
 * Split takes x-coordinates from the front of perm(255), shifted by one so
 * that 0 stays reserved for the intercept.
 */
export function perm(n: number, random: RandomSource = defaultRandomSource): number[] {
  const m = new Array<number>(n).fill(0);

  for (let i = 0; i < n; i++) {
    const j = random.randomInt(i);
    m[i] = m[j];
    m[j] = i;
  }

  return m;
}
