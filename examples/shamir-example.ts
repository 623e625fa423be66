/**
 * Shamir Secret Sharing Example
 *
 * Splits a passphrase into 5 shares with a threshold of 3, prints them as
 * base64, then recovers the passphrase from 3 shuffled shares.
 */

import { split, reconstruct } from '../src/index.js';
import { defaultRandomSource } from '../src/utils/random.js';

const secret = 'Some super secret';
const parts = 5;
const threshold = 3;

function shuffle<T>(items: T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = defaultRandomSource.randomInt(i);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

console.log(`\n=== ${threshold}-of-${parts} split ===\n`);

const shares = split(secret, parts, threshold);

console.log('Base64 encoded shares:');
shares.forEach((share, idx) => {
  console.log(`  ${idx}: ${Buffer.from(share).toString('base64')}`);
});

const chosen = shuffle(shares).slice(0, threshold);
const recovered = new TextDecoder().decode(reconstruct(chosen));

console.log(`\nRecovered string: ${recovered}`);
console.log(`   ✓ Matches original: ${recovered === secret}`);
