/**
 * Deterministic seeding helpers. Map generation must reproduce from a seed.
 */

export function makeXorShift32(seed: number): () => number {
  let x = seed >>> 0;
  if (x === 0) x = 0x6d2b79f5; // xorshift is stuck at zero
  return function nextFloat(): number {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 0x100000000;
  };
}

export function pickIndex(rand: () => number, length: number): number {
  return Math.floor(rand() * length);
}
