/**
 * Seeded PRNG for reproducible decisions.
 * Uses xoshiro128** with splitmix32 initialization.
 */

import type { RandomSource } from "./types";

/**
 * Create a seeded random number generator.
 * Returns a function that produces uniform [0, 1) values.
 */
export function createSeededRandom(seed: number): RandomSource {
  // Initialize 128-bit state from seed using splitmix32
  let s = seed | 0;
  const splitmix32 = () => {
    s = (s + 0x9e3779b9) | 0;
    let t = s ^ (s >>> 16);
    t = Math.imul(t, 0x21f0aaad);
    t = t ^ (t >>> 15);
    t = Math.imul(t, 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };

  let a = splitmix32();
  let b = splitmix32();
  let c = splitmix32();
  let d = splitmix32();

  return function xoshiro128ss(): number {
    const t = b << 9;
    const r = Math.imul(rotl(Math.imul(a, 5), 7), 9);
    c ^= a;
    d ^= b;
    b ^= c;
    a ^= d;
    c ^= t;
    d = rotl(d, 11);
    return (r >>> 0) / 4294967296;
  };
}

function rotl(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k));
}

/**
 * Standard normal sample via the Box-Muller transform.
 * Consumes two draws from `random`.
 */
export function gaussian(random: RandomSource, stdDev = 1): number {
  const u1 = 1 - random(); // (0, 1], keeps log() finite
  const u2 = random();
  const z0 = Math.sqrt(-2.0 * Math.log(u1)) * Math.cos(2.0 * Math.PI * u2);
  return z0 * stdDev;
}

/** Pick uniformly from a non-empty list. */
export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  const idx = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[idx];
}
