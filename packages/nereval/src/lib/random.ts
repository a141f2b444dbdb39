import type { RandomSource } from './types.js';

// Seeded PRNG for repeatability
export function mulberry32(seed: number): RandomSource {
  return function() {
    let t = seed += 0x6D2B79F5;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export function uniformVector(random: RandomSource, dim: number, scale: number): number[] {
  const out = new Array<number>(dim);
  for (let i = 0; i < dim; i++) out[i] = (random() * 2 - 1) * scale;
  return out;
}
