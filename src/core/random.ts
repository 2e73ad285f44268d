import { RandomSource } from './types';

/** mulberry32: small, fast and reproducible for a given 32-bit seed. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[randomIndex(items.length, random)];
}
