export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

/** Uniform draw in [min, max). */
export function randomRange(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * clamp01(random());
}

export function pickRandom<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(clamp01(random()) * items.length));
  return items[index];
}
