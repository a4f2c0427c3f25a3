/**
 * Uniform source over [0, 1), compatible with Math.random.
 */
export type RandomSource = () => number;

export function randomIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * Picks one item uniformly, or undefined for an empty list.
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[randomIndex(items.length, random)];
}
