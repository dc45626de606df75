/** Uniform source in [0, 1), the contract of Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * mulberry32: small, fast, 32-bit state. Good enough for picking survey
 * answers reproducibly; not for anything security-related.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  if (max < min) throw new RangeError(`randomInt: max (${max}) < min (${min})`);
  return min + Math.floor(random() * (max - min + 1));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('pickOne: no items to pick from');
  return items[Math.floor(random() * items.length)];
}

export function randomString(random: RandomSource, alphabet: string, length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += alphabet[Math.floor(random() * alphabet.length)];
  }
  return out;
}
