//slotcore/utils/Rng.ts

/** Uniform float in [0, 1). */
export type RandomSource = () => number;

function seedFromString(str: string): number {
  let h = 1779033703 ^ str.length;
  for (let i = 0; i < str.length; i++) {
    h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return h >>> 0 || 1;
}

/** mulberry32 over a string or numeric seed; same seed, same sequence. */
export function seededRandom(seed: string | number): RandomSource {
  let state = typeof seed === "number" ? seed >>> 0 || 1 : seedFromString(seed);

  return () => {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rand: RandomSource, min: number, maxInclusive: number): number {
  return min + Math.floor(rand() * (maxInclusive - min + 1));
}
