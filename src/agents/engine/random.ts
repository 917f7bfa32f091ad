/**
 * Deterministic xorshift32 generator. Not cryptographically secure; it only has to make
 * a tick replayable from its seed.
 */
export type Rng = {
  nextU32: () => number;
  nextFloat: () => number;
};

export const makeRng = (seed: number): Rng => {
  let x = seed | 0;
  if (x === 0) x = 0x6d2b79f5;

  const nextU32 = () => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return x >>> 0;
  };

  const nextFloat = () => nextU32() / 0x100000000;

  return { nextU32, nextFloat };
};

/** FNV-1a style mix of a seed with string keys into a stable u32. */
export const mixSeed = (seed: number, ...keys: (string | number)[]) => {
  let h = (seed ^ 0x811c9dc5) >>> 0;
  for (const key of keys) {
    const text = String(key);
    for (let i = 0; i < text.length; i += 1) {
      h ^= text.charCodeAt(i);
      h = Math.imul(h, 16777619) >>> 0;
    }
    h ^= 0x2c;
    h = Math.imul(h, 16777619) >>> 0;
  }
  return h;
};

export const rngFor = (seed: number, ...keys: (string | number)[]) => makeRng(mixSeed(seed, ...keys));
