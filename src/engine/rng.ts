/**
 * Seeded random number generator (xoshiro128**).
 * Every randomised tie-break in the engine draws from one of these so a
 * given seed always reproduces the same draw.
 */
export function createRng(seed: number): () => number {
  let s0 = seed | 0;
  let s1 = (seed * 1664525 + 1013904223) | 0;
  let s2 = (s1 * 1664525 + 1013904223) | 0;
  let s3 = (s2 * 1664525 + 1013904223) | 0;

  return () => {
    const t = (s1 << 9) | 0;
    let r = (s1 * 5) | 0;
    r = ((r << 7) | (r >>> 25)) | 0;
    r = (r * 9) | 0;

    s2 ^= s0;
    s3 ^= s1;
    s1 ^= s2;
    s0 ^= s3;
    s2 ^= t;
    s3 = (s3 << 11) | (s3 >>> 21);

    return (r >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle driven by the given generator. Returns a new array.
 */
export function seededShuffle<T>(items: readonly T[], rng: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}
