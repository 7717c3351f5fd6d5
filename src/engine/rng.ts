export type Rng = () => number;

// mulberry32
export function createRng(seed: number): Rng {
  let a = seed | 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [0, max). */
export function randomInt(rng: Rng, max: number): number {
  return Math.floor(rng() * max);
}

export function pickRandom<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  return items[randomInt(rng, items.length)];
}

// Seed for a solver that plays a game built from `seed`
export function deriveSeed(seed: number): number {
  return (seed ^ 0x9e3779b9) >>> 0;
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000);
}
