/**
 * Deterministic PRNG (mulberry32) for property-style tests. The same seed
 * always yields the same sequence.
 */
export type Rng = Readonly<{
  /** Float in [0, 1). */
  next: () => number;
  /** Integer in [min, max] inclusive. */
  int: (min: number, max: number) => number;
  /** Element of a non-empty array. */
  pick: <T>(items: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const int = (min: number, max: number): number => {
    const lo = Math.ceil(Math.min(min, max));
    const hi = Math.floor(Math.max(min, max));
    return lo + Math.floor(next() * (hi - lo + 1));
  };

  const pick = <T>(items: readonly T[]): T => {
    if (items.length === 0) throw new Error("createRng.pick: items must not be empty");
    const item = items[int(0, items.length - 1)];
    if (item === undefined) throw new Error("createRng.pick: index out of range");
    return item;
  };

  return Object.freeze({ next, int, pick });
}
