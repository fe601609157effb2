/**
 * Deterministic xorshift32 generator for seeded randomized tests.
 * A failing seed reproduces the exact same sequence.
 */
export type Rng = Readonly<{
  /** Next value in [0, 2^32). */
  u32: () => number;
  /** Integer in [min, max], inclusive. */
  int: (min: number, max: number) => number;
  pick: <T>(values: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  // xorshift32 never leaves the zero state.
  let state = seed >>> 0 || 0x9e3779b9;

  const u32 = (): number => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };

  const int = (min: number, max: number): number => {
    if (max <= min) return min;
    return min + (u32() % (max - min + 1));
  };

  const pick = <T>(values: readonly T[]): T => {
    if (values.length === 0) throw new Error("createRng.pick: values must not be empty");
    const value = values[u32() % values.length];
    if (value === undefined) throw new Error("createRng.pick: sparse array");
    return value;
  };

  return Object.freeze({ u32, int, pick });
}
