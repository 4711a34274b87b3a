/** Source of uniform random numbers in [0, 1). */
export type Rng = () => number;

/**
 * Deterministic linear congruential generator returning numbers in [0, 1).
 * Good enough for reproducible weight init and toy datasets.
 */
export function seededRandom(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

/** Standard normal sample (Box-Muller). */
export function gaussian(rng: Rng): number {
  const u = 1 - rng();
  const v = rng();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}
