/**
 * Source of uniformly distributed numbers in `[0, 1)`. Components that make
 * stochastic decisions receive one explicitly so runs can be replayed.
 */
export interface RandomSource {
  next(): number;
}

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 48271; // Park–Miller recommended multiplier

/** Hashes a textual seed into the LCG state space; never returns zero. */
export function deriveSeed(token: string): number {
  let hash = 0;
  for (let index = 0; index < token.length; index += 1) {
    hash = (hash * 31 + token.charCodeAt(index)) % MODULUS;
  }
  return hash === 0 ? 1 : hash;
}

function normaliseNumericSeed(seed: number): number {
  const integer = Math.trunc(Number.isFinite(seed) ? seed : 0) % (MODULUS - 1);
  return integer <= 0 ? integer + MODULUS - 1 : integer;
}

/**
 * Park–Miller minimal standard generator. Two instances built from the same
 * seed produce identical sequences.
 */
export class SeededRandom implements RandomSource {
  private state: number;
  public readonly seed: number | string;

  constructor(seed: number | string) {
    this.seed = seed;
    this.state = typeof seed === "string" ? deriveSeed(seed) : normaliseNumericSeed(seed);
  }

  next(): number {
    this.state = (this.state * MULTIPLIER) % MODULUS;
    return (this.state - 1) / (MODULUS - 1);
  }
}

/** Picks one entry of a non-empty list using `random`. */
export function pick<T>(random: RandomSource, items: readonly [T, ...T[]]): T {
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index] ?? items[0];
}
