import seedrandom from "seedrandom";

/**
 * Capability to produce a uniformly distributed integer in `[1, max]`.
 *
 * Every die the evaluator rolls goes through a `RandomSource`, so swapping the source is
 * enough to make rolls deterministic.
 */
export interface RandomSource {
  roll(max: number): number;
}

/** Non-deterministic source backed by `Math.random`. */
export class MathRandomSource implements RandomSource {
  roll(max: number): number {
    return Math.floor(Math.random() * max) + 1;
  }
}

/**
 * Reproducible source: the same seed always yields the same sequence of rolls.
 *
 * Example: `new SeededRandomSource(42n)`
 */
export class SeededRandomSource implements RandomSource {
  readonly seed: string;
  private readonly prng: seedrandom.PRNG;

  constructor(seed: number | bigint | string) {
    this.seed = String(seed);
    this.prng = seedrandom(this.seed);
  }

  roll(max: number): number {
    return Math.floor(this.prng() * max) + 1;
  }
}

/**
 * Replays a fixed list of values, cycling when exhausted. The requested `max` is ignored, so
 * callers control exactly what each die shows.
 *
 * Example: `rollWithRng("4d6kh3", new ScriptedRandomSource([1, 5, 3, 6]))` → total 14
 */
export class ScriptedRandomSource implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {
    if (values.length === 0) {
      throw new RangeError("ScriptedRandomSource needs at least one value");
    }
  }

  roll(_max: number): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value;
  }

  /** Number of values handed out so far. */
  get consumed(): number {
    return this.index;
  }
}

export function defaultRandomSource(): RandomSource {
  return new MathRandomSource();
}
