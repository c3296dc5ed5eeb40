import { DiceError } from "./errors";
import { Evaluator } from "./evaluator";
import { parse } from "./parser";
import { defaultRandomSource, SeededRandomSource, type RandomSource } from "./rng";
import type { Expression } from "./types";

/** Plain-data form of a {@link SimResult}, as produced by `toJSON()`. */
export interface SimSummary {
  n: number;
  min: number;
  max: number;
  mean: number;
  std_dev: number;
  distribution: Record<string, number>;
}

/**
 * Outcome of a Monte Carlo run: how often each total occurred plus summary statistics.
 */
export class SimResult {
  constructor(
    /** Outcome total → number of trials that produced it. */
    readonly distribution: ReadonlyMap<number, number>,
    readonly min: number,
    readonly max: number,
    readonly mean: number,
    readonly stdDev: number,
    /** Number of trials. */
    readonly n: number
  ) {}

  /**
   * Returns `[value, count]` pairs ascending by value.
   *
   * Example: `simulate("1d2", 4).sortedOutcomes()` → `[[1, 3], [2, 1]]`
   */
  sortedOutcomes(): Array<[number, number]> {
    return [...this.distribution.entries()].sort(([a], [b]) => a - b);
  }

  /** Returns the observed probability (count / n) of each outcome. */
  probabilities(): Map<number, number> {
    const probabilities = new Map<number, number>();
    for (const [value, count] of this.distribution) {
      probabilities.set(value, count / this.n);
    }
    return probabilities;
  }

  /**
   * Returns the most frequent outcome. Ties go to whichever maximum the distribution yields
   * first, which callers should not rely on.
   */
  mode(): number | undefined {
    let best: number | undefined;
    let bestCount = 0;
    for (const [value, count] of this.distribution) {
      if (count > bestCount) {
        best = value;
        bestCount = count;
      }
    }
    return best;
  }

  /**
   * Returns the median trial outcome, averaging the two middle samples for an even `n`.
   *
   * The distribution is expanded back into a sorted sample list, so this costs O(n log n).
   */
  median(): number {
    const samples: number[] = [];
    for (const [value, count] of this.distribution) {
      for (let i = 0; i < count; i++) samples.push(value);
    }
    if (samples.length === 0) return 0;

    samples.sort((a, b) => a - b);
    const mid = Math.floor(samples.length / 2);
    return samples.length % 2 === 0 ? (samples[mid - 1] + samples[mid]) / 2 : samples[mid];
  }

  toJSON(): SimSummary {
    const distribution: Record<string, number> = {};
    for (const [value, count] of this.sortedOutcomes()) {
      distribution[String(value)] = count;
    }
    return {
      n: this.n,
      min: this.min,
      max: this.max,
      mean: this.mean,
      std_dev: this.stdDev,
      distribution,
    };
  }
}

/**
 * Single-pass accumulator of trial outcomes. Keeps counts, running sum and sum of squares
 * rather than every sample.
 *
 * Accumulators from independent workers can be combined with {@link merge}; every statistic
 * is associative and commutative.
 */
export class SimulationAccumulator {
  private readonly counts = new Map<number, number>();
  private sum = 0;
  private sumOfSquares = 0;
  private low = Infinity;
  private high = -Infinity;
  private trials = 0;

  get n(): number {
    return this.trials;
  }

  add(total: number): this {
    this.counts.set(total, (this.counts.get(total) ?? 0) + 1);
    this.sum += total;
    this.sumOfSquares += total * total;
    this.low = Math.min(this.low, total);
    this.high = Math.max(this.high, total);
    this.trials++;
    return this;
  }

  merge(other: SimulationAccumulator): this {
    for (const [value, count] of other.counts) {
      this.counts.set(value, (this.counts.get(value) ?? 0) + count);
    }
    this.sum += other.sum;
    this.sumOfSquares += other.sumOfSquares;
    this.low = Math.min(this.low, other.low);
    this.high = Math.max(this.high, other.high);
    this.trials += other.trials;
    return this;
  }

  /** @throws {DiceError} `invalidTrialCount` when no trial was recorded. */
  finish(): SimResult {
    if (this.trials === 0) {
      throw new DiceError({ kind: "invalidTrialCount", trials: 0 });
    }

    const mean = this.sum / this.trials;
    const variance = Math.max(0, this.sumOfSquares / this.trials - mean * mean);

    return new SimResult(
      new Map(this.counts),
      this.low,
      this.high,
      mean,
      Math.sqrt(variance),
      this.trials
    );
  }
}

function assertTrialCount(n: number): void {
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new DiceError({ kind: "invalidTrialCount", trials: n });
  }
}

/** Evaluates an already-parsed expression `n` times with one continuously advancing source. */
export function simulateExpression(
  expression: Expression,
  n: number,
  rng: RandomSource
): SimResult {
  assertTrialCount(n);

  const evaluator = new Evaluator(rng);
  const accumulator = new SimulationAccumulator();
  for (let i = 0; i < n; i++) {
    accumulator.add(evaluator.evaluate(expression).total);
  }
  return accumulator.finish();
}

/** Parse once, then run `n` trials with the caller's random source. */
export function simulateWithRng(input: string, n: number, rng: RandomSource): SimResult {
  assertTrialCount(n);
  return simulateExpression(parse(input), n, rng);
}

/**
 * Run `n` trials with a non-deterministic source.
 *
 * Example: `simulate("2d6", 10_000).mean` → ≈ 7
 */
export function simulate(input: string, n: number): SimResult {
  return simulateWithRng(input, n, defaultRandomSource());
}

/** Run `n` trials reproducibly: identical arguments always give identical results. */
export function simulateSeeded(input: string, n: number, seed: number | bigint): SimResult {
  return simulateWithRng(input, n, new SeededRandomSource(seed));
}
