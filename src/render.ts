import type { SimResult } from "./simulator";

const FULL = "█";

/**
 * Renders a simulation as a text histogram, one row per outcome.
 *
 * ```
 * 1d2 (n=4)
 *
 *    1: ████████████████████████████████████████  75.0%
 *    2: █████████████                             25.0%
 *
 * mean: 1.25, std: 0.43
 * ```
 */
export function renderHistogram(expression: string, result: SimResult, width = 40): string {
  const outcomes = result.sortedOutcomes();
  const maxCount = outcomes.reduce((max, [, count]) => Math.max(max, count), 1);

  const lines = [`${expression} (n=${result.n})`, ""];
  for (const [value, count] of outcomes) {
    const bar = FULL.repeat(Math.floor((count / maxCount) * width));
    const pct = ((count / result.n) * 100).toFixed(1);
    lines.push(`${String(value).padStart(4)}: ${bar.padEnd(width)} ${pct.padStart(5)}%`);
  }
  lines.push("", `mean: ${result.mean.toFixed(2)}, std: ${result.stdDev.toFixed(2)}`);

  return lines.join("\n");
}

/** Pretty-printed JSON summary with distribution keys in ascending order. */
export function renderJson(result: SimResult): string {
  return JSON.stringify(result.toJSON(), null, 2);
}

export const NOTATION_REFERENCE = `DICE NOTATION REFERENCE

BASIC ROLLS
  NdS       Roll N dice with S sides (2d6, 1d20)
  dS        Roll 1 die (d20 = 1d20)
  d%        Percentile die (d100)
  dF        Fudge die (-1, 0, +1)

ARITHMETIC
  + - * /   Basic operations (2d6 + 5, (1d6 + 2) * 3)
  (...)     Grouping
  /         Integer division, rounding toward zero

KEEP AND DROP
  khN       Keep highest N dice (4d6kh3)
  klN       Keep lowest N dice (2d20kl1 for disadvantage)
  kN        Keep highest N (shorthand for khN)
  dhN       Drop highest N dice
  dlN       Drop lowest N dice (4d6dl1)

EXPLODING DICE
  !         Explode on max, adding each extra roll to the same die
  !p        Penetrating explode, each extra roll counts one less
  !>N !>=N !<N !<=N !=N !<>N
            Explode on a condition instead of the max face

REROLL
  r         Reroll 1s until not 1
  ro        Reroll once only
  r<N       Reroll below N
  r<=N      Reroll at or below N

SUCCESS COUNTING
  >N >=N <N <=N =N <>N
            Count dice meeting the condition instead of summing
  5d10>=8   Count 8s, 9s and 10s

MODIFIER ORDER
  Modifiers apply: reroll -> explode -> keep/drop -> success count,
  whatever order they are written in.
  Example: 4d6r!kh3 rerolls 1s, explodes 6s, then keeps highest 3`;
