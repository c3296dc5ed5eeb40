import { evaluate } from "./evaluator";
import { parse } from "./parser";
import { defaultRandomSource, type RandomSource } from "./rng";
import type { RollResult } from "./types";

/**
 * Parse and roll a dice expression once with a non-deterministic source.
 *
 * Example: `roll("4d6kh3").expression` → `"4d6kh3[6, 5, 4, (1)] = 15"`
 *
 * @throws {DiceError} when the expression does not parse or the roll cannot complete
 */
export function roll(expression: string): RollResult {
  return rollWithRng(expression, defaultRandomSource());
}

/**
 * Parse and roll with a caller-supplied {@link RandomSource}, e.g. a seeded or scripted one.
 *
 * Example: `rollWithRng("2d6", new ScriptedRandomSource([3, 4])).total` → 7
 */
export function rollWithRng(expression: string, rng: RandomSource): RollResult {
  return evaluate(parse(expression), rng);
}

export { Evaluator, evaluate, applyKeepDrop, compare, maxFace, satisfies } from "./evaluator";
export { parse, Parser, clearParserCache, getCachingEnabled, setCachingEnabled } from "./parser";
export { Lexer, tokenize } from "./lexer";
export {
  SimResult,
  SimulationAccumulator,
  simulate,
  simulateExpression,
  simulateSeeded,
  simulateWithRng,
} from "./simulator";
export type { SimSummary } from "./simulator";
export {
  defaultRandomSource,
  MathRandomSource,
  ScriptedRandomSource,
  SeededRandomSource,
} from "./rng";
export type { RandomSource } from "./rng";
export { DiceError, isDiceError } from "./errors";
export type { DiceErrorDetail, DiceErrorKind } from "./errors";
export {
  formatCondition,
  formatDice,
  formatDieKind,
  formatExpression,
  formatModifier,
  formatRollSpec,
} from "./format";
export { NOTATION_REFERENCE, renderHistogram, renderJson } from "./render";
export { MAX_DICE_COUNT, MAX_EXPLOSIONS, MAX_INTEGER_LITERAL, MAX_REROLLS } from "./limits";
export { LRUCache } from "./common/lru-cache";
export type * from "./types";
