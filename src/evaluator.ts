import { DiceError } from "./errors";
import { formatDice, formatRollSpec } from "./format";
import { MAX_EXPLOSIONS, MAX_REROLLS } from "./limits";
import { defaultRandomSource, type RandomSource } from "./rng";
import type {
  BinaryNode,
  Comparator,
  Condition,
  DieKind,
  DieResult,
  ExplodeModifier,
  Expression,
  KeepDropModifier,
  Modifier,
  RerollModifier,
  RollResult,
  RollSpec,
} from "./types";

export function compare(comparator: Comparator, value: number, target: number): boolean {
  switch (comparator) {
    case "=":
      return value === target;
    case "<>":
      return value !== target;
    case "<":
      return value < target;
    case "<=":
      return value <= target;
    case ">":
      return value > target;
    case ">=":
      return value >= target;
  }
}

export function satisfies(condition: Condition, value: number): boolean {
  return compare(condition.comparator, value, condition.value);
}

/** Highest value a single roll of this die can show. */
export function maxFace(kind: DieKind): number {
  switch (kind.type) {
    case "numeric":
      return kind.sides;
    case "percent":
      return 100;
    case "fudge":
      return 1;
  }
}

const DEFAULT_REROLL_CONDITION: Condition = { comparator: "=", value: 1 };

// -0 would leak into traces and equality checks
function integer(n: number): number {
  if (!Number.isSafeInteger(n)) throw DiceError.overflow(n);
  return n + 0;
}

function isKeepDrop(modifier: Modifier): modifier is KeepDropModifier {
  return (
    modifier.type === "keepHighest" ||
    modifier.type === "keepLowest" ||
    modifier.type === "dropHighest" ||
    modifier.type === "dropLowest"
  );
}

/**
 * Walks an expression tree and rolls its dice through a {@link RandomSource}.
 *
 * Roll modifiers are applied in fixed phases regardless of the order they were written:
 * rerolls, then explosions, then keep/drop, then success counting. Within a phase, modifiers
 * apply in written order.
 */
export class Evaluator {
  constructor(private readonly rng: RandomSource) {}

  evaluate(expression: Expression): RollResult {
    switch (expression.type) {
      case "number":
        return { total: expression.value, dice: [], expression: String(expression.value) };

      case "roll":
        return this.evaluateRoll(expression.spec);

      case "binary":
        return this.evaluateBinary(expression);

      case "group": {
        const inner = this.evaluate(expression.inner);
        return { total: inner.total, dice: inner.dice, expression: `(${inner.expression})` };
      }
    }
  }

  private evaluateBinary(node: BinaryNode): RollResult {
    const left = this.evaluate(node.left);
    const right = this.evaluate(node.right);

    let total: number;
    switch (node.operator) {
      case "+":
        total = left.total + right.total;
        break;
      case "-":
        total = left.total - right.total;
        break;
      case "*":
        total = left.total * right.total;
        break;
      case "/":
        if (right.total === 0) throw DiceError.divisionByZero();
        total = Math.trunc(left.total / right.total);
        break;
    }
    total = integer(total);

    return {
      total,
      dice: [...left.dice, ...right.dice],
      expression: `${left.expression} ${node.operator} ${right.expression} = ${total}`,
    };
  }

  private evaluateRoll(spec: RollSpec): RollResult {
    const dice: DieResult[] = [];
    for (let i = 0; i < spec.count; i++) {
      const value = this.rollDie(spec.sides);
      dice.push({ value, rolls: [value], dropped: false });
    }

    for (const modifier of spec.modifiers) {
      if (modifier.type === "reroll") this.applyReroll(dice, spec.sides, modifier);
    }
    for (const modifier of spec.modifiers) {
      if (modifier.type === "explode") this.applyExplode(dice, spec.sides, modifier);
    }
    for (const modifier of spec.modifiers) {
      if (isKeepDrop(modifier)) applyKeepDrop(dice, modifier);
    }

    const successConditions: Condition[] = [];
    for (const modifier of spec.modifiers) {
      if (modifier.type === "countSuccesses") successConditions.push(modifier.condition);
    }

    const notation = formatRollSpec(spec);

    if (successConditions.length === 0) {
      const total = integer(dice.reduce((sum, die) => (die.dropped ? sum : sum + die.value), 0));
      return { total, dice, expression: `${notation}[${formatDice(dice)}] = ${total}` };
    }

    const isHit = (die: DieResult): boolean =>
      !die.dropped && successConditions.every((condition) => satisfies(condition, die.value));
    const total = dice.filter(isHit).length;
    const label = total === 1 ? "success" : "successes";

    return {
      total,
      dice,
      expression: `${notation}[${formatDice(dice, isHit)}] = ${total} ${label}`,
    };
  }

  private rollDie(kind: DieKind): number {
    switch (kind.type) {
      case "numeric":
        return this.rng.roll(kind.sides);
      case "percent":
        return this.rng.roll(100);
      case "fudge":
        return this.rng.roll(3) - 2;
    }
  }

  private applyReroll(dice: DieResult[], kind: DieKind, modifier: RerollModifier): void {
    const condition = modifier.condition ?? DEFAULT_REROLL_CONDITION;

    for (const die of dice) {
      if (die.dropped) continue;

      let rerolls = 0;
      while (satisfies(condition, die.value)) {
        if (rerolls >= MAX_REROLLS) throw DiceError.rerollLimit(MAX_REROLLS);

        const value = this.rollDie(kind);
        die.rolls.push(value);
        die.value = value;
        rerolls++;

        if (modifier.once) break;
      }
    }
  }

  private applyExplode(dice: DieResult[], kind: DieKind, modifier: ExplodeModifier): void {
    const condition: Condition = modifier.condition ?? { comparator: "=", value: maxFace(kind) };

    for (const die of dice) {
      if (die.dropped) continue;

      let explosions = 0;
      let latest = die.rolls[die.rolls.length - 1];
      while (satisfies(condition, latest)) {
        if (explosions >= MAX_EXPLOSIONS) throw DiceError.explodeLimit(MAX_EXPLOSIONS);

        latest = this.rollDie(kind);
        die.rolls.push(latest);
        die.value += modifier.penetrating ? latest - 1 : latest;
        explosions++;
      }
    }
  }
}

/**
 * Marks dice as dropped for one keep/drop modifier, considering only dice still active.
 * Ranking is by value with a stable sort, so among equal values the earlier die goes first.
 */
export function applyKeepDrop(dice: DieResult[], modifier: KeepDropModifier): void {
  const active: number[] = [];
  dice.forEach((die, index) => {
    if (!die.dropped) active.push(index);
  });

  const ascending = (a: number, b: number) => dice[a].value - dice[b].value;
  const descending = (a: number, b: number) => dice[b].value - dice[a].value;

  let ranked: number[];
  let toDrop: number;
  switch (modifier.type) {
    case "keepHighest":
      ranked = active.sort(ascending);
      toDrop = active.length - modifier.count;
      break;
    case "keepLowest":
      ranked = active.sort(descending);
      toDrop = active.length - modifier.count;
      break;
    case "dropHighest":
      ranked = active.sort(descending);
      toDrop = modifier.count;
      break;
    case "dropLowest":
      ranked = active.sort(ascending);
      toDrop = modifier.count;
      break;
  }

  for (const index of ranked.slice(0, Math.max(0, toDrop))) {
    dice[index].dropped = true;
  }
}

/** Evaluate a parsed expression once. */
export function evaluate(
  expression: Expression,
  rng: RandomSource = defaultRandomSource()
): RollResult {
  return new Evaluator(rng).evaluate(expression);
}
