import type { Condition, DieKind, DieResult, Expression, Modifier, RollSpec } from "./types";

export function formatCondition(condition: Condition): string {
  return `${condition.comparator}${condition.value}`;
}

export function formatDieKind(kind: DieKind): string {
  switch (kind.type) {
    case "numeric":
      return String(kind.sides);
    case "percent":
      return "%";
    case "fudge":
      return "F";
  }
}

export function formatModifier(modifier: Modifier): string {
  switch (modifier.type) {
    case "keepHighest":
      return `kh${modifier.count}`;
    case "keepLowest":
      return `kl${modifier.count}`;
    case "dropHighest":
      return `dh${modifier.count}`;
    case "dropLowest":
      return `dl${modifier.count}`;
    case "explode":
      return `!${modifier.penetrating ? "p" : ""}${
        modifier.condition ? formatCondition(modifier.condition) : ""
      }`;
    case "reroll":
      return `r${modifier.once ? "o" : ""}${
        modifier.condition ? formatCondition(modifier.condition) : ""
      }`;
    case "countSuccesses":
      return formatCondition(modifier.condition);
  }
}

/** Canonical notation of a roll, e.g. `4d6kh3` or `1d6!p>4`. */
export function formatRollSpec(spec: RollSpec): string {
  return `${spec.count}d${formatDieKind(spec.sides)}${spec.modifiers.map(formatModifier).join("")}`;
}

/**
 * Renders an expression back to notation that parses to an equal tree.
 *
 * Example: `formatExpression(parse("(2d6+3)*2"))` → `"(2d6 + 3) * 2"`
 */
export function formatExpression(expression: Expression): string {
  switch (expression.type) {
    case "number":
      return String(expression.value);
    case "roll":
      return formatRollSpec(expression.spec);
    case "group":
      return `(${formatExpression(expression.inner)})`;
    case "binary":
      if (isUnaryMinus(expression)) return `-${formatExpression(expression.right)}`;
      return `${formatExpression(expression.left)} ${expression.operator} ${formatExpression(
        expression.right
      )}`;
  }
}

// `-x` parses to `0 - x`; only a factor-level operand can be written back with a bare minus.
function isUnaryMinus(expression: Expression): boolean {
  if (expression.type !== "binary" || expression.operator !== "-") return false;
  if (expression.left.type !== "number" || expression.left.value !== 0) return false;
  return expression.right.type !== "binary" || isUnaryMinus(expression.right);
}

/** Dice list of a roll trace: dropped dice in parentheses, success hits suffixed with `*`. */
export function formatDice(dice: readonly DieResult[], isHit?: (die: DieResult) => boolean): string {
  return dice
    .map((die) => {
      if (die.dropped) return `(${die.value})`;
      return isHit?.(die) ? `${die.value}*` : String(die.value);
    })
    .join(", ");
}
