/** Arithmetic operators, in the order they are written in notation. */
export type Operator = "+" | "-" | "*" | "/";

/** Comparison used by explode, reroll and success conditions. `<>` means "not equal". */
export type Comparator = "=" | "<>" | "<" | "<=" | ">" | ">=";

/** A comparison against a fixed value, e.g. `>=8`. */
export interface Condition {
  readonly comparator: Comparator;
  readonly value: number;
}

/** The kind of die being rolled. */
export type DieKind =
  | { readonly type: "numeric"; readonly sides: number }
  | { readonly type: "percent" }
  | { readonly type: "fudge" };

export type KeepDropModifier =
  | { readonly type: "keepHighest"; readonly count: number }
  | { readonly type: "keepLowest"; readonly count: number }
  | { readonly type: "dropHighest"; readonly count: number }
  | { readonly type: "dropLowest"; readonly count: number };

export type ExplodeModifier = {
  readonly type: "explode";
  /** Each additional roll contributes one less than its face. */
  readonly penetrating: boolean;
  /** Defaults to the die's maximum face when absent. */
  readonly condition?: Condition;
};

export type RerollModifier = {
  readonly type: "reroll";
  /** Stop after a single re-roll regardless of the new value. */
  readonly once: boolean;
  /** Defaults to `=1` when absent. */
  readonly condition?: Condition;
};

export type CountSuccessesModifier = {
  readonly type: "countSuccesses";
  readonly condition: Condition;
};

/**
 * A roll modifier. The position of a modifier in {@link RollSpec.modifiers} is the order it was
 * written; evaluation always applies rerolls, then explosions, then keep/drop, then success counting.
 */
export type Modifier =
  | KeepDropModifier
  | ExplodeModifier
  | RerollModifier
  | CountSuccessesModifier;

export interface RollSpec {
  readonly count: number;
  readonly sides: DieKind;
  readonly modifiers: readonly Modifier[];
}

export type NumberNode = { readonly type: "number"; readonly value: number };

export type RollNode = { readonly type: "roll"; readonly spec: RollSpec };

export type BinaryNode = {
  readonly type: "binary";
  readonly operator: Operator;
  readonly left: Expression;
  readonly right: Expression;
};

export type GroupNode = { readonly type: "group"; readonly inner: Expression };

/** A parsed dice expression. Nodes are never shared between trees. */
export type Expression = NumberNode | RollNode | BinaryNode | GroupNode;

/** State of one physical die during evaluation. */
export interface DieResult {
  /** Current value: the latest roll after rerolls, or the accumulated total after explosions. */
  value: number;
  /** Every value this die produced, in order. */
  rolls: number[];
  dropped: boolean;
}

export interface RollResult {
  readonly total: number;
  /** Dice of every roll in the expression, in evaluation order. */
  readonly dice: readonly DieResult[];
  /** Human-readable trace, e.g. `4d6kh3[(1), 5, 3, 6] = 14`. */
  readonly expression: string;
}

export type TokenType =
  | "number"
  | "d"
  | "percent"
  | "fudge"
  | "plus"
  | "minus"
  | "star"
  | "slash"
  | "lparen"
  | "rparen"
  | "k"
  | "h"
  | "l"
  | "bang"
  | "r"
  | "o"
  | "p"
  | "eq"
  | "lt"
  | "gt"
  | "eof";

/** A lexical token; `offset` is the UTF-8 byte offset of its first character. */
export type Token =
  | { readonly type: "number"; readonly value: number; readonly offset: number }
  | { readonly type: Exclude<TokenType, "number">; readonly offset: number };
