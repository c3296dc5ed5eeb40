import { LRUCache } from "./common/lru-cache";
import { DiceError } from "./errors";
import { Lexer } from "./lexer";
import { MAX_DICE_COUNT } from "./limits";
import type {
  Comparator,
  Condition,
  DieKind,
  Expression,
  Modifier,
  Operator,
  Token,
  TokenType,
} from "./types";

const TOKEN_TEXT: Record<Exclude<TokenType, "number" | "eof">, string> = {
  d: "d",
  percent: "%",
  fudge: "F",
  plus: "+",
  minus: "-",
  star: "*",
  slash: "/",
  lparen: "(",
  rparen: ")",
  k: "k",
  h: "h",
  l: "l",
  bang: "!",
  r: "r",
  o: "o",
  p: "p",
  eq: "=",
  lt: "<",
  gt: ">",
};

/** Describes a token the way it appears in "expected X, found Y" diagnostics. */
export function describeToken(token: Token): string {
  if (token.type === "number") return `number ${token.value}`;
  if (token.type === "eof") return "end of input";
  return `'${TOKEN_TEXT[token.type]}'`;
}

/**
 * Recursive-descent parser with one token of lookahead in `current`.
 *
 * ```
 * expression     := term (('+' | '-') term)*
 * term           := factor (('*' | '/') factor)*
 * factor         := roll_or_number | '(' expression ')' | '-' factor
 * roll_or_number := [count] ['d' sides modifiers]
 * sides          := integer | '%' | 'F'
 * ```
 */
export class Parser {
  private readonly lexer: Lexer;
  private current: Token;

  constructor(input: string) {
    this.lexer = new Lexer(input);
    this.current = this.lexer.next();
  }

  /** Parses the whole input; trailing tokens are an error. */
  parse(): Expression {
    const expression = this.expression();
    if (this.current.type !== "eof") {
      throw DiceError.expected("end of input", describeToken(this.current));
    }
    return expression;
  }

  private advance(): Token {
    const previous = this.current;
    this.current = this.lexer.next();
    return previous;
  }

  /** Tests the current token without letting the compiler narrow `current` across `advance()`. */
  private check(type: TokenType): boolean {
    return this.current.type === type;
  }

  private fail(expected: string): never {
    if (this.current.type === "eof") throw DiceError.unexpectedEndOfInput();
    throw DiceError.expected(expected, describeToken(this.current));
  }

  private expression(): Expression {
    let left = this.term();

    for (;;) {
      const operator = this.additiveOperator();
      if (!operator) return left;
      this.advance();
      const right = this.term();
      left = { type: "binary", operator, left, right };
    }
  }

  private term(): Expression {
    let left = this.factor();

    for (;;) {
      const operator = this.multiplicativeOperator();
      if (!operator) return left;
      this.advance();
      const right = this.factor();
      left = { type: "binary", operator, left, right };
    }
  }

  private additiveOperator(): Operator | undefined {
    if (this.current.type === "plus") return "+";
    if (this.current.type === "minus") return "-";
    return undefined;
  }

  private multiplicativeOperator(): Operator | undefined {
    if (this.current.type === "star") return "*";
    if (this.current.type === "slash") return "/";
    return undefined;
  }

  private factor(): Expression {
    switch (this.current.type) {
      case "number":
      case "d":
        return this.rollOrNumber();

      case "lparen": {
        this.advance();
        const inner = this.expression();
        if (!this.check("rparen")) this.fail("')'");
        this.advance();
        return { type: "group", inner };
      }

      case "minus":
        this.advance();
        return {
          type: "binary",
          operator: "-",
          left: { type: "number", value: 0 },
          right: this.factor(),
        };

      default:
        return this.fail("number, dice roll, or '('");
    }
  }

  private rollOrNumber(): Expression {
    let count = 1;
    const token = this.current;
    if (token.type === "number") {
      count = token.value;
      this.advance();
      if (!this.check("d")) return { type: "number", value: count };
    }

    // consume 'd'
    this.advance();

    if (count > MAX_DICE_COUNT) {
      throw new DiceError({ kind: "invalidDiceCount", count });
    }

    const sides = this.sides();
    const modifiers = this.modifiers();

    return { type: "roll", spec: { count, sides, modifiers } };
  }

  private sides(): DieKind {
    const token = this.current;
    switch (token.type) {
      case "number":
        if (token.value < 1) {
          throw new DiceError({ kind: "invalidDiceSides", sides: token.value });
        }
        this.advance();
        return { type: "numeric", sides: token.value };

      case "percent":
        this.advance();
        return { type: "percent" };

      case "fudge":
        this.advance();
        return { type: "fudge" };

      default:
        return this.fail("dice sides (number, %, or F)");
    }
  }

  private modifiers(): Modifier[] {
    const modifiers: Modifier[] = [];

    for (;;) {
      switch (this.current.type) {
        case "k":
          this.advance();
          modifiers.push(this.keepModifier());
          break;

        case "bang":
          this.advance();
          modifiers.push(this.explodeModifier());
          break;

        case "r":
          this.advance();
          modifiers.push(this.rerollModifier());
          break;

        case "d": {
          // 'd' is a drop modifier only when 'h' or 'l' follows
          const next = this.lexer.peek();
          if (next.type !== "h" && next.type !== "l") return modifiers;
          this.advance();
          modifiers.push(this.dropModifier());
          break;
        }

        case "eq":
        case "lt":
        case "gt":
          modifiers.push({ type: "countSuccesses", condition: this.requiredCondition() });
          break;

        default:
          return modifiers;
      }
    }
  }

  private keepModifier(): Modifier {
    let highest = true;
    if (this.current.type === "h") {
      this.advance();
    } else if (this.current.type === "l") {
      this.advance();
      highest = false;
    }

    const count = this.optionalNumber(1);
    return highest ? { type: "keepHighest", count } : { type: "keepLowest", count };
  }

  private dropModifier(): Modifier {
    let highest: boolean;
    if (this.current.type === "h") highest = true;
    else if (this.current.type === "l") highest = false;
    else return this.fail("'h' or 'l' after 'd'");
    this.advance();

    const count = this.optionalNumber(1);
    return highest ? { type: "dropHighest", count } : { type: "dropLowest", count };
  }

  private explodeModifier(): Modifier {
    const penetrating = this.current.type === "p";
    if (penetrating) this.advance();

    const condition = this.optionalCondition();
    return condition
      ? { type: "explode", penetrating, condition }
      : { type: "explode", penetrating };
  }

  private rerollModifier(): Modifier {
    const once = this.current.type === "o";
    if (once) this.advance();

    const condition = this.optionalCondition();
    return condition ? { type: "reroll", once, condition } : { type: "reroll", once };
  }

  private optionalNumber(fallback: number): number {
    const token = this.current;
    if (token.type !== "number") return fallback;
    this.advance();
    return token.value;
  }

  private requiredCondition(): Condition {
    const condition = this.optionalCondition();
    if (condition) return condition;
    return this.fail("comparison operator (>, <, =, >=, <=, <>)");
  }

  private optionalCondition(): Condition | undefined {
    let comparator: Comparator;

    switch (this.current.type) {
      case "eq":
        this.advance();
        comparator = "=";
        break;

      case "lt":
        this.advance();
        if (this.check("eq")) {
          this.advance();
          comparator = "<=";
        } else if (this.check("gt")) {
          this.advance();
          comparator = "<>";
        } else {
          comparator = "<";
        }
        break;

      case "gt":
        this.advance();
        if (this.check("eq")) {
          this.advance();
          comparator = ">=";
        } else {
          comparator = ">";
        }
        break;

      default:
        return undefined;
    }

    return { comparator, value: this.conditionValue() };
  }

  private conditionValue(): number {
    const negative = this.current.type === "minus";
    if (negative) this.advance();

    const token = this.current;
    if (token.type !== "number") return this.fail("number after comparison");
    this.advance();
    return negative ? -token.value : token.value;
  }
}

/** Freezes a parsed tree and everything it references, in place. */
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Parsed expressions are frozen, so identical inputs share one tree.
 */
const parseCache = new LRUCache<string, Expression>(1000);

let cachingEnabled = true;

/** Enable or disable the internal parse cache. */
export function setCachingEnabled(enabled: boolean): void {
  cachingEnabled = enabled;
  if (!enabled) clearParserCache();
}

/** Returns whether the internal parse cache is currently enabled. */
export function getCachingEnabled(): boolean {
  return cachingEnabled;
}

/** Clears the internal parse cache. */
export function clearParserCache(): void {
  parseCache.clear();
}

/**
 * Parse dice notation into an {@link Expression}.
 *
 * @throws {DiceError} on lexical or syntactic errors, a zero-sided die, or too many dice.
 */
export function parse(input: string): Expression {
  if (!cachingEnabled) return deepFreeze(new Parser(input).parse());

  return parseCache.getOrCreate(input, () => deepFreeze(new Parser(input).parse()));
}
