import { MAX_EXPLOSIONS, MAX_REROLLS } from "./limits";

export type DiceErrorDetail =
  | { kind: "unexpectedCharacter"; character: string; offset: number }
  | { kind: "unexpectedEndOfInput" }
  | { kind: "expected"; expected: string; found: string }
  | { kind: "invalidDiceCount"; count: number }
  | { kind: "invalidDiceSides"; sides: number }
  | { kind: "rerollLimit"; limit: number }
  | { kind: "explodeLimit"; limit: number }
  | { kind: "divisionByZero" }
  | { kind: "overflow"; value: number }
  | { kind: "invalidTrialCount"; trials: number };

export type DiceErrorKind = DiceErrorDetail["kind"];

function describe(detail: DiceErrorDetail): string {
  switch (detail.kind) {
    case "unexpectedCharacter":
      return `Unexpected character '${detail.character}' at position ${detail.offset}`;
    case "unexpectedEndOfInput":
      return "Unexpected end of input";
    case "expected":
      return `Expected ${detail.expected}, found ${detail.found}`;
    case "invalidDiceCount":
      return `Invalid dice count: ${detail.count}`;
    case "invalidDiceSides":
      return `Invalid dice sides: ${detail.sides}`;
    case "rerollLimit":
      return `Reroll limit exceeded (max ${detail.limit} rerolls)`;
    case "explodeLimit":
      return `Explode limit exceeded (max ${detail.limit} explosions)`;
    case "divisionByZero":
      return "Division by zero";
    case "overflow":
      return `Integer overflow: result ${detail.value} is outside the safe integer range`;
    case "invalidTrialCount":
      return `Invalid trial count: ${detail.trials} (must be a positive integer)`;
  }
}

/**
 * Raised by the lexer, parser, evaluator and simulator. Narrow on `detail.kind` to recover
 * the structured fields.
 */
export class DiceError extends Error {
  readonly detail: DiceErrorDetail;

  constructor(detail: DiceErrorDetail) {
    super(describe(detail));
    this.name = "DiceError";
    this.detail = detail;
  }

  get kind(): DiceErrorKind {
    return this.detail.kind;
  }

  static unexpectedCharacter(character: string, offset: number): DiceError {
    return new DiceError({ kind: "unexpectedCharacter", character, offset });
  }

  static unexpectedEndOfInput(): DiceError {
    return new DiceError({ kind: "unexpectedEndOfInput" });
  }

  static expected(expected: string, found: string): DiceError {
    return new DiceError({ kind: "expected", expected, found });
  }

  static rerollLimit(limit: number = MAX_REROLLS): DiceError {
    return new DiceError({ kind: "rerollLimit", limit });
  }

  static explodeLimit(limit: number = MAX_EXPLOSIONS): DiceError {
    return new DiceError({ kind: "explodeLimit", limit });
  }

  static divisionByZero(): DiceError {
    return new DiceError({ kind: "divisionByZero" });
  }

  static overflow(value: number): DiceError {
    return new DiceError({ kind: "overflow", value });
  }
}

export function isDiceError(error: unknown): error is DiceError {
  return error instanceof DiceError;
}
