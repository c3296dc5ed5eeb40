import { describe, expect, it } from "vitest";
import {
  DiceError,
  isDiceError,
  roll,
  rollWithRng,
  ScriptedRandomSource,
  SeededRandomSource,
  simulate,
} from "../src/index";
import { constantSource, maxSource, thrownBy } from "./helpers";

describe("roll", () => {
  it("reports the documented scenarios", () => {
    expect(rollWithRng("2d6", new ScriptedRandomSource([3, 4])).total).toBe(7);
    expect(rollWithRng("4d6kh3", new ScriptedRandomSource([1, 5, 3, 6])).total).toBe(14);
    expect(rollWithRng("1d6!p", new ScriptedRandomSource([6, 6, 4])).total).toBe(14);
    expect(rollWithRng("5d10>=8", new ScriptedRandomSource([10, 7, 8, 3, 9])).total).toBe(3);
  });

  it("stays within the faces of the dice", () => {
    for (let i = 0; i < 50; i++) {
      const result = roll("3d6");
      expect(result.total).toBeGreaterThanOrEqual(3);
      expect(result.total).toBeLessThanOrEqual(18);
      expect(result.dice).toHaveLength(3);
    }
  });

  it("throws a DiceError for bad notation", () => {
    const error = thrownBy(() => roll("2d6 +"));
    expect(error).toBeInstanceOf(DiceError);
    expect(error.name).toBe("DiceError");
    expect(isDiceError(error)).toBe(true);
    expect(isDiceError(new Error("nope"))).toBe(false);
  });

  it("never rolls more dice than kept plus dropped", () => {
    const result = rollWithRng("6d6dl2kh3", new SeededRandomSource(3));
    const dropped = result.dice.filter((die) => die.dropped).length;
    expect(dropped).toBe(3);
    expect(result.dice).toHaveLength(6);
  });
});

describe("Properties", () => {
  it.each(["2d6 + 3", "4d6kh3", "3d8 * 2", "d% + dF", "2d20kl1", "4dF", "(1d4 + 1) * 3", "6d10>=7"])(
    "%s totals no more on ones than on maximum faces",
    (expression) => {
      const low = rollWithRng(expression, constantSource(1)).total;
      const high = rollWithRng(expression, maxSource).total;
      expect(low).toBeLessThanOrEqual(high);
    }
  );

  it("keeping at least as many dice as rolled changes nothing", () => {
    for (const seed of [1, 2, 3, 4, 5]) {
      const plain = rollWithRng("3d6", new SeededRandomSource(seed)).total;
      expect(rollWithRng("3d6kh3", new SeededRandomSource(seed)).total).toBe(plain);
      expect(rollWithRng("3d6kh5", new SeededRandomSource(seed)).total).toBe(plain);
    }
  });

  it("accounts for every trial in the distribution", () => {
    const result = simulate("2d6 + 1d4", 1000);
    let total = 0;
    for (const count of result.distribution.values()) total += count;
    expect(total).toBe(result.n);
  });

  it("keeps each die's value equal to the sum of its rolls when exploding", () => {
    const result = rollWithRng("5d4!", new SeededRandomSource(11));
    for (const die of result.dice) {
      expect(die.value).toBe(die.rolls.reduce((sum, value) => sum + value, 0));
    }
  });

  it("keeps each die's value equal to its latest roll when rerolling", () => {
    const result = rollWithRng("5d6r<3", new SeededRandomSource(11));
    for (const die of result.dice) {
      expect(die.value).toBe(die.rolls[die.rolls.length - 1]);
      expect(die.value).toBeGreaterThanOrEqual(3);
    }
  });
});
