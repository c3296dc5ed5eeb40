import { describe, expect, it } from "vitest";
import { formatDice, formatModifier, formatRollSpec } from "../src/index";
import type { DieResult, Modifier } from "../src/index";

const modifierCases: Array<[Modifier, string]> = [
  [{ type: "keepHighest", count: 3 }, "kh3"],
  [{ type: "keepLowest", count: 1 }, "kl1"],
  [{ type: "dropHighest", count: 2 }, "dh2"],
  [{ type: "dropLowest", count: 1 }, "dl1"],
  [{ type: "explode", penetrating: false }, "!"],
  [{ type: "explode", penetrating: true, condition: { comparator: ">=", value: 5 } }, "!p>=5"],
  [{ type: "reroll", once: true }, "ro"],
  [{ type: "reroll", once: false, condition: { comparator: "<", value: 3 } }, "r<3"],
  [{ type: "countSuccesses", condition: { comparator: "<>", value: -1 } }, "<>-1"],
];

describe("formatModifier", () => {
  it.each(modifierCases)("renders %j as %s", (modifier, text) => {
    expect(formatModifier(modifier)).toBe(text);
  });
});

describe("formatRollSpec", () => {
  it("joins count, sides and modifiers", () => {
    expect(
      formatRollSpec({
        count: 4,
        sides: { type: "fudge" },
        modifiers: [
          { type: "reroll", once: false },
          { type: "keepHighest", count: 3 },
        ],
      })
    ).toBe("4dFrkh3");
  });
});

describe("formatDice", () => {
  const pool: DieResult[] = [
    { value: 2, rolls: [2], dropped: true },
    { value: 9, rolls: [6, 3], dropped: false },
    { value: 4, rolls: [4], dropped: false },
  ];

  it("parenthesizes dropped dice", () => {
    expect(formatDice(pool)).toBe("(2), 9, 4");
  });

  it("stars hits", () => {
    expect(formatDice(pool, (die) => die.value > 5)).toBe("(2), 9*, 4");
  });
});
