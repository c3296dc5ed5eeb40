import { DiceError } from "../src/index";
import type { RandomSource } from "../src/index";

/** Runs `fn` and returns the DiceError it throws. */
export function thrownBy(fn: () => unknown): DiceError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DiceError) return error;
    throw error;
  }
  throw new Error("expected a DiceError to be thrown");
}

/** Always shows the same face. */
export function constantSource(value: number): RandomSource {
  return { roll: () => value };
}

/** Always shows the highest face of whatever die is rolled. */
export const maxSource: RandomSource = { roll: (max) => max };

/** Records every `max` it is asked for and answers with 1. */
export function recordingSource(): RandomSource & { requests: number[] } {
  const requests: number[] = [];
  return {
    requests,
    roll(max: number) {
      requests.push(max);
      return 1;
    },
  };
}
