import { describe, expect, it } from "vitest";
import { DEFAULT_TRIALS, runCli, USAGE } from "../src/cli";
import type { CliIO } from "../src/cli";
import { NOTATION_REFERENCE } from "../src/index";

function capture(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
  };
}

function run(...argv: string[]) {
  const io = capture();
  const code = runCli(argv, io);
  return { code, stdout: io.stdout, stderr: io.stderr };
}

describe("CLI", () => {
  describe("roll", () => {
    it("prints the trace of a constant expression", () => {
      expect(run("roll", "-3")).toEqual({ code: 0, stdout: ["0 - 3 = -3"], stderr: [] });
    });

    it("joins the remaining arguments into one expression", () => {
      const { code, stdout } = run("roll", "2d6", "+", "3", "--seed", "9");
      expect(code).toBe(0);
      expect(stdout).toHaveLength(1);
      expect(stdout[0]).toMatch(/^2d6\[\d, \d\] = \d+ \+ 3 = \d+$/);
    });

    it("accepts the largest 64-bit seed", () => {
      expect(run("roll", "5", "--seed", "18446744073709551615")).toEqual({
        code: 0,
        stdout: ["5"],
        stderr: [],
      });
    });

    it("repeats itself for the same seed", () => {
      expect(run("roll", "4d6kh3", "--seed", "42").stdout).toEqual(
        run("roll", "4d6kh3", "--seed", "42").stdout
      );
    });

    it("reports notation errors without the usage text", () => {
      expect(run("roll", "2d")).toEqual({
        code: 1,
        stdout: [],
        stderr: ["Error: Unexpected end of input"],
      });
    });

    it("needs an expression", () => {
      expect(run("roll")).toEqual({
        code: 1,
        stdout: [],
        stderr: ["Error: Missing dice expression", USAGE],
      });
    });
  });

  describe("sim", () => {
    it("prints a histogram", () => {
      const { code, stdout } = run("sim", "5", "-n", "3");
      expect(code).toBe(0);
      expect(stdout).toEqual(
        [["5 (n=3)", "", `   5: ${"█".repeat(40)} 100.0%`, "", "mean: 5.00, std: 0.00"].join("\n")]
      );
    });

    it("prints JSON with --json", () => {
      const { code, stdout } = run("sim", "5", "--trials", "10", "--json");
      expect(code).toBe(0);
      expect(JSON.parse(stdout[0])).toEqual({
        n: 10,
        min: 5,
        max: 5,
        mean: 5,
        std_dev: 0,
        distribution: { "5": 10 },
      });
    });

    it("defaults the trial count", () => {
      const { stdout } = run("sim", "5", "--json");
      expect(JSON.parse(stdout[0]).n).toBe(DEFAULT_TRIALS);
    });

    it("is reproducible with --seed", () => {
      const first = run("sim", "3d6", "-n", "200", "--seed", "7", "--json");
      const second = run("sim", "3d6", "-n", "200", "--seed", "7", "--json");
      expect(second.stdout).toEqual(first.stdout);
    });

    const badFlags: Array<[string[], string]> = [
      [["-n", "0"], "Error: -n must be positive"],
      [["-n", "1.5"], "Error: -n must be an integer"],
      [["-n", "many"], "Error: -n must be a number"],
      [["--seed", "-1"], "Error: --seed must be a non-negative integer"],
      [["--seed", "18446744073709551616"], "Error: --seed must be below 2^64"],
      [["-n"], "Error: -n needs a value"],
    ];

    it.each(badFlags)("rejects %j", (flags, message) => {
      expect(run("sim", "1d6", ...flags)).toEqual({
        code: 1,
        stdout: [],
        stderr: [message, USAGE],
      });
    });
  });

  describe("other commands", () => {
    it("prints the notation reference", () => {
      expect(run("notation")).toEqual({ code: 0, stdout: [NOTATION_REFERENCE], stderr: [] });
    });

    it("prints usage for help", () => {
      expect(run("help")).toEqual({ code: 0, stdout: [USAGE], stderr: [] });
    });

    it("prints usage and fails without a command", () => {
      expect(run()).toEqual({ code: 1, stdout: [USAGE], stderr: [] });
    });

    it("rejects unknown commands", () => {
      expect(run("frobnicate").stderr).toEqual(["Error: Unknown command: frobnicate", USAGE]);
    });

    it.each(["--verbose", "-x"])("rejects the unknown option %s", (option) => {
      expect(run("sim", "1d6", option)).toEqual({
        code: 1,
        stdout: [],
        stderr: [`Error: Unknown option: ${option}`, USAGE],
      });
    });
  });
});
