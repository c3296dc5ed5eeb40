import { z } from "zod";
import { isDiceError } from "./errors";
import { roll, rollWithRng } from "./index";
import { NOTATION_REFERENCE, renderHistogram, renderJson } from "./render";
import { SeededRandomSource } from "./rng";
import { simulate, simulateSeeded } from "./simulator";

export const DEFAULT_TRIALS = 10_000;

const SEED_LIMIT = 2n ** 64n;

export const USAGE = `Usage:
  dicetrace roll <expression> [--seed S]           Roll once and print the trace
  dicetrace sim <expression> [-n N] [--seed S] [--json]
                                                   Simulate N rolls (default ${DEFAULT_TRIALS})
  dicetrace notation                               Show the notation reference`;

/** Where command output goes; the binary wires this to the console. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

const optionsSchema = z.object({
  trials: z.coerce
    .number({ invalid_type_error: "-n must be a number" })
    .int("-n must be an integer")
    .positive("-n must be positive")
    .default(DEFAULT_TRIALS),
  seed: z
    .string()
    .regex(/^\d+$/, "--seed must be a non-negative integer")
    .refine((s) => !/^\d+$/.test(s) || BigInt(s) < SEED_LIMIT, "--seed must be below 2^64")
    .transform((s) => BigInt(s))
    .optional(),
  json: z.boolean().default(false),
});

type CliOptions = z.infer<typeof optionsSchema>;

class UsageError extends Error {}

interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  options: CliOptions;
}

function valueAfter(argv: readonly string[], index: number): string {
  const value = argv[index + 1];
  if (value === undefined) throw new UsageError(`${argv[index]} needs a value`);
  return value;
}

function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const raw: { trials?: string; seed?: string; json?: boolean } = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "-n":
      case "--n":
      case "--trials":
        raw.trials = valueAfter(argv, i++);
        break;
      case "--seed":
        raw.seed = valueAfter(argv, i++);
        break;
      case "--json":
        raw.json = true;
        break;
      default:
        // "-3" is an expression, "-x" is not
        if (arg.startsWith("--") || /^-[^\d(d%]/i.test(arg)) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  const parsed = optionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, options: parsed.data };
}

function expressionFrom(positionals: readonly string[]): string {
  const expression = positionals.join(" ").trim();
  if (expression === "") throw new UsageError("Missing dice expression");
  return expression;
}

/**
 * Runs one CLI invocation and returns the process exit code.
 *
 * Example: `runCli(["sim", "2d6", "-n", "1000", "--json"], consoleIO)`
 */
export function runCli(argv: readonly string[], io: CliIO): number {
  try {
    const { command, positionals, options } = parseArgs(argv);

    switch (command) {
      case "roll": {
        const expression = expressionFrom(positionals);
        const result =
          options.seed === undefined
            ? roll(expression)
            : rollWithRng(expression, new SeededRandomSource(options.seed));
        io.out(result.expression);
        return 0;
      }

      case "sim": {
        const expression = expressionFrom(positionals);
        const result =
          options.seed === undefined
            ? simulate(expression, options.trials)
            : simulateSeeded(expression, options.trials, options.seed);
        io.out(options.json ? renderJson(result) : renderHistogram(expression, result));
        return 0;
      }

      case "notation":
        io.out(NOTATION_REFERENCE);
        return 0;

      case undefined:
      case "help":
        io.out(USAGE);
        return command === undefined ? 1 : 0;

      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`Error: ${error.message}`);
      io.err(USAGE);
      return 1;
    }
    if (isDiceError(error)) {
      io.err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
