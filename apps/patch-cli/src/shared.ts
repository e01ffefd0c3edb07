/**
 * Shared utilities for the binpatch CLI
 */

import * as fs from "node:fs/promises";
import { isPatchError, type PatchErrorKind } from "@binpatch/patch";
import { type Result, unwrap } from "@binpatch/utils";

/**
 * Process exit codes, one per failure category
 */
export const EXIT_CODES = {
  ok: 0,
  usage: 1,
  format: 2,
  capacity: 3,
  sourceMismatch: 4,
  corrupt: 5,
  validation: 6,
} as const;

const PATCH_ERROR_EXITS: Record<PatchErrorKind, number> = {
  format: EXIT_CODES.format,
  capacity: EXIT_CODES.capacity,
  "source-mismatch": EXIT_CODES.sourceMismatch,
  corrupt: EXIT_CODES.corrupt,
};

const PATCH_ERROR_LABELS: Record<PatchErrorKind, string> = {
  format: "invalid patch",
  capacity: "patch format capacity exceeded",
  "source-mismatch": "wrong original file",
  corrupt: "corrupt patch",
};

/**
 * Failure detected by the CLI itself: bad arguments, unreadable files,
 * a patch that does not reproduce its target.
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.usage, options?: ErrorOptions) {
    super(message, options);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof CliError) {
    return err.exitCode;
  }
  if (isPatchError(err)) {
    return PATCH_ERROR_EXITS[err.kind];
  }
  return EXIT_CODES.usage;
}

/**
 * One-line message for stderr
 */
export function describeError(err: unknown): string {
  if (isPatchError(err)) {
    return `${PATCH_ERROR_LABELS[err.kind]}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read a whole file, reporting a missing file as a usage error
 */
export async function readInput(path: string, label: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.readFile(path));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`cannot read ${label} '${path}': ${reason}`, EXIT_CODES.usage, {
      cause: err,
    });
  }
}

export async function writeOutput(path: string, data: Uint8Array): Promise<void> {
  try {
    await fs.writeFile(path, data);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`cannot write '${path}': ${reason}`, EXIT_CODES.usage, { cause: err });
  }
}

/**
 * Print a result's warnings, then return its value or throw its error
 */
export function unwrapResult<T, E>(result: Result<T, E>): T {
  for (const message of result.warnings) {
    console.warn(warning(`warning: ${message}`));
  }
  return unwrap(result);
}

/**
 * Parse a positive integer flag value
 */
export function parseCount(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? Number.NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliError(`${flag} expects a positive integer, got '${value ?? ""}'`);
  }
  return parsed;
}

/**
 * Split arguments into positionals and flags; `flagsWithValue` take the next argument.
 */
export function splitArgs(
  args: string[],
  flagsWithValue: readonly string[],
  booleanFlags: readonly string[],
): { positional: string[]; flags: Map<string, string | true> } {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    const name = eq < 0 ? arg : arg.slice(0, eq);
    if (flagsWithValue.includes(name)) {
      const value = eq < 0 ? args[++i] : arg.slice(eq + 1);
      if (value === undefined) {
        throw new CliError(`${name} requires a value`);
      }
      flags.set(name, value);
    } else if (booleanFlags.includes(name) && eq < 0) {
      flags.set(name, true);
    } else {
      throw new CliError(`unknown option '${arg}'`);
    }
  }

  return { positional, flags };
}

/**
 * Value of a flag that takes one, if given
 */
export function flagValue(flags: Map<string, string | true>, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === "string" ? value : undefined;
}

/**
 * Print output styling utilities
 */
export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function colorize(text: string, ...codes: string[]): string {
  if (!process.stdout.isTTY) {
    return text;
  }
  return `${codes.join("")}${text}${colors.reset}`;
}

export function success(text: string): string {
  return colorize(text, colors.green);
}

export function error(text: string): string {
  return colorize(text, colors.red);
}

export function warning(text: string): string {
  return colorize(text, colors.yellow);
}

export function info(text: string): string {
  return colorize(text, colors.cyan);
}

export function dim(text: string): string {
  return colorize(text, colors.dim);
}

export function bold(text: string): string {
  return colorize(text, colors.bold);
}

/**
 * Print an error and exit with the code for its category
 */
export function fatal(err: unknown): never {
  console.error(error(`binpatch: ${describeError(err)}`));
  process.exit(exitCodeFor(err));
}
