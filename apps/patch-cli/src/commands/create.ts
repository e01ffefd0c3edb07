/**
 * create - diff two files into a patch
 */

import * as path from "node:path";
import {
  applyPatch,
  createPatch,
  type DifferOptions,
  inspectPatch,
  type PatchFormat,
} from "@binpatch/patch";
import {
  bold,
  CliError,
  dim,
  EXIT_CODES,
  flagValue,
  parseCount,
  readInput,
  splitArgs,
  success,
  unwrapResult,
  writeOutput,
} from "../shared.js";

const FORMAT_NAMES: Record<string, PatchFormat> = {
  simple: "ips",
  ips: "ips",
  delta: "bps",
  bps: "bps",
  ups: "ups",
};

export interface CreateArgs {
  original: string;
  modified: string;
  patch: string;
  format: PatchFormat;
  metadataFile?: string;
  differ: DifferOptions;
  validate: boolean;
}

/**
 * Patch format named by a file extension, if any
 */
export function formatFromPath(file: string): PatchFormat | undefined {
  return FORMAT_NAMES[path.extname(file).slice(1).toLowerCase()];
}

export function parseCreateArgs(args: string[]): CreateArgs {
  const { positional, flags } = splitArgs(
    args,
    ["--format", "--metadata", "--window", "--min-match"],
    ["--validate"],
  );
  if (positional.length !== 3) {
    throw new CliError("create expects <original> <modified> <patch>");
  }
  const [original, modified, patch] = positional;

  let format = formatFromPath(patch) ?? "bps";
  const formatName = flagValue(flags, "--format");
  if (formatName !== undefined) {
    const named = FORMAT_NAMES[formatName.toLowerCase()];
    if (!named) {
      throw new CliError(`unknown format '${formatName}' (expected simple, delta or ups)`);
    }
    format = named;
  }

  const differ: DifferOptions = {};
  const window = flagValue(flags, "--window");
  if (window !== undefined) differ.searchWindow = parseCount("--window", window);
  const minMatch = flagValue(flags, "--min-match");
  if (minMatch !== undefined) differ.minMatch = parseCount("--min-match", minMatch);

  return {
    original,
    modified,
    patch,
    format,
    metadataFile: flagValue(flags, "--metadata"),
    differ,
    validate: flags.has("--validate"),
  };
}

/**
 * Run create command
 */
export async function runCreate(args: string[]): Promise<void> {
  const options = parseCreateArgs(args);
  const source = await readInput(options.original, "original file");
  const target = await readInput(options.modified, "modified file");
  const metadata = options.metadataFile
    ? await readInput(options.metadataFile, "metadata file")
    : undefined;

  const patch = unwrapResult(
    createPatch(source, target, { format: options.format, metadata, differ: options.differ }),
  );

  if (options.validate) {
    const rebuilt = unwrapResult(applyPatch(source, patch));
    if (!sameBytes(rebuilt, target)) {
      throw new CliError(
        "validation failed: applying the new patch does not reproduce the modified file",
        EXIT_CODES.validation,
      );
    }
  }

  await writeOutput(options.patch, patch);

  const summary = inspectPatch(patch);
  console.log(
    success(`Created ${summary.format.toUpperCase()} patch ${bold(options.patch)}`) +
      dim(` (${patch.length} bytes, ${summary.recordCount} records)`),
  );
  if (options.validate) {
    console.log(success("Validated: patch reproduces the modified file"));
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}
