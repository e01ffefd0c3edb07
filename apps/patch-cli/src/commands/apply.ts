/**
 * apply - rebuild a file from its original and a patch
 */

import { applyPatch } from "@binpatch/patch";
import { crc32, formatCrc32 } from "@binpatch/utils";
import { bold, CliError, dim, readInput, splitArgs, success, unwrapResult, writeOutput } from "../shared.js";

export interface ApplyArgs {
  original: string;
  patch: string;
  output: string;
  truncate: boolean;
}

export function parseApplyArgs(args: string[]): ApplyArgs {
  const { positional, flags } = splitArgs(args, [], ["--no-truncate"]);
  if (positional.length !== 3) {
    throw new CliError("apply expects <original> <patch> <output>");
  }
  const [original, patch, output] = positional;
  return { original, patch, output, truncate: !flags.has("--no-truncate") };
}

/**
 * Run apply command
 */
export async function runApply(args: string[]): Promise<void> {
  const options = parseApplyArgs(args);
  const source = await readInput(options.original, "original file");
  const patch = await readInput(options.patch, "patch file");

  const output = unwrapResult(applyPatch(source, patch, { truncate: options.truncate }));
  await writeOutput(options.output, output);

  console.log(
    success(`Wrote ${bold(options.output)}`) +
      dim(` (${output.length} bytes, CRC32 ${formatCrc32(crc32(output))})`),
  );
}
