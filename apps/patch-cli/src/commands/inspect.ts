/**
 * inspect - print what a patch contains
 */

import {
  describePatch,
  inspectPatch,
  type IpsRecord,
  parseIpsPatch,
} from "@binpatch/patch";
import { bold, CliError, dim, flagValue, info, parseCount, readInput, splitArgs, warning } from "../shared.js";

const DEFAULT_RECORD_LIMIT = 20;

export interface InspectArgs {
  patch: string;
  records: number;
}

export function parseInspectArgs(args: string[]): InspectArgs {
  const { positional, flags } = splitArgs(args, ["--records"], []);
  if (positional.length !== 1) {
    throw new CliError("inspect expects <patch>");
  }
  const records = flagValue(flags, "--records");
  return {
    patch: positional[0],
    records: records === undefined ? DEFAULT_RECORD_LIMIT : parseCount("--records", records),
  };
}

export function formatRecord(record: IpsRecord): string {
  const offset = `0x${record.offset.toString(16).toUpperCase().padStart(6, "0")}`;
  if (record.type === "rle") {
    const value = record.value.toString(16).toUpperCase().padStart(2, "0");
    return `${offset}  RLE   ${record.len} x 0x${value}`;
  }
  return `${offset}  DATA  ${record.data.length} bytes`;
}

/**
 * Run inspect command
 */
export async function runInspect(args: string[]): Promise<void> {
  const options = parseInspectArgs(args);
  const bytes = await readInput(options.patch, "patch file");
  const metadata = inspectPatch(bytes);

  const lines = describePatch(metadata);
  const width = Math.max(...lines.map(([label]) => label.length));
  console.log(bold(options.patch));
  for (const [label, value] of lines) {
    console.log(`  ${label.padEnd(width)}  ${info(value)}`);
  }

  if (metadata.patchChecksumValid === false) {
    console.log(warning("Patch checksum does not match: the file is damaged"));
  }

  if (metadata.format === "ips" && metadata.recordCount > 0) {
    const { records } = parseIpsPatch(bytes);
    console.log("");
    console.log(bold("Records:"));
    for (const record of records.slice(0, options.records)) {
      console.log(`  ${formatRecord(record)}`);
    }
    if (records.length > options.records) {
      console.log(dim(`  ... ${records.length - options.records} more`));
    }
  }
}
