import {
  appendBytes,
  appendNumber,
  asciiBytes,
  crc32,
  matchesAscii,
  readNumber,
  VarintError,
} from "@binpatch/utils";
import { CorruptPatchError, PatchFormatError } from "../../errors/index.js";
import { appendChecksumFooter, FOOTER_SIZE, readChecksumFooter } from "../checksum-footer.js";
import { UPS_MAGIC, type ParsedUpsPatch, type UpsHunk, type UpsPatch } from "./types.js";

const MIN_PATCH_SIZE = UPS_MAGIC.length + 2 + FOOTER_SIZE;

/**
 * XOR `source` against `target` and collect the differing stretches.
 */
export function createUpsPatch(source: Uint8Array, target: Uint8Array): UpsPatch {
  const size = Math.max(source.length, target.length);
  const byteAt = (data: Uint8Array, i: number) => (i < data.length ? data[i] : 0);

  const hunks: UpsHunk[] = [];
  let i = 0;
  while (i < size) {
    if (byteAt(source, i) === byteAt(target, i)) {
      i++;
      continue;
    }
    const offset = i;
    const xor: number[] = [];
    while (i < size && byteAt(source, i) !== byteAt(target, i)) {
      xor.push(byteAt(source, i) ^ byteAt(target, i));
      i++;
    }
    hunks.push({ offset, xor: new Uint8Array(xor) });
  }

  return {
    sourceSize: source.length,
    targetSize: target.length,
    hunks,
    sourceChecksum: crc32(source),
    targetChecksum: crc32(target),
  };
}

export function serializeUpsPatch(patch: UpsPatch): Uint8Array {
  const output = asciiBytes(UPS_MAGIC);
  appendNumber(output, patch.sourceSize);
  appendNumber(output, patch.targetSize);

  let relative = 0;
  for (const hunk of patch.hunks) {
    if (hunk.offset < relative) {
      throw new RangeError(`UPS hunks overlap or are out of order at ${hunk.offset}`);
    }
    if (hunk.xor.includes(0)) {
      throw new RangeError(`UPS hunk at ${hunk.offset} contains a zero XOR byte`);
    }
    appendNumber(output, hunk.offset - relative);
    appendBytes(output, hunk.xor);
    output.push(0);
    relative = hunk.offset + hunk.xor.length + 1;
  }

  return appendChecksumFooter(output, patch.sourceChecksum, patch.targetChecksum);
}

export interface UpsParseOptions {
  /** Reject the patch when its own CRC does not match (default true) */
  verifyChecksum?: boolean;
}

/**
 * Read a UPS patch.
 *
 * @throws PatchFormatError on bad magic, a patch too short for its header
 *   and footer, or a hunk without terminator
 * @throws CorruptPatchError when the patch CRC does not match
 */
export function parseUpsPatch(bytes: Uint8Array, options: UpsParseOptions = {}): ParsedUpsPatch {
  if (!matchesAscii(bytes, 0, UPS_MAGIC)) {
    throw new PatchFormatError('missing "UPS1" header', "ups");
  }
  if (bytes.length < MIN_PATCH_SIZE) {
    throw new PatchFormatError(`patch is ${bytes.length} bytes, too short for header and footer`, "ups");
  }

  const footer = readChecksumFooter(bytes);
  if ((options.verifyChecksum ?? true) && footer.patchChecksum !== footer.actualPatchChecksum) {
    throw new CorruptPatchError("UPS patch checksum mismatch: the patch file is damaged");
  }

  const end = bytes.length - FOOTER_SIZE;
  const body = bytes.subarray(0, end);
  let pos = UPS_MAGIC.length;
  const next = (): number => {
    try {
      const { value, bytesRead } = readNumber(body, pos);
      pos += bytesRead;
      return value;
    } catch (error) {
      if (error instanceof VarintError) {
        throw new PatchFormatError(error.message, "ups", { cause: error });
      }
      throw error;
    }
  };

  const sourceSize = next();
  const targetSize = next();
  const hunks: UpsHunk[] = [];
  let relative = 0;

  while (pos < end) {
    const offset = relative + next();
    const terminator = body.indexOf(0, pos);
    if (terminator < 0) {
      throw new PatchFormatError(`hunk at ${offset} has no terminator`, "ups");
    }
    const xor = body.slice(pos, terminator);
    hunks.push({ offset, xor });
    pos = terminator + 1;
    relative = offset + xor.length + 1;
  }

  return {
    sourceSize,
    targetSize,
    hunks,
    sourceChecksum: footer.sourceChecksum,
    targetChecksum: footer.targetChecksum,
    patchChecksum: footer.patchChecksum,
  };
}
