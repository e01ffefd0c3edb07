import { crc32, formatCrc32 } from "@binpatch/utils";
import { CorruptPatchError, SourceMismatchError } from "../../errors/index.js";
import { allocateOutput } from "../output-buffer.js";
import type { UpsPatch } from "./types.js";

export type UpsDirection = "forward" | "reverse";

/**
 * Which way `patch` applies to `image`, if at all.
 */
export function upsDirection(image: Uint8Array, patch: UpsPatch): UpsDirection | undefined {
  const checksum = crc32(image);
  if (image.length === patch.sourceSize && checksum === patch.sourceChecksum) {
    return "forward";
  }
  if (image.length === patch.targetSize && checksum === patch.targetChecksum) {
    return "reverse";
  }
  return undefined;
}

/**
 * Apply a UPS patch. An image matching the patch's output checksum is turned
 * back into its input.
 *
 * @throws SourceMismatchError when `image` matches neither side of the patch
 * @throws CorruptPatchError when the declared output size cannot be allocated
 *   or the result fails its checksum
 */
export function applyUpsPatch(image: Uint8Array, patch: UpsPatch): Uint8Array {
  const direction = upsDirection(image, patch);
  if (!direction) {
    throw new SourceMismatchError(patch.sourceChecksum, crc32(image));
  }

  const [size, expected] =
    direction === "forward"
      ? [patch.targetSize, patch.targetChecksum]
      : [patch.sourceSize, patch.sourceChecksum];

  const output = allocateOutput(size, "UPS");
  output.set(image.subarray(0, size));
  for (const hunk of patch.hunks) {
    const end = Math.min(hunk.offset + hunk.xor.length, size);
    for (let pos = hunk.offset; pos < end; pos++) {
      output[pos] = (pos < image.length ? image[pos] : 0) ^ hunk.xor[pos - hunk.offset];
    }
  }

  const actual = crc32(output);
  if (actual !== expected) {
    throw new CorruptPatchError(
      `UPS output checksum mismatch: expected ${formatCrc32(expected)}, got ${formatCrc32(actual)}`,
    );
  }
  return output;
}
