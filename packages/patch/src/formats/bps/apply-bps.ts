import { crc32, formatCrc32 } from "@binpatch/utils";
import { CorruptPatchError, SourceMismatchError } from "../../errors/index.js";
import { allocateOutput } from "../output-buffer.js";
import { actionLength, type BpsPatch } from "./types.js";

/**
 * Rebuild the target from `source` and a parsed BPS patch.
 *
 * @throws SourceMismatchError when `source` is not the image the patch was built for
 * @throws CorruptPatchError when the actions do not add up to the declared
 *   target size, an action reads out of bounds, or the result does not match
 *   the target checksum
 */
export function applyBpsPatch(source: Uint8Array, patch: BpsPatch): Uint8Array {
  const sourceChecksum = crc32(source);
  if (source.length !== patch.sourceSize) {
    throw new SourceMismatchError(
      patch.sourceChecksum,
      sourceChecksum,
      `Source size mismatch: patch expects ${patch.sourceSize} bytes, got ${source.length}`,
    );
  }
  if (sourceChecksum !== patch.sourceChecksum) {
    throw new SourceMismatchError(patch.sourceChecksum, sourceChecksum);
  }

  const produced = patch.actions.reduce((sum, action) => sum + actionLength(action), 0);
  if (produced !== patch.targetSize) {
    throw new CorruptPatchError(
      `BPS actions produce ${produced} bytes but the header declares ${patch.targetSize}`,
    );
  }

  const output = allocateOutput(patch.targetSize, "BPS");
  let outputOffset = 0;
  let sourceRelative = 0;
  let targetRelative = 0;

  for (const action of patch.actions) {
    const len = actionLength(action);

    switch (action.kind) {
      case "source-read":
        if (outputOffset + len > source.length) {
          throw new CorruptPatchError(`BPS source-read past the end of the source at ${outputOffset}`);
        }
        output.set(source.subarray(outputOffset, outputOffset + len), outputOffset);
        break;

      case "target-read":
        output.set(action.data, outputOffset);
        break;

      case "source-copy":
        sourceRelative += action.relativeOffset;
        if (sourceRelative < 0 || sourceRelative + len > source.length) {
          throw new CorruptPatchError(`BPS source-copy from ${sourceRelative} is out of range`);
        }
        output.set(source.subarray(sourceRelative, sourceRelative + len), outputOffset);
        sourceRelative += len;
        break;

      case "target-copy":
        targetRelative += action.relativeOffset;
        if (targetRelative < 0 || targetRelative >= outputOffset) {
          throw new CorruptPatchError(`BPS target-copy from ${targetRelative} reads unwritten output`);
        }
        // Byte by byte: the regions may overlap
        for (let i = 0; i < len; i++) {
          output[outputOffset + i] = output[targetRelative++];
        }
        break;
    }
    outputOffset += len;
  }

  const targetChecksum = crc32(output);
  if (targetChecksum !== patch.targetChecksum) {
    throw new CorruptPatchError(
      `BPS target checksum mismatch: expected ${formatCrc32(patch.targetChecksum)}, got ${formatCrc32(targetChecksum)}`,
    );
  }
  return output;
}
