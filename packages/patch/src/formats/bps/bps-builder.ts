import { crc32 } from "@binpatch/utils";
import type { EditOperation } from "../../diff/types.js";
import type { BpsAction, BpsPatch } from "./types.js";

export interface BpsBuildOptions {
  /** Free-form bytes stored in the header, conventionally UTF-8 */
  metadata?: Uint8Array;
}

interface RunLocation {
  start: number;
  len: number;
}

/**
 * Turn edit operations into BPS actions.
 *
 * A run becomes a copy of an earlier run of the same byte when one is long
 * enough, otherwise one stored byte followed by a self-overlapping target copy.
 */
export function buildBpsPatch(
  source: Uint8Array,
  target: Uint8Array,
  operations: Iterable<EditOperation>,
  options: BpsBuildOptions = {},
): BpsPatch {
  const actions: BpsAction[] = [];
  const runs = new Map<number, RunLocation>();
  let outputOffset = 0;
  let sourceRelative = 0;
  let targetRelative = 0;
  let readStart = -1;

  const flushRead = () => {
    if (readStart >= 0) {
      actions.push({ kind: "target-read", data: target.subarray(readStart, outputOffset) });
      readStart = -1;
    }
  };

  const targetCopy = (start: number, len: number) => {
    flushRead();
    actions.push({ kind: "target-copy", len, relativeOffset: start - targetRelative });
    targetRelative = start + len;
    outputOffset += len;
  };

  for (const op of operations) {
    switch (op.type) {
      case "literal":
        if (readStart < 0) readStart = outputOffset;
        outputOffset += op.data.length;
        break;

      case "source-copy":
        flushRead();
        if (op.start === outputOffset) {
          const last = actions[actions.length - 1];
          if (last?.kind === "source-read") {
            last.len += op.len;
          } else {
            actions.push({ kind: "source-read", len: op.len });
          }
        } else {
          actions.push({
            kind: "source-copy",
            len: op.len,
            relativeOffset: op.start - sourceRelative,
          });
          sourceRelative = op.start + op.len;
        }
        outputOffset += op.len;
        break;

      case "target-copy":
        targetCopy(op.start, op.len);
        break;

      case "run": {
        const earlier = runs.get(op.value);
        if (earlier && earlier.len >= op.len) {
          targetCopy(earlier.start, op.len);
        } else {
          const start = outputOffset;
          if (readStart < 0) readStart = outputOffset;
          outputOffset += 1;
          if (op.len > 1) {
            targetCopy(start, op.len - 1);
          }
          runs.set(op.value, { start, len: op.len });
        }
        break;
      }
    }
  }
  flushRead();

  if (outputOffset !== target.length) {
    throw new RangeError(
      `Operations cover ${outputOffset} bytes but the target has ${target.length}`,
    );
  }

  return {
    sourceSize: source.length,
    targetSize: target.length,
    metadata: options.metadata ?? new Uint8Array(0),
    actions,
    sourceChecksum: crc32(source),
    targetChecksum: crc32(target),
  };
}
