/**
 * BPS: action stream over a source image with checksummed header and footer.
 *
 * ```
 * "BPS1"
 * sourceSize:varint  targetSize:varint  metadataSize:varint  metadata[metadataSize]
 * action*   ((len - 1) << 2 | kind):varint  [data[len] | offset:signed varint]
 * sourceCrc:u32le  targetCrc:u32le  patchCrc:u32le
 * ```
 */

export const BPS_MAGIC = "BPS1";

export const BPS_SOURCE_READ = 0;
export const BPS_TARGET_READ = 1;
export const BPS_SOURCE_COPY = 2;
export const BPS_TARGET_COPY = 3;

export type BpsAction =
  /** Copy source bytes at the current output position */
  | { kind: "source-read"; len: number }
  /** Bytes stored in the patch */
  | { kind: "target-read"; data: Uint8Array }
  /** Move the source cursor by `relativeOffset`, then copy from it */
  | { kind: "source-copy"; len: number; relativeOffset: number }
  /** Move the target cursor by `relativeOffset`, then copy already written output */
  | { kind: "target-copy"; len: number; relativeOffset: number };

export type BpsActionKind = BpsAction["kind"];

export interface BpsPatch {
  sourceSize: number;
  targetSize: number;
  metadata: Uint8Array;
  actions: BpsAction[];
  sourceChecksum: number;
  targetChecksum: number;
}

export interface ParsedBpsPatch extends BpsPatch {
  patchChecksum: number;
}

export function actionLength(action: BpsAction): number {
  return action.kind === "target-read" ? action.data.length : action.len;
}
