/**
 * UPS: XOR hunks, applicable in either direction.
 *
 * ```
 * "UPS1"
 * sourceSize:varint  targetSize:varint
 * hunk*   skip:varint  xor[n]  0x00
 * sourceCrc:u32le  targetCrc:u32le  patchCrc:u32le
 * ```
 *
 * `skip` counts bytes after the previous hunk's terminator. Bytes past the end
 * of the shorter image read as zero.
 */

export const UPS_MAGIC = "UPS1";

export interface UpsHunk {
  offset: number;
  /** Non-zero XOR bytes; the 0x00 terminator is implied */
  xor: Uint8Array;
}

export interface UpsPatch {
  sourceSize: number;
  targetSize: number;
  hunks: UpsHunk[];
  sourceChecksum: number;
  targetChecksum: number;
}

export interface ParsedUpsPatch extends UpsPatch {
  patchChecksum: number;
}
