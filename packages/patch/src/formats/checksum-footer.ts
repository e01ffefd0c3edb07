import { appendUint32LE, crc32, readUint32LE } from "@binpatch/utils";

/** Source CRC, target CRC, patch CRC */
export const FOOTER_SIZE = 12;

export interface ChecksumFooter {
  sourceChecksum: number;
  targetChecksum: number;
  /** Patch CRC as stored in the file */
  patchChecksum: number;
  /** Patch CRC recomputed over every byte before it */
  actualPatchChecksum: number;
}

/**
 * Read the footer shared by BPS and UPS. The caller checks that `bytes`
 * holds at least FOOTER_SIZE bytes.
 */
export function readChecksumFooter(bytes: Uint8Array): ChecksumFooter {
  const end = bytes.length;
  return {
    sourceChecksum: readUint32LE(bytes, end - 12),
    targetChecksum: readUint32LE(bytes, end - 8),
    patchChecksum: readUint32LE(bytes, end - 4),
    actualPatchChecksum: crc32(bytes.subarray(0, end - 4)),
  };
}

/**
 * Append source and target checksums and return the finished patch, ending
 * with the CRC of everything before it.
 */
export function appendChecksumFooter(
  output: number[],
  sourceChecksum: number,
  targetChecksum: number,
): Uint8Array {
  appendUint32LE(output, sourceChecksum);
  appendUint32LE(output, targetChecksum);
  const body = new Uint8Array(output.length + 4);
  body.set(output);
  const patchChecksum = crc32(body.subarray(0, output.length));
  const view = new DataView(body.buffer);
  view.setUint32(output.length, patchChecksum, true);
  return body;
}
