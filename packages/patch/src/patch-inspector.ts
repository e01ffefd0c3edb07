import { crc32, formatCrc32 } from "@binpatch/utils";
import { PatchFormatError } from "./errors/index.js";
import { readChecksumFooter } from "./formats/checksum-footer.js";
import { type BpsActionKind, parseBpsPatch } from "./formats/bps/index.js";
import { parseIpsPatch, recordLength } from "./formats/ips/index.js";
import { parseUpsPatch } from "./formats/ups/index.js";
import { detectPatchFormat, type PatchFormat } from "./patch-format.js";

/**
 * Summary of a patch file, read from its header, footer and record structure.
 */
export interface PatchMetadata {
  readonly format: PatchFormat;
  readonly patchSize: number;
  readonly sourceSize?: number;
  readonly targetSize?: number;
  readonly sourceChecksum?: number;
  readonly targetChecksum?: number;
  readonly patchChecksum?: number;
  /** False when the stored patch checksum does not match its contents */
  readonly patchChecksumValid?: boolean;
  /** IPS records, BPS actions or UPS hunks */
  readonly recordCount: number;
  readonly actionCounts?: Readonly<Record<BpsActionKind, number>>;
  /** Bytes written by IPS records or XORed by UPS hunks */
  readonly bytesChanged?: number;
  readonly truncated: boolean;
  readonly truncateTo?: number;
  /** BPS metadata decoded as UTF-8 */
  readonly metadata?: string;
}

/**
 * Describe a patch without applying it.
 *
 * A BPS or UPS patch whose own checksum is wrong is still described, with
 * `patchChecksumValid` set to false.
 *
 * @throws PatchFormatError on an unknown header or malformed structure
 */
export function inspectPatch(bytes: Uint8Array): PatchMetadata {
  const format = detectPatchFormat(bytes);
  switch (format) {
    case "ips": {
      const patch = parseIpsPatch(bytes);
      return {
        format,
        patchSize: bytes.length,
        targetSize: patch.truncateTo,
        recordCount: patch.records.length,
        bytesChanged: patch.records.reduce((sum, record) => sum + recordLength(record), 0),
        truncated: patch.truncateTo !== undefined,
        truncateTo: patch.truncateTo,
      };
    }
    case "bps": {
      const patch = parseBpsPatch(bytes, { verifyChecksum: false });
      const footer = readChecksumFooter(bytes);
      const actionCounts: Record<BpsActionKind, number> = {
        "source-read": 0,
        "target-read": 0,
        "source-copy": 0,
        "target-copy": 0,
      };
      for (const action of patch.actions) {
        actionCounts[action.kind]++;
      }
      return {
        format,
        patchSize: bytes.length,
        sourceSize: patch.sourceSize,
        targetSize: patch.targetSize,
        sourceChecksum: patch.sourceChecksum,
        targetChecksum: patch.targetChecksum,
        patchChecksum: patch.patchChecksum,
        patchChecksumValid: footer.patchChecksum === footer.actualPatchChecksum,
        recordCount: patch.actions.length,
        actionCounts,
        truncated: patch.targetSize < patch.sourceSize,
        metadata: patch.metadata.length > 0 ? new TextDecoder().decode(patch.metadata) : undefined,
      };
    }
    case "ups": {
      const patch = parseUpsPatch(bytes, { verifyChecksum: false });
      const footer = readChecksumFooter(bytes);
      return {
        format,
        patchSize: bytes.length,
        sourceSize: patch.sourceSize,
        targetSize: patch.targetSize,
        sourceChecksum: patch.sourceChecksum,
        targetChecksum: patch.targetChecksum,
        patchChecksum: patch.patchChecksum,
        patchChecksumValid: footer.patchChecksum === footer.actualPatchChecksum,
        recordCount: patch.hunks.length,
        bytesChanged: patch.hunks.reduce((sum, hunk) => sum + hunk.xor.length, 0),
        truncated: patch.targetSize < patch.sourceSize,
      };
    }
    case undefined:
      throw new PatchFormatError("Unrecognised patch format: no IPS, BPS or UPS header");
  }
}

/**
 * Whether `source` is the image a patch expects, judged by the declared size
 * and checksum. UPS accepts either side. IPS declares nothing: `undefined`.
 */
export function checkSource(metadata: PatchMetadata, source: Uint8Array): boolean | undefined {
  if (metadata.format === "ips" || metadata.sourceChecksum === undefined) {
    return undefined;
  }
  const checksum = crc32(source);
  const matchesSource = source.length === metadata.sourceSize && checksum === metadata.sourceChecksum;
  if (metadata.format === "ups") {
    return (
      matchesSource ||
      (source.length === metadata.targetSize && checksum === metadata.targetChecksum)
    );
  }
  return matchesSource;
}

/**
 * One `label: value` line per known field, in display order.
 */
export function describePatch(metadata: PatchMetadata): Array<[string, string]> {
  const lines: Array<[string, string]> = [
    ["Format", metadata.format.toUpperCase()],
    ["Patch size", `${metadata.patchSize} bytes`],
  ];
  if (metadata.sourceSize !== undefined) lines.push(["Source size", `${metadata.sourceSize} bytes`]);
  if (metadata.targetSize !== undefined) lines.push(["Target size", `${metadata.targetSize} bytes`]);
  if (metadata.sourceChecksum !== undefined) {
    lines.push(["Source CRC32", formatCrc32(metadata.sourceChecksum)]);
  }
  if (metadata.targetChecksum !== undefined) {
    lines.push(["Target CRC32", formatCrc32(metadata.targetChecksum)]);
  }
  if (metadata.patchChecksum !== undefined) {
    const status = metadata.patchChecksumValid ? "valid" : "INVALID";
    lines.push(["Patch CRC32", `${formatCrc32(metadata.patchChecksum)} (${status})`]);
  }
  const unit = metadata.format === "ips" ? "Records" : metadata.format === "bps" ? "Actions" : "Hunks";
  lines.push([unit, String(metadata.recordCount)]);
  if (metadata.actionCounts) {
    for (const [kind, count] of Object.entries(metadata.actionCounts)) {
      lines.push([`  ${kind}`, String(count)]);
    }
  }
  if (metadata.bytesChanged !== undefined) {
    lines.push(["Bytes changed", String(metadata.bytesChanged)]);
  }
  if (metadata.truncateTo !== undefined) {
    lines.push(["Truncate to", `${metadata.truncateTo} bytes`]);
  }
  if (metadata.metadata !== undefined) lines.push(["Metadata", metadata.metadata]);
  return lines;
}
