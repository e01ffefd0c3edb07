import { crc32 } from "@binpatch/utils";
import { describe, expect, it } from "vitest";
import {
  checkSource,
  createPatch,
  describePatch,
  inspectPatch,
  type PatchFormat,
  PatchFormatError,
} from "../src/index.js";
import { ascii, randomBytes } from "./test-data.js";

function patchFor(source: Uint8Array, target: Uint8Array, format: PatchFormat, metadata?: string) {
  const result = createPatch(source, target, {
    format,
    metadata: metadata === undefined ? undefined : ascii(metadata),
  });
  if (!result.success) {
    throw result.errors[0];
  }
  return result.value;
}

const source = new Uint8Array(100);
const target = new Uint8Array(100);
target.fill(0xff, 50, 60);

describe("inspectPatch", () => {
  it("should describe an IPS patch", () => {
    const bytes = patchFor(source, target, "ips");
    expect(inspectPatch(bytes)).toEqual({
      format: "ips",
      patchSize: 16,
      recordCount: 1,
      bytesChanged: 10,
      truncated: false,
    });
  });

  it("should report IPS truncation", () => {
    const original = randomBytes(10);
    const metadata = inspectPatch(patchFor(original, original.slice(0, 6), "ips"));
    expect(metadata.truncated).toBe(true);
    expect(metadata.truncateTo).toBe(6);
    expect(metadata.targetSize).toBe(6);
    expect(describePatch(metadata)).toEqual([
      ["Format", "IPS"],
      ["Patch size", "11 bytes"],
      ["Target size", "6 bytes"],
      ["Records", "0"],
      ["Bytes changed", "0"],
      ["Truncate to", "6 bytes"],
    ]);
  });

  it("should describe a BPS patch", () => {
    const bytes = patchFor(source, target, "bps", "author: test");
    const metadata = inspectPatch(bytes);
    expect(metadata).toMatchObject({
      format: "bps",
      patchSize: bytes.length,
      sourceSize: 100,
      targetSize: 100,
      sourceChecksum: crc32(source),
      targetChecksum: crc32(target),
      patchChecksumValid: true,
      recordCount: 4,
      actionCounts: {
        "source-read": 2,
        "target-read": 1,
        "source-copy": 0,
        "target-copy": 1,
      },
      truncated: false,
      metadata: "author: test",
    });
  });

  it("should flag a damaged checksum instead of throwing", () => {
    const bytes = patchFor(source, target, "bps");
    bytes[bytes.length - 1] ^= 0xff;
    const metadata = inspectPatch(bytes);
    expect(metadata.patchChecksumValid).toBe(false);
    expect(metadata.recordCount).toBe(4);
    expect(describePatch(metadata)).toContainEqual([
      "Patch CRC32",
      `${(metadata.patchChecksum ?? 0).toString(16).toUpperCase().padStart(8, "0")} (INVALID)`,
    ]);
  });

  it("should describe a UPS patch", () => {
    const shorter = target.slice(0, 80);
    const metadata = inspectPatch(patchFor(source, shorter, "ups"));
    expect(metadata).toMatchObject({
      format: "ups",
      sourceSize: 100,
      targetSize: 80,
      recordCount: 1,
      bytesChanged: 10,
      truncated: true,
      patchChecksumValid: true,
    });
  });

  it("should reject unknown data", () => {
    expect(() => inspectPatch(ascii("garbage"))).toThrow(PatchFormatError);
  });
});

describe("checkSource", () => {
  it("should match the BPS source only", () => {
    const metadata = inspectPatch(patchFor(source, target, "bps"));
    expect(checkSource(metadata, source)).toBe(true);
    expect(checkSource(metadata, target)).toBe(false);
  });

  it("should accept either side of a UPS patch", () => {
    const metadata = inspectPatch(patchFor(source, target, "ups"));
    expect(checkSource(metadata, source)).toBe(true);
    expect(checkSource(metadata, target)).toBe(true);
    expect(checkSource(metadata, new Uint8Array(100).fill(3))).toBe(false);
  });

  it("should have no opinion about IPS", () => {
    expect(checkSource(inspectPatch(patchFor(source, target, "ips")), source)).toBeUndefined();
  });
});
