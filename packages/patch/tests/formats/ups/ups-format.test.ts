import { crc32 } from "@binpatch/utils";
import { describe, expect, it } from "vitest";
import {
  applyUpsPatch,
  CorruptPatchError,
  createUpsPatch,
  PatchFormatError,
  parseUpsPatch,
  serializeUpsPatch,
  SourceMismatchError,
  upsDirection,
} from "../../../src/index.js";
import { appendChecksumFooter } from "../../../src/formats/checksum-footer.js";
import { randomBytes, reviseBytes } from "../../test-data.js";

const source = new Uint8Array([1, 2, 3, 4, 5]);
const target = new Uint8Array([1, 9, 9, 4, 5, 6]);

describe("UPS patches", () => {
  describe("createUpsPatch", () => {
    it("should collect XOR hunks over the longer image", () => {
      const patch = createUpsPatch(source, target);
      expect(patch.sourceSize).toBe(5);
      expect(patch.targetSize).toBe(6);
      expect(patch.hunks).toEqual([
        { offset: 1, xor: new Uint8Array([11, 10]) },
        { offset: 5, xor: new Uint8Array([6]) },
      ]);
    });

    it("should produce no hunks for identical images", () => {
      const data = randomBytes(40);
      expect(createUpsPatch(data, data).hunks).toEqual([]);
      expect(serializeUpsPatch(createUpsPatch(data, data))).toHaveLength(4 + 1 + 1 + 12);
    });
  });

  describe("serializeUpsPatch", () => {
    it("should write relative skips and terminated hunks", () => {
      const bytes = serializeUpsPatch(createUpsPatch(source, target));
      expect(Array.from(bytes.subarray(0, 13))).toEqual([
        0x55, 0x50, 0x53, 0x31, 0x85, 0x86, 0x81, 11, 10, 0, 0x81, 6, 0,
      ]);
      expect(new DataView(bytes.buffer).getUint32(13, true)).toBe(crc32(source));
      expect(bytes).toHaveLength(25);
    });

    it("should reject out-of-order hunks", () => {
      const patch = createUpsPatch(source, target);
      patch.hunks.reverse();
      expect(() => serializeUpsPatch(patch)).toThrow(RangeError);
    });
  });

  describe("parseUpsPatch", () => {
    it("should read back what was written", () => {
      const patch = createUpsPatch(source, target);
      expect(parseUpsPatch(serializeUpsPatch(patch))).toMatchObject({
        sourceSize: 5,
        targetSize: 6,
        hunks: patch.hunks,
        sourceChecksum: crc32(source),
        targetChecksum: crc32(target),
      });
    });

    it("should report a single bit flip as corruption", () => {
      const bytes = serializeUpsPatch(createUpsPatch(source, target));
      for (let i = 4; i < bytes.length; i++) {
        const damaged = bytes.slice();
        damaged[i] ^= 0x10;
        expect(() => parseUpsPatch(damaged)).toThrow(CorruptPatchError);
      }
    });

    it("should reject a hunk without terminator", () => {
      const bytes = appendChecksumFooter([0x55, 0x50, 0x53, 0x31, 0x81, 0x81, 0x80, 5], 0, 0);
      expect(() => parseUpsPatch(bytes)).toThrow("UPS: hunk at 0 has no terminator");
    });

    it("should reject a wrong header", () => {
      expect(() => parseUpsPatch(new Uint8Array(20))).toThrow(PatchFormatError);
    });
  });

  describe("applyUpsPatch", () => {
    const patch = createUpsPatch(source, target);

    it("should patch forward", () => {
      expect(upsDirection(source, patch)).toBe("forward");
      expect(applyUpsPatch(source, patch)).toEqual(target);
    });

    it("should patch the target back into the source", () => {
      expect(upsDirection(target, patch)).toBe("reverse");
      expect(applyUpsPatch(target, patch)).toEqual(source);
    });

    it("should reject an image matching neither side", () => {
      const other = new Uint8Array([1, 2, 3, 4, 6]);
      expect(upsDirection(other, patch)).toBeUndefined();
      expect(() => applyUpsPatch(other, patch)).toThrow(SourceMismatchError);
    });

    it("should reject output failing its checksum", () => {
      const damaged = { ...patch, targetChecksum: patch.targetChecksum ^ 1 };
      expect(() => applyUpsPatch(source, damaged)).toThrow(CorruptPatchError);
    });

    it("should round-trip a revised buffer both ways", () => {
      const original = randomBytes(1200, 8);
      const revised = reviseBytes(original);
      const parsed = parseUpsPatch(serializeUpsPatch(createUpsPatch(original, revised)));
      expect(applyUpsPatch(original, parsed)).toEqual(revised);
      expect(applyUpsPatch(revised, parsed)).toEqual(original);
    });
  });
});
