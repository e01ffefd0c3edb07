import { describe, expect, it } from "vitest";
import { crc32, formatCrc32 } from "../../../src/hash/crc32/index.js";

const encoder = new TextEncoder();

describe("crc32", () => {
  describe("crc32 function", () => {
    it("returns 0 for empty data", () => {
      expect(crc32(new Uint8Array([]))).toBe(0);
    });

    it("matches the standard check value", () => {
      expect(crc32(encoder.encode("123456789"))).toBe(0xcbf43926);
    });

    it("matches known values for text", () => {
      expect(crc32(encoder.encode("hello"))).toBe(0x3610a686);
      expect(crc32(encoder.encode("The quick brown fox jumps over the lazy dog"))).toBe(0x414fa339);
    });

    it("produces unsigned 32-bit integers", () => {
      const result = crc32(new Uint8Array([0xff, 0xff, 0xff, 0xff]));
      expect(result).toBeGreaterThanOrEqual(0);
      expect(result).toBeLessThanOrEqual(0xffffffff);
    });

    it("changes when a single bit flips", () => {
      const data = encoder.encode("binary image");
      const flipped = new Uint8Array(data);
      flipped[3] ^= 0x10;
      expect(crc32(flipped)).not.toBe(crc32(data));
    });
  });

  describe("formatCrc32", () => {
    it("pads to eight upper-case digits", () => {
      expect(formatCrc32(0xcbf43926)).toBe("CBF43926");
      expect(formatCrc32(0x1f)).toBe("0000001F");
    });
  });
});
