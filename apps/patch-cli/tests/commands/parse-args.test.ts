import { describe, expect, it } from "vitest";
import { parseApplyArgs } from "../../src/commands/apply.js";
import { formatFromPath, parseCreateArgs } from "../../src/commands/create.js";
import { formatRecord, parseInspectArgs } from "../../src/commands/inspect.js";

describe("parseCreateArgs", () => {
  it("should map format names to patch formats", () => {
    expect(parseCreateArgs(["a", "b", "p", "--format=simple"]).format).toBe("ips");
    expect(parseCreateArgs(["a", "b", "p", "--format", "delta"]).format).toBe("bps");
    expect(parseCreateArgs(["a", "b", "p", "--format=UPS"]).format).toBe("ups");
  });

  it("should infer the format from the patch extension", () => {
    expect(formatFromPath("out/fix.ips")).toBe("ips");
    expect(formatFromPath("fix.UPS")).toBe("ups");
    expect(formatFromPath("fix.patch")).toBeUndefined();
    expect(parseCreateArgs(["a", "b", "fix.ips"]).format).toBe("ips");
    expect(parseCreateArgs(["a", "b", "fix.patch"]).format).toBe("bps");
  });

  it("should collect differ options and flags", () => {
    expect(
      parseCreateArgs(["a", "b", "p.bps", "--window", "256", "--min-match=6", "--validate", "--metadata", "m.txt"]),
    ).toEqual({
      original: "a",
      modified: "b",
      patch: "p.bps",
      format: "bps",
      metadataFile: "m.txt",
      differ: { searchWindow: 256, minMatch: 6 },
      validate: true,
    });
  });

  it("should reject bad usage", () => {
    expect(() => parseCreateArgs(["a", "b"])).toThrow("create expects <original> <modified> <patch>");
    expect(() => parseCreateArgs(["a", "b", "p", "--format=xdelta"])).toThrow(
      "unknown format 'xdelta' (expected simple, delta or ups)",
    );
  });
});

describe("parseApplyArgs", () => {
  it("should read positionals and the truncation flag", () => {
    expect(parseApplyArgs(["a", "p", "o"])).toEqual({ original: "a", patch: "p", output: "o", truncate: true });
    expect(parseApplyArgs(["a", "p", "o", "--no-truncate"]).truncate).toBe(false);
    expect(() => parseApplyArgs(["a", "p"])).toThrow("apply expects <original> <patch> <output>");
  });
});

describe("parseInspectArgs", () => {
  it("should default to 20 records", () => {
    expect(parseInspectArgs(["p.ips"])).toEqual({ patch: "p.ips", records: 20 });
    expect(parseInspectArgs(["p.ips", "--records", "3"]).records).toBe(3);
  });
});

describe("formatRecord", () => {
  it("should describe data and RLE records", () => {
    expect(formatRecord({ type: "rle", offset: 50, len: 10, value: 0xff })).toBe("0x000032  RLE   10 x 0xFF");
    expect(formatRecord({ type: "data", offset: 0x454f45, data: new Uint8Array(2) })).toBe(
      "0x454F45  DATA  2 bytes",
    );
  });
});
