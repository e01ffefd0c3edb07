import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { runApply } from "../../src/commands/apply.js";
import { runCreate } from "../../src/commands/create.js";
import { runInspect } from "../../src/commands/inspect.js";
import { exitCodeFor } from "../../src/shared.js";

function sampleBytes(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out[i] = state >>> 24;
  }
  return out;
}

async function exitCodeOf(promise: Promise<void>): Promise<number> {
  try {
    await promise;
    return 0;
  } catch (err) {
    return exitCodeFor(err);
  }
}

describe("binpatch commands", () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let warn: MockInstance<typeof console.warn>;
  const original = sampleBytes(4096, 1);
  const modified = original.slice();
  modified.fill(0x20, 1000, 1100);
  modified.set(sampleBytes(64, 2), 3000);

  const file = (name: string) => path.join(dir, name);

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "binpatch-cli-"));
    await fs.writeFile(file("original.bin"), original);
    await fs.writeFile(file("modified.bin"), modified);
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    warn = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  for (const [name, flag] of [
    ["fix.ips", "--format=simple"],
    ["fix.bps", "--format=delta"],
    ["fix.ups", "--format=ups"],
  ]) {
    it(`should create and apply a patch with ${flag}`, async () => {
      await runCreate([file("original.bin"), file("modified.bin"), file(name), flag, "--validate"]);
      await runApply([file("original.bin"), file(name), file("out.bin")]);

      const rebuilt = new Uint8Array(await fs.readFile(file("out.bin")));
      expect(rebuilt).toEqual(modified);
      expect(log).toHaveBeenCalledWith(expect.stringContaining("Validated"));
    });
  }

  it("should store and show BPS metadata", async () => {
    await fs.writeFile(file("notes.txt"), "release: test");
    await runCreate([
      file("original.bin"),
      file("modified.bin"),
      file("fix.bps"),
      "--metadata",
      file("notes.txt"),
    ]);
    log.mockClear();
    await runInspect([file("fix.bps")]);

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => /Format\s+BPS/.test(line))).toBe(true);
    expect(lines.some((line) => /Metadata\s+release: test/.test(line))).toBe(true);
  });

  it("should list IPS records", async () => {
    await runCreate([file("original.bin"), file("modified.bin"), file("fix.ips")]);
    log.mockClear();
    await runInspect([file("fix.ips"), "--records", "1"]);

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain("  0x0003E8  RLE   100 x 0x20");
    expect(lines).toContain("  ... 1 more");
  });

  it("should warn when the output is truncated", async () => {
    await fs.writeFile(file("short.bin"), original.slice(0, 100));
    await runCreate([file("original.bin"), file("short.bin"), file("cut.ips")]);
    await runApply([file("original.bin"), file("cut.ips"), file("out.bin")]);

    expect((await fs.readFile(file("out.bin"))).length).toBe(100);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("Output truncated to 100 bytes"));
  });

  describe("Exit codes", () => {
    it("should exit 1 for a missing input file", async () => {
      const code = await exitCodeOf(
        runApply([file("missing.bin"), file("fix.bps"), file("out.bin")]),
      );
      expect(code).toBe(1);
    });

    it("should exit 2 for something that is not a patch", async () => {
      await fs.writeFile(file("junk.bin"), "definitely not a patch");
      const code = await exitCodeOf(runApply([file("original.bin"), file("junk.bin"), file("out.bin")]));
      expect(code).toBe(2);
    });

    it("should exit 4 when applied to the wrong original", async () => {
      await runCreate([file("original.bin"), file("modified.bin"), file("fix.bps")]);
      const code = await exitCodeOf(runApply([file("modified.bin"), file("fix.bps"), file("out.bin")]));
      expect(code).toBe(4);
    });

    it("should exit 5 for a damaged patch", async () => {
      await runCreate([file("original.bin"), file("modified.bin"), file("fix.bps")]);
      const bytes = new Uint8Array(await fs.readFile(file("fix.bps")));
      bytes[bytes.length >> 1] ^= 0x01;
      await fs.writeFile(file("fix.bps"), bytes);

      const code = await exitCodeOf(runApply([file("original.bin"), file("fix.bps"), file("out.bin")]));
      expect(code).toBe(5);
    });
  });
});
