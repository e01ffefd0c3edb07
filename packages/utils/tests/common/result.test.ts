import { describe, expect, it } from "vitest";
import { errSingle, ok, unwrap } from "../../src/common/result.js";

describe("Result", () => {
  it("wraps success values with warnings", () => {
    const result = ok(42, ["note"]);
    expect(result.success).toBe(true);
    expect(result.warnings).toEqual(["note"]);
    expect(unwrap(result)).toBe(42);
  });

  it("rethrows the original error when unwrapping a failure", () => {
    class CustomError extends Error {}
    const error = new CustomError("boom");
    const result = errSingle(error);
    expect(result.success).toBe(false);
    expect(result.errors).toEqual([error]);
    expect(() => unwrap(result)).toThrow(error);
  });

  it("describes non-Error failures", () => {
    const result = errSingle("plain failure");
    expect(() => unwrap(result)).toThrow("Unwrap failed: plain failure");
  });
});
