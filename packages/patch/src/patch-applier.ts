import { errSingle, ok, type Result } from "@binpatch/utils";
import { isPatchError, type PatchError, PatchFormatError } from "./errors/index.js";
import { applyBpsPatch, parseBpsPatch } from "./formats/bps/index.js";
import { applyIpsPatch, parseIpsPatch } from "./formats/ips/index.js";
import { applyUpsPatch, parseUpsPatch } from "./formats/ups/index.js";
import { detectPatchFormat } from "./patch-format.js";

export interface ApplyOptions {
  /** Honour IPS truncation markers (default true) */
  truncate?: boolean;
}

/**
 * Reconstruct a target from `source` and a patch in any supported format.
 *
 * Patch errors come back as failures; anything else is a bug and is thrown.
 */
export function applyPatch(
  source: Uint8Array,
  patchBytes: Uint8Array,
  options: ApplyOptions = {},
): Result<Uint8Array, PatchError> {
  try {
    const format = detectPatchFormat(patchBytes);
    switch (format) {
      case "ips": {
        const truncate = options.truncate ?? true;
        const patch = parseIpsPatch(patchBytes);
        const output = applyIpsPatch(source, patch, { truncate });
        const warnings: string[] = [];
        if (patch.truncateTo !== undefined) {
          warnings.push(
            truncate
              ? `Output truncated to ${output.length} bytes`
              : `Ignored truncation to ${patch.truncateTo} bytes`,
          );
        }
        return ok(output, warnings);
      }
      case "bps":
        return ok(applyBpsPatch(source, parseBpsPatch(patchBytes)));
      case "ups":
        return ok(applyUpsPatch(source, parseUpsPatch(patchBytes)));
      case undefined:
        throw new PatchFormatError("Unrecognised patch format: no IPS, BPS or UPS header");
    }
  } catch (error) {
    if (isPatchError(error)) {
      return errSingle(error);
    }
    throw error;
  }
}
