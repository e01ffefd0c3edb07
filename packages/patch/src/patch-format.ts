import { matchesAscii } from "@binpatch/utils";
import { BPS_MAGIC } from "./formats/bps/types.js";
import { IPS_MAGIC } from "./formats/ips/types.js";
import { UPS_MAGIC } from "./formats/ups/types.js";

export type PatchFormat = "ips" | "bps" | "ups";

export const PATCH_FORMATS: readonly PatchFormat[] = ["ips", "bps", "ups"];

/**
 * Identify a patch by its leading magic bytes.
 */
export function detectPatchFormat(bytes: Uint8Array): PatchFormat | undefined {
  if (matchesAscii(bytes, 0, IPS_MAGIC)) return "ips";
  if (matchesAscii(bytes, 0, BPS_MAGIC)) return "bps";
  if (matchesAscii(bytes, 0, UPS_MAGIC)) return "ups";
  return undefined;
}
