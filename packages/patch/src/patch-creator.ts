import { errSingle, ok, type Result } from "@binpatch/utils";
import { type DifferOptions, diffBinary } from "./diff/index.js";
import { isPatchError, type PatchError } from "./errors/index.js";
import { buildBpsPatch, serializeBpsPatch } from "./formats/bps/index.js";
import { buildIpsPatch, type IpsBuildOptions, serializeIpsPatch } from "./formats/ips/index.js";
import { createUpsPatch, serializeUpsPatch } from "./formats/ups/index.js";
import type { PatchFormat } from "./patch-format.js";

export interface CreateOptions {
  format: PatchFormat;
  /** Embedded in BPS patches only */
  metadata?: Uint8Array;
  /** Match search settings (IPS and BPS) */
  differ?: DifferOptions;
  /** IPS RLE threshold */
  minRleLength?: IpsBuildOptions["minRleLength"];
}

/**
 * Encode the difference between two buffers as patch bytes.
 */
export function createPatch(
  source: Uint8Array,
  target: Uint8Array,
  options: CreateOptions,
): Result<Uint8Array, PatchError> {
  const warnings: string[] = [];
  if (options.metadata && options.format !== "bps") {
    warnings.push(`${options.format.toUpperCase()} patches carry no metadata; it was not stored`);
  }

  try {
    switch (options.format) {
      case "ips": {
        const patch = buildIpsPatch(target, diffBinary(source, target, options.differ), {
          sourceSize: source.length,
          minRleLength: options.minRleLength,
        });
        return ok(serializeIpsPatch(patch), warnings);
      }
      case "bps": {
        const operations = diffBinary(source, target, options.differ);
        const patch = buildBpsPatch(source, target, operations, { metadata: options.metadata });
        return ok(serializeBpsPatch(patch), warnings);
      }
      case "ups":
        return ok(serializeUpsPatch(createUpsPatch(source, target)), warnings);
    }
  } catch (error) {
    if (isPatchError(error)) {
      return errSingle(error, warnings);
    }
    throw error;
  }
}
