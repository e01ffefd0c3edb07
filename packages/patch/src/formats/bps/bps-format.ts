import {
  appendBytes,
  appendNumber,
  appendSignedNumber,
  asciiBytes,
  matchesAscii,
  readNumber,
  readSignedNumber,
  VarintError,
} from "@binpatch/utils";
import { CorruptPatchError, PatchFormatError } from "../../errors/index.js";
import { appendChecksumFooter, FOOTER_SIZE, readChecksumFooter } from "../checksum-footer.js";
import {
  BPS_MAGIC,
  BPS_SOURCE_COPY,
  BPS_SOURCE_READ,
  BPS_TARGET_COPY,
  BPS_TARGET_READ,
  type BpsAction,
  type BpsPatch,
  type ParsedBpsPatch,
} from "./types.js";

/** Magic, three one-byte varints, footer */
const MIN_PATCH_SIZE = BPS_MAGIC.length + 3 + FOOTER_SIZE;

export function serializeBpsPatch(patch: BpsPatch): Uint8Array {
  const output = asciiBytes(BPS_MAGIC);
  appendNumber(output, patch.sourceSize);
  appendNumber(output, patch.targetSize);
  appendNumber(output, patch.metadata.length);
  appendBytes(output, patch.metadata);

  for (const action of patch.actions) {
    switch (action.kind) {
      case "source-read":
        appendAction(output, BPS_SOURCE_READ, action.len);
        break;
      case "target-read":
        appendAction(output, BPS_TARGET_READ, action.data.length);
        appendBytes(output, action.data);
        break;
      case "source-copy":
        appendAction(output, BPS_SOURCE_COPY, action.len);
        appendSignedNumber(output, action.relativeOffset);
        break;
      case "target-copy":
        appendAction(output, BPS_TARGET_COPY, action.len);
        appendSignedNumber(output, action.relativeOffset);
        break;
    }
  }

  return appendChecksumFooter(output, patch.sourceChecksum, patch.targetChecksum);
}

function appendAction(output: number[], kind: number, len: number): void {
  if (len < 1) {
    throw new RangeError(`BPS action length must be positive, got ${len}`);
  }
  appendNumber(output, (len - 1) * 4 + kind);
}

export interface BpsParseOptions {
  /** Reject the patch when its own CRC does not match (default true) */
  verifyChecksum?: boolean;
}

/**
 * Read a BPS patch.
 *
 * The patch CRC is checked before the body is decoded, so damage anywhere
 * after the magic is reported as corruption rather than a format error.
 *
 * @throws PatchFormatError on bad magic, a patch too short for its header
 *   and footer, or a malformed body
 * @throws CorruptPatchError when the patch CRC does not match
 */
export function parseBpsPatch(bytes: Uint8Array, options: BpsParseOptions = {}): ParsedBpsPatch {
  if (!matchesAscii(bytes, 0, BPS_MAGIC)) {
    throw new PatchFormatError('missing "BPS1" header', "bps");
  }
  if (bytes.length < MIN_PATCH_SIZE) {
    throw new PatchFormatError(`patch is ${bytes.length} bytes, too short for header and footer`, "bps");
  }

  const footer = readChecksumFooter(bytes);
  if ((options.verifyChecksum ?? true) && footer.patchChecksum !== footer.actualPatchChecksum) {
    throw new CorruptPatchError("BPS patch checksum mismatch: the patch file is damaged");
  }

  try {
    return {
      ...readBody(bytes, bytes.length - FOOTER_SIZE),
      sourceChecksum: footer.sourceChecksum,
      targetChecksum: footer.targetChecksum,
      patchChecksum: footer.patchChecksum,
    };
  } catch (error) {
    if (error instanceof VarintError) {
      throw new PatchFormatError(error.message, "bps", { cause: error });
    }
    throw error;
  }
}

function readBody(
  bytes: Uint8Array,
  end: number,
): Omit<BpsPatch, "sourceChecksum" | "targetChecksum"> {
  let pos = BPS_MAGIC.length;
  const next = (): number => {
    if (pos >= end) {
      throw new PatchFormatError("truncated header", "bps");
    }
    const { value, bytesRead } = readNumber(bytes.subarray(0, end), pos);
    pos += bytesRead;
    return value;
  };

  const sourceSize = next();
  const targetSize = next();
  const metadataSize = next();
  if (pos + metadataSize > end) {
    throw new PatchFormatError("metadata runs past the end of the patch", "bps");
  }
  const metadata = bytes.slice(pos, pos + metadataSize);
  pos += metadataSize;

  const actions: BpsAction[] = [];
  while (pos < end) {
    const data = next();
    const kind = data % 4;
    const len = Math.floor(data / 4) + 1;

    if (kind === BPS_SOURCE_READ) {
      actions.push({ kind: "source-read", len });
    } else if (kind === BPS_TARGET_READ) {
      if (pos + len > end) {
        throw new PatchFormatError("target-read runs past the end of the patch", "bps");
      }
      actions.push({ kind: "target-read", data: bytes.slice(pos, pos + len) });
      pos += len;
    } else {
      const { value: relativeOffset, bytesRead } = readSignedNumber(bytes.subarray(0, end), pos);
      pos += bytesRead;
      actions.push({
        kind: kind === BPS_SOURCE_COPY ? "source-copy" : "target-copy",
        len,
        relativeOffset,
      });
    }
  }

  return { sourceSize, targetSize, metadata, actions };
}
