import {
  appendBytes,
  appendUint16BE,
  appendUint24BE,
  asciiBytes,
  matchesAscii,
  readUint16BE,
  readUint24BE,
} from "@binpatch/utils";
import { PatchFormatError } from "../../errors/index.js";
import { checkCapacity } from "./ips-builder.js";
import {
  IPS_EOF,
  IPS_EOF_OFFSET,
  IPS_MAGIC,
  IPS_MAX_RECORD_LENGTH,
  type IpsPatch,
  type IpsRecord,
} from "./types.js";

/**
 * Write an IPS patch to bytes.
 *
 * @throws CapacityExceededError when an offset does not fit in 24 bits
 * @throws PatchFormatError when a record is empty, too long or starts at the
 *   offset that reads as "EOF"
 */
export function serializeIpsPatch(patch: IpsPatch): Uint8Array {
  checkCapacity(patch);
  const output = asciiBytes(IPS_MAGIC);

  for (const record of patch.records) {
    if (record.offset === IPS_EOF_OFFSET) {
      throw new PatchFormatError("record offset 0x454F46 would read as EOF", "ips");
    }
    appendUint24BE(output, record.offset);
    if (record.type === "data") {
      checkRecordLength(record.data.length);
      appendUint16BE(output, record.data.length);
      appendBytes(output, record.data);
    } else {
      checkRecordLength(record.len);
      appendUint16BE(output, 0);
      appendUint16BE(output, record.len);
      output.push(record.value & 0xff);
    }
  }

  output.push(...asciiBytes(IPS_EOF));
  if (patch.truncateTo !== undefined) {
    appendUint24BE(output, patch.truncateTo);
  }
  return new Uint8Array(output);
}

function checkRecordLength(len: number): void {
  if (len < 1 || len > IPS_MAX_RECORD_LENGTH) {
    throw new PatchFormatError(`record length ${len} outside 1..65535`, "ips");
  }
}

/**
 * Read IPS records.
 *
 * @throws PatchFormatError on bad magic, a truncated record or a missing "EOF"
 */
export function parseIpsPatch(bytes: Uint8Array): IpsPatch {
  if (!matchesAscii(bytes, 0, IPS_MAGIC)) {
    throw new PatchFormatError('missing "PATCH" header', "ips");
  }

  const records: IpsRecord[] = [];
  let pos = IPS_MAGIC.length;

  while (true) {
    if (matchesAscii(bytes, pos, IPS_EOF)) {
      pos += IPS_EOF.length;
      break;
    }
    if (pos + 5 > bytes.length) {
      throw new PatchFormatError(
        pos >= bytes.length ? 'missing "EOF" marker' : `truncated record header at byte ${pos}`,
        "ips",
      );
    }
    const offset = readUint24BE(bytes, pos);
    const len = readUint16BE(bytes, pos + 3);
    pos += 5;

    if (len === 0) {
      if (pos + 3 > bytes.length) {
        throw new PatchFormatError(`truncated RLE record at offset 0x${hex(offset)}`, "ips");
      }
      records.push({ type: "rle", offset, len: readUint16BE(bytes, pos), value: bytes[pos + 2] });
      pos += 3;
    } else {
      if (pos + len > bytes.length) {
        throw new PatchFormatError(`truncated data record at offset 0x${hex(offset)}`, "ips");
      }
      records.push({ type: "data", offset, data: bytes.slice(pos, pos + len) });
      pos += len;
    }
  }

  const patch: IpsPatch = { records };
  if (bytes.length - pos >= 3) {
    patch.truncateTo = readUint24BE(bytes, pos);
  }
  return patch;
}

function hex(value: number): string {
  return value.toString(16).toUpperCase().padStart(6, "0");
}
