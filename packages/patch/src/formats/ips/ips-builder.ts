import type { EditOperation } from "../../diff/types.js";
import { CapacityExceededError } from "../../errors/index.js";
import {
  DEFAULT_MIN_RLE_LENGTH,
  IPS_EOF_OFFSET,
  IPS_MAX_OFFSET,
  IPS_MAX_RECORD_LENGTH,
  type IpsPatch,
  type IpsRecord,
} from "./types.js";

export interface IpsBuildOptions {
  /** Length of the source image; a longer source gets a truncation length */
  sourceSize?: number;
  /** Shortest run worth an RLE record */
  minRleLength?: number;
}

/**
 * Turn edit operations into IPS records.
 *
 * IPS cannot reference other positions, so copies from anywhere but the same
 * offset become data bytes. Unchanged bytes in place produce no record.
 *
 * @throws CapacityExceededError when a record offset or the truncation length
 *   does not fit in 24 bits
 */
export function buildIpsPatch(
  target: Uint8Array,
  operations: Iterable<EditOperation>,
  options: IpsBuildOptions = {},
): IpsPatch {
  const minRleLength = options.minRleLength ?? DEFAULT_MIN_RLE_LENGTH;
  if (!Number.isInteger(minRleLength) || minRleLength < 1) {
    throw new RangeError(`minRleLength must be a positive integer, got ${minRleLength}`);
  }

  const records: IpsRecord[] = [];
  let position = 0;
  let dataStart = -1;

  const flushData = () => {
    if (dataStart < 0) return;
    for (let offset = dataStart; offset < position; offset += IPS_MAX_RECORD_LENGTH) {
      const end = Math.min(offset + IPS_MAX_RECORD_LENGTH, position);
      records.push({ type: "data", offset, data: target.subarray(offset, end) });
    }
    dataStart = -1;
  };

  for (const op of operations) {
    if (op.type === "source-copy" && op.start === position) {
      flushData();
      position += op.len;
    } else if (op.type === "run" && op.len >= minRleLength) {
      flushData();
      for (let done = 0; done < op.len; done += IPS_MAX_RECORD_LENGTH) {
        const len = Math.min(IPS_MAX_RECORD_LENGTH, op.len - done);
        records.push({ type: "rle", offset: position + done, len, value: op.value });
      }
      position += op.len;
    } else {
      if (dataStart < 0) {
        dataStart = position;
      }
      position += op.type === "literal" ? op.data.length : op.len;
    }
  }
  flushData();

  if (position !== target.length) {
    throw new RangeError(
      `Operations cover ${position} bytes but the target has ${target.length}`,
    );
  }

  const patch: IpsPatch = { records: avoidEofOffset(target, records) };
  if (options.sourceSize !== undefined && options.sourceSize > target.length) {
    patch.truncateTo = target.length;
  }
  checkCapacity(patch);
  return patch;
}

/**
 * Rewrite a record starting at 0x454F46 to start one byte earlier.
 */
function avoidEofOffset(target: Uint8Array, records: IpsRecord[]): IpsRecord[] {
  const index = records.findIndex((record) => record.offset === IPS_EOF_OFFSET);
  if (index < 0) {
    return records;
  }
  const record = records[index];
  const start = IPS_EOF_OFFSET - 1;
  const replacement: IpsRecord[] = [];

  if (record.type === "data") {
    const end = IPS_EOF_OFFSET + record.data.length;
    replacement.push({
      type: "data",
      offset: start,
      data: target.subarray(start, Math.min(end, start + IPS_MAX_RECORD_LENGTH)),
    });
    if (end - start > IPS_MAX_RECORD_LENGTH) {
      replacement.push({
        type: "data",
        offset: start + IPS_MAX_RECORD_LENGTH,
        data: target.subarray(start + IPS_MAX_RECORD_LENGTH, end),
      });
    }
  } else {
    replacement.push({ type: "data", offset: start, data: target.subarray(start, start + 2) });
    if (record.len > 1) {
      replacement.push({
        type: "rle",
        offset: IPS_EOF_OFFSET + 1,
        len: record.len - 1,
        value: record.value,
      });
    }
  }

  return [...records.slice(0, index), ...replacement, ...records.slice(index + 1)];
}

/**
 * @throws CapacityExceededError
 */
export function checkCapacity(patch: IpsPatch): void {
  for (const record of patch.records) {
    if (record.offset > IPS_MAX_OFFSET) {
      throw new CapacityExceededError("IPS record offset", record.offset, IPS_MAX_OFFSET);
    }
  }
  if (patch.truncateTo !== undefined && patch.truncateTo > IPS_MAX_OFFSET) {
    throw new CapacityExceededError("IPS truncation length", patch.truncateTo, IPS_MAX_OFFSET);
  }
}
