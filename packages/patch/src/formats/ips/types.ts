/**
 * IPS: offset/length records over a source image.
 *
 * ```
 * "PATCH"
 * record*   offset:u24be  len:u16be  data[len]
 *           offset:u24be  0x0000     count:u16be  value:u8   (RLE)
 * "EOF"
 * [truncate:u24be]
 * ```
 */

export const IPS_MAGIC = "PATCH";
export const IPS_EOF = "EOF";

/** Largest offset a record (or the truncation length) can express */
export const IPS_MAX_OFFSET = 0xffffff;
/** Largest payload or RLE count of a single record */
export const IPS_MAX_RECORD_LENGTH = 0xffff;
/** "EOF" read as a 24-bit offset; a record there would end the patch */
export const IPS_EOF_OFFSET = 0x454f46;

/** Shortest run encoded as an RLE record instead of data bytes */
export const DEFAULT_MIN_RLE_LENGTH = 4;

export type IpsRecord =
  | { type: "data"; offset: number; data: Uint8Array }
  | { type: "rle"; offset: number; len: number; value: number };

export interface IpsPatch {
  records: IpsRecord[];
  /** Final output length, when the target is shorter than the source */
  truncateTo?: number;
}

export function recordLength(record: IpsRecord): number {
  return record.type === "data" ? record.data.length : record.len;
}
