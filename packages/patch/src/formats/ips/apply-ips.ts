import { recordLength, type IpsPatch } from "./types.js";

export interface IpsApplyOptions {
  /** Honour the truncation length when the patch declares one (default true) */
  truncate?: boolean;
}

/**
 * Apply IPS records to a copy of `source`.
 *
 * The output grows to cover the furthest record. IPS carries no checksums, so
 * any source is accepted.
 */
export function applyIpsPatch(
  source: Uint8Array,
  patch: IpsPatch,
  options: IpsApplyOptions = {},
): Uint8Array {
  let size = source.length;
  for (const record of patch.records) {
    size = Math.max(size, record.offset + recordLength(record));
  }

  const output = new Uint8Array(size);
  output.set(source);
  for (const record of patch.records) {
    if (record.type === "data") {
      output.set(record.data, record.offset);
    } else {
      output.fill(record.value, record.offset, record.offset + record.len);
    }
  }

  const truncate = options.truncate ?? true;
  if (truncate && patch.truncateTo !== undefined && patch.truncateTo < output.length) {
    return output.slice(0, patch.truncateTo);
  }
  return output;
}
