/**
 * One step in reconstructing a target buffer.
 *
 * Operations come in ascending target order and are contiguous: each one
 * produces the bytes immediately after the previous one. Copy operations do not
 * repeat their target position; it is the running total of earlier lengths.
 */
export type EditOperation =
  | {
      type: "literal";
      /** Target position of the first byte */
      offset: number;
      /** Target bytes (a view into the target buffer) */
      data: Uint8Array;
    }
  | {
      type: "run";
      offset: number;
      /** Repeated byte value */
      value: number;
      len: number;
    }
  | {
      /** Bytes equal to source[start, start + len) */
      type: "source-copy";
      start: number;
      len: number;
    }
  | {
      /** Bytes equal to earlier target bytes; the regions may overlap */
      type: "target-copy";
      start: number;
      len: number;
    };

export function operationLength(op: EditOperation): number {
  return op.type === "literal" ? op.data.length : op.len;
}
