import { CorruptPatchError } from "../errors/index.js";

/**
 * Allocate the output image a patch header declares.
 *
 * @throws CorruptPatchError when the runtime refuses a buffer of that size
 */
export function allocateOutput(size: number, format: string): Uint8Array {
  try {
    return new Uint8Array(size);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new CorruptPatchError(`${format} output of ${size} bytes cannot be allocated`, {
        cause: error,
      });
    }
    throw error;
  }
}
