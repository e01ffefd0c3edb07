/**
 * Variable-length integer encoding used by the BPS and UPS patch formats
 *
 * - Each byte carries 7 data bits, least significant group first
 * - The high bit (0x80) marks the FINAL byte of a number
 * - Every continuation subtracts one from the remaining value, so each
 *   number has exactly one encoding (no redundant zero groups)
 *
 * Signed values put the sign in bit 0 and the magnitude in the remaining bits.
 *
 * Values are JavaScript numbers and may use the full safe-integer range;
 * arithmetic avoids 32-bit bitwise operators for that reason.
 */

/**
 * Thrown when a buffer does not hold a well-formed number.
 */
export class VarintError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VarintError";
  }
}

/**
 * Result of reading a varint
 */
export interface VarintResult {
  /** The decoded value */
  value: number;
  /** Number of bytes consumed */
  bytesRead: number;
}

function assertEncodable(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Cannot encode ${value} as an unsigned varint`);
  }
}

/**
 * Append an unsigned number to an output array
 *
 * @param output Array to append to
 * @param value Non-negative safe integer
 */
export function appendNumber(output: number[], value: number): void {
  assertEncodable(value);
  let remaining = value;
  while (true) {
    const bits = remaining % 0x80;
    remaining = Math.floor(remaining / 0x80);
    if (remaining === 0) {
      output.push(bits | 0x80);
      return;
    }
    output.push(bits);
    remaining--;
  }
}

/**
 * Read an unsigned number
 *
 * @param data Buffer to read from
 * @param offset Starting offset
 * @returns Decoded value and bytes consumed
 */
export function readNumber(data: Uint8Array, offset: number): VarintResult {
  let value = 0;
  let shift = 1;
  let pos = offset;

  while (true) {
    if (pos >= data.length) {
      throw new VarintError("Truncated varint");
    }
    const b = data[pos++];
    value += (b & 0x7f) * shift;
    if ((b & 0x80) !== 0) {
      break;
    }
    shift *= 0x80;
    value += shift;
    if (shift > Number.MAX_SAFE_INTEGER) {
      throw new VarintError("Varint too long");
    }
  }

  if (!Number.isSafeInteger(value)) {
    throw new VarintError("Varint too long");
  }
  return { value, bytesRead: pos - offset };
}

/**
 * Append a signed number (sign in bit 0)
 */
export function appendSignedNumber(output: number[], value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Cannot encode ${value} as a signed varint`);
  }
  appendNumber(output, Math.abs(value) * 2 + (value < 0 ? 1 : 0));
}

/**
 * Read a signed number written by appendSignedNumber()
 */
export function readSignedNumber(data: Uint8Array, offset: number): VarintResult {
  const { value: raw, bytesRead } = readNumber(data, offset);
  const magnitude = Math.floor(raw / 2);
  const negative = raw % 2 === 1;
  return { value: negative && magnitude !== 0 ? -magnitude : magnitude, bytesRead };
}
