/**
 * Fixed-width integer fields
 *
 * IPS stores offsets and lengths big-endian; BPS and UPS footers store
 * checksums little-endian. Readers assume the caller checked bounds.
 */

export function readUint16BE(data: Uint8Array, offset: number): number {
  return (data[offset] << 8) | data[offset + 1];
}

export function readUint24BE(data: Uint8Array, offset: number): number {
  return (data[offset] << 16) | (data[offset + 1] << 8) | data[offset + 2];
}

export function readUint32LE(data: Uint8Array, offset: number): number {
  return (
    (data[offset] |
      (data[offset + 1] << 8) |
      (data[offset + 2] << 16) |
      (data[offset + 3] << 24)) >>>
    0
  );
}

export function appendUint16BE(output: number[], value: number): void {
  output.push((value >>> 8) & 0xff, value & 0xff);
}

export function appendUint24BE(output: number[], value: number): void {
  output.push((value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff);
}

export function appendUint32LE(output: number[], value: number): void {
  output.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
}

/**
 * Append every byte of a buffer to an output array
 */
export function appendBytes(output: number[], data: Uint8Array): void {
  for (let i = 0; i < data.length; i++) {
    output.push(data[i]);
  }
}

/**
 * Compare a region of a buffer against an ASCII tag
 */
export function matchesAscii(data: Uint8Array, offset: number, tag: string): boolean {
  if (offset + tag.length > data.length) {
    return false;
  }
  for (let i = 0; i < tag.length; i++) {
    if (data[offset + i] !== tag.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}

export function asciiBytes(tag: string): number[] {
  return Array.from(tag, (ch) => ch.charCodeAt(0));
}
