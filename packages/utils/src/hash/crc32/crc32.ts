/**
 * CRC-32 checksum
 *
 * The reflected IEEE CRC (polynomial 0xEDB88320) shared by ZIP, PNG and the
 * IPS/UPS/BPS patch formats. Patch footers store these values, so the result
 * must match other implementations bit for bit.
 */

/**
 * Lookup table for the reflected polynomial. Built once, never written again.
 */
const CRC32_TABLE = makeCrc32Table();

function makeCrc32Table(): Uint32Array {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i;
    for (let j = 0; j < 8; j++) {
      crc = crc & 1 ? 0xedb88320 ^ (crc >>> 1) : crc >>> 1;
    }
    table[i] = crc;
  }
  return table;
}

function updateCrc(crc: number, data: Uint8Array): number {
  for (let i = 0; i < data.length; i++) {
    crc = CRC32_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return crc;
}

/**
 * Compute the CRC-32 of a buffer
 *
 * @returns Unsigned 32-bit checksum
 */
export function crc32(data: Uint8Array): number {
  return (updateCrc(0xffffffff, data) ^ 0xffffffff) >>> 0;
}

/**
 * Format a checksum the way patch tools print them: 8 upper-case hex digits.
 */
export function formatCrc32(value: number): string {
  return (value >>> 0).toString(16).toUpperCase().padStart(8, "0");
}
