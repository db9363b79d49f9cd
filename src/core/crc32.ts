/**
 * CRC-32 (polynomial 0x04C11DB7, reflected).
 *
 * The table is built the long way round: reflect the index, run the
 * polynomial MSB-first, reflect the result. That is how the GM8.1 packer
 * builds it and it yields the standard reflected table.
 */

const POLYNOMIAL = 0x04c11db7;

let table: Uint32Array | null = null;

function reflect(value: number, bits: number): number {
  let out = 0;
  for (let i = 1; i <= bits; i++) {
    if (value & 1) out |= 1 << (bits - i);
    value >>>= 1;
  }
  return out >>> 0;
}

export function crc32Table(): Uint32Array {
  if (table) return table;
  const t = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let c = (reflect(i, 8) << 24) >>> 0;
    for (let j = 0; j < 8; j++) {
      c = ((c << 1) ^ (c & 0x80000000 ? POLYNOMIAL : 0)) >>> 0;
    }
    t[i] = reflect(c, 32);
  }
  table = t;
  return t;
}

/**
 * Feed bytes through the CRC register without the final inversion.
 * Start from 0xFFFFFFFF.
 */
export function crc32Update(crc: number, bytes: Uint8Array): number {
  const t = crc32Table();
  let r = crc >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    r = (r >>> 8) ^ t[(r ^ bytes[i]) & 0xff];
  }
  return r >>> 0;
}

/** Standard CRC-32 (check value of "123456789" is 0xCBF43926). */
export function crc32(bytes: Uint8Array): number {
  return (crc32Update(0xffffffff, bytes) ^ 0xffffffff) >>> 0;
}
