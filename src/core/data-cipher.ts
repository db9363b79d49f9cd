/**
 * Asset-data substitution cipher (present in both GM8.0 and GM8.1).
 *
 * Layout at the cursor:
 *   u32  garbage1 dword count
 *   u32  garbage2 dword count
 *   ...  garbage1 * 4 bytes
 *   256  swap table (a byte permutation)
 *   ...  garbage2 * 4 bytes
 *   u32  length of the encrypted span
 *   ...  encrypted span (everything the asset categories are read from)
 */

import type { Cursor } from './cursor';
import { TruncatedInputError } from './errors';
import { log } from './logger';

export function inverseSwapTable(swapTable: Uint8Array): Uint8Array {
  const inv = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    inv[swapTable[i]] = i;
  }
  return inv;
}

/**
 * Undo both passes on `span` in place.
 *
 * Pass 1 walks backward substituting each byte through the inverse table
 * and subtracting its (still encrypted) predecessor plus its offset.
 * Pass 2 walks backward again, swapping each byte with the one
 * `swapTable[offset & 0xFF]` places earlier, never before the span start.
 */
export function unscrambleSpan(span: Uint8Array, swapTable: Uint8Array): void {
  const inv = inverseSwapTable(swapTable);
  const len = span.length;

  for (let j = len - 1; j > 0; j--) {
    span[j] = (inv[span[j]] - (span[j - 1] + j)) & 0xff;
  }

  for (let j = len - 1; j > 0; j--) {
    const k = Math.max(0, j - swapTable[j & 0xff]);
    const tmp = span[j];
    span[j] = span[k];
    span[k] = tmp;
  }
}

/**
 * Read the swap table, then decrypt the span that follows in place. The
 * cursor is left at the first decrypted byte.
 */
export function decryptDataBlock(cursor: Cursor): void {
  const garbage1 = cursor.readU32() * 4;
  const garbage2 = cursor.readU32() * 4;

  cursor.skip(garbage1);
  const swapTable = Uint8Array.from(cursor.readBytes(256));
  cursor.skip(garbage2);

  const len = cursor.readU32();
  const start = cursor.position;
  if (len > cursor.remaining) {
    throw new TruncatedInputError(start, len, cursor.length);
  }

  log(`Data layer: ${len} bytes at 0x${start.toString(16)}`);
  unscrambleSpan(cursor.data.subarray(start, start + len), swapTable);
}
