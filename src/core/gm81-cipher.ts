/**
 * GM8.1 stream cipher
 *
 * Layout at the cursor (directly after the 8.1 header marker):
 *   u32  key seed    formatted into "_MJD<seed>#RWK", hashed as UTF-16LE
 *   u32  seed1
 *   ...  (crc & 0xFF) + 10 plain bytes
 *   ...  every following full dword XORed with the keystream
 *
 * The keystream is two 16-bit multiply-with-carry generators; each step
 * yields one 32-bit mask. XOR is its own inverse, so the same routine
 * encrypts.
 */

import type { Cursor } from './cursor';
import { crc32Update } from './crc32';
import { log } from './logger';

const KEY_PREFIX = '_MJD';
const KEY_SUFFIX = '#RWK';
const PLAIN_SPAN_BASE = 10;

export interface KeystreamState {
  seed1: number;
  seed2: number;
}

/** Advance both generators and return the next 32-bit mask. */
export function nextXorMask(state: KeystreamState): number {
  state.seed1 = ((state.seed1 & 0xffff) * 0x9069 + (state.seed1 >>> 16)) >>> 0;
  state.seed2 = ((state.seed2 & 0xffff) * 0x4650 + (state.seed2 >>> 16)) >>> 0;
  return ((state.seed1 << 16) + (state.seed2 & 0xffff)) >>> 0;
}

/**
 * The hashed key text. The seed is printed as a signed decimal and every
 * character is widened to two bytes, low byte first.
 */
export function gm81KeyBytes(seed: number): Buffer {
  return Buffer.from(`${KEY_PREFIX}${seed | 0}${KEY_SUFFIX}`, 'utf16le');
}

/** The CRC register over the key bytes, without final inversion. */
export function gm81Seed2(seed: number): number {
  return crc32Update(0xffffffff, gm81KeyBytes(seed));
}

/**
 * XOR every complete dword of `data` from `start` onward with the
 * keystream. A trailing partial dword is left alone.
 */
export function applyGm81Keystream(data: Buffer, start: number, seed1: number, seed2: number): void {
  const state: KeystreamState = { seed1: seed1 >>> 0, seed2: seed2 >>> 0 };
  for (let pos = start; data.length - pos >= 4; pos += 4) {
    const word = (data.readUInt32LE(pos) ^ nextXorMask(state)) >>> 0;
    data.writeUInt32LE(word, pos);
  }
}

/**
 * Decrypt the GM8.1 layer in place. The cursor is left just after the
 * two seed words, which is where the container continues.
 */
export function decryptGm81(cursor: Cursor): void {
  const seed2 = gm81Seed2(cursor.readI32());
  const seed1 = cursor.readU32();
  const start = cursor.position + (seed2 & 0xff) + PLAIN_SPAN_BASE;

  log(`GM8.1 layer: seed1=0x${seed1.toString(16)} seed2=0x${seed2.toString(16)} from 0x${start.toString(16)}`);
  applyGm81Keystream(cursor.data, start, seed1, seed2);
}
