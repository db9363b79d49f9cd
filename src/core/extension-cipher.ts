/**
 * Extension payload descrambler.
 *
 * Each extension's embedded files sit in one payload that starts with a
 * signed 32-bit seed. The seed drives 10000 adjacent swaps over a byte
 * table; the upper half of the table is the inverse mapping used to
 * decrypt. The first byte after the seed is stored in the clear.
 */

import type { Cursor } from './cursor';
import { FormatError } from './errors';
import { warn } from './logger';

const TABLE_SIZE = 0x200;
const SWAP_STEPS = 10000;

export interface ExtensionSeeds {
  seed1: number;
  seed2: number;
  /** True when one +100 correction was not enough to make both seeds non-negative. */
  anomalous: boolean;
}

export function extensionSeeds(seed: number): ExtensionSeeds {
  let seed2 = (seed % 250) + 6;
  let seed1 = (seed / 250) | 0;
  if (seed1 < 0) seed1 += 100;
  if (seed2 < 0) seed2 += 100;
  return { seed1, seed2, anomalous: seed1 < 0 || seed2 < 0 };
}

/**
 * Build the 512-entry table. Entries [1..256] hold the scrambled
 * permutation; entries [256..511] map an encrypted byte back to plain.
 * Index arithmetic is unsigned 32-bit, as the packer computes it.
 */
export function buildExtensionTable(seed1: number, seed2: number): Uint8Array {
  const table = new Uint8Array(TABLE_SIZE);
  for (let i = 0; i < TABLE_SIZE; i++) table[i] = i;

  for (let i = 1; i <= SWAP_STEPS; i++) {
    const at = (((Math.imul(i, seed2) + seed1) >>> 0) % 254) + 1;
    const tmp = table[at];
    table[at] = table[at + 1];
    table[at + 1] = tmp;
  }

  for (let i = 0; i < 256; i++) {
    table[table[i + 1] + 0x100] = i + 1;
  }
  return table;
}

/**
 * Read the payload seed at the cursor and decrypt the rest of the payload
 * (up to `end`) in place. The cursor is left just after the seed, at the
 * first file block.
 */
export function decryptExtensionPayload(cursor: Cursor, end: number, strictSeeds: boolean): void {
  const seedAt = cursor.position;
  const raw = cursor.readI32();
  const seeds = extensionSeeds(raw);

  if (seeds.anomalous) {
    const msg = `Extension payload seed ${raw} at 0x${seedAt.toString(16)} needs more than one correction`;
    if (strictSeeds) throw new FormatError(msg, seedAt);
    warn(msg);
  }

  const table = buildExtensionTable(seeds.seed1, seeds.seed2);
  const data = cursor.data;
  for (let i = cursor.position + 1; i < end; i++) {
    data[i] = table[data[i] + 0x100];
  }
}
