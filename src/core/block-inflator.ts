/**
 * Length-prefixed zlib blocks.
 *
 * Every asset record, the settings block, the game information and the
 * extension payloads are stored as:
 *   u32  compressed length
 *   ...  zlib stream of exactly that many bytes
 *
 * fflate does not check the Adler-32 trailer, so it is checked here.
 */

import { unzlibSync } from 'fflate';
import type { Cursor } from './cursor';
import { CorruptBlockError } from './errors';

const ADLER_MOD = 65521;
/** Bytes that can be summed before the 32-bit accumulators need reducing */
const ADLER_RUN = 5552;

export function adler32(data: Uint8Array): number {
  let a = 1;
  let b = 0;
  for (let i = 0; i < data.length; ) {
    const end = Math.min(i + ADLER_RUN, data.length);
    for (; i < end; i++) {
      a += data[i];
      b += a;
    }
    a %= ADLER_MOD;
    b %= ADLER_MOD;
  }
  return ((b << 16) | a) >>> 0;
}

export interface InflateStats {
  blocks: number;
  compressedBytes: number;
  inflatedBytes: number;
}

export class BlockInflator {
  private _stats: InflateStats = { blocks: 0, compressedBytes: 0, inflatedBytes: 0 };

  get stats(): InflateStats {
    return { ...this._stats };
  }

  /**
   * Inflate the block at the cursor and advance past it. The returned
   * buffer is freshly allocated and owned by the caller.
   */
  inflate(cursor: Cursor): Buffer {
    const offset = cursor.position;
    const compressed = cursor.readByteString();

    let out: Uint8Array;
    try {
      out = unzlibSync(compressed);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CorruptBlockError(
        `Inflate failed for ${compressed.length}-byte block at 0x${offset.toString(16)}: ${reason}`,
        offset,
        { cause: err },
      );
    }

    const expected = compressed.readUInt32BE(compressed.length - 4);
    const actual = adler32(out);
    if (actual !== expected) {
      throw new CorruptBlockError(
        `Checksum mismatch for ${compressed.length}-byte block at 0x${offset.toString(16)}: ` +
          `stored 0x${expected.toString(16)}, computed 0x${actual.toString(16)}`,
        offset,
      );
    }

    this._stats.blocks++;
    this._stats.compressedBytes += compressed.length;
    this._stats.inflatedBytes += out.length;
    return Buffer.from(out.buffer, out.byteOffset, out.byteLength);
  }
}
