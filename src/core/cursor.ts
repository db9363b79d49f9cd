/**
 * Bounds-checked little-endian reader over a byte buffer.
 *
 * All GameMaker 8 fields are 32-bit words, 8-byte doubles or
 * length-prefixed byte strings. Reads advance the position; reading past
 * the end throws TruncatedInputError instead of returning garbage.
 */

import { TruncatedInputError } from './errors';

export class Cursor {
  public readonly data: Buffer;
  private _pos: number;

  constructor(data: Buffer, position = 0) {
    this.data = data;
    this._pos = 0;
    this.seek(position);
  }

  get position(): number {
    return this._pos;
  }

  get length(): number {
    return this.data.length;
  }

  get remaining(): number {
    return this.data.length - this._pos;
  }

  /** Move to an absolute offset. The offset may equal the buffer length. */
  seek(offset: number): void {
    if (offset < 0 || offset > this.data.length) {
      throw new TruncatedInputError(offset, 0, this.data.length);
    }
    this._pos = offset;
  }

  skip(count: number): void {
    this.require(count);
    this._pos += count;
  }

  readU32(): number {
    this.require(4);
    const v = this.data.readUInt32LE(this._pos);
    this._pos += 4;
    return v;
  }

  readI32(): number {
    this.require(4);
    const v = this.data.readInt32LE(this._pos);
    this._pos += 4;
    return v;
  }

  readF64(): number {
    this.require(8);
    const v = this.data.readDoubleLE(this._pos);
    this._pos += 8;
    return v;
  }

  readBool(): boolean {
    return this.readU32() !== 0;
  }

  /**
   * Signed asset index; any negative value (the format writes -1) means
   * "no asset" and comes back as null.
   */
  readRef(): number | null {
    const v = this.readI32();
    return v < 0 ? null : v;
  }

  /** A view of the next `count` bytes (shares memory with the source). */
  readBytes(count: number): Buffer {
    this.require(count);
    const out = this.data.subarray(this._pos, this._pos + count);
    this._pos += count;
    return out;
  }

  /**
   * Length-prefixed byte string. The bytes are returned as-is: code and
   * text payloads may contain NUL, so the length travels with them.
   */
  readByteString(): Buffer {
    const len = this.readU32();
    return this.readBytes(len);
  }

  /** Length-prefixed string decoded as latin1 (names, captions, paths). */
  readString(): string {
    return this.readByteString().toString('latin1');
  }

  private require(count: number): void {
    if (count < 0 || this._pos + count > this.data.length) {
      throw new TruncatedInputError(this._pos, count, this.data.length);
    }
  }
}
