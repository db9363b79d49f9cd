import { describe, expect, it } from 'vitest';
import { crc32, crc32Table, crc32Update } from '../src/core/crc32';

describe('crc32', () => {
  it('should produce the standard check value', () => {
    expect(crc32(Buffer.from('123456789'))).toBe(0xcbf43926);
  });

  it('should leave the register uninverted in crc32Update', () => {
    expect(crc32Update(0xffffffff, Buffer.from('123456789'))).toBe(0x340bc6d9);
  });

  it('should build the reflected table', () => {
    const t = crc32Table();
    expect(t[0]).toBe(0);
    expect(t[1]).toBe(0x77073096);
    expect(t[255]).toBe(0x2d02ef8d);
  });

  it('should continue across split input', () => {
    const whole = crc32Update(0xffffffff, Buffer.from('123456789'));
    const split = crc32Update(crc32Update(0xffffffff, Buffer.from('1234')), Buffer.from('56789'));
    expect(split).toBe(whole);
  });

  it('should return 0 for empty input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0);
  });
});
