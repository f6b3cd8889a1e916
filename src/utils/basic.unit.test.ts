import { describe, expect, it } from 'vitest';
import { crc32 } from './crc32.js';
import { digestHex } from './crypto.js';
import { formatFileCount, formatSize } from './size.js';
import { formatDuration, fromUnixTimestamp, toUnixTimestamp } from './time.js';
import { utf8ByteCompare } from './utf8.js';

describe('crc32', () => {
  it('matches the standard check value', () => {
    expect(crc32(Buffer.from('123456789', 'latin1'))).toBe(0xcbf43926);
  });

  it('returns 0 for empty input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0);
  });
});

describe('digestHex', () => {
  it('returns upper-case hex', () => {
    expect(digestHex('sha1', Buffer.from('abc'))).toBe('A9993E364706816ABA3E25717850C26C9CD0D89D');
  });
});

describe('formatSize', () => {
  it('uses two decimals and a 1024 base', () => {
    expect(formatSize(0)).toBe('0.00B');
    expect(formatSize(29)).toBe('29.00B');
    expect(formatSize(1024)).toBe('1.00KB');
    expect(formatSize(6799)).toBe('6.64KB');
    expect(formatSize(1024 * 1024)).toBe('1.00MB');
    expect(formatSize(3 * 1024 ** 3)).toBe('3.00GB');
  });

  it('honours the requested precision', () => {
    expect(formatSize(1536, 1)).toBe('1.5KB');
  });
});

describe('formatFileCount', () => {
  it('pluralizes', () => {
    expect(formatFileCount(0)).toBe('0 files');
    expect(formatFileCount(1)).toBe('1 file');
    expect(formatFileCount(2)).toBe('2 files');
  });
});

describe('time helpers', () => {
  it('converts to and from unix timestamps', () => {
    expect(toUnixTimestamp(new Date('2020-01-01T00:00:00.500Z'))).toBe(1577836800);
    expect(fromUnixTimestamp(1577836800).toISOString()).toBe('2020-01-01T00:00:00.000Z');
  });

  it('formats durations', () => {
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(90_000)).toBe('1min 30s');
  });
});

describe('utf8ByteCompare', () => {
  it('compares by unsigned byte order', () => {
    expect(utf8ByteCompare('a', 'b')).toBeLessThan(0);
    expect(utf8ByteCompare('b', 'a')).toBeGreaterThan(0);
    expect(utf8ByteCompare('a', 'a')).toBe(0);
    expect(utf8ByteCompare('a', 'aa')).toBeLessThan(0);
    // U+00E9 encodes as 0xC3 0xA9, after every ASCII byte.
    expect(utf8ByteCompare('é', 'z')).toBeGreaterThan(0);
  });
});
