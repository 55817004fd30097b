/**
 * @summary Tests for SHA256 hashing and byte encoding.
 */

import { describe, it, expect } from 'vitest';
import {
  sha256,
  sha256Hex,
  sha256Concat,
  bytesToHex,
  hexToBytes,
  isValidHex,
  normalizeBytes32,
  concatBytes,
  utf8ToBytes,
  intToBytes,
  uint32ToBytes,
} from '../utils/hash.js';

describe('sha256', () => {
  it('produces 32-byte output', () => {
    const result = sha256(utf8ToBytes('hello world'));
    expect(result).toBeInstanceOf(Uint8Array);
    expect(result.length).toBe(32);
  });

  it('matches known vectors', () => {
    expect(sha256Hex(utf8ToBytes('hello'))).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
    expect(sha256Hex(new Uint8Array(0))).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('hashes concatenated parts like a single buffer', () => {
    const joined = sha256Concat(utf8ToBytes('hel'), utf8ToBytes('lo'));
    expect(bytesToHex(joined)).toBe(sha256Hex(utf8ToBytes('hello')));
  });
});

describe('hex encoding', () => {
  it('round-trips bytes', () => {
    expect(bytesToHex(hexToBytes('00ff10'))).toBe('00ff10');
  });

  it('accepts a 0x prefix', () => {
    expect(Array.from(hexToBytes('0xabcd'))).toEqual([0xab, 0xcd]);
  });

  it('rejects odd length and bad characters', () => {
    expect(() => hexToBytes('abc')).toThrow('even length');
    expect(() => hexToBytes('zz')).toThrow('Invalid hex character');
  });

  it('validates expected byte length', () => {
    expect(isValidHex('aa'.repeat(32), 32)).toBe(true);
    expect(isValidHex('aa'.repeat(31), 32)).toBe(false);
    expect(isValidHex('xyz')).toBe(false);
  });
});

describe('normalizeBytes32', () => {
  it('lowercases and strips the prefix', () => {
    expect(normalizeBytes32('0x' + 'AB'.repeat(32))).toBe('ab'.repeat(32));
  });

  it('names the value in the error', () => {
    expect(() => normalizeBytes32('1234', 'coin id')).toThrow(/Invalid coin id/);
  });
});

describe('intToBytes', () => {
  it('encodes zero as the empty string', () => {
    expect(intToBytes(0n).length).toBe(0);
  });

  it('uses minimal two\'s complement', () => {
    expect(bytesToHex(intToBytes(1n))).toBe('01');
    expect(bytesToHex(intToBytes(127n))).toBe('7f');
    expect(bytesToHex(intToBytes(128n))).toBe('0080');
    expect(bytesToHex(intToBytes(255n))).toBe('00ff');
    expect(bytesToHex(intToBytes(256n))).toBe('0100');
    expect(bytesToHex(intToBytes(1_000_000n))).toBe('0f4240');
  });

  it('encodes negative values', () => {
    expect(bytesToHex(intToBytes(-1n))).toBe('ff');
    expect(bytesToHex(intToBytes(-128n))).toBe('80');
    expect(bytesToHex(intToBytes(-129n))).toBe('ff7f');
  });
});

describe('uint32ToBytes', () => {
  it('writes big-endian', () => {
    expect(bytesToHex(uint32ToBytes(1))).toBe('00000001');
    expect(bytesToHex(uint32ToBytes(0xdeadbeef))).toBe('deadbeef');
  });

  it('rejects values outside the range', () => {
    expect(() => uint32ToBytes(-1)).toThrow();
    expect(() => uint32ToBytes(2 ** 32)).toThrow();
  });
});

describe('concatBytes', () => {
  it('joins parts in order', () => {
    expect(bytesToHex(concatBytes(hexToBytes('01'), new Uint8Array(0), hexToBytes('0203')))).toBe(
      '010203'
    );
  });
});
