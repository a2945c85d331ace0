import { describe, it, expect } from 'vitest';
import { SignatureMagic } from '../../src/magic.js';
import { InvalidArgumentError } from '../../src/errors.js';
import { fromAscii } from '../../src/binary/buffer.js';

describe('SignatureMagic', () => {
  it('should match a signature at the start', () => {
    const magic = new SignatureMagic({ pattern: '%PDF-' });

    expect(magic.eval(fromAscii('%PDF-1.4'))).toBe(true);
    expect(magic.eval(fromAscii('%!PS-Adobe'))).toBe(false);
    expect(magic.minLength).toBe(5);
  });

  it('should not match a buffer shorter than the signature', () => {
    const magic = new SignatureMagic({ pattern: [0x89, 0x50, 0x4e, 0x47] });

    expect(magic.eval(new Uint8Array([0x89, 0x50]))).toBe(false);
    expect(magic.eval(new Uint8Array(0))).toBe(false);
  });

  it('should match at a fixed offset', () => {
    const magic = new SignatureMagic({ pattern: 'ftyp', offset: 4 });
    const data = new Uint8Array([0x00, 0x00, 0x00, 0x18, 0x66, 0x74, 0x79, 0x70]);

    expect(magic.eval(data)).toBe(true);
    expect(magic.eval(data.subarray(1))).toBe(false);
    expect(magic.minLength).toBe(8);
  });

  it('should search an offset range', () => {
    const magic = new SignatureMagic({ pattern: [0xab], offset: 0, rangeEnd: 3 });

    expect(magic.eval(new Uint8Array([0x00, 0x00, 0xab]))).toBe(true);
    expect(magic.eval(new Uint8Array([0x00, 0x00, 0x00, 0xab]))).toBe(true);
    expect(magic.eval(new Uint8Array([0x00, 0x00, 0x00, 0x00, 0xab]))).toBe(false);
  });

  it('should apply a mask before comparing', () => {
    const magic = new SignatureMagic({ pattern: [0x40], mask: [0xf0] });

    expect(magic.eval(new Uint8Array([0x4f]))).toBe(true);
    expect(magic.eval(new Uint8Array([0x5f]))).toBe(false);
  });

  it('should reject invalid signatures', () => {
    expect(() => new SignatureMagic({ pattern: '' })).toThrow('Signature pattern is empty');
    expect(() => new SignatureMagic({ pattern: 'ab', mask: [0xff] })).toThrow(InvalidArgumentError);
    expect(() => new SignatureMagic({ pattern: 'ab', offset: 4, rangeEnd: 2 })).toThrow(
      'Invalid signature range 4:2'
    );
    expect(() => new SignatureMagic({ pattern: 'ab', offset: -1 })).toThrow(InvalidArgumentError);
  });

  describe('fromHex', () => {
    it('should build a signature from hex', () => {
      const magic = SignatureMagic.fromHex('25 50 44 46');

      expect(magic.eval(fromAscii('%PDF'))).toBe(true);
    });

    it('should reject malformed hex', () => {
      expect(() => SignatureMagic.fromHex('abc')).toThrow('Invalid hex pattern: abc');
      expect(() => SignatureMagic.fromHex('zz')).toThrow(InvalidArgumentError);
    });
  });

  it('should print pattern and range', () => {
    expect(new SignatureMagic({ pattern: [0xff, 0xd8] }).toString()).toBe('ffd8@0');
    expect(SignatureMagic.fromHex('2550', { offset: 2, rangeEnd: 4 }).toString()).toBe('2550@2:4');
  });
});
