import { InvalidArgumentError } from '../errors.js';

/**
 * Normalize a byte pattern given as bytes, byte values, or an ASCII string
 */
export function toBytes(pattern: Uint8Array | number[] | string): Uint8Array {
  if (typeof pattern === 'string') {
    return fromAscii(pattern);
  }
  return pattern instanceof Uint8Array ? pattern : new Uint8Array(pattern);
}

/**
 * Check if pattern exists at a specific offset, optionally AND-ing each input byte with a mask
 */
export function matchesAt(
  data: Uint8Array,
  offset: number,
  pattern: Uint8Array,
  mask?: Uint8Array
): boolean {
  if (offset < 0 || offset + pattern.length > data.length) {
    return false;
  }
  for (let i = 0; i < pattern.length; i++) {
    const byte = data[offset + i]!;
    const masked = mask ? byte & mask[i]! : byte;
    if (masked !== pattern[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Convert a string to Uint8Array using ASCII encoding
 */
export function fromAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Parse a hex string such as `"89504e47"` (whitespace ignored)
 */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new InvalidArgumentError(`Invalid hex pattern: ${hex}`);
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
