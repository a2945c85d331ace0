import { InvalidArgumentError } from './errors.js';
import * as buffer from './binary/buffer.js';
import type { Magic, SignatureOptions } from './types.js';

/**
 * Byte signature found at a fixed offset or anywhere within an offset range.
 *
 * ```ts
 * // PNG
 * new SignatureMagic({ pattern: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] });
 * // "ftyp" box at offset 4
 * new SignatureMagic({ pattern: 'ftyp', offset: 4 });
 * ```
 */
export class SignatureMagic implements Magic {
  public readonly pattern: Uint8Array;
  public readonly offset: number;
  public readonly rangeEnd: number;
  public readonly mask: Uint8Array | undefined;

  constructor(options: SignatureOptions) {
    const pattern = buffer.toBytes(options.pattern);
    const offset = options.offset ?? 0;
    const rangeEnd = options.rangeEnd ?? offset;

    if (pattern.length === 0) {
      throw new InvalidArgumentError('Signature pattern is empty');
    }
    if (!Number.isInteger(offset) || offset < 0 || !Number.isInteger(rangeEnd) || rangeEnd < offset) {
      throw new InvalidArgumentError(`Invalid signature range ${offset}:${rangeEnd}`);
    }

    let mask: Uint8Array | undefined;
    if (options.mask !== undefined) {
      mask = buffer.toBytes(options.mask);
      if (mask.length !== pattern.length) {
        throw new InvalidArgumentError(
          `Signature mask length ${mask.length} does not match pattern length ${pattern.length}`
        );
      }
      // Stored pre-masked
      const masked = new Uint8Array(pattern.length);
      for (let i = 0; i < pattern.length; i++) {
        masked[i] = pattern[i]! & mask[i]!;
      }
      this.pattern = masked;
    } else {
      this.pattern = pattern;
    }

    this.offset = offset;
    this.rangeEnd = rangeEnd;
    this.mask = mask;
  }

  /**
   * Build a signature from a hex string, e.g. `SignatureMagic.fromHex('25504446')`
   */
  static fromHex(hex: string, options: Omit<SignatureOptions, 'pattern'> = {}): SignatureMagic {
    return new SignatureMagic({ ...options, pattern: buffer.fromHex(hex) });
  }

  get minLength(): number {
    return this.offset + this.pattern.length;
  }

  eval(data: Uint8Array): boolean {
    for (let at = this.offset; at <= this.rangeEnd; at++) {
      if (at + this.pattern.length > data.length) {
        return false;
      }
      if (buffer.matchesAt(data, at, this.pattern, this.mask)) {
        return true;
      }
    }
    return false;
  }

  toString(): string {
    const hex = Array.from(this.pattern, b => b.toString(16).padStart(2, '0')).join('');
    const range = this.rangeEnd === this.offset ? `${this.offset}` : `${this.offset}:${this.rangeEnd}`;
    return `${hex}@${range}`;
  }
}
