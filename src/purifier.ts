import { InvalidArgumentError } from './errors.js';
import type { ResettableByteStream } from './types.js';

/**
 * Cleans input before MIME type detection runs on it.
 *
 * A purifier reads and discards whatever should not take part in detection
 * (a byte order mark, leading garbage, an envelope), then calls `mark()` so
 * that a later `reset()` rewinds to the cleansed start. It may reject with an
 * I/O error.
 */
export interface Purifier {
  purify(input: ResettableByteStream): Promise<void>;
}

/**
 * In-memory `ResettableByteStream` over a byte array
 */
export class MemoryByteStream implements ResettableByteStream {
  private readonly data: Uint8Array;
  private offset = 0;
  private marked = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  get position(): number {
    return this.offset;
  }

  read(length: number): Uint8Array {
    checkLength(length);
    const end = Math.min(this.offset + length, this.data.length);
    const chunk = this.data.subarray(this.offset, end);
    this.offset = end;
    return chunk;
  }

  skip(length: number): number {
    checkLength(length);
    const end = Math.min(this.offset + length, this.data.length);
    const skipped = end - this.offset;
    this.offset = end;
    return skipped;
  }

  mark(): void {
    this.marked = this.offset;
  }

  reset(): void {
    this.offset = this.marked;
  }
}

function checkLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new InvalidArgumentError(`Invalid length: ${length}`);
  }
}
