/**
 * A name component that is either a concrete value or the `*` wildcard.
 */
export type TypeSlot<T> =
  | { readonly kind: 'any' }
  | { readonly kind: 'exact'; readonly value: T };

/**
 * Byte-pattern predicate used to recognise content.
 */
export interface Magic {
  eval(data: Uint8Array): boolean;
  /** Bytes of input the predicate needs to be able to match */
  readonly minLength?: number;
}

/**
 * Options for a signature magic
 */
export interface SignatureOptions {
  /** Bytes, byte values, or an ASCII string */
  pattern: Uint8Array | number[] | string;
  /** First offset tried (default: 0) */
  offset?: number;
  /** Last offset tried, inclusive (default: `offset`) */
  rangeEnd?: number;
  /** AND-ed with the input before comparison; same length as `pattern` */
  mask?: Uint8Array | number[];
}

/**
 * Byte stream that can rewind to a marked position (the start until `mark()` is called).
 */
export interface ResettableByteStream {
  /** Current read offset */
  readonly position: number;
  /** Read up to `length` bytes; returns an empty array at end of stream */
  read(length: number): Uint8Array;
  /** Advance up to `length` bytes; returns the number skipped */
  skip(length: number): number;
  /** Remember the current position for `reset()` */
  mark(): void;
  /** Return to the last marked position */
  reset(): void;
}

/**
 * Subtype and quality given when an entry is created
 */
export interface MimeTypeInit {
  /** Overrides the media type's subtype; `'*'` means any subtype */
  subtype?: string;
  quality?: number;
}

/**
 * Full state accepted by the `MimeTypeEntry` constructor.
 * Usually assembled by a `MimeTypeBuilder`.
 */
export interface MimeTypeOptions extends MimeTypeInit {
  acronym?: string;
  description?: string;
  uniformTypeIdentifier?: string;
  links?: readonly URL[];
  extensions?: readonly string[];
  magics?: readonly Magic[];
  rootXml?: readonly { namespaceURI?: string | null; localName?: string | null }[];
}

/**
 * JSON-friendly summary of an entry, as printed by the CLI.
 */
export interface MimeTypeSummary {
  name: string;
  fullType: string;
  majorType: string;
  subtype: string;
  quality: number;
  anyMajorType: boolean;
  anySubtype: boolean;
}
