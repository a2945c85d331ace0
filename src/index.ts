/**
 * mime-entry - Media type entries for content-type detection
 *
 * Model one registered MIME type: its name, quality, file extensions,
 * and the magic byte patterns and XML root elements that identify it.
 *
 * @packageDocumentation
 */

// Entries
export { MimeTypeEntry, normalizeQuality } from './mime-type.js';
export { MimeTypeBuilder } from './builder.js';
export { RootXmlAssociation } from './root-xml.js';

// Names
export { MediaType, hashString } from './media-type.js';
export { isValid } from './validate.js';

// Evidence
export { SignatureMagic } from './magic.js';
export { MemoryByteStream } from './purifier.js';
export type { Purifier } from './purifier.js';

// Types
export type {
  TypeSlot,
  Magic,
  SignatureOptions,
  ResettableByteStream,
  MimeTypeInit,
  MimeTypeOptions,
  MimeTypeSummary,
} from './types.js';

// Error classes
export { MimeEntryError, InvalidArgumentError, MalformedMimeTypeError } from './errors.js';

// Binary utilities for advanced usage
export * as buffer from './binary/buffer.js';
