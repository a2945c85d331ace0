/**
 * Base error class for mime-entry errors
 */
export class MimeEntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MimeEntryError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a required argument is missing or unusable
 */
export class InvalidArgumentError extends MimeEntryError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

const MALFORMED_PREFIX = 'Cannot parse MIME type (expected type/subtype[;q=x.y] format): ';

/**
 * Thrown when a MIME type string cannot be parsed
 */
export class MalformedMimeTypeError extends MimeEntryError {
  public readonly input: string;

  constructor(input: string) {
    super(MALFORMED_PREFIX + input);
    this.name = 'MalformedMimeTypeError';
    this.input = input;
  }
}
