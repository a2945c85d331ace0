import { InvalidArgumentError } from './errors.js';
import type { MediaType } from './media-type.js';

function isEmpty(str: string | null | undefined): boolean {
  return str === null || str === undefined || str === '';
}

/**
 * Root element that identifies an XML document as a given type.
 * Made of a namespace URI and/or a local name; an empty field only
 * matches an empty candidate.
 */
export class RootXmlAssociation {
  public readonly type: MediaType | undefined;
  public readonly namespaceURI: string | undefined;
  public readonly localName: string | undefined;

  constructor(
    type: MediaType | undefined,
    namespaceURI: string | null | undefined,
    localName: string | null | undefined
  ) {
    if (isEmpty(namespaceURI) && isEmpty(localName)) {
      throw new InvalidArgumentError('Both namespaceURI and localName cannot be empty');
    }
    this.type = type;
    this.namespaceURI = namespaceURI ?? undefined;
    this.localName = localName ?? undefined;
  }

  matches(namespaceURI: string | null | undefined, localName: string | null | undefined): boolean {
    return fieldMatches(this.namespaceURI, namespaceURI) && fieldMatches(this.localName, localName);
  }

  toString(): string {
    return `${this.type?.toString() ?? ''}, ${this.namespaceURI ?? ''}, ${this.localName ?? ''}`;
  }
}

function fieldMatches(expected: string | undefined, actual: string | null | undefined): boolean {
  if (isEmpty(expected)) {
    return isEmpty(actual);
  }
  return expected === actual;
}
