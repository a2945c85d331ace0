import { InvalidArgumentError } from './errors.js';
import { MediaType } from './media-type.js';
import { MimeTypeEntry } from './mime-type.js';
import { RootXmlAssociation } from './root-xml.js';
import type { Magic, MimeTypeInit } from './types.js';

/**
 * Collects the extensions, magics, XML root associations and documentation
 * of a media type while a registry is being loaded, then produces an
 * immutable `MimeTypeEntry`.
 *
 * ```ts
 * const pdf = new MimeTypeBuilder(new MediaType('application', 'pdf'))
 *   .setAcronym('PDF')
 *   .addExtension('.pdf')
 *   .addMagic(new SignatureMagic({ pattern: '%PDF-' }))
 *   .build();
 * ```
 */
export class MimeTypeBuilder {
  public readonly type: MediaType;
  private readonly init: MimeTypeInit;
  private acronym = '';
  private description = '';
  private uniformTypeIdentifier = '';
  private readonly links: URL[] = [];
  private readonly extensions: string[] = [];
  private readonly magics: Magic[] = [];
  private readonly rootXml: RootXmlAssociation[] = [];

  constructor(type: MediaType, init: MimeTypeInit = {}) {
    if (type === null || type === undefined) {
      throw new InvalidArgumentError('Media type name is missing');
    }
    if (type.type === '*') {
      throw new InvalidArgumentError('The */* entry is only created by MimeTypeEntry.parse');
    }
    this.type = type;
    this.init = { ...init };
  }

  /**
   * Start from the name and quality of a `type/subtype[;q=x.y]` string.
   * `*\/*` is rejected with an InvalidArgumentError.
   */
  static parse(mimeType: string): MimeTypeBuilder {
    const entry = MimeTypeEntry.parse(mimeType);
    return new MimeTypeBuilder(entry.getType() ?? MediaType.ANY, {
      subtype: entry.getSubtype(),
      quality: entry.getQuality(),
    });
  }

  setAcronym(acronym: string): this {
    this.acronym = required(acronym, 'Acronym is missing');
    return this;
  }

  setDescription(description: string): this {
    this.description = required(description, 'Description is missing');
    return this;
  }

  setUniformTypeIdentifier(uti: string): this {
    this.uniformTypeIdentifier = required(uti, 'Uniform Type Identifier is missing');
    return this;
  }

  /**
   * Add a documentation link. Strings must be absolute URLs.
   */
  addLink(link: URL | string): this {
    if (link === null || link === undefined) {
      throw new InvalidArgumentError('Missing Link');
    }
    const href = link instanceof URL ? link.href : link;
    try {
      this.links.push(new URL(href));
    } catch {
      throw new InvalidArgumentError(`Invalid link: ${link}`);
    }
    return this;
  }

  /**
   * Add a known file extension. The first one added is the preferred one;
   * duplicates are ignored.
   */
  addExtension(extension: string): this {
    if (!this.extensions.includes(extension)) {
      this.extensions.push(extension);
    }
    return this;
  }

  /**
   * Add a magic. A missing magic is ignored.
   */
  addMagic(magic: Magic | null | undefined): this {
    if (magic) {
      this.magics.push(magic);
    }
    return this;
  }

  /**
   * Associate an XML root element with this type.
   *
   * @throws InvalidArgumentError when both namespaceURI and localName are empty
   */
  addRootXML(namespaceURI: string | null | undefined, localName: string | null | undefined): this {
    this.rootXml.push(new RootXmlAssociation(this.type, namespaceURI, localName));
    return this;
  }

  build(): MimeTypeEntry {
    return new MimeTypeEntry(this.type, {
      ...this.init,
      acronym: this.acronym,
      description: this.description,
      uniformTypeIdentifier: this.uniformTypeIdentifier,
      links: this.links,
      extensions: this.extensions,
      magics: this.magics,
      rootXml: this.rootXml,
    });
  }
}

function required(value: string, message: string): string {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(message);
  }
  return value;
}
