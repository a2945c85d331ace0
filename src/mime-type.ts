import { InvalidArgumentError, MalformedMimeTypeError } from './errors.js';
import { MediaType } from './media-type.js';
import { RootXmlAssociation } from './root-xml.js';
import type { Magic, MimeTypeOptions, MimeTypeSummary, TypeSlot } from './types.js';

const ANY = '*';

/**
 * Quality values outside the open interval (0, 1) fall back to 1.0
 */
export function normalizeQuality(q: number): number {
  if (!Number.isFinite(q) || q <= 0.0 || q >= 1.0) {
    return 1.0;
  }
  return q;
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseQuality(value: string): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }
  if (!DECIMAL.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

function requireText(value: string | undefined, message: string): string {
  if (value === undefined) {
    return '';
  }
  if (value === null) {
    throw new InvalidArgumentError(message);
  }
  return value;
}

/**
 * Internet media type registered with a detection system: its name,
 * quality weight, file extensions, documentation, and the evidence
 * (magic byte patterns, XML root elements) used to recognise it.
 *
 * Entries are immutable. Use a `MimeTypeBuilder` to assemble one, or
 * `MimeTypeEntry.parse()` for a `type/subtype[;q=x.y]` string.
 *
 * Equality, hashing and ordering only look at `type`: two entries that
 * differ in subtype or quality but share a media type are the same key.
 */
export class MimeTypeEntry {
  public readonly type: TypeSlot<MediaType>;
  public readonly subtype: TypeSlot<string>;
  public readonly quality: number;
  public readonly acronym: string;
  public readonly uniformTypeIdentifier: string;
  public readonly description: string;
  public readonly links: readonly URL[];
  public readonly extensions: readonly string[];
  public readonly magics: readonly Magic[];
  public readonly rootXmlAssociations: readonly RootXmlAssociation[];
  /** Bytes of input the magics need */
  public readonly minLength: number;

  /** Only `parse('*\/*')` holds this, so only it creates the any-type entry */
  private static readonly ANY_TYPE_KEY: unique symbol = Symbol('any-type');

  /**
   * @param type normalized media type; parameters are not part of the entry
   * @throws InvalidArgumentError when `type` is missing or a wildcard type, when
   *   `options.subtype` is neither `*` nor the media type's subtype, or when a
   *   text field is null
   */
  constructor(type: MediaType, options: MimeTypeOptions = {}, anyTypeKey?: symbol) {
    if (type === null || type === undefined) {
      throw new InvalidArgumentError('Media type name is missing');
    }
    const base = type.getBaseType();

    const subtype = (options.subtype ?? base.subtype).trim().toLowerCase();
    if (subtype !== ANY && subtype !== base.subtype) {
      throw new InvalidArgumentError(`Subtype ${subtype} does not match media type ${base.toString()}`);
    }
    if (base.type === ANY) {
      if (anyTypeKey !== MimeTypeEntry.ANY_TYPE_KEY || subtype !== ANY) {
        throw new InvalidArgumentError('The */* entry is only created by MimeTypeEntry.parse');
      }
      this.type = { kind: 'any' };
    } else {
      this.type = { kind: 'exact', value: base };
    }
    this.subtype = subtype === ANY ? { kind: 'any' } : { kind: 'exact', value: subtype };
    this.quality = normalizeQuality(options.quality ?? 1.0);

    this.acronym = requireText(options.acronym, 'Acronym is missing');
    this.uniformTypeIdentifier = requireText(
      options.uniformTypeIdentifier,
      'Uniform Type Identifier is missing'
    );
    this.description = requireText(options.description, 'Description is missing');

    this.links = Object.freeze((options.links ?? []).map(link => new URL(link.href)));
    this.extensions = Object.freeze([...new Set(options.extensions ?? [])]);
    this.magics = Object.freeze([...(options.magics ?? [])]);
    this.rootXmlAssociations = Object.freeze(
      (options.rootXml ?? []).map(
        xml => new RootXmlAssociation(base, xml.namespaceURI, xml.localName)
      )
    );
    this.minLength = this.magics.reduce((max, magic) => Math.max(max, magic.minLength ?? 0), 0);
  }

  /**
   * Parse a `type/subtype[;params]` string. Only the `q` parameter is read;
   * an unparsable or out-of-range `q` is ignored.
   *
   * ```ts
   * MimeTypeEntry.parse('application/rdf+xml;q=0.9').getQuality(); // 0.9
   * MimeTypeEntry.parse('text/*').isAnySubtype();                  // true
   * ```
   *
   * @throws MalformedMimeTypeError when there is no `/`, or for `*\/subtype`
   */
  static parse(mimeType: string): MimeTypeEntry;
  static parse(mimeType: null | undefined): null;
  static parse(mimeType: string | null | undefined): MimeTypeEntry | null;
  static parse(mimeType: string | null | undefined): MimeTypeEntry | null {
    if (mimeType === null || mimeType === undefined) {
      return null;
    }

    let quality = 1.0;
    let end = mimeType.indexOf(';');
    if (end > -1) {
      for (const param of mimeType.substring(end + 1).split(';')) {
        const eq = param.indexOf('=');
        if (eq === -1) continue;
        if (param.substring(0, eq).trim().toLowerCase() !== 'q') continue;
        const q = parseQuality(param.substring(eq + 1));
        if (q === undefined) continue;
        quality = normalizeQuality(q);
      }
    } else {
      end = mimeType.length;
    }

    const name = mimeType.substring(0, end);
    const slash = name.indexOf('/');
    if (slash === -1) {
      throw new MalformedMimeTypeError(mimeType);
    }
    const major = name.substring(0, slash).trim().toLowerCase();
    const minor = name.substring(slash + 1).trim().toLowerCase();

    if (major === ANY) {
      if (minor !== ANY) {
        throw new MalformedMimeTypeError(mimeType);
      }
      return new MimeTypeEntry(MediaType.ANY, { quality }, MimeTypeEntry.ANY_TYPE_KEY);
    }
    return new MimeTypeEntry(new MediaType(major, minor), { quality });
  }

  /**
   * Order for `Array.prototype.sort`, consistent with `compareTo`
   */
  static compare(a: MimeTypeEntry, b: MimeTypeEntry): number {
    return a.compareTo(b);
  }

  /**
   * The media type, or `undefined` for the any-type entry
   */
  getType(): MediaType | undefined {
    return this.type.kind === 'exact' ? this.type.value : undefined;
  }

  getName(): string {
    return this.type.kind === 'exact' ? this.type.value.toString() : `${ANY}/${ANY}`;
  }

  getDescription(): string {
    return this.description;
  }

  getAcronym(): string {
    return this.acronym;
  }

  getUniformTypeIdentifier(): string {
    return this.uniformTypeIdentifier;
  }

  getLinks(): readonly URL[] {
    return this.links;
  }

  /**
   * Preferred file extension, or an empty string if none are known
   */
  getExtension(): string {
    return this.extensions[0] ?? '';
  }

  /**
   * Known file extensions, best first
   */
  getExtensions(): readonly string[] {
    return this.extensions;
  }

  getMagics(): readonly Magic[] {
    return this.magics;
  }

  getMinLength(): number {
    return this.minLength;
  }

  hasMagic(): boolean {
    return this.magics.length > 0;
  }

  /**
   * True when any magic matches. Short buffers are left to each magic.
   */
  matchesMagic(data: Uint8Array): boolean {
    for (const magic of this.magics) {
      if (magic.eval(data)) {
        return true;
      }
    }
    return false;
  }

  matches(data: Uint8Array): boolean {
    return this.matchesMagic(data);
  }

  hasRootXML(): boolean {
    return this.rootXmlAssociations.length > 0;
  }

  matchesXML(namespaceURI: string | null | undefined, localName: string | null | undefined): boolean {
    return this.rootXmlAssociations.some(xml => xml.matches(namespaceURI, localName));
  }

  getMajorType(): string {
    return this.type.kind === 'exact' ? this.type.value.type : ANY;
  }

  getSubtype(): string {
    return this.subtype.kind === 'exact' ? this.subtype.value : ANY;
  }

  getFullType(): string {
    return `${this.getMajorType()}/${this.getSubtype()}`;
  }

  getQuality(): number {
    return this.quality;
  }

  isAnyMajorType(): boolean {
    return this.type.kind === 'any';
  }

  isAnySubtype(): boolean {
    return this.subtype.kind === 'any';
  }

  compareTo(other: MimeTypeEntry): number {
    if (this.type.kind === 'any') {
      return other.type.kind === 'any' ? 0 : -1;
    }
    if (other.type.kind === 'any') {
      return 1;
    }
    return this.type.value.compareTo(other.type.value);
  }

  equals(other: unknown): boolean {
    return other instanceof MimeTypeEntry && this.compareTo(other) === 0;
  }

  hashCode(): number {
    return this.type.kind === 'exact' ? this.type.value.hashCode() : 0;
  }

  toString(): string {
    return this.getName();
  }

  toSummary(): MimeTypeSummary {
    return {
      name: this.getName(),
      fullType: this.getFullType(),
      majorType: this.getMajorType(),
      subtype: this.getSubtype(),
      quality: this.quality,
      anyMajorType: this.isAnyMajorType(),
      anySubtype: this.isAnySubtype(),
    };
  }
}
