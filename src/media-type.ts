import { parse as parseContentType } from 'content-type';

/**
 * 32-bit string hash (`h = 31 * h + c`)
 */
export function hashString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = (Math.imul(hash, 31) + str.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * Immutable, normalized `type/subtype` name with optional parameters.
 */
export class MediaType {
  static readonly ANY = new MediaType('*', '*');
  static readonly OCTET_STREAM = new MediaType('application', 'octet-stream');
  static readonly TEXT_PLAIN = new MediaType('text', 'plain');

  public readonly type: string;
  public readonly subtype: string;
  public readonly parameters: Readonly<Record<string, string>>;

  constructor(type: string, subtype: string, parameters: Record<string, string> = {}) {
    this.type = type.trim().toLowerCase();
    this.subtype = subtype.trim().toLowerCase();

    // Parameters are stored sorted by key
    const keys = Object.keys(parameters).map(key => [key.trim().toLowerCase(), key] as const);
    keys.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
    const normalized: Record<string, string> = {};
    for (const [name, key] of keys) {
      const value = parameters[key];
      if (value !== undefined) {
        normalized[name] = value;
      }
    }
    this.parameters = Object.freeze(normalized);
  }

  /**
   * Parse an RFC 7231 media type such as `text/html; charset=utf-8`.
   * Returns `undefined` when the text is not a media type.
   */
  static parse(text: string): MediaType | undefined {
    let parsed: ReturnType<typeof parseContentType>;
    try {
      parsed = parseContentType(text.trim());
    } catch {
      return undefined;
    }
    const slash = parsed.type.indexOf('/');
    return new MediaType(
      parsed.type.substring(0, slash),
      parsed.type.substring(slash + 1),
      parsed.parameters
    );
  }

  hasParameters(): boolean {
    return Object.keys(this.parameters).length > 0;
  }

  /**
   * Same type without parameters
   */
  getBaseType(): MediaType {
    return this.hasParameters() ? new MediaType(this.type, this.subtype) : this;
  }

  toString(): string {
    let result = `${this.type}/${this.subtype}`;
    for (const [key, value] of Object.entries(this.parameters)) {
      result += `; ${key}=${value}`;
    }
    return result;
  }

  equals(other: unknown): boolean {
    return other instanceof MediaType && other.toString() === this.toString();
  }

  hashCode(): number {
    return hashString(this.toString());
  }

  compareTo(other: MediaType): number {
    const a = this.toString();
    const b = other.toString();
    return a < b ? -1 : a > b ? 1 : 0;
  }
}
