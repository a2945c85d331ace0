import { InvalidArgumentError } from './errors.js';

/**
 * RFC 2045 tspecials, except "/" which is handled as the separator
 */
const TSPECIALS = new Set(['(', ')', '<', '>', '@', ',', ';', ':', '\\', '"', '[', ']', '?', '=']);

/**
 * Check that a string is a valid media type name (RFC 2045 section 5.1, simplified):
 *
 * ```
 * name      := token "/" token
 * token     := 1*<any US-ASCII CHAR except SPACE, CTLs, or tspecials>
 * tspecials := "(" / ")" / "<" / ">" / "@" / "," / ";" / ":" /
 *              "\" / <"> / "/" / "[" / "]" / "?" / "="
 * ```
 *
 * @throws InvalidArgumentError when `name` is null or undefined
 */
export function isValid(name: string | null | undefined): boolean {
  if (name === null || name === undefined) {
    throw new InvalidArgumentError('Name is missing');
  }

  let slash = false;
  for (let i = 0; i < name.length; i++) {
    const code = name.charCodeAt(i);
    const ch = name.charAt(i);
    if (code <= 0x20 || code >= 127 || TSPECIALS.has(ch)) {
      return false;
    }
    if (ch === '/') {
      if (slash || i === 0 || i + 1 === name.length) {
        return false;
      }
      slash = true;
    }
  }
  return slash;
}
