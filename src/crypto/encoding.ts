/**
 * Base-N and string encoding utilities.
 *
 * Base-N coders come from @scure/base, which rejects bad characters, bad
 * padding and non-zero trailing bits instead of skipping over them.
 */
import { base16, base32, base32hex, base64, base64url } from '@scure/base';
import { TaCryptoError } from '../errors.js';

// ── Bases ────────────────────────────────────────────────────────────────────

export const ENCODING_BASES = ['b64', 'standard_b64', 'urlsafe_b64', 'b32', 'b32hex', 'b16'] as const;

export type EncodingBase = (typeof ENCODING_BASES)[number];

/** A reversible byte ↔ text coder for one base. */
export interface Codec {
  readonly base: EncodingBase;
  encode(bytes: Uint8Array): string;
  decode(text: string): Uint8Array;
}

interface BytesCoder {
  encode(data: Uint8Array): string;
  decode(str: string): Uint8Array;
}

const CODERS: Readonly<Record<EncodingBase, BytesCoder>> = Object.freeze({
  b64: base64,
  standard_b64: base64,
  urlsafe_b64: base64url,
  b32: base32,
  b32hex: base32hex,
  b16: base16,
});

export function isEncodingBase(name: string): name is EncodingBase {
  return (ENCODING_BASES as readonly string[]).includes(name);
}

/**
 * Resolve a base name ("b64", "urlsafe_b64", "b32", "b32hex", "b16").
 * Names are matched exactly.
 */
export function parseEncodingBase(name: string): EncodingBase {
  if (!isEncodingBase(name)) {
    throw TaCryptoError.configuration(
      `unknown encoding base "${name}". Expected one of ${ENCODING_BASES.join(', ')}.`,
    );
  }
  return name;
}

export function getCodec(name: string): Codec {
  const base = parseEncodingBase(name);
  const coder = CODERS[base];
  return {
    base,
    encode: (bytes) => coder.encode(bytes),
    decode(text) {
      try {
        return coder.decode(text);
      } catch (err) {
        throw TaCryptoError.malformedEncoding(base, err);
      }
    },
  };
}

/**
 * Encode bytes in the given base (default: standard padded base64).
 */
export function encode(bytes: Uint8Array, base: string = 'b64'): string {
  return getCodec(base).encode(bytes);
}

/**
 * Decode base-N text. Throws MALFORMED_ENCODING on any invalid input.
 */
export function decode(text: string, base: string = 'b64'): Uint8Array {
  return getCodec(base).decode(text);
}

// ── URL quoting ──────────────────────────────────────────────────────────────

/**
 * Percent-encode text for embedding in a URL. Unreserved characters and "/"
 * are left as they are; everything else is escaped as UTF-8 "%XX".
 */
export function urlQuote(text: string): string {
  return encodeURIComponent(text)
    .replace(/[!'()*]/g, c => '%' + c.charCodeAt(0).toString(16).toUpperCase())
    .replace(/%2F/g, '/');
}

/**
 * Reverse {@link urlQuote}, returning the raw bytes. Each "%XX" escape becomes
 * the byte 0xXX, whether or not the result is valid UTF-8; other characters
 * are taken as UTF-8. A "%" not followed by two hex digits is rejected.
 */
export function urlUnquote(text: string): Uint8Array {
  const out: number[] = [];
  let i = 0;
  while (i < text.length) {
    if (text[i] === '%') {
      const hex = text.slice(i + 1, i + 3);
      if (!/^[0-9A-Fa-f]{2}$/.test(hex)) {
        throw TaCryptoError.malformedEncoding('url-quoted');
      }
      out.push(parseInt(hex, 16));
      i += 3;
    } else {
      const next = text.indexOf('%', i);
      const end = next === -1 ? text.length : next;
      out.push(...strToBytes(text.slice(i, end)));
      i = end;
    }
  }
  return Uint8Array.from(out);
}

// ── UTF-8 ────────────────────────────────────────────────────────────────────

/**
 * Encode a UTF-8 string to bytes.
 */
export function strToBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

/**
 * Decode bytes to a UTF-8 string.
 */
export function bytesToStr(b: Uint8Array): string {
  return new TextDecoder().decode(b);
}
