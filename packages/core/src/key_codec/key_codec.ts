/**
 * KeyCodec for transforming logical keys into storage-safe names.
 * Backends use the encoded form as a filename, a row name or a KV key.
 */
export interface KeyCodec {
  /** Transform key to storage-safe string */
  encode: (key: string) => string;
  /** Recover original key from encoded string */
  decode: (encoded: string) => string;
}

const HEX_DIGITS = '0123456789ABCDEF';

function needsEscape(code: number): boolean {
  return code === 0x2f /* / */ || code === 0x25 /* % */ || code === 0x00;
}

function fromHex(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;
  return -1;
}

/**
 * Escapes only `/`, `%` and NUL as `%XX` (uppercase hex).
 * Every other character, including non-ASCII, is left alone.
 */
export function encodeKey(key: string): string {
  let out = '';
  for (let i = 0; i < key.length; i++) {
    const code = key.charCodeAt(i);
    if (needsEscape(code)) {
      out += '%' + HEX_DIGITS.charAt(code >> 4) + HEX_DIGITS.charAt(code & 0x0f);
    } else {
      out += key.charAt(i);
    }
  }
  return out;
}

function escapeAt(encoded: string, i: number): number {
  if (encoded.charCodeAt(i) !== 0x25 || i + 2 >= encoded.length) return -1;
  const hi = fromHex(encoded.charCodeAt(i + 1));
  const lo = fromHex(encoded.charCodeAt(i + 2));
  return hi < 0 || lo < 0 ? -1 : (hi << 4) | lo;
}

function utf8OrVerbatim(bytes: number[], verbatim: string): string {
  const buffer = Buffer.from(bytes);
  const text = buffer.toString('utf-8');
  // Invalid sequences decode to U+FFFD and no longer re-encode to the same bytes
  return Buffer.from(text, 'utf-8').equals(buffer) ? text : verbatim;
}

/**
 * Decodes `%XX` sequences. Anything that is not a complete, valid escape
 * is copied through unchanged, so this never throws on arbitrary input.
 *
 * Escapes of bytes >= 0x80 come from names written by other tools: a run of
 * them is decoded as UTF-8 (`caf%C3%A9` is `café`), or copied through
 * unchanged when it is not valid UTF-8.
 */
export function decodeKey(encoded: string): string {
  let out = '';
  let i = 0;
  while (i < encoded.length) {
    const byte = escapeAt(encoded, i);
    if (byte < 0) {
      out += encoded.charAt(i);
      i += 1;
    } else if (byte < 0x80) {
      out += String.fromCharCode(byte);
      i += 3;
    } else {
      const start = i;
      const bytes: number[] = [];
      for (let next = byte; next >= 0x80; next = escapeAt(encoded, i)) {
        bytes.push(next);
        i += 3;
      }
      out += utf8OrVerbatim(bytes, encoded.slice(start, i));
    }
  }
  return out;
}

/**
 * Default codec used by every store unless overridden.
 */
export const DEFAULT_KEY_CODEC: KeyCodec = Object.freeze({
  encode: encodeKey,
  decode: decodeKey,
});

/**
 * Pass-through codec: names are stored exactly as given.
 * Used by the JSON-only SQLite store, whose rows are keyed by the bare key.
 */
export const IDENTITY_KEY_CODEC: KeyCodec = Object.freeze({
  encode: (key: string) => key,
  decode: (encoded: string) => encoded,
});
