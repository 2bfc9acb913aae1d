/**
 * Marshaller Interface
 *
 * A serialization format: an encode/decode pair plus the filename extension
 * that names stored entries and recognises them again on list().
 *
 * Marshallers are stateless. Decoding assigns the top-level fields of the
 * decoded document onto the caller's target object, so a zero-length payload
 * (handled by the stores) leaves the target as it was.
 */

export type FormatName = 'toml' | 'json' | 'yaml' | 'msgpack';

export const FORMAT_NAMES: readonly FormatName[] = Object.freeze(['toml', 'json', 'yaml', 'msgpack'] as const);

export interface Marshaller {
  /** Format identifier, as accepted by the factory and the CLI */
  readonly name: FormatName;

  /** Canonical extension, without the leading dot (e.g. "toml") */
  readonly extension: string;

  /**
   * Encodes a document.
   * @throws if the value cannot be represented in this format
   */
  marshal(value: object): Buffer;

  /**
   * Decodes a payload and assigns its fields onto `target`.
   * @throws if the payload is malformed or is not a document (object)
   */
  unmarshal(data: Uint8Array, target: object): void;
}

export type Document = Record<string, unknown>;

/**
 * A stored document is always a plain object: scalars and arrays
 * cannot be assigned onto a target.
 */
export function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isFormatName(value: unknown): value is FormatName {
  return typeof value === 'string' && FORMAT_NAMES.some((name) => name === value);
}
