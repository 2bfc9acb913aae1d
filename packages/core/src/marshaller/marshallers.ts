import * as TOML from '@iarna/toml';
import * as yaml from 'js-yaml';
import { encode as encodeMsgpack, decode as decodeMsgpack } from '@msgpack/msgpack';
import type { FormatName, Marshaller } from './marshaller';
import { isDocument } from './marshaller';

type TomlTable = Parameters<typeof TOML.stringify>[0];

function isTomlTable(value: unknown): value is TomlTable {
  return isDocument(value);
}

function toText(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('utf-8');
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function assignDocument(format: FormatName, target: object, decoded: unknown): void {
  if (!isDocument(decoded)) {
    throw new Error(`${format} payload is not a document (got ${describeValue(decoded)})`);
  }
  Object.assign(target, decoded);
}

export const TOML_MARSHALLER: Marshaller = Object.freeze({
  name: 'toml',
  extension: 'toml',
  marshal(value: object): Buffer {
    // TOML has no notion of undefined, functions or class instances:
    // reduce to JSON-compatible data first.
    const plain: unknown = JSON.parse(JSON.stringify(value));
    if (!isTomlTable(plain)) {
      throw new Error('toml can only encode a table (plain object) at the top level');
    }
    return Buffer.from(TOML.stringify(plain), 'utf-8');
  },
  unmarshal(data: Uint8Array, target: object): void {
    assignDocument('toml', target, TOML.parse(toText(data)));
  },
} satisfies Marshaller);

export const JSON_MARSHALLER: Marshaller = Object.freeze({
  name: 'json',
  extension: 'json',
  marshal(value: object): Buffer {
    return Buffer.from(JSON.stringify(value, null, 2), 'utf-8');
  },
  unmarshal(data: Uint8Array, target: object): void {
    const decoded: unknown = JSON.parse(toText(data));
    assignDocument('json', target, decoded);
  },
} satisfies Marshaller);

export const YAML_MARSHALLER: Marshaller = Object.freeze({
  name: 'yaml',
  extension: 'yaml',
  marshal(value: object): Buffer {
    return Buffer.from(yaml.dump(value, { noRefs: true, skipInvalid: true }), 'utf-8');
  },
  unmarshal(data: Uint8Array, target: object): void {
    assignDocument('yaml', target, yaml.load(toText(data)));
  },
} satisfies Marshaller);

export const MSGPACK_MARSHALLER: Marshaller = Object.freeze({
  name: 'msgpack',
  extension: 'msgpack',
  marshal(value: object): Buffer {
    const encoded = encodeMsgpack(value, { ignoreUndefined: true });
    return Buffer.from(encoded.buffer, encoded.byteOffset, encoded.byteLength);
  },
  unmarshal(data: Uint8Array, target: object): void {
    assignDocument('msgpack', target, decodeMsgpack(data));
  },
} satisfies Marshaller);

/**
 * Known formats in preference order: the first entry is the default
 * format of a MultiFormat store.
 */
export const KNOWN_MARSHALLERS: readonly Marshaller[] = Object.freeze([
  TOML_MARSHALLER,
  JSON_MARSHALLER,
  YAML_MARSHALLER,
  MSGPACK_MARSHALLER,
]);

export function marshallerByName(name: string): Marshaller | undefined {
  return KNOWN_MARSHALLERS.find((marshaller) => marshaller.name === name);
}

/**
 * Finds the marshaller whose extension is the suffix of a stored name.
 * Returns undefined for unknown extensions.
 */
export function marshallerByExtension(
  fileName: string,
  marshallers: readonly Marshaller[] = KNOWN_MARSHALLERS,
): Marshaller | undefined {
  return marshallers.find((marshaller) => fileName.endsWith(`.${marshaller.extension}`));
}
