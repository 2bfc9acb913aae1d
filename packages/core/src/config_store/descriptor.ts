import type { Marshaller } from '../marshaller';
import { isFormatName } from '../marshaller';
import { UsageError } from './config_store.errors';

/** A bare key: the store picks the format. */
export interface KeyDescriptor {
  readonly kind: 'key';
  readonly key: string;
}

/** A key pinned to one format. */
export interface FormatDescriptor {
  readonly kind: 'format';
  readonly key: string;
  readonly marshaller: Marshaller;
}

/**
 * Identifies a document within a scope. `key` is always the logical
 * name, never the stored name with its extension.
 */
export type Descriptor = KeyDescriptor | FormatDescriptor;

/** Store methods accept a plain string as shorthand for `key(name)`. */
export type DescriptorInput = Descriptor | string;

export function key(name: string): KeyDescriptor {
  return { kind: 'key', key: name };
}

export function formatKey(name: string, marshaller: Marshaller): FormatDescriptor {
  return { kind: 'format', key: name, marshaller };
}

function isMarshaller(value: unknown): value is Marshaller {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    isFormatName(value.name) &&
    'extension' in value &&
    typeof value.extension === 'string' &&
    'marshal' in value &&
    typeof value.marshal === 'function' &&
    'unmarshal' in value &&
    typeof value.unmarshal === 'function'
  );
}

/**
 * Normalizes what callers pass to store methods. Input is checked at
 * run time since untyped callers can hand in anything.
 *
 * @throws UsageError for a missing descriptor or an unknown kind
 */
export function toDescriptor(input: unknown): Descriptor {
  if (typeof input === 'string') return key(input);
  if (input === null || input === undefined) {
    throw new UsageError('a descriptor is required');
  }
  if (typeof input !== 'object' || !('kind' in input) || !('key' in input) || typeof input.key !== 'string') {
    throw new UsageError('descriptor must be a string or an object with "kind" and "key"');
  }
  switch (input.kind) {
    case 'key':
      return key(input.key);
    case 'format':
      if (!('marshaller' in input) || !isMarshaller(input.marshaller)) {
        throw new UsageError(`format descriptor "${input.key}" has no valid marshaller`);
      }
      return formatKey(input.key, input.marshaller);
    default:
      throw new UsageError(`unknown descriptor kind: ${String(input.kind)}`);
  }
}

/** Human-readable form used in logs: `"name"` or `"name" (toml)`. */
export function describeDescriptor(descriptor: Descriptor): string {
  switch (descriptor.kind) {
    case 'key':
      return JSON.stringify(descriptor.key);
    case 'format':
      return `${JSON.stringify(descriptor.key)} (${descriptor.marshaller.name})`;
  }
}
