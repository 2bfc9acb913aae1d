import type { Marshaller } from '../marshaller';
import type { Loader } from '../loader';
import { SerializationError } from './config_store.errors';

export function encodeDocument(marshaller: Marshaller, loader: Loader, key: string, value: object): Buffer {
  try {
    return marshaller.marshal(value);
  } catch (error) {
    throw new SerializationError(
      { operation: 'marshal', key, format: marshaller.name, backend: loader.backend },
      { cause: error },
    );
  }
}

/**
 * Decodes onto `target`. Zero-length payloads are "exists but empty"
 * and leave the target untouched.
 */
export function decodeDocument(
  marshaller: Marshaller,
  loader: Loader,
  key: string,
  data: Uint8Array,
  target: object,
): void {
  if (data.length === 0) return;
  try {
    marshaller.unmarshal(data, target);
  } catch (error) {
    throw new SerializationError(
      { operation: 'unmarshal', key, format: marshaller.name, backend: loader.backend },
      { cause: error },
    );
  }
}
