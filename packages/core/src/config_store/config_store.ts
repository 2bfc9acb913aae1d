/**
 * ConfigStore Interface
 *
 * Named configuration documents within one scope (`app/ns1/ns2`), backed
 * by any Loader. A store turns a Descriptor into a stored name (key codec
 * plus format extension), serializes with a Marshaller and delegates the
 * bytes to the loader.
 *
 * Implementations:
 * - SimpleStore: one format fixed at construction
 * - MultiFormat: an ordered list of formats, the first one preferred
 *
 * @example
 * ```typescript
 * import { key } from '@confstore/core';
 * import { FsConfigDatabase } from '@confstore/core/fs';
 *
 * const db = new FsConfigDatabase({ basePath: '/tmp/conf' });
 * const store = await db.open('myapp', 'prod');
 * await store.marshal(key('server'), { port: 8080 });
 *
 * const server: { port?: number } = {};
 * await store.unmarshal('server', server);
 * ```
 */

import type { Descriptor, DescriptorInput } from './descriptor';

export interface ConfigStore {
  /**
   * Lists every stored document of the scope.
   * A multi-format store returns one descriptor per stored format.
   */
  list(): Promise<Descriptor[]>;

  /**
   * Encodes `value` and writes it under the descriptor's name,
   * replacing any previous content.
   */
  marshal(descriptor: DescriptorInput, value: object): Promise<void>;

  /**
   * Reads a document and assigns its fields onto `target`.
   * A zero-length entry succeeds without touching `target`.
   *
   * @returns the format descriptor of the entry that was actually read
   * @throws NotFoundError when no entry matches
   */
  unmarshal<T extends object>(descriptor: DescriptorInput, target: T): Promise<Descriptor>;

  /**
   * @throws NotFoundError when no entry matches
   */
  delete(descriptor: DescriptorInput): Promise<void>;
}

/**
 * Opens the store of one scope. Backends create whatever the scope needs
 * (directories, buckets) on open.
 */
export type Opener = (app: string, ...namespaces: string[]) => Promise<ConfigStore>;

/**
 * A backend handle serving any number of scopes.
 */
export interface ConfigDatabase {
  readonly open: Opener;

  /** Releases the handle. Stores opened from it must not be used afterwards. */
  close(): Promise<void>;
}
