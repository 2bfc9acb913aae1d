import type { Marshaller } from '../marshaller';
import type { Loader } from '../loader';
import type { KeyCodec } from '../key_codec';
import { DEFAULT_KEY_CODEC } from '../key_codec';
import type { ConfigStore } from './config_store';
import type { Descriptor, DescriptorInput } from './descriptor';
import { formatKey, key, toDescriptor } from './descriptor';
import { UsageError } from './config_store.errors';
import { decodeDocument, encodeDocument } from './serialization';

/**
 * Options for SimpleStore
 */
export interface SimpleStoreOptions {
  /** Key encoder for stored names (default: DEFAULT_KEY_CODEC) */
  keyCodec?: KeyCodec;

  /** Append the marshaller's extension to stored names (default: true) */
  useExtension?: boolean;
}

/**
 * SimpleStore - one format fixed at construction
 *
 * Stored name = `keyCodec.encode(key) + '.' + extension`, e.g. the key
 * `a/b%` becomes `a%2Fb%25.toml`.
 *
 * @example
 * const store = new SimpleStore(loader, TOML_MARSHALLER);
 * await store.marshal('server', { port: 8080 });
 */
export class SimpleStore implements ConfigStore {
  private readonly loader: Loader;
  private readonly marshaller: Marshaller;
  private readonly keyCodec: KeyCodec;
  private readonly suffix: string;

  constructor(loader: Loader, marshaller: Marshaller, options: SimpleStoreOptions = {}) {
    this.loader = loader;
    this.marshaller = marshaller;
    this.keyCodec = options.keyCodec ?? DEFAULT_KEY_CODEC;
    this.suffix = (options.useExtension ?? true) ? `.${marshaller.extension}` : '';
  }

  private nameFor(name: string): string {
    return `${this.keyCodec.encode(name)}${this.suffix}`;
  }

  /**
   * Accepts a bare key or a format descriptor naming this store's format.
   */
  private resolve(input: DescriptorInput): string {
    const descriptor = toDescriptor(input);
    switch (descriptor.kind) {
      case 'key':
        return descriptor.key;
      case 'format':
        if (descriptor.marshaller.name !== this.marshaller.name) {
          throw new UsageError(
            `store only holds ${this.marshaller.name} documents, "${descriptor.key}" asks for ${descriptor.marshaller.name}`,
          );
        }
        return descriptor.key;
    }
  }

  async list(): Promise<Descriptor[]> {
    const names = await this.loader.list();
    return names.map((name) => {
      // Foreign entries without the suffix are still listed
      const stem = this.suffix && name.endsWith(this.suffix) ? name.slice(0, -this.suffix.length) : name;
      return key(this.keyCodec.decode(stem));
    });
  }

  async marshal(descriptor: DescriptorInput, value: object): Promise<void> {
    const name = this.resolve(descriptor);
    const data = encodeDocument(this.marshaller, this.loader, name, value);
    await this.loader.write(this.nameFor(name), data);
  }

  async unmarshal<T extends object>(descriptor: DescriptorInput, target: T): Promise<Descriptor> {
    const name = this.resolve(descriptor);
    const data = await this.loader.read(this.nameFor(name));
    decodeDocument(this.marshaller, this.loader, name, data, target);
    return formatKey(name, this.marshaller);
  }

  async delete(descriptor: DescriptorInput): Promise<void> {
    const name = this.resolve(descriptor);
    await this.loader.delete(this.nameFor(name));
  }
}
