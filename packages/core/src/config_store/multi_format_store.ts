import type { Marshaller } from '../marshaller';
import { KNOWN_MARSHALLERS, marshallerByExtension } from '../marshaller';
import type { Loader } from '../loader';
import type { KeyCodec } from '../key_codec';
import { DEFAULT_KEY_CODEC } from '../key_codec';
import type { ConfigStore } from './config_store';
import type { Descriptor, DescriptorInput } from './descriptor';
import { formatKey, key, toDescriptor } from './descriptor';
import { AggregateStoreError, NotFoundError, UsageError, isNotFound, toError } from './config_store.errors';
import { decodeDocument, encodeDocument } from './serialization';

/**
 * Options for MultiFormat
 */
export interface MultiFormatOptions {
  /** Key encoder for stored names (default: DEFAULT_KEY_CODEC) */
  keyCodec?: KeyCodec;
}

/**
 * MultiFormat - an ordered list of formats over one loader
 *
 * Format resolution for a bare key:
 * - marshal writes the first (preferred) format only. Copies in other
 *   formats are left as they are.
 * - unmarshal reads the first format, in list order, that reads and decodes.
 * - delete removes the key in every format.
 *
 * A format descriptor always targets exactly that format.
 */
export class MultiFormat implements ConfigStore {
  private readonly loader: Loader;
  private readonly marshallers: readonly Marshaller[];
  private readonly preferred: Marshaller;
  private readonly keyCodec: KeyCodec;

  /**
   * @param marshallers - formats in preference order; an empty list means KNOWN_MARSHALLERS
   */
  constructor(loader: Loader, marshallers: readonly Marshaller[] = KNOWN_MARSHALLERS, options: MultiFormatOptions = {}) {
    this.loader = loader;
    this.marshallers = marshallers.length > 0 ? marshallers : KNOWN_MARSHALLERS;
    const [preferred] = this.marshallers;
    if (!preferred) {
      throw new UsageError('MultiFormat needs at least one marshaller');
    }
    this.preferred = preferred;
    this.keyCodec = options.keyCodec ?? DEFAULT_KEY_CODEC;
  }

  private nameFor(name: string, marshaller: Marshaller): string {
    return `${this.keyCodec.encode(name)}.${marshaller.extension}`;
  }

  async list(): Promise<Descriptor[]> {
    const names = await this.loader.list();
    return names.map((name) => {
      const marshaller = marshallerByExtension(name, this.marshallers);
      if (!marshaller) {
        return key(this.keyCodec.decode(name));
      }
      const stem = name.slice(0, -(marshaller.extension.length + 1));
      return formatKey(this.keyCodec.decode(stem), marshaller);
    });
  }

  async marshal(input: DescriptorInput, value: object): Promise<void> {
    const descriptor = toDescriptor(input);
    const marshaller = descriptor.kind === 'format' ? descriptor.marshaller : this.preferred;
    const data = encodeDocument(marshaller, this.loader, descriptor.key, value);
    await this.loader.write(this.nameFor(descriptor.key, marshaller), data);
  }

  async unmarshal<T extends object>(input: DescriptorInput, target: T): Promise<Descriptor> {
    const descriptor = toDescriptor(input);
    switch (descriptor.kind) {
      case 'format':
        await this.readInto(descriptor.key, descriptor.marshaller, target);
        return descriptor;
      case 'key':
        return this.scanInto(descriptor.key, target);
    }
  }

  private async readInto(name: string, marshaller: Marshaller, target: object): Promise<void> {
    const data = await this.loader.read(this.nameFor(name, marshaller));
    decodeDocument(marshaller, this.loader, name, data, target);
  }

  /**
   * Tries each format in list order. A format that is missing or fails
   * to decode moves the scan on; the last failure is reported when no
   * format succeeds.
   */
  private async scanInto(name: string, target: object): Promise<Descriptor> {
    let lastError: unknown = new NotFoundError(this.loader.scope, name);
    for (const marshaller of this.marshallers) {
      // Decode into a scratch object so a failed attempt cannot leave
      // partial fields on the target.
      const scratch = {};
      try {
        await this.readInto(name, marshaller, scratch);
      } catch (error) {
        lastError = error;
        continue;
      }
      Object.assign(target, scratch);
      return formatKey(name, marshaller);
    }
    throw lastError;
  }

  async delete(input: DescriptorInput): Promise<void> {
    const descriptor = toDescriptor(input);
    if (descriptor.kind === 'format') {
      await this.loader.delete(this.nameFor(descriptor.key, descriptor.marshaller));
      return;
    }

    const failures: Error[] = [];
    let deleted = 0;
    for (const marshaller of this.marshallers) {
      try {
        await this.loader.delete(this.nameFor(descriptor.key, marshaller));
        deleted++;
      } catch (error) {
        if (!isNotFound(error)) {
          failures.push(toError(error));
        }
      }
    }

    const [onlyFailure] = failures;
    if (failures.length === 1 && onlyFailure) throw onlyFailure;
    if (failures.length > 1) throw new AggregateStoreError(failures);
    if (deleted === 0) throw new NotFoundError(this.loader.scope, descriptor.key);
  }
}
