import type { ConfigStore } from './config_store';
import type { Descriptor, DescriptorInput } from './descriptor';
import { toDescriptor } from './descriptor';

/**
 * A store bound to one descriptor, for code that only ever touches a
 * single document (e.g. an application's own settings).
 */
export interface StoreBinding {
  readonly descriptor: Descriptor;
  marshal(value: object): Promise<void>;
  unmarshal<T extends object>(target: T): Promise<Descriptor>;
  delete(): Promise<void>;
}

/**
 * @throws UsageError when the descriptor is invalid
 */
export function bind(store: ConfigStore, input: DescriptorInput): StoreBinding {
  const descriptor = toDescriptor(input);
  return {
    descriptor,
    marshal: (value) => store.marshal(descriptor, value),
    unmarshal: (target) => store.unmarshal(descriptor, target),
    delete: () => store.delete(descriptor),
  };
}
