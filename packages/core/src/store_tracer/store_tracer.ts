import * as path from 'path';
import { inspect } from 'util';
import type { ConfigStore, Opener } from '../config_store';
import type { Descriptor, DescriptorInput } from '../config_store';
import { describeDescriptor } from '../config_store';
import type { Logger } from '../logger';
import { logger as defaultLogger } from '../logger';
import type { TracerSettings } from './store_tracer.types';

/**
 * Name a traced store is known by: `app/ns1/ns2`, or '' for no scope at all.
 */
export function storeName(app: string, namespaces: readonly string[]): string {
  if (app === '' && namespaces.length === 0) return '';
  return path.posix.join(app, ...namespaces);
}

function describeInput(input: DescriptorInput): string {
  if (input === null || input === undefined) return String(input);
  if (typeof input === 'string') return JSON.stringify(input);
  return describeDescriptor(input);
}

function formatValue(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: Infinity });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Logging decorator around a ConfigStore. Results and errors are passed
 * through as they are.
 */
class TracedStore implements ConfigStore {
  constructor(
    private readonly name: string,
    private readonly store: ConfigStore,
    private readonly logger: Logger,
    private readonly logRequests: boolean,
    private readonly logResponses: boolean,
  ) {}

  private async trace<T>(call: string, run: () => Promise<T>, payload?: (result: T) => string): Promise<T> {
    const line = `config store ${this.name}: ${call}`;
    if (this.logRequests) {
      this.logger.info(line);
    }
    let result: T;
    try {
      result = await run();
    } catch (error) {
      this.logger.info(`${line} -> error: ${errorMessage(error)}`);
      throw error;
    }
    const details = this.logResponses && payload ? ` ${payload(result)}` : '';
    this.logger.info(`${line} -> ok${details}`);
    return result;
  }

  list(): Promise<Descriptor[]> {
    return this.trace('list()', () => this.store.list(), (descriptors) =>
      `[${descriptors.map(describeDescriptor).join(', ')}]`,
    );
  }

  marshal(descriptor: DescriptorInput, value: object): Promise<void> {
    return this.trace(`marshal(${describeInput(descriptor)})`, () => this.store.marshal(descriptor, value), () =>
      `value=${formatValue(value)}`,
    );
  }

  unmarshal<T extends object>(descriptor: DescriptorInput, target: T): Promise<Descriptor> {
    return this.trace(`unmarshal(${describeInput(descriptor)})`, () => this.store.unmarshal(descriptor, target), (read) =>
      `${describeDescriptor(read)} ${formatValue(target)}`,
    );
  }

  delete(descriptor: DescriptorInput): Promise<void> {
    return this.trace(`delete(${describeInput(descriptor)})`, () => this.store.delete(descriptor));
  }
}

/**
 * StoreTracer - opt-in call logging for stores and openers
 *
 * @example
 * const tracer = new StoreTracer({ enabled: true, exclude: ['myapp/secrets'] });
 * const open = tracer.wrapOpener(db.open);
 * const store = await open('myapp', 'prod');
 * await store.list();
 * // config store myapp/prod: list()
 * // config store myapp/prod: list() -> ok
 */
export class StoreTracer {
  private readonly settings: Required<TracerSettings>;
  private readonly logger: Logger;

  constructor(settings: TracerSettings = {}, logger: Logger = defaultLogger) {
    this.settings = {
      enabled: settings.enabled ?? false,
      logRequests: settings.logRequests ?? true,
      logResponses: settings.logResponses ?? false,
      include: [...(settings.include ?? [])],
      exclude: [...(settings.exclude ?? [])],
    };
    this.logger = logger;
  }

  get active(): boolean {
    return this.settings.enabled || this.settings.logResponses;
  }

  enabledFor(name: string): boolean {
    if (!this.active) return false;
    if (this.settings.exclude.some((prefix) => name.startsWith(prefix))) return false;
    if (this.settings.include.length === 0) return true;
    return this.settings.include.some((prefix) => name.startsWith(prefix));
  }

  wrapStore(name: string, store: ConfigStore): ConfigStore {
    if (!this.enabledFor(name)) return store;
    return new TracedStore(name, store, this.logger, this.settings.logRequests, this.settings.logResponses);
  }

  wrapOpener(opener: Opener): Opener {
    return async (app, ...namespaces) => {
      const store = await opener(app, ...namespaces);
      return this.wrapStore(storeName(app, namespaces), store);
    };
  }
}
