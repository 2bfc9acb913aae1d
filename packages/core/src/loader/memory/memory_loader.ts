import type { Loader } from '../loader';
import { scopeOf } from '../loader';
import type { ConfigDatabase, ConfigStore } from '../../config_store';
import { NotFoundError, storeForLoader, validateLayout } from '../../config_store';
import type { StoreLayout } from '../../config_store';

/** scope -> name -> bytes */
export type MemoryData = Map<string, Map<string, Buffer>>;

/**
 * MemoryLoader - in-process Loader
 *
 * Copies bytes on read and write so callers can never mutate stored
 * entries through a buffer they hold.
 */
export class MemoryLoader implements Loader {
  readonly backend = 'memory';
  readonly scope: string;
  private readonly data: MemoryData;

  constructor(data: MemoryData, scope: string) {
    this.data = data;
    this.scope = scope;
  }

  async list(): Promise<string[]> {
    return Array.from(this.data.get(this.scope)?.keys() ?? []);
  }

  async read(name: string): Promise<Buffer> {
    const value = this.data.get(this.scope)?.get(name);
    if (value === undefined) {
      throw new NotFoundError(this.scope, name);
    }
    return Buffer.from(value);
  }

  async write(name: string, data: Uint8Array): Promise<void> {
    let entries = this.data.get(this.scope);
    if (!entries) {
      entries = new Map();
      this.data.set(this.scope, entries);
    }
    entries.set(name, Buffer.from(data));
  }

  async delete(name: string): Promise<void> {
    if (!this.data.get(this.scope)?.delete(name)) {
      throw new NotFoundError(this.scope, name);
    }
  }
}

/**
 * Options for MemoryConfigDatabase
 */
export interface MemoryConfigDatabaseOptions extends StoreLayout {
  /** Initial data, shared rather than copied */
  initial?: MemoryData;
}

/**
 * MemoryConfigDatabase - every scope lives in one shared map
 *
 * @example
 * // Test setup
 * const db = new MemoryConfigDatabase({ format: 'json' });
 * const store = await db.open('myapp', 'testns');
 * await store.marshal('config', { Value: 'hello' });
 *
 * // Assertions on raw bytes
 * expect(db.entries('myapp/testns').get('config.json')).toBeDefined();
 */
export class MemoryConfigDatabase implements ConfigDatabase {
  private readonly data: MemoryData;
  private readonly layout: StoreLayout;

  constructor(options: MemoryConfigDatabaseOptions = {}) {
    const { initial, ...layout } = options;
    validateLayout(layout);
    this.data = initial ?? new Map();
    this.layout = layout;
  }

  readonly open = async (app: string, ...namespaces: string[]): Promise<ConfigStore> => {
    return storeForLoader(new MemoryLoader(this.data, scopeOf(app, namespaces)), this.layout);
  };

  async close(): Promise<void> {
    // Nothing to release
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of ConfigDatabase, only for tests)
  // ─────────────────────────────────────────────────────────

  /** Raw entries of one scope */
  entries(scope: string): ReadonlyMap<string, Buffer> {
    return this.data.get(scope) ?? new Map();
  }

  /** Removes every scope */
  clear(): void {
    this.data.clear();
  }
}
