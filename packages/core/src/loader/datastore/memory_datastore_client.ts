import type { DatastoreClient } from './datastore_client';

/**
 * MemoryDatastoreClient - in-process DatastoreClient for tests
 */
export class MemoryDatastoreClient implements DatastoreClient {
  private readonly entities = new Map<string, Map<string, Buffer>>();

  async listNames(scope: string): Promise<string[]> {
    return Array.from(this.entities.get(scope)?.keys() ?? []);
  }

  async read(scope: string, name: string): Promise<Buffer | null> {
    const data = this.entities.get(scope)?.get(name);
    return data ? Buffer.from(data) : null;
  }

  async write(scope: string, name: string, data: Buffer): Promise<void> {
    let scoped = this.entities.get(scope);
    if (!scoped) {
      scoped = new Map();
      this.entities.set(scope, scoped);
    }
    scoped.set(name, Buffer.from(data));
  }

  async remove(scope: string, name: string): Promise<boolean> {
    return this.entities.get(scope)?.delete(name) ?? false;
  }
}
