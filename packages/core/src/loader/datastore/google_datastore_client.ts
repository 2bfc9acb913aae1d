import { Datastore } from '@google-cloud/datastore';
import type { DatastoreClient } from './datastore_client';
import type { Logger } from '../../logger';
import { logger as defaultLogger } from '../../logger';

/** Kind of the ancestor entity that groups one scope */
export const SCOPE_KIND = 'ConfigScope';

export interface GoogleDatastoreClientOptions {
  /** default: the ambient Google Cloud project */
  projectId?: string;

  /** Datastore namespace (default: the default namespace) */
  namespace?: string;

  /** Entity kind of stored documents (default: "Config") */
  kind?: string;

  logger?: Logger;
}

function entityData(entity: object): Buffer {
  const data: unknown = 'data' in entity ? entity.data : undefined;
  if (Buffer.isBuffer(data)) return data;
  // Older documents may hold the payload as a string property
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  return Buffer.alloc(0);
}

function entityKeyName(entity: unknown): string | undefined {
  if (typeof entity !== 'object' || entity === null) return undefined;
  const entityKey: unknown = Reflect.get(entity, Datastore.KEY);
  if (typeof entityKey !== 'object' || entityKey === null || !('name' in entityKey)) return undefined;
  return typeof entityKey.name === 'string' ? entityKey.name : undefined;
}

/**
 * GoogleDatastoreClient - Cloud Datastore entities
 *
 * Key path: `[ConfigScope, <scope>, <kind>, <name>]`, so every scope is one
 * entity group. The payload is the unindexed `data` property.
 */
export class GoogleDatastoreClient implements DatastoreClient {
  readonly kind: string;
  private readonly datastore: Datastore;
  private readonly logger: Logger;

  constructor(options: GoogleDatastoreClientOptions = {}, datastore?: Datastore) {
    this.kind = options.kind ?? 'Config';
    this.logger = options.logger ?? defaultLogger;
    this.datastore = datastore ?? new Datastore({ projectId: options.projectId, namespace: options.namespace });
  }

  private entityKey(scope: string, name: string) {
    return this.datastore.key([SCOPE_KIND, scope, this.kind, name]);
  }

  async listNames(scope: string): Promise<string[]> {
    const query = this.datastore
      .createQuery(this.kind)
      .hasAncestor(this.datastore.key([SCOPE_KIND, scope]))
      .select('__key__');
    const [entities] = await this.datastore.runQuery(query);
    const names: string[] = [];
    for (const entity of entities) {
      const name = entityKeyName(entity);
      if (name !== undefined) names.push(name);
    }
    return names;
  }

  async read(scope: string, name: string): Promise<Buffer | null> {
    const response = await this.datastore.get(this.entityKey(scope, name));
    const entity: unknown = response[0];
    if (typeof entity !== 'object' || entity === null) return null;
    return entityData(entity);
  }

  async write(scope: string, name: string, data: Buffer): Promise<void> {
    await this.datastore.save({
      key: this.entityKey(scope, name),
      data: [{ name: 'data', value: data, excludeFromIndexes: true }],
    });
  }

  async remove(scope: string, name: string): Promise<boolean> {
    const key = this.entityKey(scope, name);
    const transaction = this.datastore.transaction();
    await transaction.run();
    try {
      const response = await transaction.get(key);
      const entity: unknown = response[0];
      if (entity === undefined || entity === null) {
        await transaction.rollback();
        return false;
      }
      transaction.delete(key);
      await transaction.commit();
      return true;
    } catch (error) {
      // The get or commit failure is the one callers see
      await transaction.rollback().catch((rollbackError: unknown) => {
        this.logger.warn(`datastore rollback failed for ${scope}/${name}: ${String(rollbackError)}`);
      });
      throw error;
    }
  }
}
