import type { Loader } from '../loader';
import { scopeOf } from '../loader';
import type { ConfigDatabase, ConfigStore } from '../../config_store';
import { BackendError, NotFoundError, storeForLoader } from '../../config_store';
import type { Logger } from '../../logger';
import { logger as defaultLogger } from '../../logger';
import type { DatastoreClient } from './datastore_client';
import type { GoogleDatastoreClientOptions } from './google_datastore_client';
import { GoogleDatastoreClient } from './google_datastore_client';

/** gRPC status codes worth a retry by the caller: DEADLINE_EXCEEDED, ABORTED, UNAVAILABLE */
const TRANSIENT_CODES: readonly number[] = [4, 10, 14];

function isTransient(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'number' &&
    TRANSIENT_CODES.includes(error.code)
  );
}

/**
 * DatastoreLoader - entities of one scope in a remote document database
 */
export class DatastoreLoader implements Loader {
  readonly backend = 'datastore';
  readonly scope: string;
  private readonly client: DatastoreClient;

  constructor(client: DatastoreClient, scope: string) {
    this.client = client;
    this.scope = scope;
  }

  private fail(operation: string, error: unknown, name?: string): BackendError {
    return new BackendError(
      { backend: this.backend, operation, scope: this.scope, entry: name, retryable: isTransient(error) },
      { cause: error },
    );
  }

  async list(): Promise<string[]> {
    try {
      return await this.client.listNames(this.scope);
    } catch (error) {
      throw this.fail('list', error);
    }
  }

  async read(name: string): Promise<Buffer> {
    let data: Buffer | null;
    try {
      data = await this.client.read(this.scope, name);
    } catch (error) {
      throw this.fail('read', error, name);
    }
    if (data === null) {
      throw new NotFoundError(this.scope, name);
    }
    return data;
  }

  async write(name: string, data: Uint8Array): Promise<void> {
    try {
      await this.client.write(this.scope, name, Buffer.from(data));
    } catch (error) {
      throw this.fail('write', error, name);
    }
  }

  async delete(name: string): Promise<void> {
    let removed: boolean;
    try {
      removed = await this.client.remove(this.scope, name);
    } catch (error) {
      throw this.fail('delete', error, name);
    }
    if (!removed) {
      throw new NotFoundError(this.scope, name);
    }
  }
}

/**
 * Options for DatastoreConfigDatabase
 */
export interface DatastoreConfigDatabaseOptions extends GoogleDatastoreClientOptions { }

/**
 * DatastoreConfigDatabase - JSON documents in Google Cloud Datastore
 *
 * Pass a client to use another implementation of DatastoreClient
 * (MemoryDatastoreClient in tests).
 */
export class DatastoreConfigDatabase implements ConfigDatabase {
  private readonly client: DatastoreClient;
  private readonly logger: Logger;

  constructor(options: DatastoreConfigDatabaseOptions = {}, client?: DatastoreClient) {
    this.logger = options.logger ?? defaultLogger;
    this.client = client ?? new GoogleDatastoreClient({ ...options, logger: this.logger });
  }

  readonly open = async (app: string, ...namespaces: string[]): Promise<ConfigStore> => {
    const scope = scopeOf(app, namespaces);
    this.logger.debug(`opened datastore scope ${scope}`);
    return storeForLoader(new DatastoreLoader(this.client, scope), { format: 'json' });
  };

  async close(): Promise<void> {
    // The client keeps no handle that needs releasing
  }
}
