import * as fs from 'fs/promises';
import * as path from 'path';
import type { Loader } from '../loader';
import { errorCode, scopeOf } from '../loader';
import type { ConfigDatabase, ConfigStore, StoreLayout } from '../../config_store';
import { BackendError, NotFoundError, UsageError, storeForLoader, validateLayout } from '../../config_store';
import type { Logger } from '../../logger';
import { logger as defaultLogger } from '../../logger';
import { userConfigDir } from './user_config_dir';

/**
 * Rejects names that would leave the directory they are joined to.
 * Blocks: empty, `.`, `..`, `/`, the platform separator, NUL.
 */
function assertSafeSegment(segment: string, what: string): void {
  if (segment === '' || segment === '.' || segment === '..') {
    throw new UsageError(`invalid ${what} "${segment}"`);
  }
  if (segment.includes('/') || segment.includes(path.sep) || segment.includes('\u0000')) {
    throw new UsageError(`invalid ${what} "${segment}": separators and NUL are not allowed`);
  }
}

/**
 * FsLoader - one file per stored name under `<root>`
 *
 * Sub-directories (nested namespaces) are not entries and are skipped by
 * list().
 */
export class FsLoader implements Loader {
  readonly backend = 'directory';
  readonly scope: string;
  readonly root: string;

  constructor(root: string, scope: string) {
    this.root = root;
    this.scope = scope;
  }

  private filePath(name: string): string {
    assertSafeSegment(name, 'entry name');
    return path.join(this.root, name);
  }

  private fail(operation: string, error: unknown, name?: string): BackendError {
    return new BackendError({ backend: this.backend, operation, scope: this.scope, entry: name }, { cause: error });
  }

  async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.root, { withFileTypes: true });
      return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw this.fail('list', error);
    }
  }

  async read(name: string): Promise<Buffer> {
    const filePath = this.filePath(name);
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new NotFoundError(this.scope, name, { cause: error });
      }
      throw this.fail('read', error, name);
    }
  }

  async write(name: string, data: Uint8Array): Promise<void> {
    const filePath = this.filePath(name);
    try {
      await fs.mkdir(this.root, { recursive: true });
      await fs.writeFile(filePath, data);
    } catch (error) {
      throw this.fail('write', error, name);
    }
  }

  async delete(name: string): Promise<void> {
    const filePath = this.filePath(name);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new NotFoundError(this.scope, name, { cause: error });
      }
      throw this.fail('delete', error, name);
    }
  }
}

/**
 * Options for FsConfigDatabase
 */
export interface FsConfigDatabaseOptions extends StoreLayout {
  /** Root directory (default: userConfigDir()) */
  basePath?: string;

  logger?: Logger;
}

/**
 * FsConfigDatabase - directory backend
 *
 * Layout: `<basePath>/<app>/<ns...>/<encoded-key>.<ext>`. The scope
 * directory is created when the scope is opened.
 *
 * @example
 * const db = new FsConfigDatabase({ basePath: '/tmp/conf', format: 'yaml' });
 * const store = await db.open('myapp', 'prod');
 * await store.marshal('server', { port: 8080 });
 * // -> /tmp/conf/myapp/prod/server.yaml
 */
export class FsConfigDatabase implements ConfigDatabase {
  readonly basePath: string;
  private readonly layout: StoreLayout;
  private readonly logger: Logger;

  constructor(options: FsConfigDatabaseOptions = {}) {
    const { basePath, logger, ...layout } = options;
    validateLayout(layout);
    this.basePath = basePath ?? userConfigDir();
    this.layout = layout;
    this.logger = logger ?? defaultLogger;
  }

  readonly open = async (app: string, ...namespaces: string[]): Promise<ConfigStore> => {
    assertSafeSegment(app, 'application name');
    for (const namespace of namespaces) {
      assertSafeSegment(namespace, 'namespace');
    }
    const scope = scopeOf(app, namespaces);
    const root = path.join(this.basePath, app, ...namespaces);
    try {
      await fs.mkdir(root, { recursive: true });
    } catch (error) {
      throw new BackendError({ backend: 'directory', operation: 'open', scope }, { cause: error });
    }
    this.logger.debug(`opened directory store ${scope} at ${root}`);
    return storeForLoader(new FsLoader(root, scope), this.layout);
  };

  async close(): Promise<void> {
    // Files are opened per operation
  }
}
