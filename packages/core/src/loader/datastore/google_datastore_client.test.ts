import { Datastore } from '@google-cloud/datastore';
import type { Logger } from '../../logger';
import { GoogleDatastoreClient, SCOPE_KIND } from './google_datastore_client';

// ─── Test Helpers ───────────────────────────────────────────

function createMockDatastore() {
  const query = {
    hasAncestor: jest.fn(),
    select: jest.fn(),
  };
  query.hasAncestor.mockReturnValue(query);
  query.select.mockReturnValue(query);

  const transaction = {
    run: jest.fn().mockResolvedValue([]),
    get: jest.fn(),
    delete: jest.fn(),
    commit: jest.fn().mockResolvedValue([]),
    rollback: jest.fn().mockResolvedValue([]),
  };

  const datastore = {
    key: jest.fn((path: unknown[]) => ({ path })),
    createQuery: jest.fn().mockReturnValue(query),
    runQuery: jest.fn(),
    get: jest.fn(),
    save: jest.fn().mockResolvedValue([]),
    transaction: jest.fn().mockReturnValue(transaction),
  };

  return { datastore, query, transaction };
}

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function keyed(name: unknown): object {
  return { [Datastore.KEY]: name === undefined ? { id: '42' } : { name } };
}

describe('GoogleDatastoreClient', () => {
  let mocks: ReturnType<typeof createMockDatastore>;
  let logger: jest.Mocked<Logger>;
  let client: GoogleDatastoreClient;

  const scope = 'myapp/prod';
  const entityPath = [SCOPE_KIND, scope, 'Setting', 'server.json'];

  beforeEach(() => {
    mocks = createMockDatastore();
    logger = createMockLogger();
    client = new GoogleDatastoreClient({ kind: 'Setting', logger }, mocks.datastore as unknown as Datastore);
  });

  it('should default the entity kind to Config', () => {
    expect(new GoogleDatastoreClient({}, mocks.datastore as unknown as Datastore).kind).toBe('Config');
  });

  // ─────────────────────────────────────────────────────────
  // read
  // ─────────────────────────────────────────────────────────

  describe('read', () => {
    it('should get the entity under the scope ancestor', async () => {
      mocks.datastore.get.mockResolvedValue([{ data: Buffer.from('{"port":8080}') }]);

      const data = await client.read(scope, 'server.json');

      expect(mocks.datastore.key).toHaveBeenCalledWith(entityPath);
      expect(mocks.datastore.get).toHaveBeenCalledWith({ path: entityPath });
      expect(data?.toString('utf-8')).toBe('{"port":8080}');
    });

    it('should return null for a missing entity', async () => {
      mocks.datastore.get.mockResolvedValue([undefined]);

      expect(await client.read(scope, 'server.json')).toBeNull();
    });

    it('should accept payloads stored as strings', async () => {
      mocks.datastore.get.mockResolvedValue([{ data: 'port = 1' }]);

      const data = await client.read(scope, 'server.json');

      expect(data).toEqual(Buffer.from('port = 1', 'utf-8'));
    });

    it('should treat an entity without data as an empty payload', async () => {
      mocks.datastore.get.mockResolvedValue([{}]);

      const data = await client.read(scope, 'server.json');

      expect(data).toEqual(Buffer.alloc(0));
    });

    it('should treat a data property of another type as an empty payload', async () => {
      mocks.datastore.get.mockResolvedValue([{ data: 7 }]);

      const data = await client.read(scope, 'server.json');

      expect(data).toEqual(Buffer.alloc(0));
    });
  });

  // ─────────────────────────────────────────────────────────
  // listNames
  // ─────────────────────────────────────────────────────────

  describe('listNames', () => {
    it('should run a keys-only ancestor query', async () => {
      mocks.datastore.runQuery.mockResolvedValue([[]]);

      await client.listNames(scope);

      expect(mocks.datastore.createQuery).toHaveBeenCalledWith('Setting');
      expect(mocks.query.hasAncestor).toHaveBeenCalledWith({ path: [SCOPE_KIND, scope] });
      expect(mocks.query.select).toHaveBeenCalledWith('__key__');
      expect(mocks.datastore.runQuery).toHaveBeenCalledWith(mocks.query);
    });

    it('should return the key names and skip numeric ids', async () => {
      mocks.datastore.runQuery.mockResolvedValue([[keyed('a.json'), keyed(undefined), keyed('b.toml'), {}]]);

      expect(await client.listNames(scope)).toEqual(['a.json', 'b.toml']);
    });
  });

  // ─────────────────────────────────────────────────────────
  // write
  // ─────────────────────────────────────────────────────────

  describe('write', () => {
    it('should save the payload as an unindexed data property', async () => {
      const payload = Buffer.from('{"port":8080}');

      await client.write(scope, 'server.json', payload);

      expect(mocks.datastore.save).toHaveBeenCalledWith({
        key: { path: entityPath },
        data: [{ name: 'data', value: payload, excludeFromIndexes: true }],
      });
    });
  });

  // ─────────────────────────────────────────────────────────
  // remove
  // ─────────────────────────────────────────────────────────

  describe('remove', () => {
    it('should delete an existing entity inside a transaction', async () => {
      mocks.transaction.get.mockResolvedValue([{ data: Buffer.from('{}') }]);

      expect(await client.remove(scope, 'server.json')).toBe(true);

      expect(mocks.transaction.run).toHaveBeenCalled();
      expect(mocks.transaction.get).toHaveBeenCalledWith({ path: entityPath });
      expect(mocks.transaction.delete).toHaveBeenCalledWith({ path: entityPath });
      expect(mocks.transaction.commit).toHaveBeenCalled();
      expect(mocks.transaction.rollback).not.toHaveBeenCalled();
    });

    it('should roll back and return false for a missing entity', async () => {
      mocks.transaction.get.mockResolvedValue([undefined]);

      expect(await client.remove(scope, 'server.json')).toBe(false);

      expect(mocks.transaction.delete).not.toHaveBeenCalled();
      expect(mocks.transaction.commit).not.toHaveBeenCalled();
      expect(mocks.transaction.rollback).toHaveBeenCalledTimes(1);
    });

    it('should roll back and rethrow when the commit fails', async () => {
      mocks.transaction.get.mockResolvedValue([{ data: Buffer.from('{}') }]);
      mocks.transaction.commit.mockRejectedValue(new Error('contention'));

      await expect(client.remove(scope, 'server.json')).rejects.toThrow('contention');

      expect(mocks.transaction.rollback).toHaveBeenCalledTimes(1);
    });

    it('should keep the original failure when the rollback fails too', async () => {
      mocks.transaction.get.mockRejectedValue(new Error('deadline exceeded'));
      mocks.transaction.rollback.mockRejectedValue(new Error('transaction expired'));

      await expect(client.remove(scope, 'server.json')).rejects.toThrow('deadline exceeded');

      expect(logger.warn).toHaveBeenCalledWith(
        'datastore rollback failed for myapp/prod/server.json: Error: transaction expired',
      );
    });
  });
});
