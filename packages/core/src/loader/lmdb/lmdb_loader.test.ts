import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { LmdbConfigDatabase } from './lmdb_loader';
import { NotFoundError, UsageError, formatKey, isNotFound, key } from '../../config_store';
import { JSON_MARSHALLER, TOML_MARSHALLER } from '../../marshaller';

describe('LmdbConfigDatabase', () => {
  let tempDir: string;
  let db: LmdbConfigDatabase;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lmdb-db-test-'));
    db = new LmdbConfigDatabase({ path: path.join(tempDir, 'config.lmdb') });
  });

  afterEach(async () => {
    await db.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should round trip a JSON document', async () => {
    const store = await db.open('myapp', 'testns');

    await store.marshal(key('config'), { Value: 'hello' });
    const out: { Value?: string } = {};
    const read = await store.unmarshal('config', out);

    expect(out.Value).toBe('hello');
    expect(read).toEqual(formatKey('config', JSON_MARSHALLER));
    expect(await store.list()).toEqual([key('config')]);
  });

  it('should reject absent entries with NotFoundError', async () => {
    const store = await db.open('myapp');

    const error = await store.unmarshal('missing', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    await expect(store.delete('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should delete entries', async () => {
    const store = await db.open('myapp');
    await store.marshal('k', { a: 1 });

    await store.delete('k');

    expect(await store.list()).toEqual([]);
    expect(isNotFound(await store.unmarshal('k', {}).catch((e: unknown) => e))).toBe(true);
  });

  it('should keep scopes in separate buckets', async () => {
    const ns1 = await db.open('app', 'ns1');
    const ns2 = await db.open('app', 'ns2');
    await ns1.marshal('k', { a: 1 });

    expect(await ns2.list()).toEqual([]);
    expect(await ns1.list()).toEqual([key('k')]);
  });

  it('should fully replace previous content', async () => {
    const store = await db.open('myapp');
    await store.marshal('k', { a: 1 });
    await store.marshal('k', { b: 2 });

    const out = {};
    await store.unmarshal('k', out);

    expect(out).toEqual({ b: 2 });
  });

  it('should persist across reopen', async () => {
    const store = await db.open('myapp');
    await store.marshal('k', { a: 1 });
    await db.close();

    db = new LmdbConfigDatabase({ path: path.join(tempDir, 'config.lmdb') });
    const reopened = await db.open('myapp');
    const out: { a?: number } = {};
    await reopened.unmarshal('k', out);

    expect(out.a).toBe(1);
  });

  it('should resolve formats in multi mode', async () => {
    const multiDb = new LmdbConfigDatabase({ path: path.join(tempDir, 'multi.lmdb'), mode: 'multi' });
    const store = await multiDb.open('myapp');
    await store.marshal('quote', { text: 'A' });
    await store.marshal(formatKey('quote', JSON_MARSHALLER), { text: 'B' });

    expect(await store.list()).toHaveLength(2);
    const out: { text?: string } = {};
    expect(await store.unmarshal('quote', out)).toEqual(formatKey('quote', TOML_MARSHALLER));
    expect(out.text).toBe('A');

    await multiDb.close();
  });

  it('should reject invalid options and closed environments', async () => {
    expect(() => new LmdbConfigDatabase({ path: path.join(tempDir, 'x.lmdb'), maxDbs: 0 })).toThrow(UsageError);

    await db.close();
    await expect(db.open('myapp')).rejects.toBeInstanceOf(UsageError);
  });
});
