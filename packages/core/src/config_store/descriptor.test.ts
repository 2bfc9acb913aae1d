import { JSON_MARSHALLER, TOML_MARSHALLER } from '../marshaller';
import { MemoryConfigDatabase } from '../loader/memory';
import { bind } from './binding';
import { describeDescriptor, formatKey, key, toDescriptor } from './descriptor';
import { UsageError } from './config_store.errors';

describe('Descriptor', () => {
  describe('toDescriptor', () => {
    it('should turn a string into a key descriptor', () => {
      expect(toDescriptor('server')).toEqual({ kind: 'key', key: 'server' });
    });

    it('should keep valid descriptors', () => {
      expect(toDescriptor(key('a'))).toEqual(key('a'));
      expect(toDescriptor(formatKey('a', JSON_MARSHALLER))).toEqual(formatKey('a', JSON_MARSHALLER));
    });

    it('should reject null and undefined', () => {
      expect(() => toDescriptor(null)).toThrow(UsageError);
      expect(() => toDescriptor(undefined)).toThrow('API usage error - a descriptor is required');
    });

    it('should reject an unknown kind', () => {
      expect(() => toDescriptor({ kind: 'glob', key: 'a*' })).toThrow('API usage error - unknown descriptor kind: glob');
    });

    it('should reject a format descriptor without a usable marshaller', () => {
      expect(() => toDescriptor({ kind: 'format', key: 'a', marshaller: { name: 'xml' } })).toThrow(
        'API usage error - format descriptor "a" has no valid marshaller',
      );
    });

    it('should reject objects without a string key', () => {
      expect(() => toDescriptor({ kind: 'key', key: 42 })).toThrow(UsageError);
      expect(() => toDescriptor(7)).toThrow(UsageError);
    });
  });

  describe('describeDescriptor', () => {
    it('should quote the key and name the format', () => {
      expect(describeDescriptor(key('a b'))).toBe('"a b"');
      expect(describeDescriptor(formatKey('a', TOML_MARSHALLER))).toBe('"a" (toml)');
    });
  });

  describe('bind', () => {
    it('should route every call to the bound descriptor', async () => {
      const db = new MemoryConfigDatabase({ format: 'json' });
      const store = await db.open('myapp');
      const settings = bind(store, 'settings');

      await settings.marshal({ theme: 'dark' });
      const out: { theme?: string } = {};
      const read = await settings.unmarshal(out);

      expect(out.theme).toBe('dark');
      expect(read).toEqual(formatKey('settings', JSON_MARSHALLER));
      expect(Array.from(db.entries('myapp').keys())).toEqual(['settings.json']);

      await settings.delete();
      expect(db.entries('myapp').size).toBe(0);
    });

    it('should validate the descriptor eagerly', async () => {
      const store = await new MemoryConfigDatabase().open('myapp');

      expect(() => bind(store, JSON.parse('null'))).toThrow(UsageError);
    });
  });
});
