import { Command } from 'commander';
import { attributeName, factoryOptionsFromFlags, registerConfigStoreOptions } from './store-options';

function parse(argv: string[], prefix?: string): Command {
  const program = registerConfigStoreOptions(new Command('confstore'), prefix);
  program.exitOverride();
  program.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  program.parse(['node', 'confstore', ...argv]);
  return program;
}

describe('store options', () => {
  const savedEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  describe('attributeName', () => {
    it('should camel-case long flags the way commander does', () => {
      expect(attributeName('config-store')).toBe('configStore');
      expect(attributeName('remote-config-store-sqlite-busy-timeout-ms')).toBe('remoteConfigStoreSqliteBusyTimeoutMs');
    });
  });

  describe('factoryOptionsFromFlags', () => {
    it('should default to the directory backend', () => {
      const program = parse([]);

      expect(factoryOptionsFromFlags(program.opts())).toEqual({ backend: 'directory' });
    });

    it('should collect the sqlite section with integer pragmas', () => {
      const program = parse([
        '--config-store', 'sqlite',
        '--config-store-sqlite', '/tmp/confstore/config.db',
        '--config-store-sqlite-mode', 'multi',
        '--config-store-sqlite-busy-timeout-ms', '250',
        '--config-store-sqlite-journal-mode', 'DELETE',
      ]);

      expect(factoryOptionsFromFlags(program.opts())).toEqual({
        backend: 'sqlite',
        sqlite: {
          path: '/tmp/confstore/config.db',
          mode: 'multi',
          busyTimeoutMs: 250,
          journalMode: 'DELETE',
        },
      });
    });

    it('should accumulate repeated trace prefixes', () => {
      const program = parse([
        '--config-store', 'memory',
        '--config-store-trace',
        '--config-store-trace-include', 'myapp',
        '--config-store-trace-include', 'other',
        '--config-store-trace-exclude', 'myapp/secret',
      ]);

      expect(factoryOptionsFromFlags(program.opts())).toEqual({
        backend: 'memory',
        trace: { enabled: true, include: ['myapp', 'other'], exclude: ['myapp/secret'] },
      });
    });

    it('should read flags from CONFSTORE_ environment variables', () => {
      process.env['CONFSTORE_CONFIG_STORE'] = 'lmdb';
      process.env['CONFSTORE_CONFIG_STORE_LMDB_MAX_DBS'] = '32';

      const program = parse([]);

      expect(factoryOptionsFromFlags(program.opts())).toEqual({
        backend: 'lmdb',
        lmdb: { maxDbs: 32 },
      });
    });

    it('should prefer command line flags over the environment', () => {
      process.env['CONFSTORE_CONFIG_STORE'] = 'lmdb';

      const program = parse(['--config-store', 'memory']);

      expect(factoryOptionsFromFlags(program.opts()).backend).toBe('memory');
    });

    it('should namespace flags and variables with a prefix', () => {
      process.env['CONFSTORE_REMOTE_CONFIG_STORE_DATASTORE_PROJECT'] = 'test-project';

      const program = parse(['--remote-config-store', 'datastore'], 'remote-');

      expect(factoryOptionsFromFlags(program.opts(), 'remote-')).toEqual({
        backend: 'datastore',
        datastore: { projectId: 'test-project' },
      });
    });

    it('should reject combinations the factory does not accept', () => {
      const program = parse([
        '--config-store-directory-mode', 'multi',
        '--config-store-directory-format', 'yaml',
      ]);

      expect(() => factoryOptionsFromFlags(program.opts())).toThrow(
        'a default format only applies to the "simple" mode'
      );
    });
  });

  describe('registerConfigStoreOptions', () => {
    it('should reject unknown backends', () => {
      expect(() => parse(['--config-store', 'redis'])).toThrow(/Allowed choices are directory, sqlite, lmdb, datastore, memory/);
    });

    it('should reject non-integer sizes', () => {
      expect(() => parse(['--config-store-sqlite-cache-size', 'big'])).toThrow(/Not an integer/);
    });
  });
});
