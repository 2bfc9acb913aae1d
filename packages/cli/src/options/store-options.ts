/**
 * Store selection flags
 *
 * Every flag can also be set through a CONFSTORE_* environment variable.
 * A prefix lets one program carry several stores (`--remote-config-store ...`).
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { FORMAT_NAMES } from '@confstore/core';
import { CONFIG_STORE_BACKENDS, parseFactoryOptions } from '@confstore/core/factory';
import type { FactoryOptions } from '@confstore/core/factory';
import { JOURNAL_MODES, SQLITE_MODES, SYNCHRONOUS_MODES, TEMP_STORES } from '@confstore/core/sqlite';

const STORE_MODES = ['simple', 'multi'];
const LMDB_MODES = ['json', 'multi'];

export type FlagValues = Record<string, unknown>;

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/**
 * Commander's attribute name for a long flag: `config-store-sqlite` -> `configStoreSqlite`
 */
export function attributeName(flag: string): string {
  return flag.split('-').reduce((name, word) => name + word.charAt(0).toUpperCase() + word.slice(1));
}

function envName(flag: string): string {
  return `CONFSTORE_${flag.replace(/-/g, '_').toUpperCase()}`;
}

/**
 * Registers the store selection flags on a command.
 */
export function registerConfigStoreOptions(command: Command, prefix: string = ''): Command {
  const base = `${prefix}config-store`;
  const option = (suffix: string, argument: string, description: string): Option => {
    const flag = `${base}${suffix}`;
    return new Option(`--${flag}${argument ? ` ${argument}` : ''}`, description).env(envName(flag));
  };

  const options = [
    option('', '<backend>', 'Config store backend')
      .choices(CONFIG_STORE_BACKENDS)
      .default('directory'),

    option('-directory', '<path>', 'Root directory of the directory backend (default: user config dir)'),
    option('-directory-mode', '<mode>', 'Store layout of the directory backend').choices(STORE_MODES),
    option('-directory-format', '<format>', 'Default format of the simple layout').choices(FORMAT_NAMES),

    option('-sqlite', '<path>', 'Shared SQLite database file (default: one file per scope)'),
    option('-sqlite-mode', '<mode>', 'SQLite store layout').choices(SQLITE_MODES),
    option('-sqlite-journal-mode', '<mode>', 'SQLite journal_mode pragma').choices(JOURNAL_MODES),
    option('-sqlite-synchronous', '<mode>', 'SQLite synchronous pragma').choices(SYNCHRONOUS_MODES),
    option('-sqlite-busy-timeout-ms', '<ms>', 'SQLite busy timeout in milliseconds').argParser(parseInteger),
    option('-sqlite-cache-size', '<size>', 'SQLite cache_size pragma').argParser(parseInteger),
    option('-sqlite-mmap-size', '<bytes>', 'SQLite mmap_size pragma').argParser(parseInteger),
    option('-sqlite-temp-store', '<store>', 'SQLite temp_store pragma').choices(TEMP_STORES),

    option('-lmdb', '<path>', 'Shared LMDB environment (default: one per scope)'),
    option('-lmdb-mode', '<mode>', 'LMDB store layout').choices(LMDB_MODES),
    option('-lmdb-max-dbs', '<count>', 'Maximum number of LMDB buckets').argParser(parseInteger),

    option('-datastore-project', '<id>', 'Google Cloud project of the datastore backend'),
    option('-datastore-namespace', '<namespace>', 'Datastore namespace'),
    option('-datastore-kind', '<kind>', 'Datastore entity kind'),

    option('-trace', '', 'Log every store call'),
    option('-trace-responses', '', 'Also log results and written values'),
    option('-trace-include', '<prefix>', 'Trace only stores whose name starts with prefix (repeatable)').argParser(collect),
    option('-trace-exclude', '<prefix>', 'Never trace stores whose name starts with prefix (repeatable)').argParser(collect),
  ];

  for (const entry of options) {
    command.addOption(entry);
  }
  return command;
}

function section(values: Record<string, unknown>): Record<string, unknown> | undefined {
  const present = Object.entries(values).filter(([, value]) => value !== undefined);
  return present.length > 0 ? Object.fromEntries(present) : undefined;
}

/**
 * Turns parsed flag values into validated factory options.
 * @throws UsageError when the combination is invalid
 */
export function factoryOptionsFromFlags(values: FlagValues, prefix: string = ''): FactoryOptions {
  const read = (suffix: string): unknown => values[attributeName(`${prefix}config-store${suffix}`)];

  return parseFactoryOptions(section({
    backend: read(''),
    directory: section({
      path: read('-directory'),
      mode: read('-directory-mode'),
      format: read('-directory-format'),
    }),
    sqlite: section({
      path: read('-sqlite'),
      mode: read('-sqlite-mode'),
      journalMode: read('-sqlite-journal-mode'),
      synchronous: read('-sqlite-synchronous'),
      busyTimeoutMs: read('-sqlite-busy-timeout-ms'),
      cacheSize: read('-sqlite-cache-size'),
      mmapSize: read('-sqlite-mmap-size'),
      tempStore: read('-sqlite-temp-store'),
    }),
    lmdb: section({
      path: read('-lmdb'),
      mode: read('-lmdb-mode'),
      maxDbs: read('-lmdb-max-dbs'),
    }),
    datastore: section({
      projectId: read('-datastore-project'),
      namespace: read('-datastore-namespace'),
      kind: read('-datastore-kind'),
    }),
    trace: section({
      enabled: read('-trace'),
      logResponses: read('-trace-responses'),
      include: read('-trace-include'),
      exclude: read('-trace-exclude'),
    }),
  }) ?? {});
}
