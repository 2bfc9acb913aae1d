import { Command, Option } from 'commander';
import { FORMAT_NAMES } from '@confstore/core';
import { StoreCommand, PRINTABLE_FORMATS } from './store-command';
import type { StoreDeleteOptions, StoreGetOptions, StoreListOptions, StoreSetOptions } from './store-command';

export function registerStoreCommands(program: Command): void {
  const storeCommand = new StoreCommand();
  const formatOption = () => new Option('-f, --format <format>', 'Pin the stored format').choices(FORMAT_NAMES);

  // confstore list myapp/prod
  program
    .command('list <scope>')
    .description('List the documents of a scope (app[/namespace...])')
    .alias('ls')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (scope: string, options: StoreListOptions) => {
      await storeCommand.executeList(scope, options);
    });

  // confstore get myapp/prod server --as toml
  program
    .command('get <scope> <key>')
    .description('Print a document')
    .addOption(formatOption())
    .addOption(new Option('--as <format>', 'Print the document in this format').choices(PRINTABLE_FORMATS).default('json'))
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (scope: string, name: string, options: StoreGetOptions) => {
      await storeCommand.executeGet(scope, name, options);
    });

  // confstore set myapp/prod server '{"port": 8080}'
  program
    .command('set <scope> <key> <value>')
    .description('Write a document given as a JSON object')
    .addOption(formatOption())
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (scope: string, name: string, value: string, options: StoreSetOptions) => {
      await storeCommand.executeSet(scope, name, value, options);
    });

  // confstore delete myapp/prod server
  program
    .command('delete <scope> <key>')
    .description('Delete a document')
    .alias('rm')
    .addOption(formatOption())
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (scope: string, name: string, options: StoreDeleteOptions) => {
      await storeCommand.executeDelete(scope, name, options);
    });
}
