#!/usr/bin/env node

import { Command } from 'commander';
import { registerStoreCommands } from './commands/store/store';
import { factoryOptionsFromFlags, registerConfigStoreOptions } from './options/store-options';
import { DependencyInjectionService } from './services/dependency-injection';

const program = new Command();

program
  .name('confstore')
  .description('Inspect and edit configuration stores')
  .version('0.1.0');

registerConfigStoreOptions(program);

// Store flags are global: validate them once, before any command runs
program.hook('preAction', (_thisCommand, actionCommand) => {
  DependencyInjectionService.getInstance().configure(factoryOptionsFromFlags(actionCommand.optsWithGlobals()));
});

registerStoreCommands(program);

program.parseAsync()
  .then(() => DependencyInjectionService.getInstance().close())
  .catch((error: unknown) => {
    console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
