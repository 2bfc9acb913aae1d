import { Command } from 'commander';
import type { Descriptor, Document, FormatName } from '@confstore/core';
import { UsageError, describeDescriptor, formatKey, isDocument, key, marshallerByName } from '@confstore/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/** Formats a document can be printed in */
export const PRINTABLE_FORMATS: readonly FormatName[] = ['json', 'toml', 'yaml'];

export interface StoreListOptions extends BaseCommandOptions { }

export interface StoreGetOptions extends BaseCommandOptions {
  format?: FormatName;
  /** Rendering of the document on stdout (default: json) */
  as?: FormatName;
}

export interface StoreSetOptions extends BaseCommandOptions {
  format?: FormatName;
}

export interface StoreDeleteOptions extends BaseCommandOptions {
  format?: FormatName;
}

export interface DescriptorView {
  key: string;
  format: FormatName | null;
}

function toView(descriptor: Descriptor): DescriptorView {
  return {
    key: descriptor.key,
    format: descriptor.kind === 'format' ? descriptor.marshaller.name : null,
  };
}

function descriptorFor(name: string, format: FormatName | undefined): Descriptor {
  if (!format) return key(name);
  const marshaller = marshallerByName(format);
  if (!marshaller) {
    throw new UsageError(`unknown format "${format}"`);
  }
  return formatKey(name, marshaller);
}

/**
 * Parses the value argument of `set`: a JSON object.
 */
export function parseDocument(text: string): Document {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new UsageError(`value is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isDocument(parsed)) {
    throw new UsageError('value must be a JSON object');
  }
  return parsed;
}

/**
 * StoreCommand - list, read, write and delete configuration documents
 */
export class StoreCommand extends BaseCommand {

  register(_program: Command): void {
    // Registration handled by registerStoreCommands
  }

  /**
   * [List] Every document of a scope, one line per stored format
   */
  async executeList(scope: string, options: StoreListOptions): Promise<void> {
    try {
      const store = await this.dependencyService.openStore(scope);
      const views = (await store.list()).map(toView);
      const lines = views.map((view) => (view.format ? `${view.key} (${view.format})` : view.key));
      this.handleSuccess(
        { scope, entries: views },
        options,
        views.length === 0 ? `No documents in ${scope}` : undefined,
        lines.join('\n'),
      );
    } catch (error) {
      this.handleStoreError(`list ${scope}`, error, options);
    }
  }

  /**
   * [Get] Prints one document
   */
  async executeGet(scope: string, name: string, options: StoreGetOptions): Promise<void> {
    try {
      const store = await this.dependencyService.openStore(scope);
      const document: Document = {};
      const read = toView(await store.unmarshal(descriptorFor(name, options.format), document));

      const printer = marshallerByName(options.as ?? 'json');
      if (!printer || !PRINTABLE_FORMATS.includes(printer.name)) {
        throw new UsageError(`cannot print documents as ${String(options.as)}`);
      }
      this.handleSuccess(
        { scope, ...read, value: document },
        options,
        undefined,
        printer.marshal(document).toString('utf8').trimEnd(),
      );
    } catch (error) {
      this.handleStoreError(`read ${name} from ${scope}`, error, options);
    }
  }

  /**
   * [Set] Writes a document given as JSON, replacing any previous content
   */
  async executeSet(scope: string, name: string, value: string, options: StoreSetOptions): Promise<void> {
    try {
      const document = parseDocument(value);
      const descriptor = descriptorFor(name, options.format);
      const store = await this.dependencyService.openStore(scope);
      await store.marshal(descriptor, document);
      this.handleSuccess(
        { scope, ...toView(descriptor) },
        options,
        `Stored ${describeDescriptor(descriptor)} in ${scope}`,
      );
    } catch (error) {
      this.handleStoreError(`write ${name} to ${scope}`, error, options);
    }
  }

  /**
   * [Delete] Removes a document (every stored format unless --format is given)
   */
  async executeDelete(scope: string, name: string, options: StoreDeleteOptions): Promise<void> {
    try {
      const descriptor = descriptorFor(name, options.format);
      const store = await this.dependencyService.openStore(scope);
      await store.delete(descriptor);
      this.handleSuccess(
        { scope, ...toView(descriptor) },
        options,
        `Deleted ${describeDescriptor(descriptor)} from ${scope}`,
      );
    } catch (error) {
      this.handleStoreError(`delete ${name} from ${scope}`, error, options);
    }
  }
}
