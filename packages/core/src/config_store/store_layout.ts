import type { FormatName } from '../marshaller';
import { KNOWN_MARSHALLERS, marshallerByName } from '../marshaller';
import type { Loader } from '../loader';
import type { KeyCodec } from '../key_codec';
import type { ConfigStore } from './config_store';
import { SimpleStore } from './simple_store';
import { MultiFormat } from './multi_format_store';
import { UsageError } from './config_store.errors';

export type StoreMode = 'simple' | 'multi';

/**
 * How a backend arranges documents on top of its loader.
 */
export interface StoreLayout {
  /** One format or every known format (default: "simple") */
  mode?: StoreMode;

  /** Format of a simple store (default: "toml"). Not allowed with "multi". */
  format?: FormatName;

  keyCodec?: KeyCodec;

  /** Simple stores only (default: true) */
  useExtension?: boolean;
}

export const DEFAULT_FORMAT: FormatName = 'toml';

/**
 * @throws UsageError for an unknown format or a format combined with "multi"
 */
export function validateLayout(layout: StoreLayout): void {
  const mode = layout.mode ?? 'simple';
  if (mode !== 'simple' && mode !== 'multi') {
    throw new UsageError(`unknown store mode "${String(mode)}"`);
  }
  if (mode === 'multi' && layout.format !== undefined) {
    throw new UsageError('a default format only applies to the "simple" mode');
  }
  if (layout.format !== undefined && !marshallerByName(layout.format)) {
    throw new UsageError(`unknown format "${String(layout.format)}"`);
  }
}

export function storeForLoader(loader: Loader, layout: StoreLayout = {}): ConfigStore {
  validateLayout(layout);
  if (layout.mode === 'multi') {
    return new MultiFormat(loader, KNOWN_MARSHALLERS, { keyCodec: layout.keyCodec });
  }
  const format = layout.format ?? DEFAULT_FORMAT;
  const marshaller = marshallerByName(format);
  if (!marshaller) {
    throw new UsageError(`unknown format "${format}"`);
  }
  return new SimpleStore(loader, marshaller, { keyCodec: layout.keyCodec, useExtension: layout.useExtension });
}
