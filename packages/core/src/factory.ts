/**
 * Backend selection from plain options (parsed flags, a JSON file).
 * Pulls in every backend and its native dependencies.
 */
export * from './config_factory';
export type { TracerSettings } from './store_tracer';
