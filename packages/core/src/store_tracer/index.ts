export { StoreTracer, storeName } from './store_tracer';
export type { TracerSettings } from './store_tracer.types';
