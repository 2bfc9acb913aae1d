export type { DatastoreClient } from './datastore_client';
export { DatastoreLoader, DatastoreConfigDatabase } from './datastore_loader';
export type { DatastoreConfigDatabaseOptions } from './datastore_loader';
export { GoogleDatastoreClient, SCOPE_KIND } from './google_datastore_client';
export type { GoogleDatastoreClientOptions } from './google_datastore_client';
export { MemoryDatastoreClient } from './memory_datastore_client';
