// Google Cloud Datastore backend
export {
  DatastoreLoader,
  DatastoreConfigDatabase,
  GoogleDatastoreClient,
  SCOPE_KIND,
} from './loader/datastore';
export type {
  DatastoreClient,
  DatastoreConfigDatabaseOptions,
  GoogleDatastoreClientOptions,
} from './loader/datastore';
