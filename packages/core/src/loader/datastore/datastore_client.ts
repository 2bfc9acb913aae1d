/**
 * The slice of a document database the Datastore loader needs.
 *
 * Implementations:
 * - GoogleDatastoreClient: Google Cloud Datastore
 * - MemoryDatastoreClient: in-process, for tests
 */
export interface DatastoreClient {
  /** Entity names stored under the scope */
  listNames(scope: string): Promise<string[]>;

  /** @returns the payload, or null when the entity does not exist */
  read(scope: string, name: string): Promise<Buffer | null>;

  write(scope: string, name: string, data: Buffer): Promise<void>;

  /** @returns false when the entity did not exist */
  remove(scope: string, name: string): Promise<boolean>;
}
