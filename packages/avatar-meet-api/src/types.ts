export type StoredDocument = Record<string, unknown>;

export type DocumentFilter = Record<string, string | number | boolean>;

/**
 * Minimal document store the registry and tracker persist through.
 *
 * `insert` rejects with `StorageQuotaExceededError` when the store refuses
 * writes for quota reasons and with `StorageUnavailableError` otherwise.
 */
export interface DocumentStore {
  findOne(collection: string, filter: DocumentFilter): Promise<StoredDocument | null>;
  insert(collection: string, record: StoredDocument): Promise<void>;
  listCollectionNames(): Promise<string[]>;
  close(): Promise<void>;
}

export const ROOM_COLLECTION = "room";
export const PARTICIPANT_COLLECTION = "participant";

export interface LogFn {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

export interface AppLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}
