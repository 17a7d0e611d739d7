import { MongoClient, ObjectId, type Db } from "mongodb";
import { StorageQuotaExceededError, StorageUnavailableError, errorMessage } from "./errors.js";
import type { DocumentFilter, DocumentStore, StoredDocument } from "./types.js";

// Atlas reports "over your space quota", Cosmos DB (Mongo API) reports Forbidden.
const QUOTA_ERROR_PATTERN = /quota|forbidden/i;

export interface MongoStoreOptions {
  url: string;
  databaseName?: string;
  serverSelectionTimeoutMs: number;
}

export function isQuotaError(error: unknown): boolean {
  return QUOTA_ERROR_PATTERN.test(errorMessage(error));
}

export function classifyWriteError(error: unknown): StorageQuotaExceededError | StorageUnavailableError {
  const message = errorMessage(error);
  if (isQuotaError(error)) {
    return new StorageQuotaExceededError(message, { cause: error });
  }
  return new StorageUnavailableError(message, { cause: error });
}

function normalizeId(doc: StoredDocument): StoredDocument {
  const id = doc["_id"];
  if (id instanceof ObjectId) {
    return { ...doc, _id: id.toHexString() };
  }
  return doc;
}

export class MongoDocumentStore implements DocumentStore {
  private readonly client: MongoClient;
  private readonly db: Db;

  constructor(options: MongoStoreOptions) {
    // The driver connects lazily on the first operation.
    this.client = new MongoClient(options.url, {
      serverSelectionTimeoutMS: options.serverSelectionTimeoutMs,
    });
    this.db = this.client.db(options.databaseName);
  }

  async findOne(collection: string, filter: DocumentFilter): Promise<StoredDocument | null> {
    const doc = await this.db.collection(collection).findOne(filter);
    return doc ? normalizeId(doc) : null;
  }

  async insert(collection: string, record: StoredDocument): Promise<void> {
    try {
      await this.db.collection(collection).insertOne({ ...record });
    } catch (error) {
      throw classifyWriteError(error);
    }
  }

  async listCollectionNames(): Promise<string[]> {
    const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();
    return collections.map((collection) => collection.name);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
