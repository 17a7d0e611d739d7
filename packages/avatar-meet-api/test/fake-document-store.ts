import { StorageQuotaExceededError, StorageUnavailableError } from "../src/errors.js";
import type { DocumentFilter, DocumentStore, StoredDocument } from "../src/types.js";

type FailureMode = "quota" | "unavailable" | "hang" | null;

export class FakeDocumentStore implements DocumentStore {
  readonly collections = new Map<string, StoredDocument[]>();
  insertFailure = new Map<string, FailureMode>();
  failFinds = false;
  failListing = false;
  unavailableMessage = "socket hang up";
  closed = false;
  private nextId = 1;

  async findOne(collection: string, filter: DocumentFilter): Promise<StoredDocument | null> {
    if (this.failFinds) {
      throw new StorageUnavailableError("connection refused");
    }
    const docs = this.collections.get(collection) ?? [];
    const match = docs.find((doc) => Object.entries(filter).every(([key, value]) => doc[key] === value));
    return match ? { ...match } : null;
  }

  async insert(collection: string, record: StoredDocument): Promise<void> {
    const failure = this.insertFailure.get(collection) ?? null;
    if (failure === "quota") {
      throw new StorageQuotaExceededError("Error=16500, Quota exceeded for this account");
    }
    if (failure === "unavailable") {
      throw new StorageUnavailableError(this.unavailableMessage);
    }
    if (failure === "hang") {
      return new Promise<void>(() => {});
    }
    const docs = this.collections.get(collection) ?? [];
    docs.push({ _id: `doc-${this.nextId}`, ...record });
    this.nextId += 1;
    this.collections.set(collection, docs);
  }

  async listCollectionNames(): Promise<string[]> {
    if (this.failListing) {
      throw new Error("not authorized on avatar_meet to execute command { listCollections: 1 }");
    }
    return Array.from(this.collections.keys());
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  documents(collection: string): StoredDocument[] {
    return this.collections.get(collection) ?? [];
  }
}
