import type { Room } from "@avatar-meet/contracts";
import { ROOM_COLLECTION, type DocumentStore, type StoredDocument } from "./types.js";

export type RoomStorageKind = "persistent" | "memory";

export interface RoomStorage {
  readonly kind: RoomStorageKind;
  find(code: string): Promise<StoredDocument | null>;
  save(room: Room): Promise<void>;
}

export class PersistentRoomStorage implements RoomStorage {
  readonly kind = "persistent";

  constructor(private readonly store: DocumentStore) {}

  find(code: string): Promise<StoredDocument | null> {
    return this.store.findOne(ROOM_COLLECTION, { code });
  }

  save(room: Room): Promise<void> {
    return this.store.insert(ROOM_COLLECTION, { ...room });
  }
}

/** Transient rooms kept for the life of the process. */
export class MemoryRoomStorage implements RoomStorage {
  readonly kind = "memory";
  private readonly rooms = new Map<string, Room>();

  async find(code: string): Promise<StoredDocument | null> {
    const room = this.rooms.get(code);
    return room ? { ...room } : null;
  }

  async save(room: Room): Promise<void> {
    this.rooms.set(room.code, { ...room });
  }

  has(code: string): boolean {
    return this.rooms.has(code);
  }

  get size(): number {
    return this.rooms.size;
  }
}
