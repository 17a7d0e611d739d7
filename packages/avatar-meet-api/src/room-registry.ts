import {
  DEFAULT_MAX_PARTICIPANTS,
  DEFAULT_SCENE,
  RoomSchema,
  type CreateRoomResponse,
  type JoinRoomResponse,
  type Room,
  type RoomRecord,
} from "@avatar-meet/contracts";
import { CodeGenerationExhaustedError, RoomNotFoundError, StorageQuotaExceededError } from "./errors.js";
import type { ParticipantTracker } from "./participant-tracker.js";
import { generateRoomCode, normalizeRoomCode, type RoomCodeGenerator } from "./room-code.js";
import { MemoryRoomStorage, type RoomStorage, type RoomStorageKind } from "./room-storage.js";
import type { AppLogger, StoredDocument } from "./types.js";

export const MAX_CODE_ATTEMPTS = 10;

export interface RoomRegistryOptions {
  /** Durable storage; null when no database is configured. */
  persistent: RoomStorage | null;
  tracker: ParticipantTracker;
  logger: AppLogger;
  generateCode?: RoomCodeGenerator;
}

export interface CreateRoomInput {
  scene?: string | null;
  maxParticipants?: number | null;
}

function normalizeRecordId(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "object" && value !== null && "toHexString" in value && typeof value.toHexString === "function") {
    const hex: unknown = value.toHexString();
    return typeof hex === "string" ? hex : undefined;
  }
  return undefined;
}

// Stored fields pass through untouched; only code and scene are coerced.
function toRoomRecord(doc: StoredDocument, code: string): RoomRecord {
  const { _id: rawId, ...rest } = doc;
  const id = normalizeRecordId(rawId);
  const rawCode = rest["code"];
  const rawScene = rest["scene"];
  const storedCode = typeof rawCode === "string" ? rawCode : code;
  const scene = typeof rawScene === "string" ? rawScene : DEFAULT_SCENE;
  return id === undefined
    ? { ...rest, code: storedCode, scene }
    : { _id: id, ...rest, code: storedCode, scene };
}

export class RoomRegistry {
  private readonly persistent: RoomStorage | null;
  private readonly fallback: MemoryRoomStorage;
  private readonly tracker: ParticipantTracker;
  private readonly logger: AppLogger;
  private readonly generateCode: RoomCodeGenerator;

  constructor(options: RoomRegistryOptions) {
    this.persistent = options.persistent;
    this.fallback = new MemoryRoomStorage();
    this.tracker = options.tracker;
    this.logger = options.logger;
    this.generateCode = options.generateCode ?? (() => generateRoomCode());
  }

  get fallbackActive(): boolean {
    return this.fallback.size > 0;
  }

  get fallbackSize(): number {
    return this.fallback.size;
  }

  async generateUniqueCode(): Promise<string> {
    for (let attempt = 1; attempt <= MAX_CODE_ATTEMPTS; attempt += 1) {
      const code = this.generateCode();
      if (!(await this.isCodeTaken(code))) {
        return code;
      }
      this.logger.debug({ code, attempt }, "room code collision");
    }
    throw new CodeGenerationExhaustedError(MAX_CODE_ATTEMPTS);
  }

  async createRoom(input: CreateRoomInput = {}): Promise<CreateRoomResponse> {
    const code = await this.generateUniqueCode();
    const room = RoomSchema.parse({
      code,
      scene: input.scene || DEFAULT_SCENE,
      max_participants: input.maxParticipants ?? DEFAULT_MAX_PARTICIPANTS,
    });
    const storedIn = await this.saveRoom(room);
    this.logger.info({ code, scene: room.scene, storedIn }, "room created");
    return { code: room.code, scene: room.scene };
  }

  async saveRoom(room: Room): Promise<RoomStorageKind> {
    if (!this.persistent) {
      await this.fallback.save(room);
      return this.fallback.kind;
    }
    try {
      await this.persistent.save(room);
      return this.persistent.kind;
    } catch (error) {
      if (!(error instanceof StorageQuotaExceededError)) {
        throw error;
      }
      this.logger.warn({ err: error, code: room.code }, "room write blocked by storage quota, keeping it in memory");
      await this.fallback.save(room);
      return this.fallback.kind;
    }
  }

  async findRoom(code: string): Promise<RoomRecord | null> {
    let doc: StoredDocument | null = null;
    if (this.persistent) {
      try {
        doc = await this.persistent.find(code);
      } catch (error) {
        this.logger.warn({ err: error, code }, "persistent room lookup failed, trying fallback");
      }
    }
    if (!doc) {
      doc = await this.fallback.find(code);
    }
    return doc ? toRoomRecord(doc, code) : null;
  }

  async joinRoom(code: string, name?: string | null): Promise<JoinRoomResponse> {
    const normalized = normalizeRoomCode(code);
    const room = await this.findRoom(normalized);
    if (!room) {
      throw new RoomNotFoundError(normalized);
    }
    // recordJoin never rejects; the response does not wait on the write.
    void this.tracker.recordJoin(normalized, name);
    return { code: normalized, scene: room.scene };
  }

  async getRoom(code: string): Promise<RoomRecord> {
    const normalized = normalizeRoomCode(code);
    const room = await this.findRoom(normalized);
    if (!room) {
      throw new RoomNotFoundError(normalized);
    }
    return room;
  }

  private async isCodeTaken(code: string): Promise<boolean> {
    if (this.persistent) {
      try {
        if (await this.persistent.find(code)) {
          return true;
        }
      } catch (error) {
        this.logger.warn({ err: error, code }, "persistent uniqueness check failed");
      }
    }
    return this.fallback.has(code);
  }
}
