import { ParticipantSchema } from "@avatar-meet/contracts";
import { PARTICIPANT_COLLECTION, type AppLogger, type DocumentStore } from "./types.js";

export class ParticipantTracker {
  constructor(
    private readonly store: DocumentStore | null,
    private readonly logger: AppLogger,
  ) {}

  /** Best-effort presence write; resolves false instead of rejecting. */
  async recordJoin(roomCode: string, name?: string | null): Promise<boolean> {
    if (!this.store) {
      return false;
    }
    try {
      const participant = ParticipantSchema.parse({ room_code: roomCode, name: name ?? null });
      await this.store.insert(PARTICIPANT_COLLECTION, { ...participant });
      return true;
    } catch (error) {
      this.logger.warn({ err: error, roomCode }, "failed to record participant join");
      return false;
    }
  }
}
