import { z } from "zod";

export const ROOM_CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const ROOM_CODE_LENGTH = 6;
export const ROOM_CODE_PATTERN = /^[A-Z0-9]{6}$/;

export const SCENES = ["classroom", "space", "nature"] as const;
export const DEFAULT_SCENE = "classroom";

export const MIN_PARTICIPANTS = 1;
export const MAX_PARTICIPANTS = 64;
export const DEFAULT_MAX_PARTICIPANTS = 16;

export const MaxParticipantsSchema = z.number().int().min(MIN_PARTICIPANTS).max(MAX_PARTICIPANTS);

export const RoomSchema = z.object({
  code: z.string().regex(ROOM_CODE_PATTERN),
  scene: z.string().default(DEFAULT_SCENE),
  is_active: z.boolean().default(true),
  max_participants: MaxParticipantsSchema.default(DEFAULT_MAX_PARTICIPANTS),
});

// Stored rooms are served as found; only the fields joins rely on are typed.
export const RoomRecordSchema = z.object({
  _id: z.string().optional(),
  code: z.string(),
  scene: z.string(),
}).passthrough();

export const ParticipantSchema = z.object({
  room_code: z.string().min(1),
  name: z.string().nullable().default(null),
  is_muted: z.boolean().default(false),
  avatar_url: z.string().nullable().default(null),
});

// Any scene name is accepted; SCENES lists the presets the client ships.
export const CreateRoomRequestSchema = z.object({
  scene: z.string().nullish(),
  max_participants: MaxParticipantsSchema.nullish(),
});

export const CreateRoomResponseSchema = z.object({
  code: z.string(),
  scene: z.string(),
});

export const JoinRoomRequestSchema = z.object({
  code: z.string().trim().min(1),
  name: z.string().nullish(),
});

export const JoinRoomResponseSchema = z.object({
  code: z.string(),
  scene: z.string(),
});

export const DiagnosticsResponseSchema = z.object({
  backend: z.literal("running"),
  database: z.enum(["connected", "error", "not_configured"]),
  database_url: z.enum(["set", "not_set"]),
  database_name: z.string().nullable(),
  connection_status: z.enum(["connected", "not_connected"]),
  collections: z.array(z.string()),
  error: z.string().optional(),
  fallback_active: z.boolean(),
  fallback_rooms: z.number().int().nonnegative(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
  requestId: z.string().optional(),
  details: z.unknown().optional(),
});

export type Room = z.infer<typeof RoomSchema>;
export type RoomRecord = z.infer<typeof RoomRecordSchema>;
export type Participant = z.infer<typeof ParticipantSchema>;
export type CreateRoomRequest = z.input<typeof CreateRoomRequestSchema>;
export type CreateRoomResponse = z.infer<typeof CreateRoomResponseSchema>;
export type JoinRoomRequest = z.input<typeof JoinRoomRequestSchema>;
export type JoinRoomResponse = z.infer<typeof JoinRoomResponseSchema>;
export type DiagnosticsResponse = z.infer<typeof DiagnosticsResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
