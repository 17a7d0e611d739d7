import { describe, expect, it } from "vitest";
import {
  CreateRoomRequestSchema,
  JoinRoomRequestSchema,
  ParticipantSchema,
  RoomSchema,
} from "../src/index.js";

describe("RoomSchema", () => {
  it("fills defaults", () => {
    expect(RoomSchema.parse({ code: "K3F9QZ" })).toEqual({
      code: "K3F9QZ",
      scene: "classroom",
      is_active: true,
      max_participants: 16,
    });
  });

  it("rejects lowercase or short codes", () => {
    expect(RoomSchema.safeParse({ code: "k3f9qz" }).success).toBe(false);
    expect(RoomSchema.safeParse({ code: "K3F9Q" }).success).toBe(false);
  });
});

describe("CreateRoomRequestSchema", () => {
  it("accepts the capacity bounds", () => {
    expect(CreateRoomRequestSchema.safeParse({ max_participants: 1 }).success).toBe(true);
    expect(CreateRoomRequestSchema.safeParse({ max_participants: 64 }).success).toBe(true);
  });

  it("rejects capacities outside the bounds", () => {
    expect(CreateRoomRequestSchema.safeParse({ max_participants: 0 }).success).toBe(false);
    expect(CreateRoomRequestSchema.safeParse({ max_participants: 65 }).success).toBe(false);
  });

  it("accepts null fields as unset", () => {
    expect(CreateRoomRequestSchema.parse({ scene: null, max_participants: null })).toEqual({
      scene: null,
      max_participants: null,
    });
  });
});

describe("JoinRoomRequestSchema", () => {
  it("rejects a blank code", () => {
    expect(JoinRoomRequestSchema.safeParse({ code: "   " }).success).toBe(false);
  });
});

describe("ParticipantSchema", () => {
  it("defaults presence fields", () => {
    expect(ParticipantSchema.parse({ room_code: "K3F9QZ" })).toEqual({
      room_code: "K3F9QZ",
      name: null,
      is_muted: false,
      avatar_url: null,
    });
  });
});
