import { describe, expect, it } from "vitest";
import { ROOM_CODE_PATTERN } from "@avatar-meet/contracts";
import { generateRoomCode, normalizeRoomCode } from "../src/room-code.js";

describe("generateRoomCode", () => {
  it("produces uppercase alphanumeric codes", () => {
    for (let i = 0; i < 200; i += 1) {
      expect(generateRoomCode()).toMatch(ROOM_CODE_PATTERN);
    }
  });

  it("honours a custom length", () => {
    expect(generateRoomCode(8)).toMatch(/^[A-Z0-9]{8}$/);
  });
});

describe("normalizeRoomCode", () => {
  it("upper-cases and trims", () => {
    expect(normalizeRoomCode(" k3f9qz ")).toBe("K3F9QZ");
  });
});
