import { describe, expect, it } from "vitest";
import { StorageQuotaExceededError, StorageUnavailableError } from "../src/errors.js";
import { classifyWriteError, isQuotaError } from "../src/mongo-store.js";

describe("isQuotaError", () => {
  it("matches quota and forbidden messages in any case", () => {
    expect(isQuotaError(new Error("you are over your space quota, using 513 MB of 512 MB"))).toBe(true);
    expect(isQuotaError(new Error("Error=13, Details='Response status code does not indicate success: Forbidden'"))).toBe(true);
    expect(isQuotaError(new Error("QUOTA EXCEEDED"))).toBe(true);
  });

  it("does not match connectivity failures", () => {
    expect(isQuotaError(new Error("connect ECONNREFUSED 127.0.0.1:27017"))).toBe(false);
    expect(isQuotaError("Server selection timed out after 5000 ms")).toBe(false);
  });
});

describe("classifyWriteError", () => {
  it("maps quota failures to StorageQuotaExceededError", () => {
    const cause = new Error("Forbidden");
    const classified = classifyWriteError(cause);

    expect(classified).toBeInstanceOf(StorageQuotaExceededError);
    expect(classified.message).toBe("Forbidden");
    expect(classified.cause).toBe(cause);
  });

  it("maps everything else to StorageUnavailableError", () => {
    const classified = classifyWriteError(new Error("socket hang up"));

    expect(classified).toBeInstanceOf(StorageUnavailableError);
    expect(classified.message).toBe("socket hang up");
  });
});
