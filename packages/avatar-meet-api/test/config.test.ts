import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      host: "0.0.0.0",
      nodeEnv: "development",
      logLevel: "info",
      databaseUrl: undefined,
      databaseName: undefined,
      databaseTimeoutMs: 5000,
      corsOrigins: ["*"],
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "9100",
      HOST: "127.0.0.1",
      NODE_ENV: "production",
      LOG_LEVEL: "warn",
      DATABASE_URL: "mongodb://localhost:27017",
      DATABASE_NAME: "avatar_meet",
      DATABASE_TIMEOUT_MS: "2500",
      CORS_ORIGINS: "https://meet.example.test, https://admin.example.test",
    });

    expect(config).toEqual({
      port: 9100,
      host: "127.0.0.1",
      nodeEnv: "production",
      logLevel: "warn",
      databaseUrl: "mongodb://localhost:27017",
      databaseName: "avatar_meet",
      databaseTimeoutMs: 2500,
      corsOrigins: ["https://meet.example.test", "https://admin.example.test"],
    });
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow("Invalid numeric env var PORT: eighty");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow("Invalid log level env var LOG_LEVEL: verbose");
  });
});
