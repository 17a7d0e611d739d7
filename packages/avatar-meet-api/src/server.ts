import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyReply } from "fastify";
import cors from "@fastify/cors";
import { CreateRoomRequestSchema, JoinRoomRequestSchema } from "@avatar-meet/contracts";
import type { AppConfig } from "./config.js";
import { collectDiagnostics } from "./diagnostics.js";
import { RoomNotFoundError, errorMessage, truncateDetail } from "./errors.js";
import { MongoDocumentStore } from "./mongo-store.js";
import { ParticipantTracker } from "./participant-tracker.js";
import type { RoomCodeGenerator } from "./room-code.js";
import { RoomRegistry } from "./room-registry.js";
import { PersistentRoomStorage } from "./room-storage.js";
import type { DocumentStore } from "./types.js";

interface ServerDeps {
  /** Overrides the MongoDB store built from config; null runs without a database. */
  documentStore?: DocumentStore | null;
  generateCode?: RoomCodeGenerator;
}

const CORS_METHODS = ["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"];

function hasStatusCode(error: unknown): error is { statusCode: number } {
  return typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number";
}

function createDocumentStore(config: AppConfig): DocumentStore | null {
  if (!config.databaseUrl) {
    return null;
  }
  return new MongoDocumentStore({
    url: config.databaseUrl,
    databaseName: config.databaseName,
    serverSelectionTimeoutMs: config.databaseTimeoutMs,
  });
}

function sendFailure(
  reply: FastifyReply,
  log: FastifyBaseLogger,
  requestId: string,
  action: string,
  error: unknown,
): FastifyReply {
  if (error instanceof RoomNotFoundError) {
    return reply.code(404).send({ error: "room_not_found", message: error.message });
  }
  log.error({ err: error }, `${action} failed`);
  return reply.code(500).send({
    error: "internal_error",
    message: `${action} failed: ${truncateDetail(errorMessage(error))}`,
    requestId,
  });
}

export async function buildServer(config: AppConfig, deps: ServerDeps = {}): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 100_000,
    logger: {
      level: config.logLevel,
      transport: config.nodeEnv === "development" ? { target: "pino-pretty" } : undefined,
    },
  });

  // A wildcard origin cannot be combined with credentials, so credentials
  // are only advertised for an explicit origin list.
  const wildcardOrigin = config.corsOrigins.includes("*");
  await app.register(cors, {
    origin: wildcardOrigin ? "*" : config.corsOrigins,
    credentials: !wildcardOrigin,
    methods: CORS_METHODS,
  });

  const store = deps.documentStore === undefined ? createDocumentStore(config) : deps.documentStore;
  if (!store) {
    app.log.warn("DATABASE_URL not set, rooms are kept in memory only");
  }

  const tracker = new ParticipantTracker(store, app.log);
  const registry = new RoomRegistry({
    persistent: store ? new PersistentRoomStorage(store) : null,
    tracker,
    logger: app.log,
    generateCode: deps.generateCode,
  });

  app.addHook("onClose", async () => {
    await store?.close();
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: "invalid_request", message: truncateDetail(errorMessage(error)) });
      return;
    }
    request.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  app.get("/", async () => ({ message: "AvatarMeet backend running" }));

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  app.get("/test", async () => collectDiagnostics(config, store, registry));

  app.post("/rooms", async (request, reply) => {
    const parsed = CreateRoomRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    try {
      const created = await registry.createRoom({
        scene: parsed.data.scene,
        maxParticipants: parsed.data.max_participants,
      });
      return reply.send(created);
    } catch (error) {
      return sendFailure(reply, request.log, request.id, "Create room", error);
    }
  });

  app.post("/rooms/join", async (request, reply) => {
    const parsed = JoinRoomRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    try {
      const joined = await registry.joinRoom(parsed.data.code, parsed.data.name);
      return reply.send(joined);
    } catch (error) {
      return sendFailure(reply, request.log, request.id, "Join", error);
    }
  });

  app.get<{ Params: { code: string } }>("/rooms/:code", async (request, reply) => {
    try {
      const room = await registry.getRoom(request.params.code);
      return reply.send(room);
    } catch (error) {
      return sendFailure(reply, request.log, request.id, "Fetch room", error);
    }
  });

  return app;
}
