import type { DiagnosticsResponse } from "@avatar-meet/contracts";
import type { AppConfig } from "./config.js";
import { errorMessage, truncateDetail } from "./errors.js";
import type { RoomRegistry } from "./room-registry.js";
import type { DocumentStore } from "./types.js";

const MAX_LISTED_COLLECTIONS = 10;

export async function collectDiagnostics(
  config: AppConfig,
  store: DocumentStore | null,
  registry: RoomRegistry,
): Promise<DiagnosticsResponse> {
  const response: DiagnosticsResponse = {
    backend: "running",
    database: "not_configured",
    database_url: config.databaseUrl ? "set" : "not_set",
    database_name: config.databaseName ?? null,
    connection_status: "not_connected",
    collections: [],
    fallback_active: registry.fallbackActive,
    fallback_rooms: registry.fallbackSize,
  };

  if (!store) {
    return response;
  }

  try {
    const collections = await store.listCollectionNames();
    response.collections = collections.slice(0, MAX_LISTED_COLLECTIONS);
    response.database = "connected";
    response.connection_status = "connected";
  } catch (error) {
    response.database = "error";
    response.error = truncateDetail(errorMessage(error));
  }

  return response;
}
