import type {
  CreateRoomRequest,
  CreateRoomResponse,
  DiagnosticsResponse,
  JoinRoomRequest,
  JoinRoomResponse,
  RoomRecord,
} from "@avatar-meet/contracts";
import {
  CreateRoomResponseSchema,
  DiagnosticsResponseSchema,
  ErrorResponseSchema,
  JoinRoomResponseSchema,
  RoomRecordSchema,
} from "@avatar-meet/contracts";
import type { ZodTypeAny, output } from "zod";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AvatarMeetClientOptions {
  baseUrl: string;
  fetch?: FetchLike;
}

export class AvatarMeetApiError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = "AvatarMeetApiError";
    this.status = status;
    this.code = code;
  }
}

export class AvatarMeetClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: AvatarMeetClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  createRoom(request: CreateRoomRequest = {}): Promise<CreateRoomResponse> {
    return this.request("POST", "/rooms", CreateRoomResponseSchema, request);
  }

  joinRoom(request: JoinRoomRequest): Promise<JoinRoomResponse> {
    return this.request("POST", "/rooms/join", JoinRoomResponseSchema, request);
  }

  getRoom(code: string): Promise<RoomRecord> {
    return this.request("GET", `/rooms/${encodeURIComponent(code)}`, RoomRecordSchema);
  }

  diagnostics(): Promise<DiagnosticsResponse> {
    return this.request("GET", "/test", DiagnosticsResponseSchema);
  }

  private async request<S extends ZodTypeAny>(
    method: "GET" | "POST",
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<output<S>> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const payload: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsedError = ErrorResponseSchema.safeParse(payload);
      if (parsedError.success) {
        throw new AvatarMeetApiError(
          response.status,
          parsedError.data.error,
          parsedError.data.message ?? parsedError.data.error,
        );
      }
      throw new AvatarMeetApiError(response.status, "http_error", `Request failed with status ${response.status}`);
    }

    return schema.parse(payload);
  }
}
