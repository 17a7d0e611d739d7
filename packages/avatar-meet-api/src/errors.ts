export const MAX_ERROR_DETAIL_LENGTH = 80;

export class RoomNotFoundError extends Error {
  readonly code: string;

  constructor(code: string) {
    super("Room not found");
    this.name = "RoomNotFoundError";
    this.code = code;
  }
}

export class CodeGenerationExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number) {
    super("Failed to generate unique room code");
    this.name = "CodeGenerationExhaustedError";
    this.attempts = attempts;
  }
}

/** Write rejected because the store is over quota or forbids further writes. */
export class StorageQuotaExceededError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageQuotaExceededError";
  }
}

export class StorageUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageUnavailableError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function truncateDetail(text: string, maxLength = MAX_ERROR_DETAIL_LENGTH): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}
