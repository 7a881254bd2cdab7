import type { FetchFailureKind } from "./types";

export class InvalidWindowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidWindowError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class RoomFetchError extends Error {
  constructor(
    readonly kind: FetchFailureKind,
    message: string,
    readonly status: number | null = null
  ) {
    super(message);
    this.name = "RoomFetchError";
  }
}

export class AuthorizationRejectedError extends RoomFetchError {
  constructor(status: number, message = `credential rejected (HTTP ${status})`) {
    super("authorization", message, status);
    this.name = "AuthorizationRejectedError";
  }
}

export class TransientFetchError extends RoomFetchError {
  constructor(message: string, status: number | null = null) {
    super("transient", message, status);
    this.name = "TransientFetchError";
  }
}

export class RequestRejectedError extends RoomFetchError {
  constructor(status: number, message: string) {
    super("rejected", message, status);
    this.name = "RequestRejectedError";
  }
}

export function classifyFetchError(error: unknown): FetchFailureKind {
  if (error instanceof RoomFetchError) return error.kind;
  return "transient";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
