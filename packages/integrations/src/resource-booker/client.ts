import {
  AuthorizationRejectedError,
  InvalidWindowError,
  RequestRejectedError,
  RoomFetchError,
  TransientFetchError,
  errorMessage,
  type BookingSource,
  type Logger,
  type Room,
  type RoomFetchResult,
  type TimeInterval
} from "@roomwatch/shared";
import { withRetry } from "../http/retry";
import { normalizeBookingsPayload } from "./records";

export type ResourceBookerClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  retries?: number;
  minRetryDelayMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
};

const ERROR_PREVIEW_LENGTH = 500;

export function buildBookingRequestsUrl(baseUrl: string, roomId: string, window: TimeInterval): string {
  const url = new URL(`/api/Resources/${encodeURIComponent(roomId)}/BookingRequests`, baseUrl);
  url.searchParams.set("StartDate", window.start.toISOString());
  url.searchParams.set("EndDate", window.end.toISOString());
  url.searchParams.set("CheckSplitPermissions", "true");
  return url.toString();
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function responseError(response: Response): Promise<RoomFetchError> {
  const preview = (await response.text()).slice(0, ERROR_PREVIEW_LENGTH);
  const message = `HTTP ${response.status}: ${preview}`;
  if (response.status === 401 || response.status === 403) {
    return new AuthorizationRejectedError(response.status, message);
  }
  if (isTransientStatus(response.status)) return new TransientFetchError(message, response.status);
  return new RequestRejectedError(response.status, message);
}

function transportError(error: unknown): RoomFetchError {
  if (error instanceof RoomFetchError) return error;
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new TransientFetchError("request timed out");
  }
  return new TransientFetchError(errorMessage(error));
}

/** Reads booking requests for one room at a time from the scheduling API. */
export class ResourceBookerClient implements BookingSource {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ResourceBookerClientOptions) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async fetchRoomBookings(
    room: Room,
    window: TimeInterval,
    credential: string,
    signal?: AbortSignal
  ): Promise<RoomFetchResult> {
    if (!room.id) throw new RequestRejectedError(400, "Room identifier is empty");
    if (!credential) throw new AuthorizationRejectedError(401, "Bearer credential is empty");
    if (!(window.start < window.end)) throw new InvalidWindowError("Window start must be before window end");

    const url = buildBookingRequestsUrl(this.options.baseUrl, room.id, window);
    const payload = await withRetry(() => this.requestJson(url, credential, signal), {
      context: `room ${room.code || room.id}`,
      ...(signal ? { signal } : {}),
      ...(this.options.retries !== undefined ? { retries: this.options.retries } : {}),
      ...(this.options.minRetryDelayMs !== undefined ? { minTimeoutMs: this.options.minRetryDelayMs } : {}),
      ...(this.options.logger ? { logger: this.options.logger } : {})
    });

    return normalizeBookingsPayload(payload, room);
  }

  private async requestJson(url: string, credential: string, signal?: AbortSignal): Promise<unknown> {
    const attemptTimeout = AbortSignal.timeout(this.options.timeoutMs ?? 30_000);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${credential}`,
          Accept: "application/json"
        },
        signal: signal ? AbortSignal.any([attemptTimeout, signal]) : attemptTimeout
      });
    } catch (error) {
      throw transportError(error);
    }

    if (!response.ok) throw await responseError(response);

    try {
      return await response.json();
    } catch (error) {
      throw new TransientFetchError(`Invalid JSON from booking API: ${errorMessage(error)}`, response.status);
    }
  }
}
