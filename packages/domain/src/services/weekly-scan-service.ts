import pLimit from "p-limit";
import {
  ConfigError,
  InvalidWindowError,
  TransientFetchError,
  classifyFetchError,
  errorMessage,
  logger as defaultLogger,
  type BookingSource,
  type FriendSet,
  type Logger,
  type MatchedBooking,
  type Room,
  type RoomFailure,
  type RoomFetchResult,
  type ScanConfig,
  type TimeInterval,
  type WeeklyScanResult
} from "@roomwatch/shared";
import { layoutWeek } from "../calendar/layout";
import { matchFriendBookings } from "../matching/friend-matcher";
import { nextStage, type PipelineStage } from "../pipeline/machine";
import { applyIgnorePolicy } from "../policies/ignore-rooms";
import { formatWeekTitle } from "../report/format";
import { DEFAULT_TIMEZONE, resolveWeekWindow } from "../week/week-window";

export type WeeklyScanOptions = {
  timezone?: string;
  concurrency?: number;
  taskTimeoutMs?: number;
  logger?: Logger;
};

type RoomOutcome =
  | { ok: true; room: Room; result: RoomFetchResult }
  | { ok: false; room: Room; failure: RoomFailure };

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_TASK_TIMEOUT_MS = 120_000;

function assertCredential(credential: string) {
  if (!credential.trim()) throw new ConfigError("Bearer credential is empty");
}

export class WeeklyScanService {
  private readonly timezone: string;
  private readonly concurrency: number;
  private readonly taskTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly source: BookingSource,
    options: WeeklyScanOptions = {}
  ) {
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.taskTimeoutMs = options.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS;
    this.logger = options.logger ?? defaultLogger;
  }

  async scan(input: { config: ScanConfig; credential: string; now?: Date }): Promise<WeeklyScanResult> {
    const { config, credential } = input;
    if (config.rooms.length === 0) throw new ConfigError("No rooms configured");
    assertCredential(credential);

    let stage: PipelineStage = "RESOLVE_WINDOW";
    const advance = (roomsFailed = 0) => {
      const next = nextStage({ stage, roomsQueried: config.rooms.length, roomsFailed });
      this.logger.debug({ from: stage, to: next }, "pipeline stage");
      stage = next;
      return next;
    };

    const window = resolveWeekWindow(input.now ?? new Date(), this.timezone);
    advance();

    const outcomes = await this.fetchAll(config.rooms, { start: window.startUtc, end: window.endUtc }, credential);
    const failures = outcomes.flatMap((o) => (o.ok ? [] : [o.failure]));
    const fetched = outcomes.flatMap((o) => (o.ok ? [o.result] : []));
    const bookings = fetched.flatMap((r) => r.bookings);

    const summary = {
      roomsQueried: config.rooms.length,
      roomsFailed: failures.length,
      bookingsFetched: fetched.reduce((sum, r) => sum + r.total, 0),
      malformedRecords: fetched.reduce((sum, r) => sum + r.malformed, 0),
      matchedBookings: 0,
      events: 0,
      warnings: 0,
      skippedConfigEntries: config.issues.length
    };
    const base = {
      weekStart: window.weekStart,
      weekEnd: window.weekEnd,
      title: formatWeekTitle(window.weekStart, window.timezone),
      failedRooms: failures.map((f) => f.roomId),
      failures
    };

    if (advance(failures.length) === "FAILED") {
      this.logger.error({ summary }, "every room fetch failed");
      return { ...base, status: "failed", events: [], warnings: [], summary };
    }

    const matched = matchFriendBookings(bookings, config.friends);
    advance(failures.length);

    const laidOut = layoutWeek(matched, window);
    advance(failures.length);

    const { events, warnings } = applyIgnorePolicy(laidOut, config.ignore);
    const status = advance(failures.length) === "PARTIAL_FAILURE" ? "partial_failure" : "done";

    const result: WeeklyScanResult = {
      ...base,
      status,
      events,
      warnings,
      summary: { ...summary, matchedBookings: matched.length, events: events.length, warnings: warnings.length }
    };
    this.logger.info({ status, summary: result.summary }, "weekly scan finished");
    return result;
  }

  /** Fetch and match a single room over an explicit UTC window. */
  async inspectRoom(input: {
    room: Room;
    window: TimeInterval;
    credential: string;
    friends: FriendSet;
  }): Promise<{ matches: MatchedBooking[]; total: number; malformed: number }> {
    if (!(input.window.start < input.window.end)) {
      throw new InvalidWindowError("Window start must be before window end");
    }
    assertCredential(input.credential);

    const fetched = await this.source.fetchRoomBookings(input.room, input.window, input.credential);
    return {
      matches: matchFriendBookings(fetched.bookings, input.friends),
      total: fetched.total,
      malformed: fetched.malformed
    };
  }

  private async fetchAll(rooms: readonly Room[], window: TimeInterval, credential: string): Promise<RoomOutcome[]> {
    const limit = pLimit(this.concurrency);
    return Promise.all(rooms.map((room) => limit(() => this.fetchRoom(room, window, credential))));
  }

  /**
   * The task timeout aborts the request rather than racing it, so the worker
   * slot stays taken until the source has actually stopped.
   */
  private async fetchRoom(room: Room, window: TimeInterval, credential: string): Promise<RoomOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new TransientFetchError(`room ${room.code} timed out after ${this.taskTimeoutMs}ms`)),
      this.taskTimeoutMs
    );

    try {
      const result = await this.source.fetchRoomBookings(room, window, credential, controller.signal);
      if (result.malformed > 0) {
        this.logger.warn({ roomId: room.id, malformed: result.malformed }, "dropped malformed booking records");
      }
      return { ok: true, room, result };
    } catch (error) {
      const cause: unknown = controller.signal.aborted ? controller.signal.reason : error;
      const failure: RoomFailure = {
        roomId: room.id,
        roomCode: room.code,
        kind: classifyFetchError(cause),
        message: errorMessage(cause)
      };
      this.logger.warn({ roomId: room.id, kind: failure.kind, err: failure.message }, "room fetch failed");
      return { ok: false, room, failure };
    } finally {
      clearTimeout(timer);
    }
  }
}
