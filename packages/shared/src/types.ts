export type TimeInterval = {
  start: Date;
  end: Date;
};

export const BOOKING_TEXT_FIELDS = ["Owner", "BookerEmailAddress", "BookerName", "Reference"] as const;

export type BookingTextField = (typeof BOOKING_TEXT_FIELDS)[number];

export type BookingFields = Readonly<Partial<Record<BookingTextField, string>>>;

export type Room = {
  readonly id: string;
  readonly code: string;
  readonly name: string;
};

export type RawBooking = {
  readonly id: string;
  readonly room: Room;
  readonly start: Date;
  readonly end: Date;
  readonly title: string;
  readonly resourceName: string | null;
  readonly fields: BookingFields;
};

export type FriendSet = {
  readonly ids: ReadonlySet<string>;
  readonly fields: readonly BookingTextField[];
};

export type IgnoreSet = {
  readonly rooms: ReadonlySet<string>;
};

export type MatchedBooking = {
  readonly booking: RawBooking;
  readonly identifier: string;
  readonly field: BookingTextField;
};

export type Weekday = 0 | 1 | 2 | 3 | 4;

export type CalendarEvent = {
  weekday: Weekday;
  date: string;
  start: string;
  end: string;
  startMinutes: number;
  endMinutes: number;
  roomId: string;
  roomCode: string;
  roomName: string;
  label: string;
  lane: number;
  laneCount: number;
  ignored: boolean;
};

export type Warning = {
  roomCode: string;
  roomName: string;
  date: string;
  start: string;
  end: string;
  identifier: string;
};

export type FetchFailureKind = "authorization" | "transient" | "rejected";

export type RoomFailure = {
  roomId: string;
  roomCode: string;
  kind: FetchFailureKind;
  message: string;
};

export type ScanStatus = "done" | "partial_failure" | "failed";

export type ScanSummary = {
  roomsQueried: number;
  roomsFailed: number;
  bookingsFetched: number;
  malformedRecords: number;
  matchedBookings: number;
  events: number;
  warnings: number;
  skippedConfigEntries: number;
};

export type WeeklyScanResult = {
  status: ScanStatus;
  weekStart: string;
  weekEnd: string;
  title: string;
  events: CalendarEvent[];
  warnings: Warning[];
  failedRooms: string[];
  failures: RoomFailure[];
  summary: ScanSummary;
};

export type RoomFetchResult = {
  bookings: RawBooking[];
  total: number;
  malformed: number;
};

/**
 * Once `signal` aborts, implementations must stop work and reject promptly;
 * the caller keeps the room's worker slot until the returned promise settles.
 */
export interface BookingSource {
  fetchRoomBookings(
    room: Room,
    window: TimeInterval,
    credential: string,
    signal?: AbortSignal
  ): Promise<RoomFetchResult>;
}
