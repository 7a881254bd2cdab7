import type { BookingFields, FriendSet, MatchedBooking, RawBooking, Room } from "@roomwatch/shared";
import { resolveWeekWindow } from "../src/week/week-window";

export const TIMEZONE = "Australia/Melbourne";

// Wednesday 6 Aug 2025, 12:00 in Melbourne (AEST, UTC+10).
export const NOW = new Date("2025-08-06T02:00:00.000Z");
export const WINDOW = resolveWeekWindow(NOW, TIMEZONE);

export const SWANSTON: Room = { id: "room-swanston", code: "010.05.68", name: "Swanston Study Room" };
export const LIBRARY: Room = { id: "room-library", code: "080.10.04", name: "Library Pod" };

let sequence = 0;

export function rawBooking(input: {
  start: string;
  end: string;
  room?: Room;
  fields?: BookingFields;
  id?: string;
}): RawBooking {
  sequence += 1;
  return {
    id: input.id ?? `booking-${sequence}`,
    room: input.room ?? SWANSTON,
    start: new Date(input.start),
    end: new Date(input.end),
    title: "Study Room Booking",
    resourceName: null,
    fields: input.fields ?? {}
  };
}

export function matched(
  start: string,
  end: string,
  options: { room?: Room; identifier?: string } = {}
): MatchedBooking {
  const identifier = options.identifier ?? "s1234567";
  return {
    booking: rawBooking({ start, end, fields: { Owner: identifier }, ...(options.room ? { room: options.room } : {}) }),
    identifier,
    field: "Owner"
  };
}

export function friendSet(ids: string[], fields: FriendSet["fields"] = ["Owner"]): FriendSet {
  return { ids: new Set(ids), fields };
}
