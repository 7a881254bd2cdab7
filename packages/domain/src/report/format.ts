import { DateTime } from "luxon";
import type { MatchedBooking, Warning } from "@roomwatch/shared";

const LOCALE = "en-US";

function parseDate(isoDate: string, timezone: string): DateTime {
  return DateTime.fromISO(isoDate, { zone: timezone }).setLocale(LOCALE);
}

// "Week of 4–8 Aug 2025", "Week of 29 Sep – 3 Oct 2025", "Week of 29 Dec 2025 – 2 Jan 2026"
export function formatWeekTitle(weekStart: string, timezone: string): string {
  const monday = parseDate(weekStart, timezone);
  const friday = monday.plus({ days: 4 });

  if (monday.year !== friday.year) {
    return `Week of ${monday.toFormat("d LLL yyyy")} – ${friday.toFormat("d LLL yyyy")}`;
  }
  if (monday.month !== friday.month) {
    return `Week of ${monday.toFormat("d LLL")} – ${friday.toFormat("d LLL yyyy")}`;
  }
  return `Week of ${monday.toFormat("d")}–${friday.toFormat("d LLL yyyy")}`;
}

export function formatWarning(warning: Warning, timezone: string): string {
  const day = parseDate(warning.date, timezone).toFormat("ccc dd LLL");
  return `IGNORE-ROOM: ${warning.identifier} booked ${warning.roomCode} (${warning.roomName}) ${day} ${warning.start}–${warning.end}`;
}

export function formatLocal(value: Date, timezone: string): string {
  return DateTime.fromJSDate(value, { zone: timezone }).setLocale(LOCALE).toFormat("ccc dd LLL yyyy HH:mm");
}

export function formatBookingLine(match: MatchedBooking, timezone: string): string {
  const { booking } = match;
  const room = booking.resourceName ?? booking.room.name;
  return [
    `${formatLocal(booking.start, timezone)} → ${formatLocal(booking.end, timezone)}`,
    booking.title,
    room,
    `Owner:${booking.fields.Owner ?? "-"}`,
    booking.fields.BookerEmailAddress ?? "-"
  ].join(" | ");
}
