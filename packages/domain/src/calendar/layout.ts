import { DateTime } from "luxon";
import type { CalendarEvent, MatchedBooking, Weekday } from "@roomwatch/shared";
import type { WeekWindow } from "../week/week-window";
import { weekDays } from "../week/week-window";
import { clipInterval } from "./interval";
import { assignLanes } from "./lanes";

export type DisplayHours = {
  startHour: number;
  endHour: number;
};

export const DISPLAY_HOURS: DisplayHours = { startHour: 8, endHour: 20 };

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4];

/** A calendar event paired with the booking it was cut from. */
export type LaidOutEvent = {
  event: CalendarEvent;
  source: MatchedBooking;
};

type DaySegment = {
  source: MatchedBooking;
  startMinutes: number;
  endMinutes: number;
};

export function formatMinutes(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  return `${String(hours).padStart(2, "0")}:${String(minutes % 60).padStart(2, "0")}`;
}

function minutesIntoDay(value: DateTime, day: DateTime): number {
  if (!value.hasSame(day, "day")) return 24 * 60;
  return value.hour * 60 + value.minute;
}

function segmentsForDay(matched: readonly MatchedBooking[], day: DateTime, hours: DisplayHours): DaySegment[] {
  const bounds = {
    start: day.set({ hour: hours.startHour, minute: 0, second: 0, millisecond: 0 }).toJSDate(),
    end: day.set({ hour: hours.endHour, minute: 0, second: 0, millisecond: 0 }).toJSDate()
  };
  const segments: DaySegment[] = [];

  for (const source of matched) {
    const clipped = clipInterval(source.booking, bounds);
    if (!clipped) continue;

    const startMinutes = minutesIntoDay(DateTime.fromJSDate(clipped.start, { zone: day.zone }), day);
    const endMinutes = minutesIntoDay(DateTime.fromJSDate(clipped.end, { zone: day.zone }), day);
    if (endMinutes <= startMinutes) continue;

    segments.push({ source, startMinutes, endMinutes });
  }

  return segments;
}

/**
 * Projects matched bookings onto the Monday–Friday display grid. A booking is
 * cut into one event per weekday it touches, clipped to the display hours of
 * that day; anything outside the week or the display hours is dropped.
 */
export function layoutWeek(
  matched: readonly MatchedBooking[],
  window: WeekWindow,
  hours: DisplayHours = DISPLAY_HOURS
): LaidOutEvent[] {
  const days = weekDays(window);
  const output: LaidOutEvent[] = [];

  for (const weekday of WEEKDAYS) {
    const day = days[weekday];
    if (!day) continue;

    const placed = assignLanes(segmentsForDay(matched, day, hours)).sort(
      (a, b) => a.item.startMinutes - b.item.startMinutes || a.lane - b.lane
    );

    for (const { item, lane, laneCount } of placed) {
      const room = item.source.booking.room;
      const start = formatMinutes(item.startMinutes);
      const end = formatMinutes(item.endMinutes);
      output.push({
        event: {
          weekday,
          date: day.toFormat("yyyy-MM-dd"),
          start,
          end,
          startMinutes: item.startMinutes,
          endMinutes: item.endMinutes,
          roomId: room.id,
          roomCode: room.code,
          roomName: room.name,
          label: `${room.code} ${start}–${end}`,
          lane,
          laneCount,
          ignored: false
        },
        source: item.source
      });
    }
  }

  return output;
}
