import { isRoomCode, type CalendarEvent, type IgnoreSet, type Warning } from "@roomwatch/shared";
import type { LaidOutEvent } from "../calendar/layout";

export function isIgnoredRoom(roomCode: string, ignore: IgnoreSet): boolean {
  return isRoomCode(roomCode) && ignore.rooms.has(roomCode);
}

/**
 * Flags events in ignore-listed rooms and emits one warning per flagged
 * event. Only warnings carry the matched identifier.
 */
export function applyIgnorePolicy(
  laidOut: readonly LaidOutEvent[],
  ignore: IgnoreSet
): { events: CalendarEvent[]; warnings: Warning[] } {
  const events: CalendarEvent[] = [];
  const warnings: Warning[] = [];

  for (const { event, source } of laidOut) {
    const ignored = isIgnoredRoom(event.roomCode, ignore);
    events.push({ ...event, ignored });
    if (!ignored) continue;

    warnings.push({
      roomCode: event.roomCode,
      roomName: event.roomName,
      date: event.date,
      start: event.start,
      end: event.end,
      identifier: source.identifier
    });
  }

  return { events, warnings };
}
