import type { TimeInterval } from "@roomwatch/shared";

export type MinuteInterval = {
  startMinutes: number;
  endMinutes: number;
};

// Half-open: [start, end)
export function overlaps(a: MinuteInterval, b: MinuteInterval): boolean {
  return a.startMinutes < b.endMinutes && b.startMinutes < a.endMinutes;
}

export function clipInterval(interval: TimeInterval, bounds: TimeInterval): TimeInterval | null {
  const start = interval.start > bounds.start ? interval.start : bounds.start;
  const end = interval.end < bounds.end ? interval.end : bounds.end;
  return end > start ? { start, end } : null;
}
