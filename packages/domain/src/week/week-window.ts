import { DateTime } from "luxon";
import { InvalidWindowError } from "@roomwatch/shared";

export const DEFAULT_TIMEZONE = "Australia/Melbourne";

export type WeekWindow = {
  timezone: string;
  /** Monday, `yyyy-MM-dd` in the window's timezone. */
  weekStart: string;
  /** Friday, `yyyy-MM-dd` in the window's timezone. */
  weekEnd: string;
  startUtc: Date;
  endUtc: Date;
};

/**
 * Picks the Monday–Friday week to report on: the current one on weekdays,
 * the following one on Saturday and Sunday.
 */
export function resolveWeekWindow(now: Date, timezone = DEFAULT_TIMEZONE): WeekWindow {
  const local = DateTime.fromJSDate(now, { zone: timezone });
  if (!local.isValid) {
    throw new InvalidWindowError(`Cannot resolve week from clock input (${local.invalidReason ?? "invalid"})`);
  }

  const anchor = local.weekday >= 6 ? local.plus({ weeks: 1 }) : local;
  const monday = anchor.startOf("week");
  const friday = monday.plus({ days: 4 });

  return {
    timezone,
    weekStart: monday.toFormat("yyyy-MM-dd"),
    weekEnd: friday.toFormat("yyyy-MM-dd"),
    startUtc: monday.toUTC().toJSDate(),
    endUtc: friday.endOf("day").toUTC().toJSDate()
  };
}

export function weekDays(window: WeekWindow): DateTime[] {
  const monday = DateTime.fromISO(window.weekStart, { zone: window.timezone });
  if (!monday.isValid) throw new InvalidWindowError(`Invalid week start ${window.weekStart}`);
  return [0, 1, 2, 3, 4].map((offset) => monday.plus({ days: offset }));
}
