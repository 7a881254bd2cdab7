import { describe, expect, it } from "vitest";
import { assignLanes } from "../src/calendar/lanes";
import { overlaps } from "../src/calendar/interval";
import { formatMinutes, layoutWeek } from "../src/calendar/layout";
import { LIBRARY, WINDOW, matched } from "./fixtures";

function summarize(start: string, end: string) {
  return layoutWeek([matched(start, end)], WINDOW).map(({ event }) => [event.weekday, event.start, event.end]);
}

describe("layoutWeek", () => {
  it("places a Monday 10:00–11:00 booking in the first column", () => {
    const [entry, ...rest] = layoutWeek([matched("2025-08-04T00:00:00.000Z", "2025-08-04T01:00:00.000Z")], WINDOW);

    expect(rest).toHaveLength(0);
    expect(entry?.event).toEqual({
      weekday: 0,
      date: "2025-08-04",
      start: "10:00",
      end: "11:00",
      startMinutes: 600,
      endMinutes: 660,
      roomId: "room-swanston",
      roomCode: "010.05.68",
      roomName: "Swanston Study Room",
      label: "010.05.68 10:00–11:00",
      lane: 0,
      laneCount: 1,
      ignored: false
    });
  });

  it("never puts the matched identifier on an event", () => {
    const [entry] = layoutWeek([matched("2025-08-04T00:00:00.000Z", "2025-08-04T01:00:00.000Z")], WINDOW);
    expect(JSON.stringify(entry?.event)).not.toContain("s1234567");
  });

  it("clips bookings to the 08:00–20:00 display window", () => {
    expect(summarize("2025-08-04T09:00:00.000Z", "2025-08-04T11:00:00.000Z")).toEqual([[0, "19:00", "20:00"]]);
    expect(summarize("2025-08-03T21:00:00.000Z", "2025-08-03T23:00:00.000Z")).toEqual([[0, "08:00", "09:00"]]);
  });

  it("splits a booking that runs past midnight into one event per day", () => {
    expect(summarize("2025-08-04T08:00:00.000Z", "2025-08-04T23:00:00.000Z")).toEqual([
      [0, "18:00", "20:00"],
      [1, "08:00", "09:00"]
    ]);
  });

  it("drops bookings outside the week or the display hours", () => {
    expect(summarize("2025-08-09T00:00:00.000Z", "2025-08-09T01:00:00.000Z")).toEqual([]);
    expect(summarize("2025-08-03T00:00:00.000Z", "2025-08-03T01:00:00.000Z")).toEqual([]);
    expect(summarize("2025-08-03T20:00:00.000Z", "2025-08-03T22:00:00.000Z")).toEqual([]);
    expect(summarize("2025-08-08T10:00:00.000Z", "2025-08-08T11:00:00.000Z")).toEqual([]);
  });

  it("puts overlapping Tuesday bookings in separate lanes", () => {
    const laidOut = layoutWeek(
      [
        matched("2025-08-04T23:00:00.000Z", "2025-08-05T00:30:00.000Z", { identifier: "s1111111" }),
        matched("2025-08-05T00:00:00.000Z", "2025-08-05T01:00:00.000Z", { identifier: "s2222222" })
      ],
      WINDOW
    );

    expect(laidOut.map(({ event }) => [event.weekday, event.start, event.end, event.lane, event.laneCount])).toEqual([
      [1, "09:00", "10:30", 0, 2],
      [1, "10:00", "11:00", 1, 2]
    ]);
  });

  it("reuses the lowest free lane and orders by day, start and lane", () => {
    const laidOut = layoutWeek(
      [
        matched("2025-08-06T03:00:00.000Z", "2025-08-06T04:00:00.000Z"),
        matched("2025-08-06T00:00:00.000Z", "2025-08-06T02:00:00.000Z"),
        matched("2025-08-05T23:30:00.000Z", "2025-08-06T01:00:00.000Z", { room: LIBRARY }),
        matched("2025-08-05T23:00:00.000Z", "2025-08-06T00:00:00.000Z"),
        matched("2025-08-04T00:00:00.000Z", "2025-08-04T01:00:00.000Z")
      ],
      WINDOW
    );

    expect(laidOut.map(({ event }) => [event.weekday, event.start, event.lane, event.laneCount])).toEqual([
      [0, "10:00", 0, 1],
      [2, "09:00", 0, 2],
      [2, "09:30", 1, 2],
      [2, "10:00", 0, 2],
      [2, "13:00", 0, 1]
    ]);
  });

  it("produces identical output for identical input", () => {
    const input = [
      matched("2025-08-04T23:00:00.000Z", "2025-08-05T00:30:00.000Z"),
      matched("2025-08-05T00:00:00.000Z", "2025-08-05T01:00:00.000Z")
    ];

    expect(JSON.stringify(layoutWeek(input, WINDOW))).toBe(JSON.stringify(layoutWeek(input, WINDOW)));
  });
});

describe("assignLanes", () => {
  it("never shares a lane between overlapping intervals", () => {
    const intervals = [
      { startMinutes: 480, endMinutes: 600 },
      { startMinutes: 500, endMinutes: 520 },
      { startMinutes: 510, endMinutes: 700 },
      { startMinutes: 520, endMinutes: 540 },
      { startMinutes: 600, endMinutes: 660 }
    ];
    const placed = assignLanes(intervals);

    for (const a of placed) {
      for (const b of placed) {
        if (a !== b && overlaps(a.item, b.item)) expect(a.lane).not.toBe(b.lane);
      }
    }
    expect(placed.map((p) => p.lane)).toEqual([0, 1, 2, 1, 0]);
    expect(placed.every((p) => p.laneCount === 3)).toBe(true);
  });

  it("treats touching intervals as non-overlapping", () => {
    const placed = assignLanes([
      { startMinutes: 600, endMinutes: 660 },
      { startMinutes: 540, endMinutes: 600 }
    ]);

    expect(placed.map((p) => [p.item.startMinutes, p.lane, p.laneCount])).toEqual([
      [540, 0, 1],
      [600, 0, 1]
    ]);
  });
});

describe("formatMinutes", () => {
  it("renders minutes past midnight as HH:mm", () => {
    expect(formatMinutes(480)).toBe("08:00");
    expect(formatMinutes(1215)).toBe("20:15");
  });
});
