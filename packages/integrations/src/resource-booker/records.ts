import { DateTime } from "luxon";
import { z } from "zod";
import { BOOKING_TEXT_FIELDS, type BookingFields, type BookingTextField, type RawBooking, type Room } from "@roomwatch/shared";

const START_KEYS = ["StartDateTime", "startDate", "StartDate"] as const;
const END_KEYS = ["EndDateTime", "endDate", "EndDate"] as const;

const recordSchema = z.record(z.string(), z.unknown());
const itemsEnvelopeSchema = z.object({ items: z.array(z.unknown()) });
const resourceSchema = z.object({ Name: z.unknown().optional(), name: z.unknown().optional() });

export type NormalizedBookings = {
  bookings: RawBooking[];
  total: number;
  malformed: number;
};

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function parseInstant(record: Record<string, unknown>, keys: readonly string[]): Date | null {
  for (const key of keys) {
    const value = asText(record[key]);
    if (!value) continue;
    const parsed = DateTime.fromISO(value, { zone: "utc" });
    if (parsed.isValid) return parsed.toJSDate();
  }
  return null;
}

function extractResourceName(record: Record<string, unknown>): string | null {
  const resources = record.Resources;
  if (Array.isArray(resources) && resources.length > 0) {
    const first = resourceSchema.safeParse(resources[0]);
    if (first.success) return asText(first.data.Name) || asText(first.data.name) || null;
  }
  return asText(record.ResourceName) || null;
}

function extractFields(record: Record<string, unknown>): BookingFields {
  const fields: Partial<Record<BookingTextField, string>> = {};
  for (const field of BOOKING_TEXT_FIELDS) {
    const value = asText(record[field]);
    if (value) fields[field] = value;
  }
  return fields;
}

function extractId(record: Record<string, unknown>, fallback: string): string {
  const id = record.Id ?? record.id;
  if (typeof id === "string" && id) return id;
  if (typeof id === "number") return String(id);
  return fallback;
}

export function normalizeBookingRecord(raw: unknown, room: Room, index: number): RawBooking | null {
  const parsed = recordSchema.safeParse(raw);
  if (!parsed.success) return null;
  const record = parsed.data;

  const start = parseInstant(record, START_KEYS);
  const end = parseInstant(record, END_KEYS);
  if (!start || !end || end <= start) return null;

  return {
    id: extractId(record, `${room.id}:${index}`),
    room,
    start,
    end,
    title: asText(record.Name) || asText(record.Title) || "Booking",
    resourceName: extractResourceName(record),
    fields: extractFields(record)
  };
}

/** Accepts either a bare array of records or an `{ items: [...] }` envelope. */
export function extractRecords(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  const envelope = itemsEnvelopeSchema.safeParse(payload);
  return envelope.success ? envelope.data.items : [];
}

export function normalizeBookingsPayload(payload: unknown, room: Room): NormalizedBookings {
  const records = extractRecords(payload);
  const bookings: RawBooking[] = [];

  records.forEach((raw, index) => {
    const booking = normalizeBookingRecord(raw, room, index);
    if (booking) bookings.push(booking);
  });

  return { bookings, total: records.length, malformed: records.length - bookings.length };
}
