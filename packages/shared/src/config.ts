import { z } from "zod";
import { BOOKING_TEXT_FIELDS, type BookingTextField, type FriendSet, type IgnoreSet, type Room } from "./types";

export const ROOM_CODE_PATTERN = /^\d{3}\.\d{2}\.\d{2}$/;
export const STUDENT_NUMBER_PATTERN = /^s\d{7}$/;

export const DEFAULT_MATCH_FIELDS: readonly BookingTextField[] = BOOKING_TEXT_FIELDS;

export const utcIsoSchema = z.string().datetime({ offset: true });

export const friendsFileSchema = z.object({
  ids: z.array(z.string()).default([]),
  match_fields: z.array(z.string()).default([...DEFAULT_MATCH_FIELDS])
});

export const ignoreRoomsFileSchema = z.object({
  rooms: z.array(z.string()).default([])
});

export const roomEntrySchema = z.object({
  id: z.string().trim().min(1),
  code: z.string().trim(),
  name: z.string().trim().default("")
});

export const roomsFileSchema = z.array(z.unknown());

export type FriendsFile = z.infer<typeof friendsFileSchema>;
export type IgnoreRoomsFile = z.infer<typeof ignoreRoomsFileSchema>;

export type ConfigIssueCode =
  | "InvalidFriendId"
  | "InvalidMatchField"
  | "InvalidRoomCode"
  | "InvalidRoomEntry"
  | "DuplicateRoomCode";

export type ConfigIssue = {
  source: "friends" | "ignore_rooms" | "rooms";
  code: ConfigIssueCode;
  value: string;
};

export type ScanConfig = {
  rooms: readonly Room[];
  friends: FriendSet;
  ignore: IgnoreSet;
  issues: readonly ConfigIssue[];
};

const emailSchema = z.string().email();

const bookingTextFieldSchema = z.enum(BOOKING_TEXT_FIELDS);

export function isRoomCode(value: string): boolean {
  return ROOM_CODE_PATTERN.test(value);
}

export function normalizeFriendId(raw: string): string | null {
  const id = raw.trim().toLowerCase();
  if (!id) return null;
  if (STUDENT_NUMBER_PATTERN.test(id)) return id;
  return emailSchema.safeParse(id).success ? id : null;
}

export function buildFriendSet(file: FriendsFile): { friends: FriendSet; issues: ConfigIssue[] } {
  const ids = new Set<string>();
  const fields: BookingTextField[] = [];
  const issues: ConfigIssue[] = [];

  for (const raw of file.ids) {
    const id = normalizeFriendId(raw);
    if (id) ids.add(id);
    else issues.push({ source: "friends", code: "InvalidFriendId", value: raw });
  }

  for (const raw of file.match_fields) {
    const parsed = bookingTextFieldSchema.safeParse(raw.trim());
    if (!parsed.success) {
      issues.push({ source: "friends", code: "InvalidMatchField", value: raw });
      continue;
    }
    if (!fields.includes(parsed.data)) fields.push(parsed.data);
  }

  return { friends: { ids, fields }, issues };
}

export function buildIgnoreSet(file: IgnoreRoomsFile): { ignore: IgnoreSet; issues: ConfigIssue[] } {
  const rooms = new Set<string>();
  const issues: ConfigIssue[] = [];

  for (const raw of file.rooms) {
    const code = raw.trim();
    if (isRoomCode(code)) rooms.add(code);
    else issues.push({ source: "ignore_rooms", code: "InvalidRoomCode", value: raw });
  }

  return { ignore: { rooms }, issues };
}

export function buildRooms(entries: unknown[]): { rooms: Room[]; issues: ConfigIssue[] } {
  const rooms: Room[] = [];
  const seenCodes = new Set<string>();
  const issues: ConfigIssue[] = [];

  for (const entry of entries) {
    const parsed = roomEntrySchema.safeParse(entry);
    if (!parsed.success) {
      issues.push({ source: "rooms", code: "InvalidRoomEntry", value: JSON.stringify(entry) ?? String(entry) });
      continue;
    }
    const room = parsed.data;
    if (!isRoomCode(room.code)) {
      issues.push({ source: "rooms", code: "InvalidRoomCode", value: room.code });
      continue;
    }
    if (seenCodes.has(room.code)) {
      issues.push({ source: "rooms", code: "DuplicateRoomCode", value: room.code });
      continue;
    }
    seenCodes.add(room.code);
    rooms.push({ id: room.id, code: room.code, name: room.name || room.code });
  }

  return { rooms, issues };
}

export function buildScanConfig(input: { friends: unknown; ignoreRooms: unknown; rooms: unknown }): ScanConfig {
  const friendSet = buildFriendSet(friendsFileSchema.parse(input.friends));
  const ignoreSet = buildIgnoreSet(ignoreRoomsFileSchema.parse(input.ignoreRooms));
  const roomList = buildRooms(roomsFileSchema.parse(input.rooms));

  return {
    rooms: roomList.rooms,
    friends: friendSet.friends,
    ignore: ignoreSet.ignore,
    issues: [...friendSet.issues, ...ignoreSet.issues, ...roomList.issues]
  };
}
