import type { BookingTextField, FriendSet, MatchedBooking, RawBooking } from "@roomwatch/shared";

export type FriendMatch = {
  identifier: string;
  field: BookingTextField;
};

/**
 * Fields are scanned in configured order and the first field whose trimmed,
 * case-folded value equals a friend id wins. No substring matching.
 */
export function findFriendMatch(booking: RawBooking, friends: FriendSet): FriendMatch | null {
  for (const field of friends.fields) {
    const value = booking.fields[field]?.trim().toLowerCase();
    if (!value) continue;
    for (const identifier of friends.ids) {
      if (identifier.trim().toLowerCase() === value) return { identifier, field };
    }
  }
  return null;
}

export function matchFriendBookings(bookings: readonly RawBooking[], friends: FriendSet): MatchedBooking[] {
  const output: MatchedBooking[] = [];
  for (const booking of bookings) {
    const match = findFriendMatch(booking, friends);
    if (match) output.push({ booking, identifier: match.identifier, field: match.field });
  }
  return output;
}
