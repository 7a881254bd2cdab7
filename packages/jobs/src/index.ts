export * from "./load-config";
export * from "./scan-service";
export { runWeeklyScanOnce } from "./run-weekly-scan";
export { listBookings, parseListBookingsArgs, type ListBookingsArgs } from "./list-bookings";
