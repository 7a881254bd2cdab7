export * from "./week/week-window";
export * from "./matching/friend-matcher";
export * from "./calendar/interval";
export * from "./calendar/lanes";
export * from "./calendar/layout";
export * from "./policies/ignore-rooms";
export * from "./pipeline/machine";
export * from "./report/format";
export * from "./services/weekly-scan-service";
