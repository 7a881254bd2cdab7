import pino, { type DestinationStream, type Logger } from "pino";

export type { DestinationStream, Logger };

const REDACT_PATHS = ["credential", "token", "authorization", "headers.authorization", "headers.Authorization"];

// stdout is reserved for job output
export const LOG_FD = 2;

export function createLogger(
  name: string,
  level = process.env.LOG_LEVEL ?? "info",
  destination: DestinationStream = pino.destination({ fd: LOG_FD, sync: true })
): Logger {
  return pino(
    {
      name,
      level,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" }
    },
    destination
  );
}

export const logger = createLogger("roomwatch");
