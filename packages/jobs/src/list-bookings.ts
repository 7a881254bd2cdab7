import { parseArgs } from "node:util";
import { formatBookingLine } from "@roomwatch/domain";
import { ConfigError, InvalidWindowError, createLogger, loadEnv, utcIsoSchema, type EnvConfig, type Room } from "@roomwatch/shared";
import { isEntrypoint } from "./entrypoint";
import { loadScanConfig, resolveCredential } from "./load-config";
import { createScanService, type JobDeps } from "./scan-service";

const USAGE = "Usage: list-bookings --room <room id> --start <ISO8601 UTC> --end <ISO8601 UTC>";

export type ListBookingsArgs = {
  roomId: string;
  start: Date;
  end: Date;
};

function parseInstant(value: string, flag: string): Date {
  const parsed = utcIsoSchema.safeParse(value);
  if (!parsed.success) throw new ConfigError(`${flag} must be an ISO 8601 timestamp with offset, got '${value}'`);
  return new Date(parsed.data);
}

export function parseListBookingsArgs(argv: string[]): ListBookingsArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      room: { type: "string" },
      start: { type: "string" },
      end: { type: "string" }
    },
    strict: true
  });

  if (!values.room || !values.start || !values.end) throw new ConfigError(USAGE);

  const start = parseInstant(values.start, "--start");
  const end = parseInstant(values.end, "--end");
  if (!(start < end)) throw new InvalidWindowError("--start must be before --end");

  return { roomId: values.room, start, end };
}

export async function listBookings(args: ListBookingsArgs, env: EnvConfig, deps: JobDeps = {}): Promise<string[]> {
  const logger = deps.logger ?? createLogger("list-bookings", env.LOG_LEVEL);
  const config = await loadScanConfig(env, logger);
  const room: Room = config.rooms.find((r) => r.id === args.roomId) ?? { id: args.roomId, code: "", name: args.roomId };
  const credential = await resolveCredential(env, logger, deps.now);

  const { matches, total } = await createScanService(env, logger, deps.fetch).inspectRoom({
    room,
    window: { start: args.start, end: args.end },
    credential,
    friends: config.friends
  });

  return [
    ...matches.map((m) => formatBookingLine(m, env.ROOMWATCH_TIMEZONE)),
    "",
    `Matched ${matches.length} of ${total} bookings in that window.`
  ];
}

async function main() {
  const args = parseListBookingsArgs(process.argv.slice(2));
  const lines = await listBookings(args, loadEnv());
  process.stdout.write(`${lines.join("\n")}\n`);
}

if (isEntrypoint(import.meta.url)) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
