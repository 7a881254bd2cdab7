import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import { loadEnv, type EnvConfig } from "@roomwatch/shared";

export const NOW = new Date("2025-08-06T02:00:00.000Z");
export const BASE_URL = "https://booking.example.test";

export const ROOMS = [
  { id: "room-swanston", code: "010.05.68", name: "Swanston Study Room" },
  { id: "room-library", code: "080.10.04", name: "Library Pod" }
];

export async function makeWorkspace(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "roomwatch-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export async function writeJson(dir: string, name: string, value: unknown): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, JSON.stringify(value), "utf8");
  return path;
}

export function testEnv(dir: string, overrides: Record<string, string> = {}): EnvConfig {
  return loadEnv({
    LOG_LEVEL: "silent",
    BOOKING_API_BASE_URL: BASE_URL,
    BOOKING_API_TOKEN: "test-token",
    FETCH_RETRIES: "0",
    FRIENDS_PATH: join(dir, "friends.json"),
    IGNORE_ROOMS_PATH: join(dir, "ignore_rooms.json"),
    ROOMS_PATH: join(dir, "rooms.json"),
    STORAGE_STATE_PATH: join(dir, "storage_state.json"),
    ...overrides
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

/** Serves canned responses keyed by the room id in the request path. */
export function fakeFetch(byRoom: Record<string, () => Response>) {
  return vi.fn<typeof fetch>(async (input) => {
    const url = new URL(String(input));
    const roomId = decodeURIComponent(url.pathname.split("/")[3] ?? "");
    const respond = byRoom[roomId];
    return respond ? respond() : jsonResponse([], 200);
  });
}

export function jwtWithExpiry(expiresAt: Date): string {
  const encode = (value: unknown) => Buffer.from(JSON.stringify(value)).toString("base64url");
  return `${encode({ alg: "none" })}.${encode({ exp: Math.floor(expiresAt.getTime() / 1000) })}.sig`;
}
