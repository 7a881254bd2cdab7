import { existsSync } from "node:fs";
import { join } from "node:path";
import { config } from "dotenv";
import { z } from "zod";

/**
 * Loads `.env` files for the current NODE_ENV. dotenv never overrides a value
 * that is already set, so files are read highest priority first.
 */
function loadEnvFiles(cwd: string): void {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const envFiles = [`.env.${nodeEnv}.local`, `.env.${nodeEnv}`, ".env.local", ".env"];

  for (const file of envFiles) {
    const filePath = join(cwd, file);
    if (existsSync(filePath)) {
      config({ path: filePath });
    }
  }
}

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  ROOMWATCH_TIMEZONE: z.string().min(1).default("Australia/Melbourne"),

  // Remote scheduling API
  BOOKING_API_BASE_URL: z.string().url().default("https://cyon-syd-v4-api-d1-03.azurewebsites.net"),
  BOOKING_API_TOKEN: z.string().min(1).optional(),

  // Storage state written by the browser-session collaborator
  STORAGE_STATE_PATH: z.string().default(".secrets/storage_state.json"),
  STORAGE_STATE_ORIGIN: z.string().url().default("https://resourcebooker.rmit.edu.au"),
  STORAGE_STATE_KEY: z.string().min(1).default("scientia-session-authorization"),

  FRIENDS_PATH: z.string().default("friends.json"),
  IGNORE_ROOMS_PATH: z.string().default("ignore_rooms.json"),
  ROOMS_PATH: z.string().default("rooms.json"),

  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FETCH_RETRIES: z.coerce.number().int().min(0).max(5).default(2)
});

export type EnvConfig = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): EnvConfig {
  if (source === process.env) loadEnvFiles(cwd);
  return envSchema.parse(source);
}
