import { readFile } from "node:fs/promises";
import {
  ConfigError,
  buildScanConfig,
  extractBearerToken,
  isTokenFresh,
  type EnvConfig,
  type Logger,
  type ScanConfig
} from "@roomwatch/shared";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readJsonFile(path: string, fallback: unknown): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return fallback;
    throw error;
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ConfigError(`${path} is not valid JSON`);
  }
}

export async function loadScanConfig(
  env: Pick<EnvConfig, "FRIENDS_PATH" | "IGNORE_ROOMS_PATH" | "ROOMS_PATH">,
  logger?: Logger
): Promise<ScanConfig> {
  const [friends, ignoreRooms, rooms] = await Promise.all([
    readJsonFile(env.FRIENDS_PATH, {}),
    readJsonFile(env.IGNORE_ROOMS_PATH, {}),
    readJsonFile(env.ROOMS_PATH, [])
  ]);

  const config = buildScanConfig({ friends, ignoreRooms, rooms });
  for (const issue of config.issues) {
    logger?.warn({ source: issue.source, code: issue.code, value: issue.value }, "skipped config entry");
  }
  return config;
}

export async function resolveCredential(
  env: Pick<EnvConfig, "BOOKING_API_TOKEN" | "STORAGE_STATE_PATH" | "STORAGE_STATE_ORIGIN" | "STORAGE_STATE_KEY">,
  logger?: Logger,
  now = new Date()
): Promise<string> {
  let token = env.BOOKING_API_TOKEN;
  if (!token) {
    const state = await readJsonFile(env.STORAGE_STATE_PATH, null);
    if (state === null) {
      throw new ConfigError(`No BOOKING_API_TOKEN set and ${env.STORAGE_STATE_PATH} does not exist`);
    }
    token = extractBearerToken(state, { origin: env.STORAGE_STATE_ORIGIN, storageKey: env.STORAGE_STATE_KEY });
  }

  if (!isTokenFresh(token, now)) {
    logger?.warn("bearer credential expires within five minutes; refresh the session");
  }
  return token;
}
