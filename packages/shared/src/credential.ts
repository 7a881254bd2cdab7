import { z } from "zod";
import { ConfigError } from "./errors";

const storageStateSchema = z.object({
  origins: z
    .array(
      z.object({
        origin: z.string(),
        localStorage: z.array(z.object({ name: z.string(), value: z.string() })).default([])
      })
    )
    .default([])
});

const sessionAuthorizationSchema = z.object({
  access_token: z.string().min(1)
});

const tokenPayloadSchema = z.object({
  exp: z.number().optional()
});

export type StorageStateLocation = {
  origin: string;
  storageKey: string;
};

/**
 * Pulls the bearer token out of a browser storage-state export. The token
 * lives as JSON (`{"access_token": "..."}`) inside one localStorage item.
 */
export function extractBearerToken(state: unknown, location: StorageStateLocation): string {
  const parsed = storageStateSchema.safeParse(state);
  if (!parsed.success) throw new ConfigError("Storage state is not a valid browser storage export");

  const origin = parsed.data.origins.find((o) => o.origin === location.origin);
  if (!origin) throw new ConfigError(`Origin ${location.origin} not found in storage state`);

  const item = origin.localStorage.find((x) => x.name === location.storageKey);
  if (!item) throw new ConfigError(`localStorage key '${location.storageKey}' not found`);

  let value: unknown;
  try {
    value = JSON.parse(item.value);
  } catch {
    throw new ConfigError(`localStorage key '${location.storageKey}' does not hold JSON`);
  }

  const auth = sessionAuthorizationSchema.safeParse(value);
  if (!auth.success) throw new ConfigError("access_token missing from session authorization");
  return auth.data.access_token;
}

// Reads the JWT exp claim without verifying the signature.
export function decodeTokenExpiry(token: string): Date | null {
  const payloadPart = token.split(".")[1];
  if (!payloadPart) return null;

  try {
    const payload = tokenPayloadSchema.safeParse(JSON.parse(Buffer.from(payloadPart, "base64url").toString("utf8")));
    if (!payload.success || payload.data.exp === undefined) return null;
    return new Date(payload.data.exp * 1000);
  } catch {
    return null;
  }
}

export function isTokenFresh(token: string, now = new Date(), marginMinutes = 5): boolean {
  const expiry = decodeTokenExpiry(token);
  if (!expiry) return true;
  return expiry.getTime() > now.getTime() + marginMinutes * 60_000;
}
