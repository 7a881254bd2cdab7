import { WeeklyScanService } from "@roomwatch/domain";
import { ResourceBookerClient, retryBudgetMs } from "@roomwatch/integrations";
import type { EnvConfig, Logger } from "@roomwatch/shared";

export type JobDeps = {
  fetch?: typeof fetch;
  logger?: Logger;
  now?: Date;
};

const TASK_TIMEOUT_SLACK_MS = 1_000;

/** Long enough for the client to exhaust its retries before the room task gives up. */
export function taskTimeoutMs(env: Pick<EnvConfig, "FETCH_TIMEOUT_MS" | "FETCH_RETRIES">): number {
  return retryBudgetMs({ attemptTimeoutMs: env.FETCH_TIMEOUT_MS, retries: env.FETCH_RETRIES }) + TASK_TIMEOUT_SLACK_MS;
}

export function createScanService(env: EnvConfig, logger: Logger, fetchImpl?: typeof fetch): WeeklyScanService {
  const client = new ResourceBookerClient({
    baseUrl: env.BOOKING_API_BASE_URL,
    timeoutMs: env.FETCH_TIMEOUT_MS,
    retries: env.FETCH_RETRIES,
    logger,
    ...(fetchImpl ? { fetch: fetchImpl } : {})
  });

  return new WeeklyScanService(client, {
    timezone: env.ROOMWATCH_TIMEZONE,
    concurrency: env.FETCH_CONCURRENCY,
    taskTimeoutMs: taskTimeoutMs(env),
    logger
  });
}
