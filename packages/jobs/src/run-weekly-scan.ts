import { formatWarning } from "@roomwatch/domain";
import { createLogger, loadEnv, type EnvConfig, type WeeklyScanResult } from "@roomwatch/shared";
import { isEntrypoint } from "./entrypoint";
import { loadScanConfig, resolveCredential } from "./load-config";
import { createScanService, type JobDeps } from "./scan-service";

export async function runWeeklyScanOnce(env: EnvConfig, deps: JobDeps = {}): Promise<WeeklyScanResult> {
  const logger = deps.logger ?? createLogger("weekly-scan", env.LOG_LEVEL);
  const now = deps.now ?? new Date();

  const config = await loadScanConfig(env, logger);
  const credential = await resolveCredential(env, logger, now);
  const result = await createScanService(env, logger, deps.fetch).scan({ config, credential, now });

  for (const warning of result.warnings) {
    logger.warn(formatWarning(warning, env.ROOMWATCH_TIMEZONE));
  }
  return result;
}

async function main() {
  const env = loadEnv();
  const result = await runWeeklyScanOnce(env);
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  if (result.status === "failed") process.exitCode = 1;
}

if (isEntrypoint(import.meta.url)) {
  main().catch((error: unknown) => {
    createLogger("weekly-scan").fatal({ err: error }, "weekly scan aborted");
    process.exitCode = 1;
  });
}
