import { randomUUID } from "node:crypto";
import { resolveBaseUrl, type AppConfig } from "../config.js";
import { RunLogger } from "../logging/run-logger.js";
import { DbtCloudClient, type HttpTelemetryCallback } from "../services/dbt-cloud.js";
import { createJsonlLogSink, retrievalLogPath } from "./persist.js";

export function createInvocationId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}Z$/, "Z");
  return `${stamp}_${randomUUID().slice(0, 8)}`;
}

export function createRunLogger(input: {
  config: AppConfig;
  invocationId: string;
  outputDir: string;
  persistLog: boolean;
}): { logger: RunLogger; logPath: string | null } {
  const logPath = input.persistLog ? retrievalLogPath(input.outputDir, input.invocationId) : null;
  const logger = new RunLogger({
    invocationId: input.invocationId,
    flushBatchSize: input.config.LOG_FLUSH_BATCH_SIZE,
    insertBatch: logPath ? createJsonlLogSink(logPath) : undefined,
    consoleLevel: input.config.LOG_CONSOLE_LEVEL,
    // stdout carries the JSON report only.
    // eslint-disable-next-line no-console
    consoleWrite: (line) => console.error(line),
  });
  return { logger, logPath };
}

export function createClient(input: {
  config: AppConfig;
  baseUrl?: string;
  host?: string;
  logger?: RunLogger;
}): DbtCloudClient {
  const telemetry: HttpTelemetryCallback | undefined = input.logger
    ? (event) => {
        input.logger?.log(event.level, event.stage, event.event, event.message, event.payload);
      }
    : undefined;

  return new DbtCloudClient({
    apiToken: input.config.DBT_CLOUD_API_TOKEN,
    accountId: input.config.DBT_CLOUD_ACCOUNT_ID,
    baseUrl: resolveBaseUrl({
      baseUrl: input.baseUrl ?? input.config.DBT_CLOUD_BASE_URL,
      host: input.host ?? input.config.DBT_CLOUD_HOST,
    }),
    timeoutMs: input.config.HTTP_TIMEOUT_MS,
    maxRetries: input.config.HTTP_MAX_RETRIES,
    retryBaseMs: input.config.HTTP_RETRY_BASE_MS,
    retryMaxMs: input.config.HTTP_RETRY_MAX_MS,
    telemetry,
  });
}
