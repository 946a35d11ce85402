import "dotenv/config";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://cloud.getdbt.com/api/v2";

const envBoolean = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "off", ""].includes(normalized)) {
    return false;
  }
  return value;
}, z.boolean());

const envSchema = z.object({
  DBT_CLOUD_API_TOKEN: z.string().min(1, "DBT_CLOUD_API_TOKEN is required"),
  DBT_CLOUD_ACCOUNT_ID: z.coerce.number().int().positive(),
  DBT_CLOUD_BASE_URL: z.string().min(1).optional(),
  DBT_CLOUD_HOST: z.string().min(1).optional(),
  OUTPUT_DIR: z.string().min(1).default("dbt_logs"),
  CONCURRENCY: z.coerce.number().int().positive().default(4),
  RUN_LIMIT: z.coerce.number().int().positive().default(100),
  RUN_PAGE_SIZE: z.coerce.number().int().positive().max(100).default(100),
  SERVER_DATE_FILTER: envBoolean.default(false),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  HTTP_RETRY_BASE_MS: z.coerce.number().int().positive().default(500),
  HTTP_RETRY_MAX_MS: z.coerce.number().int().positive().default(8_000),
  LOG_FLUSH_BATCH_SIZE: z.coerce.number().int().positive().default(25),
  LOG_CONSOLE_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type AppConfig = z.infer<typeof envSchema>;

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${errors}`);
  }

  if (parsed.data.HTTP_RETRY_BASE_MS > parsed.data.HTTP_RETRY_MAX_MS) {
    throw new ConfigurationError(
      `Invalid environment configuration: HTTP_RETRY_BASE_MS (${parsed.data.HTTP_RETRY_BASE_MS}) must be <= HTTP_RETRY_MAX_MS (${parsed.data.HTTP_RETRY_MAX_MS})`,
    );
  }

  cachedConfig = parsed.data;
  return parsed.data;
}

/**
 * Precedence: an explicit base URL, then a bare host (scheme added when
 * missing, `/api/v2` appended), then the multi-tenant default.
 */
export function resolveBaseUrl(input: { baseUrl?: string; host?: string }): string {
  const baseUrl = input.baseUrl?.trim();
  if (baseUrl) {
    return baseUrl.replace(/\/+$/, "");
  }

  const host = input.host?.trim();
  if (host) {
    const withScheme = /^https?:\/\//.test(host) ? host : `https://${host}`;
    return `${withScheme.replace(/\/+$/, "")}/api/v2`;
  }

  return DEFAULT_BASE_URL;
}
