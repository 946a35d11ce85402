import { z } from "zod";
import {
  ConfigurationError,
  RequestError,
  ServerError,
  TransportError,
  isRetryableError,
  serializeError,
} from "../errors.js";
import type {
  DbtEnvironment,
  DbtRunDetail,
  DbtRunStep,
  DbtRunSummary,
  ListRunsParams,
  RunLogClient,
  RunLogLevel,
} from "../types.js";

const environmentSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    deployment_type: z.string().nullish(),
    account_id: z.number().int(),
  })
  .passthrough();

const runStepSchema = z
  .object({
    id: z.number().int().optional(),
    index: z.number().int(),
    name: z.string().nullish(),
    logs: z.string().nullish(),
    debug_logs: z.string().nullish(),
    truncated_debug_logs: z.string().nullish(),
  })
  .passthrough();

const runSummarySchema = z
  .object({
    id: z.number().int(),
    environment_id: z.number().int(),
    created_at: z.string(),
    finished_at: z.string().nullish(),
    status: z.number().int(),
    status_humanized: z.string().nullish(),
  })
  .passthrough();

const runDetailSchema = runSummarySchema.extend({
  run_steps: z.array(runStepSchema).nullish(),
});

const errorEnvelopeSchema = z.object({
  status: z
    .object({
      code: z.number().optional(),
      user_message: z.string().nullish(),
      developer_message: z.string().nullish(),
    })
    .optional(),
  data: z.unknown().optional(),
});

const responseEnvelopeSchema = z.object({
  data: z.unknown(),
});

type CallKind = "environments" | "runs" | "run_detail" | "step";

interface DbtCloudClientOptions {
  apiToken: string;
  accountId: number;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  telemetry?: HttpTelemetryCallback;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface DbtCloudClientStats {
  call_count: number;
  retry_count: number;
  timeout_count: number;
  request_failure_count: number;
}

export interface HttpTelemetryEvent {
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload?: Record<string, unknown>;
}

export type HttpTelemetryCallback = (event: HttpTelemetryEvent) => void;

/**
 * Picks the text a step contributes to the combined run log. Debug mode
 * prefers the full debug log; both modes fall back to whatever log field the
 * API populated.
 */
export function selectStepLog(step: DbtRunStep, debug: boolean): string {
  if (debug) {
    return step.debug_logs || step.truncated_debug_logs || "";
  }
  return step.logs || step.truncated_debug_logs || step.debug_logs || "";
}

function hasEmbeddedLogs(step: DbtRunStep): boolean {
  return (
    typeof step.logs === "string" ||
    typeof step.debug_logs === "string" ||
    typeof step.truncated_debug_logs === "string"
  );
}

export class DbtCloudClient implements RunLogClient {
  private readonly apiToken: string;
  private readonly accountId: number;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly retryMaxMs: number;
  private readonly telemetry?: HttpTelemetryCallback;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  private readonly stats: DbtCloudClientStats = {
    call_count: 0,
    retry_count: 0,
    timeout_count: 0,
    request_failure_count: 0,
  };

  constructor(options: DbtCloudClientOptions) {
    this.apiToken = options.apiToken;
    this.accountId = options.accountId;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries;
    this.retryBaseMs = options.retryBaseMs;
    this.retryMaxMs = options.retryMaxMs;
    this.telemetry = options.telemetry;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
  }

  getStats(): DbtCloudClientStats {
    return { ...this.stats };
  }

  async listEnvironments(): Promise<DbtEnvironment[]> {
    return this.request({
      callKind: "environments",
      path: `accounts/${this.accountId}/environments/`,
      schema: z.array(environmentSchema),
    });
  }

  async listRuns(params: ListRunsParams): Promise<DbtRunSummary[]> {
    if (!Number.isInteger(params.limit) || params.limit <= 0) {
      throw new ConfigurationError(`Run limit must be a positive integer, received ${params.limit}.`);
    }
    const offset = params.offset ?? 0;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ConfigurationError(`Run offset must be a non-negative integer, received ${offset}.`);
    }

    return this.request({
      callKind: "runs",
      path: `accounts/${this.accountId}/runs/`,
      query: {
        environment_id: String(params.environmentId),
        order_by: params.orderBy ?? "-created_at",
        limit: String(params.limit),
        offset: String(offset),
        ...params.rangeParams,
      },
      schema: z.array(runSummarySchema),
    });
  }

  async getRun(runId: number, includeSteps: boolean): Promise<DbtRunDetail> {
    return this.request({
      callKind: "run_detail",
      path: `accounts/${this.accountId}/runs/${runId}/`,
      query: includeSteps ? { include_related: "run_steps" } : undefined,
      schema: runDetailSchema,
    });
  }

  async getStepLog(run: DbtRunDetail, stepIndex: number, debug: boolean): Promise<string> {
    const step = run.run_steps?.find((candidate) => candidate.index === stepIndex);
    if (!step) {
      throw new RequestError(`Run ${run.id} has no step with index ${stepIndex}.`, {
        status: 404,
        method: "GET",
        url: this.buildUrl(`accounts/${this.accountId}/runs/${run.id}/`).toString(),
      });
    }

    if (hasEmbeddedLogs(step) || step.id === undefined) {
      return selectStepLog(step, debug);
    }

    const fetched = await this.request({
      callKind: "step",
      path: `accounts/${this.accountId}/steps/${step.id}/`,
      schema: runStepSchema,
    });
    return selectStepLog(fetched, debug);
  }

  private buildUrl(path: string, query?: Record<string, string>): URL {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private emitTelemetry(event: HttpTelemetryEvent): void {
    this.telemetry?.(event);
  }

  private async request<TOut>(input: {
    callKind: CallKind;
    path: string;
    query?: Record<string, string>;
    schema: z.ZodType<TOut, z.ZodTypeDef, unknown>;
  }): Promise<TOut> {
    const url = this.buildUrl(input.path, input.query);
    this.stats.call_count += 1;

    const body = await this.withRetry({
      callKind: input.callKind,
      url,
      operation: () => this.send(url),
    });

    const envelope = responseEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw this.toShapeError(url, envelope.error);
    }

    const parsed = input.schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      throw this.toShapeError(url, parsed.error, ["data"]);
    }

    return parsed.data;
  }

  private async send(url: URL): Promise<unknown> {
    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    try {
      let response: Response;
      let text: string;
      try {
        response = await this.fetchImpl(url, {
          method: "GET",
          headers: {
            Authorization: `Token ${this.apiToken}`,
            Accept: "application/json",
          },
          signal: controller.signal,
        });
        text = await response.text();
      } catch (error) {
        if (controller.signal.aborted) {
          throw new TransportError(`Request to ${url.pathname} timed out after ${this.timeoutMs}ms.`, {
            cause: error,
            isTimeout: true,
          });
        }
        throw new TransportError(`Request to ${url.pathname} failed: ${error instanceof Error ? error.message : String(error)}`, {
          cause: error,
        });
      }

      if (response.status >= 400 && response.status < 500) {
        throw this.toRequestError(response.status, url, text);
      }

      if (!response.ok) {
        throw new ServerError(`GET ${url.pathname} failed with HTTP ${response.status}.`, {
          status: response.status,
        });
      }

      try {
        return JSON.parse(text);
      } catch (error) {
        throw new ServerError(`GET ${url.pathname} returned a body that is not JSON.`, {
          status: response.status,
          retryable: false,
          cause: error,
        });
      }
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private toShapeError(url: URL, error: z.ZodError, prefix: string[] = []): ServerError {
    const issues = error.issues
      .slice(0, 5)
      .map((issue) => `${[...prefix, ...issue.path].join(".")}: ${issue.message}`)
      .join("; ");
    this.stats.request_failure_count += 1;
    return new ServerError(`Unexpected response shape from ${url.pathname}: ${issues}`, {
      status: 200,
      retryable: false,
    });
  }

  private toRequestError(status: number, url: URL, text: string): RequestError {
    let userMessage: string | undefined;
    let developerMessage: string | undefined;
    let data: unknown;

    try {
      const parsed = errorEnvelopeSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        userMessage = parsed.data.status?.user_message ?? undefined;
        developerMessage = parsed.data.status?.developer_message ?? undefined;
        data = parsed.data.data;
      }
    } catch {
      data = text.length > 0 ? text.slice(0, 500) : undefined;
    }

    const detail = userMessage ?? developerMessage ?? (typeof data === "string" ? data : undefined);
    const message = detail
      ? `GET ${url.pathname} failed with HTTP ${status}: ${detail}`
      : `GET ${url.pathname} failed with HTTP ${status}.`;

    return new RequestError(message, {
      status,
      method: "GET",
      url: url.toString(),
      userMessage,
      developerMessage,
      data,
    });
  }

  private async withRetry<T>(input: {
    callKind: CallKind;
    url: URL;
    operation: () => Promise<T>;
  }): Promise<T> {
    const totalAttempts = this.maxRetries + 1;
    const requestPayload = {
      call_kind: input.callKind,
      path: input.url.pathname,
      query: Object.fromEntries(input.url.searchParams),
    };

    this.emitTelemetry({
      level: "debug",
      stage: "http",
      event: "http.call.started",
      message: `API call started (${input.callKind}).`,
      payload: {
        ...requestPayload,
        total_attempts: totalAttempts,
      },
    });

    for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
      const attemptStartedAt = Date.now();

      try {
        const response = await input.operation();

        this.emitTelemetry({
          level: "debug",
          stage: "http",
          event: "http.attempt.succeeded",
          message: `API attempt succeeded (${input.callKind}).`,
          payload: {
            ...requestPayload,
            attempt,
            elapsed_ms: Date.now() - attemptStartedAt,
          },
        });

        return response;
      } catch (error) {
        if (error instanceof TransportError && error.isTimeout) {
          this.stats.timeout_count += 1;
        }

        const retryable = isRetryableError(error);
        const errorPayload = serializeError(error);

        this.emitTelemetry({
          level: "warn",
          stage: "http",
          event: "http.attempt.failed",
          message: `API attempt failed (${input.callKind}).`,
          payload: {
            ...requestPayload,
            attempt,
            total_attempts: totalAttempts,
            retryable,
            elapsed_ms: Date.now() - attemptStartedAt,
            error: errorPayload,
          },
        });

        if (!retryable || attempt === totalAttempts) {
          this.stats.request_failure_count += 1;

          this.emitTelemetry({
            level: "error",
            stage: "http",
            event: "http.call.failed",
            message: `API call failed (${input.callKind}).`,
            payload: {
              ...requestPayload,
              attempt,
              total_attempts: totalAttempts,
              error: errorPayload,
            },
          });

          throw error;
        }

        this.stats.retry_count += 1;
        const baseDelay = Math.min(this.retryMaxMs, this.retryBaseMs * 2 ** (attempt - 1));
        const jitteredDelay = Math.round(baseDelay * (0.8 + this.random() * 0.4));

        this.emitTelemetry({
          level: "warn",
          stage: "http",
          event: "http.retry.scheduled",
          message: `API retry scheduled (${input.callKind}).`,
          payload: {
            ...requestPayload,
            attempt,
            total_attempts: totalAttempts,
            delay_ms: jitteredDelay,
          },
        });

        await this.sleep(jitteredDelay);
      }
    }

    throw new Error("unreachable_retry_state");
  }
}
