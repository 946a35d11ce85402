import type { RetrievalLogRow, RunLogLevel } from "../types.js";

export interface RunLoggerStats {
  event_count: number;
  http_event_count: number;
  warn_count: number;
  error_count: number;
  flush_error_count: number;
}

interface RunLoggerOptions {
  invocationId: string;
  flushBatchSize: number;
  insertBatch?: (rows: RetrievalLogRow[]) => Promise<void>;
  consoleWrite?: (line: string) => void;
  consoleLevel?: RunLogLevel;
  now?: () => Date;
}

const LEVEL_RANK: Record<RunLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MAX_LOG_PAYLOAD_BYTES = 24_000;
const MAX_LOG_PAYLOAD_DEPTH = 4;
const MAX_LOG_ARRAY_ITEMS = 20;
const MAX_LOG_OBJECT_KEYS = 40;
const MAX_LOG_STRING_CHARS = 700;

function truncateString(value: string): string {
  if (value.length <= MAX_LOG_STRING_CHARS) {
    return value;
  }

  return `${value.slice(0, MAX_LOG_STRING_CHARS)}…`;
}

function truncateForLog(value: unknown, depth: number): unknown {
  if (depth >= MAX_LOG_PAYLOAD_DEPTH) {
    return "[truncated_depth_limit]";
  }

  if (typeof value === "string") {
    return truncateString(value);
  }

  if (typeof value === "number" || typeof value === "boolean" || value === null) {
    return value;
  }

  if (Array.isArray(value)) {
    const truncated = value.slice(0, MAX_LOG_ARRAY_ITEMS).map((entry) => truncateForLog(entry, depth + 1));
    if (value.length > MAX_LOG_ARRAY_ITEMS) {
      truncated.push(`[truncated_items:${value.length - MAX_LOG_ARRAY_ITEMS}]`);
    }
    return truncated;
  }

  if (typeof value === "object") {
    const entries = Object.entries(value).slice(0, MAX_LOG_OBJECT_KEYS);
    const output: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
      output[key] = truncateForLog(entry, depth + 1);
    }
    const originalKeyCount = Object.keys(value).length;
    if (originalKeyCount > MAX_LOG_OBJECT_KEYS) {
      output.__truncated_keys = originalKeyCount - MAX_LOG_OBJECT_KEYS;
    }
    return output;
  }

  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function safePayload(value: Record<string, unknown> | undefined): Record<string, unknown> {
  if (value === undefined) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(JSON.stringify(value));
    const normalized = isRecord(parsed) ? parsed : { value: parsed };

    const serialized = JSON.stringify(normalized);
    const sizeBytes = Buffer.byteLength(serialized, "utf8");
    if (sizeBytes <= MAX_LOG_PAYLOAD_BYTES) {
      return normalized;
    }

    const truncatedPayload = truncateForLog(normalized, 0);
    if (isRecord(truncatedPayload)) {
      return {
        __payload_truncated: true,
        __original_size_bytes: sizeBytes,
        ...truncatedPayload,
      };
    }

    return {
      __payload_truncated: true,
      __original_size_bytes: sizeBytes,
      value: truncatedPayload,
    };
  } catch {
    return { payload_serialization_error: true };
  }
}

/**
 * Structured event log for one retrieval invocation. Every event is written
 * to the console as a JSON line (subject to `consoleLevel`) and buffered for
 * the optional batch sink, which receives every level.
 */
export class RunLogger {
  private readonly invocationId: string;
  private readonly flushBatchSize: number;
  private readonly insertBatch?: (rows: RetrievalLogRow[]) => Promise<void>;
  private readonly consoleWrite: (line: string) => void;
  private readonly consoleLevel: RunLogLevel;
  private readonly now: () => Date;

  private readonly buffer: RetrievalLogRow[] = [];
  private nextSeq = 1;
  private flushChain: Promise<void> = Promise.resolve();
  private isFlushing = false;

  private readonly stats: RunLoggerStats = {
    event_count: 0,
    http_event_count: 0,
    warn_count: 0,
    error_count: 0,
    flush_error_count: 0,
  };

  constructor(options: RunLoggerOptions) {
    this.invocationId = options.invocationId;
    this.flushBatchSize = options.flushBatchSize;
    this.insertBatch = options.insertBatch;
    this.consoleWrite = options.consoleWrite ?? ((line) => console.log(line));
    this.consoleLevel = options.consoleLevel ?? "debug";
    this.now = options.now ?? (() => new Date());
  }

  getStats(): RunLoggerStats {
    return { ...this.stats };
  }

  log(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): void {
    const row = this.createRow(level, stage, event, message, payload);
    this.writeLine(row);

    if (!this.insertBatch) {
      return;
    }

    this.buffer.push(row);
    if (this.buffer.length >= this.flushBatchSize && !this.isFlushing) {
      this.scheduleFlush("threshold");
    }
  }

  debug(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("debug", stage, event, message, payload);
  }

  info(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("info", stage, event, message, payload);
  }

  warn(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("warn", stage, event, message, payload);
  }

  error(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("error", stage, event, message, payload);
  }

  async flush(reason = "manual"): Promise<void> {
    if (!this.insertBatch) {
      return;
    }

    this.scheduleFlush(reason);
    await this.flushChain;

    while (this.buffer.length > 0) {
      this.scheduleFlush(`${reason}_drain`);
      await this.flushChain;
    }
  }

  private scheduleFlush(reason: string): void {
    this.flushChain = this.flushChain
      .then(async () => {
        await this.flushInternal(reason);
      })
      .catch(() => {
        this.stats.flush_error_count += 1;
      });
  }

  private createRow(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): RetrievalLogRow {
    this.stats.event_count += 1;
    if (event.startsWith("http.")) {
      this.stats.http_event_count += 1;
    }
    if (level === "warn") {
      this.stats.warn_count += 1;
    }
    if (level === "error") {
      this.stats.error_count += 1;
    }

    return {
      invocationId: this.invocationId,
      seq: this.nextSeq++,
      level,
      stage,
      event,
      message,
      payload: safePayload(payload),
      timestamp: this.now().toISOString(),
    };
  }

  private writeLine(row: RetrievalLogRow): void {
    if (LEVEL_RANK[row.level] < LEVEL_RANK[this.consoleLevel]) {
      return;
    }

    this.consoleWrite(
      JSON.stringify({
        timestamp: row.timestamp,
        invocation_id: row.invocationId,
        seq: row.seq,
        level: row.level,
        stage: row.stage,
        event: row.event,
        message: row.message,
        payload: row.payload,
      }),
    );
  }

  private async flushInternal(reason: string): Promise<void> {
    if (!this.insertBatch || this.isFlushing || this.buffer.length === 0) {
      return;
    }

    this.isFlushing = true;
    const rows = this.buffer.splice(0, this.buffer.length);

    try {
      await this.insertBatch(rows);
    } catch (error) {
      this.stats.flush_error_count += 1;

      // The failed row goes to the console only; the sink just rejected a batch.
      const failedRow = this.createRow(
        "error",
        "logging",
        "log.flush.failed",
        "Failed to flush buffered log rows; continuing execution.",
        {
          reason,
          row_count: rows.length,
          error_message: error instanceof Error ? error.message : "unknown_error",
        },
      );
      this.writeLine(failedRow);
    } finally {
      this.isFlushing = false;
      if (this.buffer.length >= this.flushBatchSize) {
        this.scheduleFlush("post_flush_threshold");
      }
    }
  }
}
