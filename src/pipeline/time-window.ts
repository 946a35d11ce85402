import { ConfigurationError } from "../errors.js";
import type { DbtRunSummary, RunTimeWindow } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?)(\.\d+)?\s*(Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parses API and CLI timestamps into epoch milliseconds. Accepts the API's
 * `2024-01-05 10:00:00.123456+00:00` form as well as ISO 8601; a missing
 * offset means UTC and a bare date means midnight UTC.
 */
export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) {
    return null;
  }

  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, date, time = "00:00:00", fraction = "", zone = "Z"] = match;
  const seconds = time.length === 5 ? `${time}:00` : time;
  const millis = fraction ? `.${`${fraction.slice(1)}000`.slice(0, 3)}` : "";
  const offset = zone.toUpperCase() === "Z" ? "Z" : zone.replace(/^([+-]\d{2})(\d{2})$/, "$1:$2");

  const parsed = Date.parse(`${date}T${seconds}${millis}${offset}`);
  return Number.isNaN(parsed) ? null : parsed;
}

export function parseBound(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseTimestamp(value);
  if (parsed === null) {
    throw new ConfigurationError(
      `Invalid --${name} value "${value}". Use an ISO 8601 date or datetime such as 2024-01-31 or 2024-01-31T23:59:59Z.`,
    );
  }
  return parsed;
}

export function buildTimeWindow(input: {
  createdAfter?: string;
  createdBefore?: string;
  finishedAfter?: string;
  finishedBefore?: string;
  daysBack?: number;
  now?: Date;
}): RunTimeWindow {
  const window: RunTimeWindow = {
    createdAfter: parseBound("created-after", input.createdAfter),
    createdBefore: parseBound("created-before", input.createdBefore),
    finishedAfter: parseBound("finished-after", input.finishedAfter),
    finishedBefore: parseBound("finished-before", input.finishedBefore),
  };

  if (input.daysBack !== undefined) {
    if (!Number.isFinite(input.daysBack) || input.daysBack < 0) {
      throw new ConfigurationError(`Invalid --days-back value ${input.daysBack}. Expected a non-negative number.`);
    }
    const now = input.now ?? new Date();
    window.createdAfter = now.getTime() - input.daysBack * DAY_MS;
  }

  if (
    window.createdAfter !== undefined &&
    window.createdBefore !== undefined &&
    window.createdAfter > window.createdBefore
  ) {
    throw new ConfigurationError("created-after must not be later than created-before.");
  }

  if (
    window.finishedAfter !== undefined &&
    window.finishedBefore !== undefined &&
    window.finishedAfter > window.finishedBefore
  ) {
    throw new ConfigurationError("finished-after must not be later than finished-before.");
  }

  return window;
}

export function isWindowEmpty(window: RunTimeWindow): boolean {
  return (
    window.createdAfter === undefined &&
    window.createdBefore === undefined &&
    window.finishedAfter === undefined &&
    window.finishedBefore === undefined
  );
}

function withinBounds(timestamp: number | null, after: number | undefined, before: number | undefined): boolean {
  if (after === undefined && before === undefined) {
    return true;
  }
  if (timestamp === null) {
    return false;
  }
  if (after !== undefined && timestamp < after) {
    return false;
  }
  if (before !== undefined && timestamp > before) {
    return false;
  }
  return true;
}

export function isRunInWindow(run: DbtRunSummary, window: RunTimeWindow): boolean {
  return (
    withinBounds(parseTimestamp(run.created_at), window.createdAfter, window.createdBefore) &&
    withinBounds(parseTimestamp(run.finished_at), window.finishedAfter, window.finishedBefore)
  );
}

export function describeWindow(window: RunTimeWindow): Record<string, string | null> {
  const iso = (value: number | undefined) => (value === undefined ? null : new Date(value).toISOString());
  return {
    created_after: iso(window.createdAfter),
    created_before: iso(window.createdBefore),
    finished_after: iso(window.finishedAfter),
    finished_before: iso(window.finishedBefore),
  };
}

function rangeParamsFor(field: string, after: number | undefined, before: number | undefined): Record<string, string> {
  const iso = (value: number) => new Date(value).toISOString();
  if (after !== undefined && before !== undefined) {
    return { [`${field}__range`]: `${iso(after)},${iso(before)}` };
  }
  if (after !== undefined) {
    return { [`${field}__gte`]: iso(after) };
  }
  if (before !== undefined) {
    return { [`${field}__lte`]: iso(before) };
  }
  return {};
}

/** Query parameters for a server-side date filter attempt; the API may reject them. */
export function buildServerRangeParams(window: RunTimeWindow): Record<string, string> {
  return {
    ...rangeParamsFor("created_at", window.createdAfter, window.createdBefore),
    ...rangeParamsFor("finished_at", window.finishedAfter, window.finishedBefore),
  };
}
