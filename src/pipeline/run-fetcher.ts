import { ConfigurationError, RequestError, serializeError } from "../errors.js";
import type { RunLogger } from "../logging/run-logger.js";
import type {
  DbtEnvironment,
  DbtRunSummary,
  RunFetchResult,
  RunFetchStopReason,
  RunLogClient,
  RunTimeWindow,
} from "../types.js";
import {
  buildServerRangeParams,
  describeWindow,
  isRunInWindow,
  isWindowEmpty,
  parseTimestamp,
} from "./time-window.js";

/** Largest page the runs endpoint serves per request. */
export const MAX_RUN_PAGE_SIZE = 100;

export interface FetchRunsInput {
  environment: DbtEnvironment;
  limit: number;
  window: RunTimeWindow;
  pageSize?: number;
  serverSideDateFilter?: boolean;
  logger?: RunLogger;
}

function oldestCreatedAt(runs: DbtRunSummary[]): number | null {
  let oldest: number | null = null;
  for (const run of runs) {
    const created = parseTimestamp(run.created_at);
    if (created !== null && (oldest === null || created < oldest)) {
      oldest = created;
    }
  }
  return oldest;
}

/**
 * Collects at most `limit` runs, most recent first, then keeps those inside
 * the window. The API has no range filter, so a full page means older runs
 * inside the window may have been left behind; `possiblyTruncated` says so.
 */
export async function fetchRuns(client: RunLogClient, input: FetchRunsInput): Promise<RunFetchResult> {
  if (!Number.isInteger(input.limit) || input.limit <= 0) {
    throw new ConfigurationError(`Run limit must be a positive integer, received ${input.limit}.`);
  }

  const pageSize = Math.min(input.pageSize ?? MAX_RUN_PAGE_SIZE, MAX_RUN_PAGE_SIZE);
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new ConfigurationError(`Run page size must be a positive integer, received ${pageSize}.`);
  }

  const { environment, window, logger } = input;
  const retrieved: DbtRunSummary[] = [];
  const seenIds = new Set<number>();
  let offset = 0;
  let duplicateCount = 0;
  let pagesFetched = 0;
  let stopReason: RunFetchStopReason = "limit_reached";
  let serverFilterRejected = false;
  let rangeParams =
    input.serverSideDateFilter && !isWindowEmpty(window) ? buildServerRangeParams(window) : undefined;

  while (retrieved.length < input.limit) {
    const requested = Math.min(pageSize, input.limit - retrieved.length);
    let page: DbtRunSummary[];

    try {
      page = await client.listRuns({
        environmentId: environment.id,
        limit: requested,
        offset,
        orderBy: "-created_at",
        rangeParams,
      });
    } catch (error) {
      if (!(rangeParams && error instanceof RequestError && error.status === 400)) {
        throw error;
      }

      serverFilterRejected = true;
      logger?.warn("runs", "runs.server_filter.rejected", "Server rejected date range parameters; filtering locally.", {
        environment_id: environment.id,
        range_params: rangeParams,
        error: serializeError(error),
      });
      rangeParams = undefined;
      continue;
    }

    pagesFetched += 1;
    offset += page.length;
    // Runs created between page requests shift the list; a shifted run comes back on the next page.
    for (const run of page) {
      if (seenIds.has(run.id)) {
        duplicateCount += 1;
        continue;
      }
      seenIds.add(run.id);
      retrieved.push(run);
    }

    if (page.length < requested) {
      stopReason = "exhausted";
      break;
    }

    const oldest = oldestCreatedAt(page);
    if (window.createdAfter !== undefined && oldest !== null && oldest < window.createdAfter) {
      stopReason = "window_passed";
      break;
    }
  }

  const runs = retrieved.filter((run) => isRunInWindow(run, window));
  const possiblyTruncated = stopReason === "limit_reached";

  logger?.info("runs", "runs.fetched", `Found ${runs.length} runs in window for environment ${environment.name}.`, {
    environment_id: environment.id,
    retrieved_count: retrieved.length,
    matched_count: runs.length,
    limit: input.limit,
    pages_fetched: pagesFetched,
    duplicate_count: duplicateCount,
    stop_reason: stopReason,
    window: describeWindow(window),
  });

  if (possiblyTruncated) {
    logger?.warn(
      "runs",
      "runs.possibly_truncated",
      `Run limit ${input.limit} reached for environment ${environment.name}; older runs inside the window may be missing.`,
      {
        environment_id: environment.id,
        limit: input.limit,
        matched_count: runs.length,
      },
    );
  }

  return {
    runs,
    retrievedCount: retrieved.length,
    limit: input.limit,
    pagesFetched,
    possiblyTruncated,
    stopReason,
    serverFilterRejected,
  };
}
