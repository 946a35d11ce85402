import path from "node:path";
import { ConfigurationError, serializeError } from "../errors.js";
import type { RunLogger } from "../logging/run-logger.js";
import type {
  DbtEnvironment,
  EnvironmentFilter,
  EnvironmentRunReport,
  InvocationReport,
  RetrievalReport,
  RunFetchResult,
  RunLogClient,
  RunTimeWindow,
} from "../types.js";
import { filterEnvironments } from "./environment-filter.js";
import { retrieveRunLogs } from "./log-retrieval.js";
import { environmentDirName } from "./persist.js";
import { fetchRuns } from "./run-fetcher.js";
import { describeWindow } from "./time-window.js";

export interface RetrievalOptions {
  outputDir: string;
  filter: EnvironmentFilter;
  window: RunTimeWindow;
  limit: number;
  pageSize?: number;
  concurrency: number;
  includeSteps: boolean;
  writeLogs: boolean;
  useDebugLogs: boolean;
  serverSideDateFilter: boolean;
}

export interface RetrievalDependencies {
  client: RunLogClient;
  logger: RunLogger;
  invocationId: string;
  logPath?: string | null;
  signal?: AbortSignal;
  now?: () => Date;
}

function emptyRetrieval(environment: DbtEnvironment, cancelled: boolean): RetrievalReport {
  return {
    environmentId: environment.id,
    environmentName: environment.name,
    attempted: 0,
    succeeded: 0,
    failed: [],
    skipped: [],
    outputPaths: [],
    logFilesWritten: 0,
    cancelled,
  };
}

function validateOptions(options: RetrievalOptions): void {
  if (!Number.isInteger(options.limit) || options.limit <= 0) {
    throw new ConfigurationError(`Run limit must be a positive integer, received ${options.limit}.`);
  }
  if (!Number.isInteger(options.concurrency) || options.concurrency <= 0) {
    throw new ConfigurationError(`Concurrency must be a positive integer, received ${options.concurrency}.`);
  }
}

function buildReport(input: {
  invocationId: string;
  startedAt: Date;
  finishedAt: Date;
  outputDir: string;
  logPath: string | null;
  appliedFilters: string[];
  environments: EnvironmentRunReport[];
  cancelled: boolean;
}): InvocationReport {
  const totals = {
    environments: input.environments.length,
    runsRetrieved: 0,
    runsMatched: 0,
    runsSucceeded: 0,
    runsFailed: 0,
    runsSkipped: 0,
    logFilesWritten: 0,
  };

  for (const entry of input.environments) {
    totals.runsRetrieved += entry.fetch.retrievedCount;
    totals.runsMatched += entry.fetch.matchedCount;
    totals.runsSucceeded += entry.retrieval.succeeded;
    totals.runsFailed += entry.retrieval.failed.length;
    totals.runsSkipped += entry.retrieval.skipped.length;
    totals.logFilesWritten += entry.retrieval.logFilesWritten;
  }

  return {
    invocationId: input.invocationId,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    elapsedMs: input.finishedAt.getTime() - input.startedAt.getTime(),
    outputDir: input.outputDir,
    logPath: input.logPath,
    appliedFilters: input.appliedFilters,
    environments: input.environments,
    truncatedEnvironments: input.environments
      .filter((entry) => entry.fetch.possiblyTruncated)
      .map((entry) => ({
        environmentId: entry.environmentId,
        environmentName: entry.environmentName,
        limit: entry.fetch.limit,
      })),
    totals,
    cancelled: input.cancelled,
  };
}

/**
 * Lists environments, applies the filter, then fetches and persists runs one
 * environment at a time. Failing to list environments or runs ends the
 * invocation; failures of individual runs are recorded in the report.
 */
export async function runRetrieval(
  options: RetrievalOptions,
  deps: RetrievalDependencies,
): Promise<InvocationReport> {
  validateOptions(options);

  const now = deps.now ?? (() => new Date());
  const { client, logger } = deps;
  const startedAt = now();
  const cancellation = new AbortController();
  const onExternalAbort = () => cancellation.abort(deps.signal?.reason);

  if (deps.signal?.aborted) {
    cancellation.abort(deps.signal.reason);
  } else {
    deps.signal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  logger.info("pipeline", "retrieval.started", "Log retrieval started.", {
    invocation_id: deps.invocationId,
    output_dir: options.outputDir,
    filter: {
      deployment_types: options.filter.deploymentTypes ?? null,
      env_names: options.filter.names ?? null,
      env_ids: options.filter.ids ?? null,
    },
    window: describeWindow(options.window),
    limit: options.limit,
    concurrency: options.concurrency,
    include_steps: options.includeSteps,
    write_logs: options.writeLogs,
    use_debug_logs: options.useDebugLogs,
    server_side_date_filter: options.serverSideDateFilter,
  });

  try {
    let environments: DbtEnvironment[];
    try {
      environments = await client.listEnvironments();
    } catch (error) {
      logger.error("pipeline", "environments.failed", "Failed to list environments.", {
        error: serializeError(error),
      });
      throw error;
    }

    const filtered = filterEnvironments(environments, options.filter);
    logger.info(
      "pipeline",
      "environments.filtered",
      filtered.appliedFilters.length > 0
        ? `Filtered to ${filtered.environments.length} of ${environments.length} environments.`
        : `No filters applied, using all ${environments.length} environments.`,
      {
        total_count: environments.length,
        selected_count: filtered.environments.length,
        applied_filters: filtered.appliedFilters,
        selected_ids: filtered.environments.map((env) => env.id),
      },
    );

    if (filtered.environments.length === 0) {
      logger.warn("pipeline", "environments.none_selected", "No environments matched the filters.");
    }

    const entries: EnvironmentRunReport[] = [];
    for (const environment of filtered.environments) {
      if (cancellation.signal.aborted) {
        logger.warn("pipeline", "environment.skipped", `Skipping environment ${environment.name}; retrieval was cancelled.`, {
          environment_id: environment.id,
        });
        continue;
      }

      logger.info("pipeline", "environment.started", `Processing environment ${environment.name}.`, {
        environment_id: environment.id,
        deployment_type: environment.deployment_type ?? null,
      });

      let fetched: RunFetchResult;
      try {
        fetched = await fetchRuns(client, {
          environment,
          limit: options.limit,
          window: options.window,
          pageSize: options.pageSize,
          serverSideDateFilter: options.serverSideDateFilter,
          logger,
        });
      } catch (error) {
        logger.error("pipeline", "runs.failed", `Failed to list runs for environment ${environment.name}.`, {
          environment_id: environment.id,
          error: serializeError(error),
        });
        throw error;
      }

      const { runs, ...fetchMeta } = fetched;
      const retrieval =
        runs.length > 0
          ? await retrieveRunLogs({
              client,
              environment,
              runs,
              concurrency: options.concurrency,
              includeSteps: options.includeSteps,
              writeLogs: options.writeLogs,
              useDebugLogs: options.useDebugLogs,
              outputDir: options.outputDir,
              logger,
              cancellation,
            })
          : emptyRetrieval(environment, cancellation.signal.aborted);

      entries.push({
        environmentId: environment.id,
        environmentName: environment.name,
        deploymentType: environment.deployment_type ?? null,
        directory: path.join(options.outputDir, environmentDirName(environment)),
        fetch: { ...fetchMeta, matchedCount: runs.length },
        retrieval,
      });
    }

    const report = buildReport({
      invocationId: deps.invocationId,
      startedAt,
      finishedAt: now(),
      outputDir: options.outputDir,
      logPath: deps.logPath ?? null,
      appliedFilters: filtered.appliedFilters,
      environments: entries,
      cancelled: cancellation.signal.aborted,
    });

    logger.info("pipeline", "retrieval.completed", "Log retrieval complete.", {
      ...report.totals,
      truncated_environment_ids: report.truncatedEnvironments.map((entry) => entry.environmentId),
      cancelled: report.cancelled,
      elapsed_ms: report.elapsedMs,
    });

    return report;
  } finally {
    deps.signal?.removeEventListener("abort", onExternalAbort);
  }
}
