import pLimit from "p-limit";
import { ConfigurationError, errorMessage, isAuthFailure, RequestError, ServerError, serializeError } from "../errors.js";
import type { RunLogger } from "../logging/run-logger.js";
import type {
  DbtEnvironment,
  DbtRunDetail,
  DbtRunSummary,
  RetrievalReport,
  RunFailure,
  RunLogClient,
} from "../types.js";
import { writeRunArtifacts } from "./persist.js";

export interface RetrieveRunLogsInput {
  client: RunLogClient;
  environment: DbtEnvironment;
  runs: DbtRunSummary[];
  concurrency: number;
  includeSteps: boolean;
  writeLogs: boolean;
  useDebugLogs: boolean;
  outputDir: string;
  logger?: RunLogger;
  /** Aborted on authentication failure; once aborted no further run is started. */
  cancellation?: AbortController;
}

export interface StepLogText {
  index: number;
  text: string;
}

type RunOutcome =
  | { kind: "succeeded"; runId: number; outputPaths: string[]; logFileWritten: boolean }
  | { kind: "failed"; failure: RunFailure }
  | { kind: "skipped"; runId: number };

/** Concatenates step logs by ascending step index; empty steps are left out. */
export function assembleCombinedLog(steps: StepLogText[]): string {
  return [...steps]
    .sort((a, b) => a.index - b.index)
    .filter((step) => step.text.length > 0)
    .map((step) => (step.text.endsWith("\n") ? step.text : `${step.text}\n`))
    .join("");
}

/** Step log requests in flight per run. */
export const STEP_LOG_CONCURRENCY = 4;

export async function collectStepLogs(
  client: RunLogClient,
  detail: DbtRunDetail,
  useDebugLogs: boolean,
): Promise<StepLogText[]> {
  const steps = detail.run_steps ?? [];
  const limiter = pLimit(STEP_LOG_CONCURRENCY);
  return Promise.all(
    steps.map((step) =>
      limiter(async () => ({
        index: step.index,
        text: await client.getStepLog(detail, step.index, useDebugLogs),
      })),
    ),
  );
}

function toFailure(runId: number, error: unknown): RunFailure {
  const failure: RunFailure = {
    runId,
    reason: errorMessage(error),
    errorName: error instanceof Error ? error.name : "UnknownError",
  };
  if (error instanceof RequestError || error instanceof ServerError) {
    failure.status = error.status;
  }
  return failure;
}

async function retrieveOne(input: RetrieveRunLogsInput, run: DbtRunSummary, signal: AbortSignal): Promise<RunOutcome> {
  const { client, environment, logger } = input;

  if (signal.aborted) {
    return { kind: "skipped", runId: run.id };
  }

  logger?.info("retrieval", "run.started", `Processing run ${run.id}.`, {
    environment_id: environment.id,
    run_id: run.id,
    status: run.status_humanized ?? run.status,
    created_at: run.created_at,
  });

  try {
    const detail = await client.getRun(run.id, input.includeSteps || input.writeLogs);

    const combinedLog = input.writeLogs
      ? assembleCombinedLog(await collectStepLogs(client, detail, input.useDebugLogs))
      : undefined;
    const logFileWritten = combinedLog !== undefined && combinedLog.length > 0;

    const outputPaths = await writeRunArtifacts({
      outputDir: input.outputDir,
      environment,
      run,
      detail,
      combinedLog,
    });

    logger?.info("retrieval", "run.saved", `Saved run ${run.id}.`, {
      environment_id: environment.id,
      run_id: run.id,
      output_paths: outputPaths,
      step_count: detail.run_steps?.length ?? 0,
      log_file_written: logFileWritten,
    });

    return {
      kind: "succeeded",
      runId: run.id,
      outputPaths,
      logFileWritten,
    };
  } catch (error) {
    if (isAuthFailure(error) && !signal.aborted) {
      input.cancellation?.abort(error);
      logger?.error("retrieval", "retrieval.cancelled", "Authentication failed; no further runs will be started.", {
        environment_id: environment.id,
        run_id: run.id,
        error: serializeError(error),
      });
    }

    logger?.warn("retrieval", "run.failed", `Run ${run.id} failed: ${errorMessage(error)}`, {
      environment_id: environment.id,
      run_id: run.id,
      error: serializeError(error),
    });

    return { kind: "failed", failure: toFailure(run.id, error) };
  }
}

/**
 * Fetches and persists every run with at most `concurrency` runs in flight.
 * A failing run is recorded in the report and never stops its siblings.
 */
export async function retrieveRunLogs(input: RetrieveRunLogsInput): Promise<RetrievalReport> {
  if (!Number.isInteger(input.concurrency) || input.concurrency <= 0) {
    throw new ConfigurationError(`Concurrency must be a positive integer, received ${input.concurrency}.`);
  }

  const cancellation = input.cancellation ?? new AbortController();
  const limiter = pLimit(input.concurrency);
  const outcomes = await Promise.all(
    input.runs.map((run) =>
      limiter(() => retrieveOne({ ...input, cancellation }, run, cancellation.signal)),
    ),
  );

  const report: RetrievalReport = {
    environmentId: input.environment.id,
    environmentName: input.environment.name,
    attempted: 0,
    succeeded: 0,
    failed: [],
    skipped: [],
    outputPaths: [],
    logFilesWritten: 0,
    cancelled: cancellation.signal.aborted,
  };

  for (const outcome of outcomes) {
    if (outcome.kind === "skipped") {
      report.skipped.push(outcome.runId);
      continue;
    }

    report.attempted += 1;
    if (outcome.kind === "failed") {
      report.failed.push(outcome.failure);
      continue;
    }

    report.succeeded += 1;
    report.outputPaths.push(...outcome.outputPaths);
    if (outcome.logFileWritten) {
      report.logFilesWritten += 1;
    }
  }

  input.logger?.info(
    "retrieval",
    "environment.retrieval.completed",
    `Retrieved ${report.succeeded} of ${input.runs.length} runs for environment ${input.environment.name}.`,
    {
      environment_id: input.environment.id,
      attempted: report.attempted,
      succeeded: report.succeeded,
      failed: report.failed.length,
      skipped: report.skipped.length,
      log_files_written: report.logFilesWritten,
      cancelled: report.cancelled,
    },
  );

  return report;
}
