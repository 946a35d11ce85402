export type RunLogLevel = "debug" | "info" | "warn" | "error";

export interface DbtEnvironment {
  id: number;
  name: string;
  deployment_type?: string | null;
  account_id: number;
  [key: string]: unknown;
}

export interface DbtRunStep {
  id?: number;
  index: number;
  name?: string | null;
  logs?: string | null;
  debug_logs?: string | null;
  truncated_debug_logs?: string | null;
  [key: string]: unknown;
}

export interface DbtRunSummary {
  id: number;
  environment_id: number;
  created_at: string;
  finished_at?: string | null;
  status: number;
  status_humanized?: string | null;
  [key: string]: unknown;
}

export interface DbtRunDetail extends DbtRunSummary {
  run_steps?: DbtRunStep[] | null;
}

export interface EnvironmentFilter {
  deploymentTypes?: string[];
  names?: string[];
  ids?: number[];
}

/** Epoch milliseconds; every configured bound is inclusive. */
export interface RunTimeWindow {
  createdAfter?: number;
  createdBefore?: number;
  finishedAfter?: number;
  finishedBefore?: number;
}

export interface ListRunsParams {
  environmentId: number;
  limit: number;
  offset?: number;
  orderBy?: string;
  rangeParams?: Record<string, string>;
}

export interface RunLogClient {
  listEnvironments(): Promise<DbtEnvironment[]>;
  listRuns(params: ListRunsParams): Promise<DbtRunSummary[]>;
  getRun(runId: number, includeSteps: boolean): Promise<DbtRunDetail>;
  getStepLog(run: DbtRunDetail, stepIndex: number, debug: boolean): Promise<string>;
}

export type RunFetchStopReason = "limit_reached" | "exhausted" | "window_passed";

export interface RunFetchResult {
  runs: DbtRunSummary[];
  retrievedCount: number;
  limit: number;
  pagesFetched: number;
  possiblyTruncated: boolean;
  stopReason: RunFetchStopReason;
  serverFilterRejected: boolean;
}

export interface RunFailure {
  runId: number;
  reason: string;
  errorName: string;
  status?: number;
}

export interface RetrievalReport {
  environmentId: number;
  environmentName: string;
  attempted: number;
  succeeded: number;
  failed: RunFailure[];
  skipped: number[];
  outputPaths: string[];
  logFilesWritten: number;
  cancelled: boolean;
}

export interface EnvironmentRunReport {
  environmentId: number;
  environmentName: string;
  deploymentType: string | null;
  directory: string;
  fetch: Omit<RunFetchResult, "runs"> & { matchedCount: number };
  retrieval: RetrievalReport;
}

export interface InvocationReport {
  invocationId: string;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  outputDir: string;
  logPath: string | null;
  appliedFilters: string[];
  environments: EnvironmentRunReport[];
  truncatedEnvironments: Array<{ environmentId: number; environmentName: string; limit: number }>;
  totals: {
    environments: number;
    runsRetrieved: number;
    runsMatched: number;
    runsSucceeded: number;
    runsFailed: number;
    runsSkipped: number;
    logFilesWritten: number;
  };
  cancelled: boolean;
}

export interface RetrievalLogRow {
  invocationId: string;
  seq: number;
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload: Record<string, unknown>;
  timestamp: string;
}
