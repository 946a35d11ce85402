import path from "node:path";
import type { AppConfig } from "../config.js";
import type { RetrievalOptions } from "../pipeline/run.js";
import { buildTimeWindow } from "../pipeline/time-window.js";
import { type CliArgs, optionalString, parseIdList, parseOptionalNumber, parsePositiveInt } from "../utils/cli.js";
import { splitList } from "../utils/text.js";

export interface RetrieveCommand {
  options: RetrievalOptions;
  baseUrl?: string;
  host?: string;
  persistLog: boolean;
}

export const RETRIEVE_USAGE = [
  "Usage: dbt-log-retrieve [options]",
  "",
  "Environment filters (comma-separated, all must match):",
  "  --deployment-types staging,production",
  "  --env-names \"Prod,Staging\"",
  "  --env-ids 12,34",
  "",
  "Run window (inclusive bounds, ISO 8601):",
  "  --days-back N            created within the last N days (overrides --created-after)",
  "  --created-after, --created-before, --finished-after, --finished-before",
  "  --limit N                most recent runs requested per environment",
  "  --page-size N            runs per API page (at most 100)",
  "  --server-date-filter     also send range parameters to the API (falls back when rejected)",
  "",
  "Output:",
  "  --output-dir DIR         default OUTPUT_DIR",
  "  --write-logs             write run_<id>_logs.txt from step logs",
  "  --use-debug-logs         use debug logs for the combined file",
  "  --no-steps               fetch run details without steps",
  "  --no-log-file            do not write the retrieval_log_<id>.jsonl event log",
  "  --concurrency N          runs processed in parallel per environment",
  "",
  "Connection:",
  "  --base-url URL | --host HOST",
].join("\n");

export function parseRetrieveArgs(args: CliArgs, config: AppConfig, now: Date = new Date()): RetrieveCommand {
  const window = buildTimeWindow({
    createdAfter: optionalString(args, "created-after"),
    createdBefore: optionalString(args, "created-before"),
    finishedAfter: optionalString(args, "finished-after"),
    finishedBefore: optionalString(args, "finished-before"),
    daysBack: parseOptionalNumber(args, "days-back"),
    now,
  });

  const outputDir = path.resolve(process.cwd(), optionalString(args, "output-dir") ?? config.OUTPUT_DIR);
  const writeLogs = Boolean(args["write-logs"]);

  return {
    options: {
      outputDir,
      filter: {
        deploymentTypes: splitList(args["deployment-types"]),
        names: splitList(args["env-names"]),
        ids: parseIdList(splitList(args["env-ids"]), "env-ids"),
      },
      window,
      limit: parsePositiveInt(args, "limit", config.RUN_LIMIT),
      pageSize: parsePositiveInt(args, "page-size", config.RUN_PAGE_SIZE),
      concurrency: parsePositiveInt(args, "concurrency", config.CONCURRENCY),
      includeSteps: writeLogs || !args["no-steps"],
      writeLogs,
      useDebugLogs: Boolean(args["use-debug-logs"]),
      serverSideDateFilter: Boolean(args["server-date-filter"]) || config.SERVER_DATE_FILTER,
    },
    baseUrl: optionalString(args, "base-url"),
    host: optionalString(args, "host"),
    persistLog: !args["no-log-file"],
  };
}
