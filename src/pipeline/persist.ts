import { appendFile, mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { DbtEnvironment, DbtRunDetail, DbtRunSummary, RetrievalLogRow } from "../types.js";
import { makePathSegment } from "../utils/text.js";

export interface RunArtifactPaths {
  directory: string;
  detailsPath: string;
  logsPath: string;
}

export function environmentDirName(environment: Pick<DbtEnvironment, "id" | "name">): string {
  return `${makePathSegment(environment.name, "env")}_${environment.id}`;
}

export function resolveRunArtifactPaths(input: {
  outputDir: string;
  environment: Pick<DbtEnvironment, "id" | "name">;
  runId: number;
}): RunArtifactPaths {
  const directory = path.join(input.outputDir, environmentDirName(input.environment));
  return {
    directory,
    detailsPath: path.join(directory, `run_${input.runId}_details.json`),
    logsPath: path.join(directory, `run_${input.runId}_logs.txt`),
  };
}

/**
 * Writes the run record and, when given, the combined step log. Existing files
 * for the same run are replaced; an empty combined log removes a log file left
 * by an earlier retrieval.
 */
export async function writeRunArtifacts(input: {
  outputDir: string;
  environment: Pick<DbtEnvironment, "id" | "name">;
  run: Pick<DbtRunSummary, "id">;
  detail: DbtRunDetail;
  combinedLog?: string;
}): Promise<string[]> {
  const paths = resolveRunArtifactPaths({
    outputDir: input.outputDir,
    environment: input.environment,
    runId: input.run.id,
  });

  await mkdir(paths.directory, { recursive: true });
  await writeFile(paths.detailsPath, `${JSON.stringify(input.detail, null, 2)}\n`, "utf8");
  const written = [paths.detailsPath];

  if (input.combinedLog === undefined) {
    return written;
  }

  if (input.combinedLog.length === 0) {
    await rm(paths.logsPath, { force: true });
    return written;
  }

  await writeFile(paths.logsPath, input.combinedLog, "utf8");
  written.push(paths.logsPath);

  return written;
}

export function retrievalLogPath(outputDir: string, invocationId: string): string {
  return path.join(outputDir, `retrieval_log_${invocationId}.jsonl`);
}

/** Batch sink for `RunLogger` that appends rows to a JSON-lines file. */
export function createJsonlLogSink(filePath: string): (rows: RetrievalLogRow[]) => Promise<void> {
  let directoryReady: Promise<string | undefined> | null = null;

  return async (rows) => {
    if (rows.length === 0) {
      return;
    }
    if (!directoryReady) {
      directoryReady = mkdir(path.dirname(filePath), { recursive: true });
    }
    await directoryReady;
    await appendFile(filePath, `${rows.map((row) => JSON.stringify(row)).join("\n")}\n`, "utf8");
  };
}
