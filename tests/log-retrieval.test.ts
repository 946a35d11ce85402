import { mkdtemp, readFile, readdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { RequestError, ServerError } from "../src/errors.js";
import {
  assembleCombinedLog,
  collectStepLogs,
  retrieveRunLogs,
  STEP_LOG_CONCURRENCY,
} from "../src/pipeline/log-retrieval.js";
import { FakeRunLogClient, makeEnvironment, makeRun } from "./fake-client.js";

const prod = makeEnvironment(1, "Prod", "production");

async function tempOutputDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

function clientWithRuns(runIds: number[]): FakeRunLogClient {
  const runs = runIds.map((id) => makeRun(id, 1, "2024-01-05T08:00:00Z"));
  return new FakeRunLogClient([prod], new Map([[1, runs]]));
}

describe("combined log assembly", () => {
  it("orders by step index, skips empty steps and terminates lines", () => {
    const combined = assembleCombinedLog([
      { index: 3, text: "three" },
      { index: 1, text: "one\n" },
      { index: 2, text: "" },
      { index: 4, text: "four" },
    ]);

    expect(combined).toBe("one\nthree\nfour\n");
  });

  it("keeps step order when fetches complete in reverse", async () => {
    const client = clientWithRuns([7]);
    client.steps.set(7, [
      { index: 3, logs: "three" },
      { index: 1, logs: "one" },
      { index: 2, logs: "two" },
    ]);
    client.stepDelayMs = (_runId, index) => (4 - index) * 15;
    const detail = await client.getRun(7, true);

    const stepLogs = await collectStepLogs(client, detail, false);

    expect(assembleCombinedLog(stepLogs)).toBe("one\ntwo\nthree\n");
  });

  it("caps step log requests per run", async () => {
    const client = clientWithRuns([8]);
    client.steps.set(
      8,
      Array.from({ length: 10 }, (_, i) => ({ index: i + 1, logs: `step ${i + 1}` })),
    );
    client.stepDelayMs = () => 10;
    const detail = await client.getRun(8, true);

    const stepLogs = await collectStepLogs(client, detail, false);

    expect(stepLogs).toHaveLength(10);
    expect(client.maxStepsInFlight).toBe(STEP_LOG_CONCURRENCY);
  });
});

describe("log retrieval pipeline", () => {
  it("writes details and combined logs for every run", async () => {
    const outputDir = await tempOutputDir("retrieval-");
    const client = clientWithRuns([1, 2]);
    client.steps.set(1, [
      { index: 2, logs: "run 1 step 2", debug_logs: "debug 1.2" },
      { index: 1, logs: "run 1 step 1", debug_logs: "debug 1.1" },
    ]);
    client.steps.set(2, [{ index: 1, logs: "", truncated_debug_logs: "truncated 2.1" }]);

    const report = await retrieveRunLogs({
      client,
      environment: prod,
      runs: [makeRun(1, 1, "2024-01-05T08:00:00Z"), makeRun(2, 1, "2024-01-05T08:00:00Z")],
      concurrency: 2,
      includeSteps: true,
      writeLogs: true,
      useDebugLogs: false,
      outputDir,
    });

    expect(report.attempted).toBe(2);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toEqual([]);
    expect(report.logFilesWritten).toBe(2);

    const envDir = path.join(outputDir, "Prod_1");
    expect((await readdir(envDir)).sort()).toEqual([
      "run_1_details.json",
      "run_1_logs.txt",
      "run_2_details.json",
      "run_2_logs.txt",
    ]);
    expect(await readFile(path.join(envDir, "run_1_logs.txt"), "utf8")).toBe("run 1 step 1\nrun 1 step 2\n");
    expect(await readFile(path.join(envDir, "run_2_logs.txt"), "utf8")).toBe("truncated 2.1\n");

    const details = JSON.parse(await readFile(path.join(envDir, "run_1_details.json"), "utf8"));
    expect(details.id).toBe(1);
    expect(details.run_steps).toHaveLength(2);
  });

  it("uses debug logs when requested", async () => {
    const outputDir = await tempOutputDir("retrieval-debug-");
    const client = clientWithRuns([1]);
    client.steps.set(1, [{ index: 1, logs: "plain", debug_logs: "verbose" }]);

    await retrieveRunLogs({
      client,
      environment: prod,
      runs: [makeRun(1, 1, "2024-01-05T08:00:00Z")],
      concurrency: 1,
      includeSteps: true,
      writeLogs: true,
      useDebugLogs: true,
      outputDir,
    });

    expect(await readFile(path.join(outputDir, "Prod_1", "run_1_logs.txt"), "utf8")).toBe("verbose\n");
  });

  it("removes a stale log file when a rerun finds no step logs", async () => {
    const outputDir = await tempOutputDir("retrieval-rerun-");
    const client = clientWithRuns([1]);
    const input = {
      client,
      environment: prod,
      runs: [makeRun(1, 1, "2024-01-05T08:00:00Z")],
      concurrency: 1,
      includeSteps: true,
      writeLogs: true,
      useDebugLogs: false,
      outputDir,
    };

    client.steps.set(1, [{ index: 1, logs: "old" }]);
    await retrieveRunLogs(input);
    client.steps.set(1, [{ index: 1, logs: "" }]);
    const report = await retrieveRunLogs(input);

    expect(report.outputPaths).toEqual([path.join(outputDir, "Prod_1", "run_1_details.json")]);
    expect(report.logFilesWritten).toBe(0);
    expect(await readdir(path.join(outputDir, "Prod_1"))).toEqual(["run_1_details.json"]);
  });

  it("writes only details when logs are not requested", async () => {
    const outputDir = await tempOutputDir("retrieval-details-");
    const client = clientWithRuns([5]);

    const report = await retrieveRunLogs({
      client,
      environment: prod,
      runs: [makeRun(5, 1, "2024-01-05T08:00:00Z")],
      concurrency: 1,
      includeSteps: false,
      writeLogs: false,
      useDebugLogs: false,
      outputDir,
    });

    expect(report.outputPaths).toEqual([path.join(outputDir, "Prod_1", "run_5_details.json")]);
    expect(report.logFilesWritten).toBe(0);
  });

  it("isolates a failing run from its siblings", async () => {
    const outputDir = await tempOutputDir("retrieval-isolation-");
    const client = clientWithRuns([1, 2, 3]);
    client.runFailures.set(2, new ServerError("GET /api/v2/accounts/1/runs/2/ failed with HTTP 500.", { status: 500 }));

    const report = await retrieveRunLogs({
      client,
      environment: prod,
      runs: [1, 2, 3].map((id) => makeRun(id, 1, "2024-01-05T08:00:00Z")),
      concurrency: 3,
      includeSteps: true,
      writeLogs: false,
      useDebugLogs: false,
      outputDir,
    });

    expect(report.attempted).toBe(3);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toEqual([
      {
        runId: 2,
        reason: "GET /api/v2/accounts/1/runs/2/ failed with HTTP 500.",
        errorName: "ServerError",
        status: 500,
      },
    ]);
    expect(report.cancelled).toBe(false);
    expect((await readdir(path.join(outputDir, "Prod_1"))).sort()).toEqual([
      "run_1_details.json",
      "run_3_details.json",
    ]);
  });

  it("never runs more than the configured number of runs at once", async () => {
    const outputDir = await tempOutputDir("retrieval-bounded-");
    const ids = [1, 2, 3, 4, 5, 6];
    const client = clientWithRuns(ids);
    client.runDelayMs = 15;

    const report = await retrieveRunLogs({
      client,
      environment: prod,
      runs: ids.map((id) => makeRun(id, 1, "2024-01-05T08:00:00Z")),
      concurrency: 2,
      includeSteps: false,
      writeLogs: false,
      useDebugLogs: false,
      outputDir,
    });

    expect(report.succeeded).toBe(6);
    expect(client.maxInFlight).toBe(2);
  });

  it("stops launching runs after an authentication failure", async () => {
    const outputDir = await tempOutputDir("retrieval-auth-");
    const client = clientWithRuns([1, 2, 3]);
    client.runFailures.set(
      1,
      new RequestError("GET /api/v2/accounts/1/runs/1/ failed with HTTP 401.", {
        status: 401,
        method: "GET",
        url: "https://cloud.test/api/v2/accounts/1/runs/1/",
      }),
    );
    const cancellation = new AbortController();

    const report = await retrieveRunLogs({
      client,
      environment: prod,
      runs: [1, 2, 3].map((id) => makeRun(id, 1, "2024-01-05T08:00:00Z")),
      concurrency: 1,
      includeSteps: true,
      writeLogs: false,
      useDebugLogs: false,
      outputDir,
      cancellation,
    });

    expect(cancellation.signal.aborted).toBe(true);
    expect(report.cancelled).toBe(true);
    expect(report.attempted).toBe(1);
    expect(report.failed.map((failure) => [failure.runId, failure.status])).toEqual([[1, 401]]);
    expect(report.skipped).toEqual([2, 3]);
    expect(client.getRunCalls).toEqual([1]);
  });

  it("rejects a non-positive concurrency", async () => {
    const client = clientWithRuns([1]);

    await expect(
      retrieveRunLogs({
        client,
        environment: prod,
        runs: [makeRun(1, 1, "2024-01-05T08:00:00Z")],
        concurrency: 0,
        includeSteps: true,
        writeLogs: false,
        useDebugLogs: false,
        outputDir: os.tmpdir(),
      }),
    ).rejects.toThrow("Concurrency must be a positive integer, received 0.");
    expect(client.getRunCalls).toEqual([]);
  });
});
