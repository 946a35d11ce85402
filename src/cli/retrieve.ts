#!/usr/bin/env node
import { getConfig } from "../config.js";
import type { RunLogger } from "../logging/run-logger.js";
import { runRetrieval } from "../pipeline/run.js";
import { createClient, createInvocationId, createRunLogger } from "../pipeline/run-support.js";
import { parseArgs } from "../utils/cli.js";
import { RETRIEVE_USAGE, parseRetrieveArgs } from "./retrieve-options.js";

let activeLogger: RunLogger | null = null;

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    // eslint-disable-next-line no-console
    console.log(RETRIEVE_USAGE);
    return;
  }

  const config = getConfig();
  const command = parseRetrieveArgs(args, config);
  const invocationId = createInvocationId();
  const { logger, logPath } = createRunLogger({
    config,
    invocationId,
    outputDir: command.options.outputDir,
    persistLog: command.persistLog,
  });
  activeLogger = logger;

  const client = createClient({
    config,
    baseUrl: command.baseUrl,
    host: command.host,
    logger,
  });

  const interrupt = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("pipeline", "retrieval.interrupted", "Interrupt received; finishing runs already in flight.");
    interrupt.abort(new Error("interrupted"));
  });

  const report = await runRetrieval(command.options, {
    client,
    logger,
    invocationId,
    logPath,
    signal: interrupt.signal,
  });

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        ...report,
        http: client.getStats(),
        logging: logger.getStats(),
      },
      null,
      2,
    ),
  );

  for (const entry of report.truncatedEnvironments) {
    // eslint-disable-next-line no-console
    console.error(
      `Warning: environment ${entry.environmentName} (${entry.environmentId}) reached the run limit of ${entry.limit}; older runs in the window may be missing. Raise --limit to widen the view.`,
    );
  }

  if (report.cancelled) {
    process.exitCode = 1;
  }
}

main()
  .then(async () => {
    await activeLogger?.flush("final");
  })
  .catch(async (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Retrieval failed:", error);
    await activeLogger?.flush("failure");
    process.exitCode = 1;
  });
