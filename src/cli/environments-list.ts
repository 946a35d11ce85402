#!/usr/bin/env node
import { getConfig } from "../config.js";
import { filterEnvironments } from "../pipeline/environment-filter.js";
import { createClient } from "../pipeline/run-support.js";
import { optionalString, parseArgs, parseIdList } from "../utils/cli.js";
import { splitList } from "../utils/text.js";

async function main(): Promise<void> {
  const config = getConfig();
  const args = parseArgs(process.argv.slice(2));
  const client = createClient({
    config,
    baseUrl: optionalString(args, "base-url"),
    host: optionalString(args, "host"),
  });

  const environments = await client.listEnvironments();
  const filtered = filterEnvironments(environments, {
    deploymentTypes: splitList(args["deployment-types"]),
    names: splitList(args["env-names"]),
    ids: parseIdList(splitList(args["env-ids"]), "env-ids"),
  });

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        accountId: config.DBT_CLOUD_ACCOUNT_ID,
        totalCount: environments.length,
        count: filtered.environments.length,
        appliedFilters: filtered.appliedFilters,
        environments: filtered.environments.map((env) => ({
          id: env.id,
          name: env.name,
          deploymentType: env.deployment_type ?? null,
        })),
      },
      null,
      2,
    ),
  );
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Environment listing failed:", error);
  process.exitCode = 1;
});
