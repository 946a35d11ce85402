import type { DbtEnvironment, EnvironmentFilter } from "../types.js";

export interface EnvironmentFilterResult {
  environments: DbtEnvironment[];
  appliedFilters: string[];
}

/**
 * Keeps environments that satisfy every provided dimension. A dimension that
 * is absent or empty does not constrain the result; input order is kept.
 */
export function filterEnvironments(
  environments: DbtEnvironment[],
  filter: EnvironmentFilter = {},
): EnvironmentFilterResult {
  let filtered = environments;
  const appliedFilters: string[] = [];

  if (filter.deploymentTypes && filter.deploymentTypes.length > 0) {
    const allowed = new Set(filter.deploymentTypes);
    filtered = filtered.filter((env) => env.deployment_type != null && allowed.has(env.deployment_type));
    appliedFilters.push(`deployment_types=${filter.deploymentTypes.join(",")}`);
  }

  if (filter.names && filter.names.length > 0) {
    const allowed = new Set(filter.names);
    filtered = filtered.filter((env) => allowed.has(env.name));
    appliedFilters.push(`env_names=${filter.names.join(",")}`);
  }

  if (filter.ids && filter.ids.length > 0) {
    const allowed = new Set(filter.ids);
    filtered = filtered.filter((env) => allowed.has(env.id));
    appliedFilters.push(`env_ids=${filter.ids.join(",")}`);
  }

  return {
    environments: filtered,
    appliedFilters,
  };
}
