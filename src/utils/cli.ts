import { ConfigurationError } from "../errors.js";

export type CliArgs = Record<string, string | boolean>;

export function parseArgs(argv: string[]): CliArgs {
  const output: CliArgs = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }

    const inline = token.indexOf("=");
    if (inline > 2) {
      output[token.slice(2, inline)] = token.slice(inline + 1);
      continue;
    }

    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      output[key] = true;
      continue;
    }

    output[key] = next;
    i += 1;
  }

  return output;
}

export function optionalString(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  if (value === true) {
    throw new ConfigurationError(`Argument --${key} expects a value.`);
  }
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export function parsePositiveInt(args: CliArgs, key: string, fallback: number): number {
  const raw = optionalString(args, key);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`Invalid --${key} value "${raw}". Expected a positive integer.`);
  }
  return value;
}

export function parseOptionalNumber(args: CliArgs, key: string): number | undefined {
  const raw = optionalString(args, key);
  if (raw === undefined) {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`Invalid --${key} value "${raw}". Expected a non-negative number.`);
  }
  return value;
}

export function parseIdList(value: string[] | undefined, key: string): number[] | undefined {
  if (!value) {
    return undefined;
  }

  return value.map((item) => {
    const id = Number(item);
    if (!Number.isInteger(id) || id <= 0) {
      throw new ConfigurationError(`Invalid --${key} entry "${item}". Expected positive integer ids.`);
    }
    return id;
  });
}
