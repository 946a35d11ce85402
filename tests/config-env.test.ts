import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const ORIGINAL_ENV = { ...process.env };

beforeEach(() => {
  process.env.DBT_CLOUD_API_TOKEN = "test-secret";
  process.env.DBT_CLOUD_ACCOUNT_ID = "12";
});

afterEach(() => {
  process.env = { ...ORIGINAL_ENV };
  vi.resetModules();
});

describe("config environment parsing", () => {
  it("applies defaults", async () => {
    delete process.env.CONCURRENCY;
    delete process.env.RUN_LIMIT;
    delete process.env.OUTPUT_DIR;

    const { getConfig } = await import("../src/config.js");
    const config = getConfig();

    expect(config.DBT_CLOUD_ACCOUNT_ID).toBe(12);
    expect(config.CONCURRENCY).toBe(4);
    expect(config.RUN_LIMIT).toBe(100);
    expect(config.OUTPUT_DIR).toBe("dbt_logs");
  });

  it("parses boolean flags", async () => {
    process.env.SERVER_DATE_FILTER = "yes";
    const first = await import("../src/config.js");
    expect(first.getConfig().SERVER_DATE_FILTER).toBe(true);

    vi.resetModules();
    process.env.SERVER_DATE_FILTER = "0";
    const second = await import("../src/config.js");
    expect(second.getConfig().SERVER_DATE_FILTER).toBe(false);
  });

  it("requires an API token", async () => {
    process.env.DBT_CLOUD_API_TOKEN = "";

    const { getConfig } = await import("../src/config.js");
    expect(() => getConfig()).toThrow(/DBT_CLOUD_API_TOKEN is required/);
  });

  it("rejects a retry base above the retry ceiling", async () => {
    process.env.HTTP_RETRY_BASE_MS = "9000";
    process.env.HTTP_RETRY_MAX_MS = "8000";

    const { getConfig } = await import("../src/config.js");
    expect(() => getConfig()).toThrow(/HTTP_RETRY_BASE_MS \(9000\) must be <= HTTP_RETRY_MAX_MS \(8000\)/);
  });
});

describe("base URL resolution", () => {
  it("prefers an explicit base URL", async () => {
    const { resolveBaseUrl } = await import("../src/config.js");

    expect(resolveBaseUrl({ baseUrl: "https://emea.example.test/api/v2/", host: "ignored.test" })).toBe(
      "https://emea.example.test/api/v2",
    );
  });

  it("builds the URL from a bare host", async () => {
    const { resolveBaseUrl } = await import("../src/config.js");

    expect(resolveBaseUrl({ host: "cloud.example.test" })).toBe("https://cloud.example.test/api/v2");
    expect(resolveBaseUrl({ host: "http://localhost:8080/" })).toBe("http://localhost:8080/api/v2");
  });

  it("falls back to the default", async () => {
    const { DEFAULT_BASE_URL, resolveBaseUrl } = await import("../src/config.js");

    expect(resolveBaseUrl({})).toBe(DEFAULT_BASE_URL);
  });
});
