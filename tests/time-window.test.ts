import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import {
  buildServerRangeParams,
  buildTimeWindow,
  isRunInWindow,
  parseTimestamp,
} from "../src/pipeline/time-window.js";
import { makeRun } from "./fake-client.js";

describe("timestamp parsing", () => {
  it("reads the API's space-separated form with microseconds", () => {
    expect(parseTimestamp("2024-01-05 10:00:00.123456+00:00")).toBe(Date.parse("2024-01-05T10:00:00.123Z"));
  });

  it("treats a bare date as midnight UTC", () => {
    expect(parseTimestamp("2024-01-31")).toBe(Date.UTC(2024, 0, 31));
  });

  it("applies explicit offsets", () => {
    expect(parseTimestamp("2024-01-05T12:00:00+0200")).toBe(Date.UTC(2024, 0, 5, 10));
  });

  it("returns null for missing or malformed values", () => {
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp("last tuesday")).toBeNull();
  });
});

describe("time window", () => {
  it("keeps runs created inside the window", () => {
    const window = buildTimeWindow({ createdAfter: "2024-01-01", createdBefore: "2024-01-31" });

    expect(isRunInWindow(makeRun(10, 1, "2024-01-05"), window)).toBe(true);
    expect(isRunInWindow(makeRun(11, 1, "2024-02-01"), window)).toBe(false);
  });

  it("treats both bounds as inclusive", () => {
    const window = buildTimeWindow({ createdAfter: "2024-01-01", createdBefore: "2024-01-31" });

    expect(isRunInWindow(makeRun(1, 1, "2024-01-01T00:00:00Z"), window)).toBe(true);
    expect(isRunInWindow(makeRun(2, 1, "2024-01-31T00:00:00Z"), window)).toBe(true);
    expect(isRunInWindow(makeRun(3, 1, "2024-01-31T00:00:01Z"), window)).toBe(false);
  });

  it("excludes unfinished runs when a finished bound is set", () => {
    const window = buildTimeWindow({ finishedAfter: "2024-01-01" });

    expect(isRunInWindow(makeRun(1, 1, "2024-01-05", null), window)).toBe(false);
    expect(isRunInWindow(makeRun(2, 1, "2024-01-05", "2024-01-05 10:30:00+00:00"), window)).toBe(true);
  });

  it("derives created-after from days-back", () => {
    const window = buildTimeWindow({
      createdAfter: "2020-01-01",
      daysBack: 5,
      now: new Date("2024-03-10T12:00:00.000Z"),
    });

    expect(window.createdAfter).toBe(Date.parse("2024-03-05T12:00:00.000Z"));
  });

  it("rejects malformed and inverted bounds", () => {
    expect(() => buildTimeWindow({ createdAfter: "yesterday" })).toThrow(ConfigurationError);
    expect(() => buildTimeWindow({ createdAfter: "2024-02-01", createdBefore: "2024-01-01" })).toThrow(
      /created-after must not be later than created-before/,
    );
  });

  it("builds range parameters for a server-side attempt", () => {
    const window = buildTimeWindow({
      createdAfter: "2024-01-01",
      createdBefore: "2024-01-31",
      finishedAfter: "2024-01-02",
    });

    expect(buildServerRangeParams(window)).toEqual({
      created_at__range: "2024-01-01T00:00:00.000Z,2024-01-31T00:00:00.000Z",
      finished_at__gte: "2024-01-02T00:00:00.000Z",
    });
  });
});
