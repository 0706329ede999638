import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { appendRunHistory, getRunHistory } from "../src/utils/run-history.ts";
import type { RunRecord } from "../src/utils/run-history.ts";

function makeRecord(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    timestamp: new Date().toISOString(),
    durationMs: 5000,
    query: "Software Engineer",
    pagesFetched: 3,
    stopReason: "exhausted",
    totalJobs: 30,
    enriched: 28,
    detailFailures: 2,
    stats: {
      totalJobs: 30,
      companies: 12,
      locations: 9,
      employmentTypes: { FULLTIME: 30 },
      remoteJobs: 4,
      avgSalary: 120000,
    },
    ...overrides,
  };
}

describe("run-history", () => {
  let dir: string;
  let historyPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "jsearch-history-"));
    historyPath = join(dir, "data", "run-history.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns empty array when no history file exists", () => {
    expect(getRunHistory(historyPath)).toEqual([]);
  });

  it("appends a run record and reads it back", () => {
    appendRunHistory(makeRecord(), historyPath);

    const history = getRunHistory(historyPath);
    expect(history).toHaveLength(1);
    expect(history[0].totalJobs).toBe(30);
    expect(history[0].stats.companies).toBe(12);
  });

  it("appends multiple records", () => {
    appendRunHistory(makeRecord(), historyPath);
    appendRunHistory(makeRecord({ stopReason: "empty-page" }), historyPath);
    appendRunHistory(makeRecord(), historyPath);

    const history = getRunHistory(historyPath);
    expect(history).toHaveLength(3);
    expect(history[1].stopReason).toBe("empty-page");
  });

  it("prunes records older than 18 months", () => {
    const old = new Date();
    old.setMonth(old.getMonth() - 19);

    appendRunHistory(makeRecord({ timestamp: old.toISOString(), query: "old" }), historyPath);
    appendRunHistory(makeRecord({ query: "recent" }), historyPath);

    const history = getRunHistory(historyPath);
    expect(history.map((r) => r.query)).toEqual(["recent"]);
  });

  it("treats an unreadable history file as empty", () => {
    appendRunHistory(makeRecord(), historyPath);
    writeFileSync(historyPath, "{not json");
    expect(getRunHistory(historyPath)).toEqual([]);
  });
});
