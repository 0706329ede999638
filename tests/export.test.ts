import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, existsSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { toJSON, toCSV, saveJobs, defaultBasename } from "../src/export.ts";
import { escapeField, stringifyCSV } from "../src/utils/csv.ts";
import type { JobRecord } from "../src/utils/types.ts";

const JOBS: JobRecord[] = [
  {
    job_id: "a",
    job_title: "Développeur, Backend",
    job_highlights: { Benefits: ["Dental", "401k"] },
    job_is_remote: true,
  },
  {
    job_id: "b",
    job_city: "Austin",
    job_min_salary: null,
  },
];

describe("escapeField", () => {
  it("leaves plain text alone", () => {
    expect(escapeField("Austin")).toBe("Austin");
  });

  it("quotes fields with commas, quotes or newlines", () => {
    expect(escapeField("a,b")).toBe('"a,b"');
    expect(escapeField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeField("line1\nline2")).toBe('"line1\nline2"');
  });

  it("renders null and missing values as empty", () => {
    expect(escapeField(null)).toBe("");
    expect(escapeField(undefined)).toBe("");
  });

  it("renders numbers and booleans as text", () => {
    expect(escapeField(42.5)).toBe("42.5");
    expect(escapeField(false)).toBe("false");
  });
});

describe("stringifyCSV", () => {
  it("writes a header and one CRLF-terminated line per row", () => {
    const csv = stringifyCSV(["a", "b"], [{ a: 1, b: "x" }, { a: 2 }]);
    expect(csv).toBe("a,b\r\n1,x\r\n2,\r\n");
  });
});

describe("toCSV", () => {
  it("uses the sorted union of flattened keys as the header", () => {
    const lines = toCSV(JOBS).split("\r\n");
    expect(lines[0]).toBe("job_city,job_highlights_Benefits,job_id,job_is_remote,job_min_salary,job_title");
  });

  it("renders fields absent from a record as empty cells", () => {
    const lines = toCSV(JOBS).split("\r\n");
    expect(lines[1]).toBe(',"[""Dental"",""401k""]",a,true,,"Développeur, Backend"');
    expect(lines[2]).toBe("Austin,,b,,,");
    expect(lines[3]).toBe("");
  });
});

describe("toJSON", () => {
  it("pretty-prints with two-space indentation and keeps non-ASCII text", () => {
    const text = toJSON([{ job_title: "Développeur" }]);
    expect(text).toBe('[\n  {\n    "job_title": "Développeur"\n  }\n]\n');
  });
});

describe("defaultBasename", () => {
  it("formats the local date and time", () => {
    expect(defaultBasename(new Date(2025, 0, 5, 7, 8, 9))).toBe("raw_jobs_20250105_070809");
  });
});

describe("saveJobs", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "jsearch-export-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes both files for the both format", () => {
    const written = saveJobs(JOBS, { format: "both", outputDir: dir, basename: "jobs" });

    expect(written).toEqual([join(dir, "jobs.json"), join(dir, "jobs.csv")]);
    expect(JSON.parse(readFileSync(join(dir, "jobs.json"), "utf-8"))).toEqual(JOBS);
    expect(readFileSync(join(dir, "jobs.csv"), "utf-8")).toBe(toCSV(JOBS));
  });

  it("writes only the requested format", () => {
    const written = saveJobs(JOBS, { format: "csv", outputDir: dir, basename: "jobs" });
    expect(written).toEqual([join(dir, "jobs.csv")]);
    expect(existsSync(join(dir, "jobs.json"))).toBe(false);
  });

  it("creates the output directory when missing", () => {
    const nested = join(dir, "out", "runs");
    saveJobs(JOBS, { format: "json", outputDir: nested, basename: "jobs" });
    expect(existsSync(join(nested, "jobs.json"))).toBe(true);
  });

  it("writes nothing for an empty collection", () => {
    const nested = join(dir, "unused");
    expect(saveJobs([], { format: "both", outputDir: nested })).toEqual([]);
    expect(existsSync(nested)).toBe(false);
  });
});
