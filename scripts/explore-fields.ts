/**
 * Prints the field inventory of a JSON export plus sample values of the
 * main JSearch fields from its first job.
 * Run: npx tsx scripts/explore-fields.ts output/maximum_job_data.json
 */
import { readFileSync } from "fs";
import { describeFields } from "../src/report.ts";
import { isJobRecord } from "../src/utils/records.ts";
import type { JobRecord } from "../src/utils/types.ts";

const KEY_FIELDS = [
  "job_id",
  "job_title",
  "employer_name",
  "job_city",
  "job_employment_type",
  "job_posted_at_datetime_utc",
];
const MAX_VALUE_LENGTH = 100;

const path = process.argv[2];
if (!path) {
  console.error("Usage: tsx scripts/explore-fields.ts <export.json>");
  process.exit(1);
}

const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
const jobs: JobRecord[] = Array.isArray(parsed) ? parsed.filter(isJobRecord) : [];

if (jobs.length === 0) {
  console.log("No jobs to explore");
  process.exit(0);
}

const fields = describeFields(jobs);
const width = Math.max(40, ...fields.map((f) => f.name.length + 1));

console.log(`\nFound ${fields.length} unique fields across all jobs:`);
console.log("-".repeat(50));
for (const field of fields) {
  console.log(`${field.name.padEnd(width)} ${field.type}`);
}

console.log("\nSample values from first job:");
console.log("-".repeat(50));
const sample = jobs[0];
for (const name of KEY_FIELDS) {
  if (!(name in sample)) continue;
  const value = sample[name];
  let text = typeof value === "string" ? value : JSON.stringify(value);
  if (text.length > MAX_VALUE_LENGTH) text = text.slice(0, MAX_VALUE_LENGTH) + "...";
  console.log(`${name}: ${text}`);
}
