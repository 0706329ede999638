import { isJobRecord, isPresent, toNumber } from "./utils/records.ts";
import { DEFAULT_FIELDS } from "./utils/types.ts";
import type {
  FieldSummary,
  FilterCriteria,
  JobFieldMap,
  JobRecord,
  JobValue,
  StatsSummary,
} from "./utils/types.ts";

const UNKNOWN_EMPLOYMENT_TYPE = "Unknown";

// ── Filtering ────────────────────────────────────────────────────────
//
// Every predicate only excludes on data it can read. A missing or
// malformed field leaves the record in.

function containsText(value: JobValue | undefined, needle: string): boolean {
  if (typeof value !== "string" || !value) return true;
  return value.toLowerCase().includes(needle.toLowerCase());
}

function meetsMinSalary(value: JobValue | undefined, minSalary: number): boolean {
  if (!isPresent(value)) return true;
  const salary = toNumber(value);
  return salary === null || salary >= minSalary;
}

function matchesTitleKeywords(value: JobValue | undefined, keywords: string[]): boolean {
  if (typeof value !== "string") return true;
  const title = value.toLowerCase();
  return keywords.some((kw) => title.includes(kw.toLowerCase()));
}

function matchesCriteria(job: JobRecord, criteria: FilterCriteria, fields: JobFieldMap): boolean {
  if (criteria.minSalary && !meetsMinSalary(job[fields.salaryMin], criteria.minSalary)) {
    return false;
  }
  if (criteria.location && !containsText(job[fields.location], criteria.location)) {
    return false;
  }
  if (criteria.remoteOnly && !isPresent(job[fields.isRemote])) {
    return false;
  }
  if (criteria.company && !containsText(job[fields.company], criteria.company)) {
    return false;
  }
  if (
    criteria.titleKeywords &&
    criteria.titleKeywords.length > 0 &&
    !matchesTitleKeywords(job[fields.title], criteria.titleKeywords)
  ) {
    return false;
  }
  return true;
}

export function filterJobs(
  jobs: JobRecord[],
  criteria: FilterCriteria,
  fields: JobFieldMap = DEFAULT_FIELDS
): JobRecord[] {
  return jobs.filter((job) => matchesCriteria(job, criteria, fields));
}

// ── Statistics ───────────────────────────────────────────────────────

function distinctKey(value: JobValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function getJobStatistics(
  jobs: JobRecord[],
  fields: JobFieldMap = DEFAULT_FIELDS
): StatsSummary {
  const companies = new Set<string>();
  const locations = new Set<string>();
  const employmentTypes = new Map<string, number>();
  let remoteJobs = 0;
  let salaryTotal = 0;
  let salaryCount = 0;

  for (const job of jobs) {
    const company = job[fields.company];
    if (company !== undefined && isPresent(company)) companies.add(distinctKey(company));

    const location = job[fields.location];
    if (location !== undefined && isPresent(location)) locations.add(distinctKey(location));

    const empType = job[fields.employmentType];
    const empKey =
      empType === undefined || empType === null || empType === ""
        ? UNKNOWN_EMPLOYMENT_TYPE
        : distinctKey(empType);
    employmentTypes.set(empKey, (employmentTypes.get(empKey) ?? 0) + 1);

    if (isPresent(job[fields.isRemote])) remoteJobs++;

    const rawMin = job[fields.salaryMin];
    const rawMax = job[fields.salaryMax];
    if (isPresent(rawMin) && isPresent(rawMax)) {
      const min = toNumber(rawMin);
      const max = toNumber(rawMax);
      if (min !== null && max !== null) {
        salaryTotal += (min + max) / 2;
        salaryCount++;
      }
    }
  }

  return {
    totalJobs: jobs.length,
    companies: companies.size,
    locations: locations.size,
    employmentTypes: Object.fromEntries(employmentTypes),
    remoteJobs,
    avgSalary: salaryCount > 0 ? salaryTotal / salaryCount : null,
  };
}

// ── Field inventory ──────────────────────────────────────────────────

export function typeName(value: JobValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (isJobRecord(value)) return "object";
  return typeof value;
}

/** Every field seen across `jobs`, typed by its first occurrence, sorted by name. */
export function describeFields(jobs: JobRecord[]): FieldSummary[] {
  const types = new Map<string, string>();
  for (const job of jobs) {
    for (const [name, value] of Object.entries(job)) {
      if (!types.has(name)) types.set(name, typeName(value));
    }
  }
  return [...types.keys()].sort().map((name) => ({ name, type: types.get(name) ?? "unknown" }));
}
