// ── Job records as returned by JSearch ───────────────────────────────

export type JobValue =
  | string
  | number
  | boolean
  | null
  | JobValue[]
  | JobRecord;

/** One listing: search-result fields, merged detail fields, plus `scraped_at`. */
export interface JobRecord {
  [key: string]: JobValue;
}

export type FlatValue = string | number | boolean | null;

/** Export projection of a JobRecord: no nested mappings, no sequences. */
export type FlatRecord = Record<string, FlatValue>;

// ── Search / detail requests ────────────────────────────────────────

export interface SearchParams {
  query: string;
  page: number;
  datePosted: string; // "all" | "today" | "3days" | "week" | "month"
  country: string;
  employmentTypes: string; // comma-separated, e.g. "FULLTIME,CONTRACTOR"
  radius: number; // km
  jobRequirements?: string;
}

export interface SearchOptions {
  startPage: number;
  numPages: number;
  datePosted: string;
  country: string;
  employmentTypes: string;
  radius: number;
  jobRequirements?: string;
  getJobDetails: boolean;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  startPage: 1,
  numPages: 10,
  datePosted: "all",
  country: "us",
  employmentTypes: "FULLTIME",
  radius: 100,
  getJobDetails: true,
};

// ── Failures ────────────────────────────────────────────────────────

export type FetchFailure =
  | { kind: "transport"; message: string }
  | { kind: "http-status"; status: number; message: string }
  | { kind: "parse"; message: string }
  | { kind: "api-status"; status: string; message: string };

// ── Pagination outcome ──────────────────────────────────────────────

export type StopReason = "exhausted" | "empty-page" | "failure";

export interface PaginationOutcome {
  pagesFetched: number;
  stopReason: StopReason;
  failure?: FetchFailure;
}

// ── Reporting ───────────────────────────────────────────────────────

export interface FilterCriteria {
  minSalary?: number;
  location?: string;
  remoteOnly?: boolean;
  company?: string;
  titleKeywords?: string[];
}

export interface StatsSummary {
  totalJobs: number;
  companies: number;
  locations: number;
  employmentTypes: Record<string, number>;
  remoteJobs: number;
  avgSalary: number | null;
}

/** Record keys the reporter reads. */
export interface JobFieldMap {
  title: string;
  company: string;
  location: string;
  employmentType: string;
  isRemote: string;
  salaryMin: string;
  salaryMax: string;
}

export const DEFAULT_FIELDS: JobFieldMap = {
  title: "title",
  company: "company",
  location: "location",
  employmentType: "employment_type",
  isRemote: "is_remote",
  salaryMin: "salary_min",
  salaryMax: "salary_max",
};

// JSearch's own key names
export const JSEARCH_FIELDS: JobFieldMap = {
  title: "job_title",
  company: "employer_name",
  location: "job_city",
  employmentType: "job_employment_type",
  isRemote: "job_is_remote",
  salaryMin: "job_min_salary",
  salaryMax: "job_max_salary",
};

export interface FieldSummary {
  name: string;
  type: string;
}

export type ExportFormat = "json" | "csv" | "both";
