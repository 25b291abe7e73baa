export type RawIssue = Record<string, unknown>;

// Entries are left as fetched; the normalizer rejects the ones that are not records
export interface RawIssueFeed {
  current: unknown[];
  archive: unknown[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface RawCatalogRecord {
  service_name?: unknown;
  service?: unknown;
  region_id?: unknown;
  region_name?: unknown;
}

// [label, text]
export type TimelineEvent = readonly [string, string];

export interface Issue {
  readonly service_name: string;
  readonly service_code: string;
  readonly region_name: string;
  readonly region_code: string;
  readonly summary: string;
  readonly timestamp: number; // Unix seconds
  readonly date: string; // UTC, "YYYY-MM-DD HH:MM:SS"
  readonly description: string;
  readonly timeline: readonly TimelineEvent[];
  readonly duration_mins: number;
}

export interface IssueQueryResult {
  current: Issue[];
  archived: Issue[];
}

export interface CatalogEntry {
  name: string;
  code: string;
}

export type InvalidIssuePolicy = "abort" | "skip";

export interface SkippedIssue {
  list: "current" | "archive";
  index: number;
  reason: string;
}

export interface RefreshSummary {
  refreshedAt: string;
  current: number;
  archived: number;
  archiveSpanDays: number;
  skipped: SkippedIssue[];
}

export interface IssueFeedSource {
  fetchIssueFeed(): Promise<RawIssueFeed>;
}

export interface CatalogSource {
  fetchCatalog(): Promise<RawCatalogRecord[]>;
}
