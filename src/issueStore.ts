import { describeError, ParseError } from "./errors";
import { IssueNormalizer } from "./issueNormalizer";
import { queryIssues } from "./issueQuery";
import { logger } from "./logger";
import {
  InvalidIssuePolicy,
  Issue,
  IssueFeedSource,
  IssueQueryResult,
  RawIssueFeed,
  RefreshSummary,
  SkippedIssue,
} from "./types";

const SECONDS_PER_DAY = 24 * 60 * 60;

export interface IssueStoreOptions {
  source: IssueFeedSource;
  normalizer: IssueNormalizer;
  invalidIssuePolicy?: InvalidIssuePolicy;
  now?: () => number; // milliseconds
}

function normalizeFilter(value: string | undefined): string | undefined {
  const trimmed = value?.trim().toLowerCase();
  return trimmed ? trimmed : undefined;
}

export class IssueStore {
  private currentIssues: readonly Issue[] = [];
  private archivedIssues: readonly Issue[] = [];
  private spanDays = 0;
  private summary: RefreshSummary | null = null;

  private readonly policy: InvalidIssuePolicy;
  private readonly now: () => number;

  constructor(private readonly options: IssueStoreOptions) {
    this.policy = options.invalidIssuePolicy ?? "abort";
    this.now = options.now ?? Date.now;
  }

  get current(): readonly Issue[] {
    return this.currentIssues;
  }

  get archived(): readonly Issue[] {
    return this.archivedIssues;
  }

  get archiveSpanDays(): number {
    return this.spanDays;
  }

  get lastRefresh(): RefreshSummary | null {
    return this.summary;
  }

  async refresh(): Promise<RefreshSummary> {
    const startedAt = this.now();
    const feed = await this.options.source.fetchIssueFeed();
    return this.load(feed, startedAt);
  }

  /**
   * Rebuilds both collections from an already fetched feed. Nothing is
   * replaced unless every record was handled.
   */
  load(feed: RawIssueFeed, startedAt: number = this.now()): RefreshSummary {
    const skipped: SkippedIssue[] = [];
    const current = this.normalizeAll(feed.current, "current", skipped);
    const archived = this.normalizeAll(feed.archive, "archive", skipped);

    // Skipped records do not count towards the span
    let oldest = Math.floor(startedAt / 1000);
    for (const issue of archived) {
      oldest = Math.min(oldest, issue.timestamp);
    }

    this.currentIssues = current;
    this.archivedIssues = archived;
    this.spanDays = Math.trunc((startedAt / 1000 - oldest) / SECONDS_PER_DAY);
    this.summary = {
      refreshedAt: new Date(startedAt).toISOString(),
      current: current.length,
      archived: archived.length,
      archiveSpanDays: this.spanDays,
      skipped,
    };

    logger.info(`Retrieved issues spanning ${this.spanDays} days`);
    if (skipped.length > 0) {
      logger.warn(`Skipped ${skipped.length} invalid issue record(s)`);
    }
    return this.summary;
  }

  query(service?: string, region?: string): IssueQueryResult {
    const serviceFilter = normalizeFilter(service);
    const regionFilter = normalizeFilter(region);
    logger.debug(
      `Getting issues for ${serviceFilter ?? "all services"} in ${regionFilter ?? "all regions"}`
    );

    return {
      current: queryIssues(this.currentIssues, serviceFilter, regionFilter),
      archived: queryIssues(this.archivedIssues, serviceFilter, regionFilter),
    };
  }

  clear(): void {
    this.currentIssues = [];
    this.archivedIssues = [];
    this.spanDays = 0;
    this.summary = null;
  }

  private normalizeAll(
    records: unknown[],
    list: SkippedIssue["list"],
    skipped: SkippedIssue[]
  ): Issue[] {
    const issues: Issue[] = [];

    records.forEach((raw, index) => {
      try {
        issues.push(this.options.normalizer.normalize(raw));
      } catch (error) {
        if (this.policy === "abort" || !(error instanceof ParseError)) {
          throw error;
        }
        const reason = describeError(error);
        logger.warn(`Skipping ${list} issue #${index}: ${reason}`);
        skipped.push({ list, index, reason });
      }
    });

    return issues;
  }
}
