import fs from "fs-extra";
import path from "path";
import { DEFAULT_TIMEZONE_ALIASES } from "../src/eventTime";
import { IssueNormalizer } from "../src/issueNormalizer";
import { RawCatalogRecord, RawIssue } from "../src/types";

export const FIXTURES = path.resolve(__dirname, "fixtures");
export const DATA_FIXTURE = path.join(FIXTURES, "data.json");
export const SERVICES_FIXTURE = path.join(FIXTURES, "services.json");

// 2024-06-20T00:00:00Z
export const FIXTURE_NOW = Date.UTC(2024, 5, 20);

export interface FixtureFeed {
  current: RawIssue[];
  archive: RawIssue[];
}

export async function readFeedFixture(): Promise<FixtureFeed> {
  return fs.readJSON(DATA_FIXTURE);
}

export async function readCatalogFixture(): Promise<RawCatalogRecord[]> {
  return fs.readJSON(SERVICES_FIXTURE);
}

export function createNormalizer(): IssueNormalizer {
  return new IssueNormalizer({
    aliases: DEFAULT_TIMEZONE_ALIASES,
    defaultZone: "America/Los_Angeles",
  });
}
