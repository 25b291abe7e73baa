import { Issue } from "./types";

function matchesService(issue: Issue, service: string): boolean {
  return (
    issue.service_name.toLowerCase() === service ||
    issue.service_code.toLowerCase() === service
  );
}

function matchesRegion(issue: Issue, region: string): boolean {
  return (
    issue.region_name.toLowerCase() === region ||
    issue.region_code.toLowerCase() === region
  );
}

export function issueMatches(
  issue: Issue,
  service?: string,
  region?: string
): boolean {
  if (service !== undefined && !matchesService(issue, service)) {
    return false;
  }
  if (region !== undefined && !matchesRegion(issue, region)) {
    return false;
  }
  return true;
}

/**
 * Filters by lower-cased service and region (name or code) and returns the
 * matches newest first. Ties keep their source order.
 */
export function queryIssues(
  issues: readonly Issue[],
  service?: string,
  region?: string
): Issue[] {
  return issues
    .filter((issue) => issueMatches(issue, service, region))
    .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
}
