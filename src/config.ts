import dotenv from "dotenv";
import { IANAZone } from "luxon";
import { DEFAULT_TIMEZONE_ALIASES, TimezoneAliases } from "./eventTime";
import { InvalidIssuePolicy } from "./types";

dotenv.config();

export interface AppConfig {
  dataUrl: string;
  servicesUrl: string;
  cronPattern: string;
  timezone: string;
  timezoneAliases: TimezoneAliases;
  invalidIssuePolicy: InvalidIssuePolicy;
  requestTimeoutMs: number;
  userAgent: string;
}

function parseAliases(raw: string | undefined): TimezoneAliases {
  const aliases: TimezoneAliases = { ...DEFAULT_TIMEZONE_ALIASES };
  if (!raw?.trim()) {
    return aliases;
  }

  for (const pair of raw.split(",")) {
    const [abbr = "", zone = ""] = pair.split("=").map((part) => part.trim());
    if (!abbr || !zone) {
      throw new Error(`Invalid TIMEZONE_ALIASES entry: "${pair}"`);
    }
    if (!IANAZone.isValidZone(zone)) {
      throw new Error(`Unknown time zone in TIMEZONE_ALIASES: ${zone}`);
    }
    aliases[abbr.toUpperCase()] = zone;
  }

  return aliases;
}

function parsePolicy(raw: string | undefined): InvalidIssuePolicy {
  const value = raw?.trim().toLowerCase() || "abort";
  if (value !== "abort" && value !== "skip") {
    throw new Error(`INVALID_ISSUE_POLICY must be "abort" or "skip", got "${value}"`);
  }
  return value;
}

function parseTimeout(raw: string | undefined): number {
  const value = Number(raw ?? 20000);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`REQUEST_TIMEOUT_MS must be a positive number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const timezone = env.TZ?.trim() || "America/Los_Angeles";
  if (!IANAZone.isValidZone(timezone)) {
    throw new Error(`Unknown time zone in TZ: ${timezone}`);
  }

  return {
    dataUrl:
      env.STATUS_DATA_URL?.trim() || "https://status.aws.amazon.com/data.json",
    servicesUrl:
      env.STATUS_SERVICES_URL?.trim() ||
      "https://status.aws.amazon.com/services.json",
    cronPattern: env.CRON_PATTERN?.trim() || "*/15 * * * *",
    timezone,
    timezoneAliases: parseAliases(env.TIMEZONE_ALIASES),
    invalidIssuePolicy: parsePolicy(env.INVALID_ISSUE_POLICY),
    requestTimeoutMs: parseTimeout(env.REQUEST_TIMEOUT_MS),
    userAgent:
      env.USER_AGENT?.trim() ||
      "Mozilla/5.0 (compatible; StatusIssues/1.0)",
  };
}
