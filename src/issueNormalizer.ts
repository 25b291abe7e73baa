import { DateTime } from "luxon";
import { ParseError } from "./errors";
import { logger } from "./logger";
import { htmlToText, TimelineOptions, TimelineParser } from "./timelineParser";
import { Issue, isRecord } from "./types";

const SERVICE_ID_PATTERN = /^([a-z0-9]+)-*([a-z0-9-]*)$/;

export interface ServiceCodes {
  serviceCode: string;
  regionCode: string;
}

/** "lambda-eu-west-1" -> { serviceCode: "lambda", regionCode: "eu-west-1" } */
export function splitServiceId(serviceId: unknown): ServiceCodes {
  const match =
    typeof serviceId === "string" ? SERVICE_ID_PATTERN.exec(serviceId) : null;
  if (!match) {
    throw new ParseError(String(serviceId), "Unrecognized service identifier");
  }
  return { serviceCode: match[1], regionCode: match[2] };
}

export type DisplayNameOutcome =
  | { kind: "parsed"; serviceName: string; regionName: string }
  | { kind: "fallback"; serviceName: string; regionName: ""; reason: string };

/** "AWS Lambda (EU-WEST-1)" -> service "AWS Lambda", region "EU-WEST-1" */
export function splitDisplayName(displayName: unknown): DisplayNameOutcome {
  if (typeof displayName !== "string") {
    return {
      kind: "fallback",
      serviceName: String(displayName ?? ""),
      regionName: "",
      reason: `display name is ${displayName === null ? "null" : typeof displayName}`,
    };
  }

  const [serviceName = "", region] = displayName.split(" (");
  return {
    kind: "parsed",
    serviceName,
    regionName: region === undefined ? "" : region.replace(/\)$/, ""),
  };
}

export function parseTimestamp(value: unknown): number {
  const text = typeof value === "number" ? String(value) : value;
  if (typeof text !== "string" || !/^\s*-?\d+\s*$/.test(text)) {
    throw new ParseError(String(value), "Issue date is not a Unix timestamp");
  }

  const timestamp = parseInt(text, 10);
  if (!DateTime.fromSeconds(timestamp, { zone: "utc" }).isValid) {
    throw new ParseError(text.trim(), "Issue date is out of range");
  }
  return timestamp;
}

export function formatUtc(timestamp: number): string {
  return DateTime.fromSeconds(timestamp, { zone: "utc" }).toFormat(
    "yyyy-MM-dd HH:mm:ss"
  );
}

export class IssueNormalizer {
  private readonly timelineParser: TimelineParser;

  constructor(options: TimelineOptions) {
    this.timelineParser = new TimelineParser(options);
  }

  normalize(raw: unknown): Issue {
    if (!isRecord(raw)) {
      throw new ParseError(String(raw), "Issue record is not an object");
    }
    const { serviceCode, regionCode } = splitServiceId(raw.service);

    const names = splitDisplayName(raw.service_name);
    if (names.kind === "fallback") {
      logger.warn(
        `Error parsing display name ${names.serviceName} (${names.reason}), using it as is`
      );
    }

    const timestamp = parseTimestamp(raw.date);
    const html = typeof raw.description === "string" ? raw.description : "";
    const timeline = this.timelineParser.parse(html, timestamp);

    return Object.freeze({
      service_name: names.serviceName,
      service_code: serviceCode,
      region_name: names.regionName,
      region_code: regionCode,
      summary: typeof raw.summary === "string" ? raw.summary : "",
      timestamp,
      date: formatUtc(timestamp),
      description: htmlToText(html),
      timeline: Object.freeze(timeline.events),
      duration_mins: TimelineParser.durationMinutes(timeline),
    });
  }
}
