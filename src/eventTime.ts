import { DateTime } from "luxon";
import { ParseError } from "./errors";

export type TimezoneAliases = Record<string, string>;

const PACIFIC = "America/Los_Angeles";

// The status page writes Pacific times as PST/PDT; both map to the same zone so
// luxon picks the offset from the date itself.
export const DEFAULT_TIMEZONE_ALIASES: Readonly<TimezoneAliases> = {
  PST: PACIFIC,
  PDT: PACIFIC,
  UTC: "UTC",
  GMT: "UTC",
};

export interface EventTimeOptions {
  aliases: Readonly<TimezoneAliases>;
  defaultZone: string;
  /** Unix seconds supplying any calendar parts the label leaves out. */
  reference: number;
}

type LabelFields = "time" | "dayAndTime" | "full";

const LABEL_FORMATS: ReadonlyArray<{ pattern: string; fields: LabelFields }> = [
  { pattern: "h:mm a", fields: "time" },
  { pattern: "h:mm:ss a", fields: "time" },
  { pattern: "H:mm", fields: "time" },
  { pattern: "MMM d h:mm a", fields: "dayAndTime" },
  { pattern: "MMM d, h:mm a", fields: "dayAndTime" },
  { pattern: "MMMM d h:mm a", fields: "dayAndTime" },
  { pattern: "MMMM d, h:mm a", fields: "dayAndTime" },
  { pattern: "MMM d yyyy h:mm a", fields: "full" },
  { pattern: "MMM d, yyyy h:mm a", fields: "full" },
  { pattern: "yyyy-MM-dd H:mm", fields: "full" },
  { pattern: "yyyy-MM-dd H:mm:ss", fields: "full" },
];

const ZONE_SUFFIX = /^(.*\S)\s+([A-Za-z]{2,5})$/;
const MERIDIEM = new Set(["AM", "PM"]);

function splitZone(
  text: string,
  options: EventTimeOptions
): { body: string; zone: string } {
  const match = ZONE_SUFFIX.exec(text);
  if (!match) {
    return { body: text, zone: options.defaultZone };
  }

  const abbr = match[2].toUpperCase();
  if (MERIDIEM.has(abbr)) {
    return { body: text, zone: options.defaultZone };
  }

  const zone = options.aliases[abbr];
  if (!zone) {
    throw new ParseError(text, `Unknown time zone abbreviation ${abbr}`);
  }
  return { body: match[1], zone };
}

function anchorPrefix(fields: LabelFields, anchor: DateTime): [string, string] {
  switch (fields) {
    case "time":
      return [`${anchor.toFormat("yyyy-MM-dd")} `, "yyyy-MM-dd "];
    case "dayAndTime":
      return [`${anchor.toFormat("yyyy")} `, "yyyy "];
    case "full":
      return ["", ""];
  }
}

/**
 * Parses a timeline label such as "11:05 PM PDT" or "Jun 13, 2024 11:05 PM PST"
 * into an absolute instant.
 */
export function parseEventTime(
  label: string,
  options: EventTimeOptions
): DateTime {
  const text = label.replace(/\s+/g, " ").trim();
  if (!text) {
    throw new ParseError(label, "Empty timeline label");
  }

  const { body, zone } = splitZone(text, options);
  const anchor = DateTime.fromSeconds(options.reference, { zone });

  for (const { pattern, fields } of LABEL_FORMATS) {
    const [prefix, prefixPattern] = anchorPrefix(fields, anchor);
    const parsed = DateTime.fromFormat(prefix + body, prefixPattern + pattern, {
      zone,
      locale: "en-US",
    });
    if (parsed.isValid) {
      return parsed;
    }
  }

  throw new ParseError(text, "Unrecognized timeline label");
}
