import * as cheerio from "cheerio";
import { DateTime } from "luxon";
import { ParseError } from "./errors";
import { EventTimeOptions, parseEventTime } from "./eventTime";
import { TimelineEvent } from "./types";

export interface ParsedTimeline {
  events: TimelineEvent[];
  earliest?: DateTime;
  latest?: DateTime;
}

export type TimelineOptions = Omit<EventTimeOptions, "reference">;

export class TimelineParser {
  constructor(private readonly options: TimelineOptions) {}

  /**
   * Every <div> in the fragment is one event: its first <span> is the
   * timestamp label and whatever text remains is the event text.
   */
  parse(html: string, reference: number): ParsedTimeline {
    const $ = cheerio.load(html, null, false);
    const result: ParsedTimeline = { events: [] };

    for (const block of $("div").toArray()) {
      const $block = $(block);
      const $label = $block.find("span").first();
      if ($label.length === 0) {
        throw new ParseError(
          $block.text().trim(),
          "Timeline entry has no timestamp label"
        );
      }

      const label = $label.text().trim();
      $label.remove();
      result.events.push([label, $block.text().trim()]);

      const instant = parseEventTime(label, { ...this.options, reference });
      if (!result.earliest || instant.toMillis() < result.earliest.toMillis()) {
        result.earliest = instant;
      }
      if (!result.latest || instant.toMillis() > result.latest.toMillis()) {
        result.latest = instant;
      }
    }

    return result;
  }

  static durationMinutes(timeline: ParsedTimeline): number {
    if (!timeline.earliest || !timeline.latest) {
      return 0;
    }
    return timeline.latest.diff(timeline.earliest, "minutes").minutes;
  }
}

export function htmlToText(html: string): string {
  return cheerio.load(html, null, false).root().text();
}
