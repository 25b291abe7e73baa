import fs from "fs-extra";
import { describeError, FetchError } from "./errors";
import { logger } from "./logger";
import {
  CatalogSource,
  IssueFeedSource,
  isRecord,
  RawCatalogRecord,
  RawIssueFeed,
} from "./types";

export interface StatusClientOptions {
  dataUrl: string;
  servicesUrl: string;
  requestTimeoutMs: number;
  userAgent: string;
}

function issueList(source: string, key: string, value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new FetchError(source, `"${key}" is not a list`);
  }
  return value;
}

export class StatusClient implements IssueFeedSource, CatalogSource {
  constructor(private readonly options: StatusClientOptions) {}

  async fetchIssueFeed(): Promise<RawIssueFeed> {
    const source = this.options.dataUrl;
    const data = await this.getJson(source);
    if (!isRecord(data)) {
      throw new FetchError(source, "issue feed is not a JSON object");
    }

    const feed: RawIssueFeed = {
      current: issueList(source, "current", data.current),
      archive: issueList(source, "archive", data.archive),
    };
    logger.info(
      `Fetched ${feed.current.length} current and ${feed.archive.length} archived issues`
    );
    return feed;
  }

  async fetchCatalog(): Promise<RawCatalogRecord[]> {
    const source = this.options.servicesUrl;
    const data = await this.getJson(source);
    if (!Array.isArray(data)) {
      throw new FetchError(source, "service catalog is not a list");
    }

    const records = data.filter(isRecord);
    if (records.length < data.length) {
      logger.warn(
        `Ignoring ${data.length - records.length} catalog entries that are not objects`
      );
    }
    return records;
  }

  private async getJson(source: string): Promise<unknown> {
    if (!/^https?:\/\//i.test(source)) {
      logger.debug(`Reading ${source}`);
      try {
        return await fs.readJSON(source);
      } catch (error) {
        throw new FetchError(source, describeError(error), error);
      }
    }

    logger.debug(`Requesting ${source}`);
    let response: Response;
    try {
      response = await fetch(source, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      throw new FetchError(source, describeError(error), error);
    }

    if (!response.ok) {
      throw new FetchError(source, `HTTP ${response.status} ${response.statusText}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new FetchError(source, `invalid JSON (${describeError(error)})`, error);
    }
  }
}
