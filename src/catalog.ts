import { LookupError, LookupKind } from "./errors";
import { logger } from "./logger";
import { CatalogEntry, CatalogSource, RawCatalogRecord } from "./types";

class CodeTable {
  // friendly name -> code, names kept as published
  private readonly byName = new Map<string, string>();
  private readonly lowerNames = new Map<string, string>();
  private readonly lowerCodes = new Map<string, string>();

  constructor(private readonly kind: LookupKind) {}

  set(name: string, code: string): void {
    this.byName.set(name, code);
    this.lowerNames.set(name.toLowerCase(), code);
    this.lowerCodes.set(code.toLowerCase(), code);
  }

  get size(): number {
    return this.byName.size;
  }

  has(value: string): boolean {
    const key = value.toLowerCase();
    return this.lowerNames.has(key) || this.lowerCodes.has(key);
  }

  resolve(value: string): string {
    const key = value.toLowerCase();
    const code = this.lowerNames.get(key) ?? this.lowerCodes.get(key);
    if (code === undefined) {
      throw new LookupError(value, this.kind);
    }
    return code;
  }

  entries(): CatalogEntry[] {
    return [...this.byName]
      .map(([name, code]) => ({ name, code }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

export class Catalog {
  private services = new CodeTable("service");
  private regions = new CodeTable("region");

  constructor(private readonly source?: CatalogSource) {}

  async refresh(): Promise<void> {
    if (!this.source) {
      throw new Error("Catalog has no source to refresh from");
    }
    this.load(await this.source.fetchCatalog());
  }

  /** Replaces both tables with the given records. */
  load(records: RawCatalogRecord[]): void {
    const services = new CodeTable("service");
    const regions = new CodeTable("region");

    for (const record of records) {
      const serviceName = nonEmptyString(record.service_name);
      const serviceId = nonEmptyString(record.service);
      if (!serviceName || !serviceId) {
        logger.debug(`Skipping catalog record without service: ${JSON.stringify(record)}`);
        continue;
      }
      services.set(serviceName, serviceId.split("-")[0]);

      const regionName = nonEmptyString(record.region_name);
      const regionCode = nonEmptyString(record.region_id);
      if (regionName && regionCode) {
        regions.set(regionName, regionCode);
      }
    }

    this.services = services;
    this.regions = regions;
    logger.info(`Catalog loaded: ${services.size} services, ${regions.size} regions`);
  }

  get serviceCount(): number {
    return this.services.size;
  }

  get regionCount(): number {
    return this.regions.size;
  }

  hasService(value: string): boolean {
    return this.services.has(value);
  }

  resolveServiceCode(value: string): string {
    return this.services.resolve(value);
  }

  hasRegion(value: string): boolean {
    return this.regions.has(value);
  }

  resolveRegionCode(value: string): string {
    return this.regions.resolve(value);
  }

  listServices(): CatalogEntry[] {
    return this.services.entries();
  }

  listRegions(): CatalogEntry[] {
    return this.regions.entries();
  }
}
