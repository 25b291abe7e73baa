import { Catalog } from "./catalog";
import { LookupError } from "./errors";
import { IssueStore } from "./issueStore";
import { ResultExporter } from "./resultExporter";
import { CatalogEntry, Issue } from "./types";

export const PROGRAM_NAME = "status-issues";

export type CliCommand =
  | { kind: "usage" }
  | { kind: "services" }
  | { kind: "regions" }
  | { kind: "watch" }
  | { kind: "query"; targets: string[]; outPath?: string };

export interface CliDependencies {
  catalog: Catalog;
  store: IssueStore;
  print?: (line: string) => void;
}

export function parseArgs(argv: string[]): CliCommand {
  const positionals: string[] = [];
  let outPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--out") {
      outPath = argv[++i];
      if (!outPath) {
        throw new Error("--out needs a file path");
      }
    } else if (arg.startsWith("--out=")) {
      outPath = arg.slice("--out=".length);
    } else {
      positionals.push(arg);
    }
  }

  const [first] = positionals;
  if (first === "services" || first === "regions" || first === "watch") {
    return { kind: first };
  }
  if (positionals.length === 0) {
    return { kind: "usage" };
  }
  if (positionals.length > 2) {
    throw new Error("Specify at most a service and a region");
  }
  return outPath
    ? { kind: "query", targets: positionals, outPath }
    : { kind: "query", targets: positionals };
}

/** Each target may name a service, a region or both; unknown ones are rejected. */
export function classifyTargets(
  targets: string[],
  catalog: Catalog
): { service?: string; region?: string } {
  const result: { service?: string; region?: string } = {};

  for (const target of targets) {
    const isService = catalog.hasService(target);
    const isRegion = catalog.hasRegion(target);
    if (!isService && !isRegion) {
      throw new LookupError(target, "target");
    }
    if (isService) {
      result.service = target;
    }
    if (isRegion) {
      result.region = target;
    }
  }

  return result;
}

export function formatServiceTable(entries: CatalogEntry[]): string[] {
  return [
    `Showing ${entries.length} known services:`,
    "\tShort Name                     Long Name",
    ...entries.map(({ name, code }) => `\t${code.padEnd(30)} ${name}`),
  ];
}

export function formatRegionTable(entries: CatalogEntry[]): string[] {
  return [
    `Showing ${entries.length} known regions:`,
    "\tRegion Name          Region Code",
    ...entries.map(({ name, code }) => `\t${name.padEnd(20)} ${code}`),
  ];
}

export function usageLines(): string[] {
  return [
    "For more specific detail please specify a service name, region name, or both.",
    "For a list of services specify 'services', for a list of regions specify 'regions'.",
    "Example Usage:",
    `\t$> ${PROGRAM_NAME} services`,
    `\t$> ${PROGRAM_NAME} lambda eu-west-1`,
  ];
}

function issueSection(title: string, issues: Issue[]): string[] {
  if (issues.length === 0) {
    return [];
  }
  return [`\n${title}`, "-".repeat(title.length), JSON.stringify(issues, null, 4)];
}

export async function runCli(
  command: Exclude<CliCommand, { kind: "watch" }>,
  deps: CliDependencies
): Promise<void> {
  const { catalog, store } = deps;
  const print = deps.print ?? ((line: string) => console.log(line));

  await catalog.refresh();
  await store.refresh();

  print(`${catalog.serviceCount} known services and ${catalog.regionCount} regions`);
  print(
    `${store.current.length} current issues, ${store.archived.length} archived issues for ${store.archiveSpanDays} days`
  );

  switch (command.kind) {
    case "usage":
      usageLines().forEach(print);
      return;
    case "services":
      formatServiceTable(catalog.listServices()).forEach(print);
      return;
    case "regions":
      formatRegionTable(catalog.listRegions()).forEach(print);
      return;
    case "query":
      break;
  }

  const { service, region } = classifyTargets(command.targets, catalog);
  // Codes match issue codes whatever name the catalog gives the target
  const serviceCode =
    service === undefined ? undefined : catalog.resolveServiceCode(service);
  const regionCode =
    region === undefined ? undefined : catalog.resolveRegionCode(region);
  const result = store.query(serviceCode, regionCode);

  const serviceLabel = serviceCode ?? "all services";
  const regionLabel = regionCode ?? "all regions";

  print(
    `${result.current.length} current issues, ${result.archived.length} archived issues for ${serviceLabel} in ${regionLabel}`
  );
  issueSection("Current Issues:", result.current).forEach(print);
  issueSection("Archived Issues:", result.archived).forEach(print);

  if (command.outPath) {
    await new ResultExporter(command.outPath).save(result);
  }
}
