import { describe, it, expect } from "vitest";
import fs from "fs-extra";
import os from "os";
import path from "path";
import { Catalog } from "../src/catalog";
import {
  classifyTargets,
  CliCommand,
  formatRegionTable,
  formatServiceTable,
  parseArgs,
  runCli,
  usageLines,
} from "../src/cli";
import { LookupError } from "../src/errors";
import { IssueStore } from "../src/issueStore";
import {
  createNormalizer,
  FIXTURE_NOW,
  readCatalogFixture,
  readFeedFixture,
} from "./support";

function createDeps(): { catalog: Catalog; store: IssueStore; lines: string[]; print: (line: string) => void } {
  const lines: string[] = [];
  return {
    catalog: new Catalog({ fetchCatalog: readCatalogFixture }),
    store: new IssueStore({
      source: { fetchIssueFeed: readFeedFixture },
      normalizer: createNormalizer(),
      now: () => FIXTURE_NOW,
    }),
    lines,
    print: (line) => lines.push(line),
  };
}

async function run(command: Exclude<CliCommand, { kind: "watch" }>): Promise<string[]> {
  const { lines, ...deps } = createDeps();
  await runCli(command, deps);
  return lines;
}

const SUMMARY = [
  "3 known services and 2 regions",
  "2 current issues, 2 archived issues for 21 days",
];

describe("parseArgs", () => {
  it("recognizes the listing commands", () => {
    expect(parseArgs([])).toEqual({ kind: "usage" });
    expect(parseArgs(["services"])).toEqual({ kind: "services" });
    expect(parseArgs(["regions"])).toEqual({ kind: "regions" });
    expect(parseArgs(["watch"])).toEqual({ kind: "watch" });
  });

  it("collects query targets and the output path", () => {
    expect(parseArgs(["lambda"])).toEqual({ kind: "query", targets: ["lambda"] });
    expect(parseArgs(["lambda", "--out", "out/issues.json", "eu-west-1"])).toEqual({
      kind: "query",
      targets: ["lambda", "eu-west-1"],
      outPath: "out/issues.json",
    });
    expect(parseArgs(["--out=issues.json", "ec2"])).toEqual({
      kind: "query",
      targets: ["ec2"],
      outPath: "issues.json",
    });
  });

  it("rejects malformed arguments", () => {
    expect(() => parseArgs(["lambda", "--out"])).toThrow("--out needs a file path");
    expect(() => parseArgs(["lambda", "eu-west-1", "extra"])).toThrow(
      "Specify at most a service and a region"
    );
  });
});

describe("classifyTargets", () => {
  it("sorts targets into service and region", async () => {
    const catalog = new Catalog();
    catalog.load(await readCatalogFixture());
    expect(classifyTargets(["eu-west-1", "Lambda"], catalog)).toEqual({
      service: "Lambda",
      region: "eu-west-1",
    });
    expect(classifyTargets(["ireland"], catalog)).toEqual({ region: "ireland" });
  });

  it("rejects targets the catalog does not know", async () => {
    const catalog = new Catalog();
    catalog.load(await readCatalogFixture());
    expect(() => classifyTargets(["lambda", "atlantis"], catalog)).toThrow(LookupError);
  });
});

describe("table formatting", () => {
  it("pads service codes and region names", () => {
    expect(formatServiceTable([{ name: "AWS Lambda", code: "lambda" }])).toEqual([
      "Showing 1 known services:",
      "\tShort Name                     Long Name",
      `\tlambda${" ".repeat(24)} AWS Lambda`,
    ]);
    expect(formatRegionTable([{ name: "Ireland", code: "eu-west-1" }])).toEqual([
      "Showing 1 known regions:",
      "\tRegion Name          Region Code",
      `\tIreland${" ".repeat(13)} eu-west-1`,
    ]);
  });
});

describe("runCli", () => {
  it("prints usage after the summary", async () => {
    expect(await run({ kind: "usage" })).toEqual([...SUMMARY, ...usageLines()]);
  });

  it("lists the catalog", async () => {
    const lines = await run({ kind: "regions" });
    expect(lines.slice(2)).toEqual([
      "Showing 2 known regions:",
      "\tRegion Name          Region Code",
      `\tIreland${" ".repeat(13)} eu-west-1`,
      `\tN. Virginia${" ".repeat(9)} us-east-1`,
    ]);
  });

  it("prints the matching issues as JSON", async () => {
    const lines = await run({ kind: "query", targets: ["lambda", "eu-west-1"] });

    expect(lines.slice(0, 2)).toEqual(SUMMARY);
    expect(lines[2]).toBe("1 current issues, 0 archived issues for lambda in eu-west-1");
    expect(lines[3]).toBe("\nCurrent Issues:");
    expect(lines[4]).toBe("---------------");
    const printed: unknown = JSON.parse(lines[5]);
    expect(printed).toMatchObject([{ service_code: "lambda", duration_mins: 10 }]);
    expect(lines).toHaveLength(6);
  });

  it("queries by the codes a catalog name resolves to", async () => {
    const lines = await run({ kind: "query", targets: ["lambda", "Ireland"] });

    expect(lines[2]).toBe("1 current issues, 0 archived issues for lambda in eu-west-1");
    const printed: unknown = JSON.parse(lines[5]);
    expect(printed).toMatchObject([{ service_code: "lambda", region_code: "eu-west-1" }]);
  });

  it("labels an unfiltered side with its default", async () => {
    const lines = await run({ kind: "query", targets: ["Amazon Simple Storage Service"] });
    expect(lines[2]).toBe("0 current issues, 1 archived issues for s3 in all regions");
    expect(lines[3]).toBe("\nArchived Issues:");
  });

  it("fails on an unknown target", async () => {
    await expect(run({ kind: "query", targets: ["atlantis"] })).rejects.toThrow(
      'Unknown target "atlantis"'
    );
  });

  it("writes the result to the output file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "status-issues-"));
    const outPath = path.join(dir, "nested", "issues.json");
    try {
      await run({ kind: "query", targets: ["us-east-1"], outPath });
      const saved: unknown = await fs.readJSON(outPath);
      expect(saved).toMatchObject({
        current: [{ service_code: "ec2" }],
        archived: [{ service_code: "lambda", region_code: "us-east-1" }],
      });
    } finally {
      await fs.remove(dir);
    }
  });
});
