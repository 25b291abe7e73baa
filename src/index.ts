#!/usr/bin/env node
// Loads .env before the logger reads LOG_LEVEL
import { loadConfig } from "./config";
import { Catalog } from "./catalog";
import { parseArgs, runCli } from "./cli";
import { IssueNormalizer } from "./issueNormalizer";
import { IssueStore } from "./issueStore";
import { logger } from "./logger";
import { StatusClient } from "./statusClient";
import { startWatch } from "./watcher";

async function bootstrap(argv: string[]): Promise<void> {
  const command = parseArgs(argv);
  const config = loadConfig();

  const client = new StatusClient(config);
  const catalog = new Catalog(client);
  const store = new IssueStore({
    source: client,
    normalizer: new IssueNormalizer({
      aliases: config.timezoneAliases,
      defaultZone: config.timezone,
    }),
    invalidIssuePolicy: config.invalidIssuePolicy,
  });

  if (command.kind !== "watch") {
    await runCli(command, { catalog, store });
    return;
  }

  const task = startWatch(catalog, store, {
    cronPattern: config.cronPattern,
    timezone: config.timezone,
  });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down scheduler...`);
    task.stop();
    store.clear();
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap(process.argv.slice(2)).catch((error: unknown) => {
  logger.error("Command failed", error);
  process.exit(1);
});
