import cron, { ScheduledTask } from "node-cron";
import { Catalog } from "./catalog";
import { IssueStore } from "./issueStore";
import { logger } from "./logger";

export interface WatchOptions {
  cronPattern: string;
  timezone: string;
}

/**
 * Returns a refresh function that does nothing while a previous call is
 * still in flight. Failures are logged; the store keeps its last good data.
 */
export function createRefreshCycle(
  catalog: Catalog,
  store: IssueStore
): () => Promise<void> {
  let running = false;

  return async () => {
    if (running) {
      logger.warn("Previous refresh still running, skipping this cycle");
      return;
    }

    running = true;
    logger.info("Starting refresh cycle");
    try {
      await catalog.refresh();
      const summary = await store.refresh();
      logger.info(
        `Cycle complete: ${summary.current} current, ${summary.archived} archived issues over ${summary.archiveSpanDays} days`
      );
    } catch (error) {
      logger.error("Refresh cycle failed", error);
    } finally {
      running = false;
    }
  };
}

export function startWatch(
  catalog: Catalog,
  store: IssueStore,
  options: WatchOptions
): ScheduledTask {
  if (!cron.validate(options.cronPattern)) {
    throw new Error(`Invalid CRON_PATTERN "${options.cronPattern}"`);
  }

  const cycle = createRefreshCycle(catalog, store);
  const task = cron.schedule(options.cronPattern, () => void cycle(), {
    timezone: options.timezone,
  });

  logger.info(`Scheduler ready with pattern "${options.cronPattern}"`);
  void cycle();
  return task;
}
