import cron, { type ScheduledTask } from "node-cron";
import { RunInProgressError } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import type { SyncCoordinator } from "./services/syncService.js";

let pollTask: ScheduledTask | null = null;

/** Runs one incremental sync; a tick that lands on an active run is dropped. */
export const runScheduledSync = async (coordinator: SyncCoordinator): Promise<void> => {
  try {
    await coordinator.run(false);
  } catch (error) {
    if (error instanceof RunInProgressError) {
      logger.warn("Scheduled sync skipped; previous run still active");
      return;
    }
    logger.error("Scheduled sync failed", error);
  }
};

export const startScheduler = (coordinator: SyncCoordinator, pollCron: string): void => {
  if (!cron.validate(pollCron)) {
    throw new Error(`Invalid POLL_CRON expression "${pollCron}"`);
  }
  stopScheduler();
  pollTask = cron.schedule(pollCron, () => runScheduledSync(coordinator));
  logger.info("Scheduler started", { pollCron });
};

export const stopScheduler = (): void => {
  if (!pollTask) {
    return;
  }
  pollTask.stop();
  pollTask = null;
};
