import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { errorMessage } from "./errors";
import type { CycleResult } from "./pipeline/types";

export type UpdateScheduler = {
  readonly stop: () => void;
  readonly runNow: () => Promise<void>;
};

export type CycleRunner = () => Promise<CycleResult>;

/**
 * Creates and starts a scheduler that refreshes the feed on the configured
 * cron schedule. Cycles never overlap: a tick that fires while one is still
 * running is skipped. Errors from a cycle are logged, never rethrown.
 *
 * @param config - Application configuration including schedule.update cron expression
 * @param logger - Logger instance for recording cycle events
 * @param runCycle - Runs one fetch → extract → build → publish pass
 * @returns An UpdateScheduler with stop() and an on-demand runNow()
 */
export function createUpdateScheduler(
  config: AppConfig,
  logger: Logger,
  runCycle: CycleRunner,
): UpdateScheduler {
  let running = false;

  const tick = async (trigger: string): Promise<void> => {
    if (running) {
      logger.warn({ trigger }, "previous update cycle still running, skipping");
      return;
    }

    running = true;
    logger.info({ trigger }, "update cycle starting");
    try {
      const result = await runCycle();
      if (result.status === "published") {
        logger.info(
          { trigger, programCount: result.programCount, degraded: result.degraded },
          "update cycle complete",
        );
      } else {
        logger.warn(
          { trigger, stage: result.stage, error: result.error },
          "update cycle failed",
        );
      }
    } catch (err) {
      logger.error(
        { trigger, error: errorMessage(err) },
        "update cycle failed unexpectedly",
      );
    } finally {
      running = false;
    }
  };

  const task: ScheduledTask = cron.schedule(config.schedule.update, () => {
    void tick("schedule");
  });

  if (config.schedule.runOnStart) {
    void tick("startup");
  }

  return {
    stop: () => {
      task.stop();
    },
    runNow: () => tick("manual"),
  };
}
