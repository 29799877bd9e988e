import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { DispatchSummary } from "./pipeline";

export type DispatchScheduler = {
  readonly stop: () => Promise<void>;
};

/**
 * Runs the dispatcher on a cron schedule. A run still in progress when the next
 * one is due causes that next run to be skipped.
 *
 * @param expression - node-cron expression from `schedule.dispatch`
 * @param runDispatch - One full dispatch pass over the configured feeds
 * @param logger - Logger instance for recording dispatch cycles
 * @returns A DispatchScheduler whose stop() halts the schedule and waits for a running dispatch
 */
export function createDispatchScheduler(
  expression: string,
  runDispatch: () => Promise<DispatchSummary>,
  logger: Logger,
): DispatchScheduler {
  let inFlight: Promise<void> | null = null;

  const runCycle = async (): Promise<void> => {
    logger.info("dispatch cycle starting");
    try {
      await runDispatch();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "dispatch cycle failed unexpectedly");
    }
  };

  const task: ScheduledTask = cron.schedule(expression, async () => {
    if (inFlight) {
      logger.warn("previous dispatch still running, skipping cycle");
      return;
    }

    inFlight = runCycle();
    try {
      await inFlight;
    } finally {
      inFlight = null;
    }
  });

  return {
    stop: async () => {
      task.stop();
      if (inFlight) {
        await inFlight;
      }
    },
  };
}
