// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { ClaimedTask, TaskQueue } from "./queue";

export type TaskOutcome =
  | { status: "succeeded" }
  | { status: "skipped" }
  | { status: "permanent_failure"; error: string }
  | { status: "transient_failure"; error: string };

export type TaskHandler = (payload: unknown) => Promise<TaskOutcome>;

export type WorkerOptions = {
  readonly queue: TaskQueue;
  readonly handlers: Readonly<Record<string, TaskHandler>>;
  readonly logger: Logger;
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
  readonly concurrency: number;
  readonly pollIntervalMs: number;
  readonly batchSize: number;
  readonly leaseMs: number;
};

type Settlement = "succeeded" | "skipped" | "retried" | "deadLettered" | "requeued";

export type TickSummary = {
  readonly claimed: number;
} & Readonly<Record<Settlement, number>>;

export type Worker = {
  readonly tick: () => Promise<TickSummary>;
  readonly start: () => void;
  readonly stop: () => Promise<void>;
};

/**
 * Drains the task queue and owns the retry decision.
 *
 * Handlers report an outcome; the worker turns it into a queue transition.
 * Transient failures (and handler throws) are re-queued after a fixed
 * `retryDelayMs` until `maxAttempts` deliveries have been made, then
 * dead-lettered. Permanent failures are dead-lettered on the spot.
 *
 * If recording the transition itself fails, the task is handed back to the
 * queue; when even that fails it stays `running` until its lease runs out and a
 * later tick (here or in another worker) recovers it.
 */
export function createWorker(options: WorkerOptions): Worker {
  const { queue, handlers, logger, maxAttempts, retryDelayMs, leaseMs } = options;
  const limit = pLimit(options.concurrency);

  let timer: NodeJS.Timeout | null = null;
  let running = false;
  let current: Promise<TickSummary> | null = null;

  const deadLetter = (task: ClaimedTask, attempt: number, error: string) => {
    queue.deadLetter(task.id, attempt, error);
    logger.error(
      {
        taskId: task.id,
        taskName: task.name,
        attempts: attempt,
        payload: task.payload,
        error,
      },
      "task permanently failed, moved to dead letter",
    );
  };

  const runTask = async (task: ClaimedTask): Promise<Settlement> => {
    const attempt = task.attempts + 1;
    const handler = handlers[task.name];

    if (!handler) {
      deadLetter(task, attempt, `no handler registered for task "${task.name}"`);
      return "deadLettered";
    }

    let outcome: TaskOutcome;
    try {
      outcome = await handler(task.payload);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      outcome = { status: "transient_failure", error: message };
    }

    switch (outcome.status) {
      case "succeeded":
      case "skipped":
        queue.complete(task.id, outcome.status, attempt);
        return outcome.status;
      case "permanent_failure":
        deadLetter(task, attempt, outcome.error);
        return "deadLettered";
      case "transient_failure":
        if (attempt >= maxAttempts) {
          deadLetter(task, attempt, outcome.error);
          return "deadLettered";
        }
        queue.retryLater(task.id, attempt, retryDelayMs, outcome.error);
        logger.warn(
          {
            taskId: task.id,
            taskName: task.name,
            attempt,
            maxAttempts,
            retryInMs: retryDelayMs,
            error: outcome.error,
          },
          "task failed, retry scheduled",
        );
        return "retried";
    }
  };

  const deliver = async (task: ClaimedTask): Promise<Settlement> => {
    try {
      return await runTask(task);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      try {
        queue.release(task.id, task.attempts + 1, error);
        logger.error(
          { taskId: task.id, taskName: task.name, error },
          "failed to record task outcome, task released",
        );
      } catch (releaseErr) {
        logger.error(
          {
            taskId: task.id,
            taskName: task.name,
            error,
            releaseError:
              releaseErr instanceof Error ? releaseErr.message : String(releaseErr),
          },
          "failed to release task, leaving it for lease recovery",
        );
      }
      return "requeued";
    }
  };

  const runTick = async (): Promise<TickSummary> => {
    const recovered = queue.recoverStale(leaseMs);
    if (recovered > 0) {
      logger.warn({ recovered, leaseMs }, "requeued tasks whose lease expired");
    }

    const claimed = queue.claimDue(options.batchSize);
    const counts: Record<Settlement, number> = {
      succeeded: 0,
      skipped: 0,
      retried: 0,
      deadLettered: 0,
      requeued: 0,
    };

    const settlements = await Promise.all(
      claimed.map((task) => limit(() => deliver(task))),
    );
    for (const settlement of settlements) {
      counts[settlement]++;
    }

    if (claimed.length > 0) {
      logger.info({ claimed: claimed.length, ...counts }, "worker tick complete");
    }

    return { claimed: claimed.length, ...counts };
  };

  const tick = (): Promise<TickSummary> => {
    const run = runTick();
    current = run;
    return run.finally(() => {
      if (current === run) current = null;
    });
  };

  const schedule = () => {
    if (!running) return;
    timer = setTimeout(loop, options.pollIntervalMs);
  };

  const loop = () => {
    tick()
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "worker tick failed");
      })
      .finally(schedule);
  };

  return {
    tick,
    start: () => {
      if (running) return;
      running = true;
      logger.info(
        { concurrency: options.concurrency, pollIntervalMs: options.pollIntervalMs },
        "worker started",
      );
      loop();
    },
    stop: async () => {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (current) {
        logger.info("waiting for in-flight tasks to settle");
        await Promise.allSettled([current]);
      }
      logger.info("worker stopped");
    },
  };
}
