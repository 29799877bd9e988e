import { createClassifier } from "./classifier";
import { registerShutdownHandlers } from "./lifecycle";
import type { Stoppable } from "./lifecycle";
import {
  PROCESS_ARTICLE_TASK,
  createArticleStore,
  createArticleTaskHandler,
} from "./pipeline";
import { createWorker } from "./queue/worker";
import { bootstrap, runDispatch } from "./runtime";
import { createDispatchScheduler } from "./scheduler";

/**
 * Worker process: drains the task queue, classifying and storing articles.
 * When `schedule.dispatch` is configured it also runs the dispatcher on that
 * schedule, so a single long-lived process covers the whole pipeline.
 */
function main(): void {
  const runtime = bootstrap("worker");
  const { config, logger, db, queue } = runtime;

  const classifier = createClassifier(config.classifier);
  logger.info({ classifier: config.classifier.kind }, "classifier initialised");

  const worker = createWorker({
    queue,
    handlers: {
      [PROCESS_ARTICLE_TASK]: createArticleTaskHandler({
        store: createArticleStore(db),
        classifier,
        logger,
      }),
    },
    logger,
    maxAttempts: config.queue.maxAttempts,
    retryDelayMs: config.queue.retryDelaySeconds * 1000,
    concurrency: config.queue.concurrency,
    pollIntervalMs: config.queue.pollIntervalMs,
    batchSize: config.queue.batchSize,
    leaseMs: config.queue.leaseSeconds * 1000,
  });

  const stoppables: Array<Stoppable> = [];

  const dispatchSchedule = config.schedule.dispatch;
  if (dispatchSchedule) {
    const scheduler = createDispatchScheduler(
      dispatchSchedule,
      () => runDispatch(runtime),
      logger,
    );
    stoppables.push({ name: "dispatch-scheduler", stop: scheduler.stop });
    logger.info({ schedule: dispatchSchedule }, "dispatch scheduler started");
  }

  stoppables.push({ name: "worker", stop: worker.stop });
  registerShutdownHandlers({ stoppables, closeDb: runtime.closeDb, logger });

  worker.start();
}

main();
