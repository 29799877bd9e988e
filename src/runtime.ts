// pattern: Imperative Shell
import { resolve } from "node:path";
import type { Logger } from "pino";
import { createLogger } from "./logger";
import { loadConfig, enabledFeedUrls } from "./config";
import type { AppConfig } from "./config";
import { createDatabase, ensureSchema } from "./db";
import type { AppDatabase } from "./db";
import { createTaskQueue } from "./queue/queue";
import type { TaskQueue } from "./queue/queue";
import { createFeedFetcher, dispatchFeeds } from "./pipeline";
import type { DispatchSummary } from "./pipeline";

export type Runtime = {
  readonly logger: Logger;
  readonly config: AppConfig;
  readonly db: AppDatabase;
  readonly queue: TaskQueue;
  readonly closeDb: () => void;
};

/**
 * Shared startup for both processes: logger, config, database handle, schema,
 * queue. The database handle created here is the only one the process uses.
 * Exits with code 1 when the configuration cannot be loaded.
 */
export function bootstrap(processName: string): Runtime {
  const logger = createLogger();
  const configPath = process.env["CONFIG_PATH"] ?? "./config.yaml";
  const databaseUrl = process.env["DATABASE_URL"] ?? "./data/news-ingest.db";

  logger.info({ process: processName }, "news-ingest starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(configPath));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { feedCount: config.feeds.length, classifier: config.classifier.kind },
    "config loaded",
  );

  const { db, close } = createDatabase(databaseUrl);
  ensureSchema(db);
  logger.info("database schema ready");

  return { logger, config, db, queue: createTaskQueue(db), closeDb: close };
}

/**
 * One dispatch pass over the enabled feeds of `runtime.config`.
 */
export function runDispatch(runtime: Runtime): Promise<DispatchSummary> {
  const { config, logger, queue } = runtime;
  return dispatchFeeds(enabledFeedUrls(config), {
    fetchFeed: createFeedFetcher(config.fetch, logger),
    submit: queue.submit,
    logger,
  });
}
