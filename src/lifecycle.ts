// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Anything that produces work against the database: the dispatch scheduler, the
 * queue worker. `stop()` resolves once the work it had already started is done.
 */
export type Stoppable = {
  readonly name: string;
  readonly stop: () => void | Promise<void>;
};

export type ShutdownDeps = {
  readonly stoppables: ReadonlyArray<Stoppable>;
  readonly closeDb: () => void;
  readonly logger: Logger;
  /** Upper bound on waiting for in-flight work before the database is closed anyway. */
  readonly drainTimeoutMs?: number;
};

const DEFAULT_DRAIN_TIMEOUT_MS = 30_000;

type DrainResult = "drained" | "timed_out";

function drainWithin(work: Promise<unknown>, timeoutMs: number): Promise<DrainResult> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<DrainResult>((resolve) => {
    timer = setTimeout(() => resolve("timed_out"), timeoutMs);
  });
  const drained = work.then((): DrainResult => "drained");
  return Promise.race([drained, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Graceful shutdown on SIGTERM/SIGINT.
 *
 * Every stoppable is told to stop first, so nothing new is claimed or
 * dispatched; then shutdown waits (bounded by `drainTimeoutMs`) for their
 * in-flight tasks to record an outcome, and only then closes the database.
 * Tasks still running when the timeout hits keep their lease and are
 * redelivered by the next worker.
 *
 * Returns the shutdown routine so callers can trigger it directly; a second
 * signal while shutting down gets the same promise.
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
): (signal: string) => Promise<void> {
  const { logger } = deps;
  const drainTimeoutMs = deps.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
  let shutdown: Promise<void> | null = null;

  const stopOne = async (stoppable: Stoppable): Promise<void> => {
    try {
      await stoppable.stop();
      logger.info({ component: stoppable.name }, "stopped");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ component: stoppable.name, error: message }, "error during stop");
    }
  };

  const run = async (signal: string): Promise<void> => {
    logger.info({ signal }, "shutdown signal received");

    const result = await drainWithin(
      Promise.all(deps.stoppables.map(stopOne)),
      drainTimeoutMs,
    );
    if (result === "timed_out") {
      logger.warn({ drainTimeoutMs }, "in-flight work did not finish, closing database anyway");
    }

    try {
      deps.closeDb();
      logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "error closing database");
    }

    logger.info("shutdown complete");
    process.exit(0);
  };

  const trigger = (signal: string): Promise<void> => {
    shutdown ??= run(signal);
    return shutdown;
  };

  const onSignal = (signal: string) => {
    trigger(signal).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      logger.fatal({ error: message }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  return trigger;
}
