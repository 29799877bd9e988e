import { bootstrap, runDispatch } from "./runtime";

/**
 * Dispatch run: fetches every enabled feed once, enqueues one task per entry,
 * and exits. Feed and entry failures are logged; they do not change the exit code.
 */
async function main(): Promise<void> {
  const runtime = bootstrap("dispatch");
  const { logger } = runtime;

  try {
    const summary = await runDispatch(runtime);
    logger.info({ ...summary, queue: runtime.queue.stats() }, "dispatch run finished");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "dispatch run aborted");
  } finally {
    runtime.closeDb();
  }

  process.exit(0);
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
