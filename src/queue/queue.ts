import { and, asc, count, eq, lt, lte } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { tasks } from "../db/schema";
import type { TaskStatus } from "../db/schema";

export type ClaimedTask = {
  readonly id: number;
  readonly name: string;
  readonly payload: unknown;
  readonly attempts: number;
};

export type TaskQueue = {
  readonly submit: (name: string, payload: unknown) => number;
  readonly claimDue: (limit: number) => Array<ClaimedTask>;
  readonly complete: (
    id: number,
    status: "succeeded" | "skipped",
    attempts: number,
  ) => void;
  readonly retryLater: (
    id: number,
    attempts: number,
    delayMs: number,
    error: string,
  ) => void;
  readonly deadLetter: (id: number, attempts: number, error: string) => void;
  readonly release: (id: number, attempts: number, error: string) => void;
  readonly recoverStale: (leaseMs: number) => number;
  readonly stats: () => Record<TaskStatus, number>;
};

export type TaskQueueOptions = {
  readonly now?: () => Date;
};

/**
 * Durable at-least-once task queue kept in the `tasks` table.
 *
 * A task is `pending` until claimed, `running` while a worker holds it, and ends
 * `succeeded`, `skipped` or `permanently_failed`. Retries go back to `pending` with
 * a later `run_after`; nothing waits in memory for them.
 *
 * Claiming stamps `updated_at`, which doubles as the lease start: a `running` row
 * untouched for longer than the lease belongs to a worker that died or lost its
 * database connection, and `recoverStale` hands it out again.
 */
export function createTaskQueue(
  db: AppDatabase,
  options: TaskQueueOptions = {},
): TaskQueue {
  const now = options.now ?? (() => new Date());

  return {
    submit: (name, payload) => {
      const at = now();
      const row = db
        .insert(tasks)
        .values({
          name,
          payload,
          status: "pending",
          attempts: 0,
          runAfter: at,
          createdAt: at,
          updatedAt: at,
        })
        .returning({ id: tasks.id })
        .get();
      return row.id;
    },

    claimDue: (limit) =>
      db.transaction((tx) => {
        const at = now();
        const due = tx
          .select({
            id: tasks.id,
            name: tasks.name,
            payload: tasks.payload,
            attempts: tasks.attempts,
          })
          .from(tasks)
          .where(and(eq(tasks.status, "pending"), lte(tasks.runAfter, at)))
          .orderBy(asc(tasks.runAfter), asc(tasks.id))
          .limit(limit)
          .all();

        for (const task of due) {
          tx.update(tasks)
            .set({ status: "running", updatedAt: at })
            .where(eq(tasks.id, task.id))
            .run();
        }

        return due;
      }),

    complete: (id, status, attempts) => {
      db.update(tasks)
        .set({ status, attempts, lastError: null, updatedAt: now() })
        .where(eq(tasks.id, id))
        .run();
    },

    retryLater: (id, attempts, delayMs, error) => {
      const at = now();
      db.update(tasks)
        .set({
          status: "pending",
          attempts,
          lastError: error,
          runAfter: new Date(at.getTime() + delayMs),
          updatedAt: at,
        })
        .where(eq(tasks.id, id))
        .run();
    },

    deadLetter: (id, attempts, error) => {
      db.update(tasks)
        .set({
          status: "permanently_failed",
          attempts,
          lastError: error,
          updatedAt: now(),
        })
        .where(eq(tasks.id, id))
        .run();
    },

    release: (id, attempts, error) => {
      db.update(tasks)
        .set({ status: "pending", attempts, lastError: error, updatedAt: now() })
        .where(and(eq(tasks.id, id), eq(tasks.status, "running")))
        .run();
    },

    recoverStale: (leaseMs) => {
      const at = now();
      const expired = new Date(at.getTime() - leaseMs);
      const recovered = db
        .update(tasks)
        .set({ status: "pending", updatedAt: at })
        .where(and(eq(tasks.status, "running"), lt(tasks.updatedAt, expired)))
        .returning({ id: tasks.id })
        .all();
      return recovered.length;
    },

    stats: () => {
      const totals: Record<TaskStatus, number> = {
        pending: 0,
        running: 0,
        succeeded: 0,
        skipped: 0,
        permanently_failed: 0,
      };

      const rows = db
        .select({ status: tasks.status, total: count() })
        .from(tasks)
        .groupBy(tasks.status)
        .all();

      for (const row of rows) {
        totals[row.status] = row.total;
      }
      return totals;
    },
  };
}
