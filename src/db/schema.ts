import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const articles = sqliteTable("articles", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  title: text("title").notNull(),
  summary: text("summary").notNull(),
  pubDate: integer("pub_date", { mode: "timestamp" }).notNull(),
  sourceUrl: text("source_url").notNull().unique(),
  category: text("category").notNull(),
  createdAt: integer("created_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

const TASK_STATUSES = [
  "pending",
  "running",
  "succeeded",
  "skipped",
  "permanently_failed",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const tasks = sqliteTable(
  "tasks",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    payload: text("payload", { mode: "json" }).$type<unknown>().notNull(),
    status: text("status", { enum: TASK_STATUSES })
      .notNull()
      .default("pending"),
    attempts: integer("attempts").notNull().default(0),
    runAfter: integer("run_after", { mode: "timestamp_ms" }).notNull(),
    lastError: text("last_error"),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    statusRunAfterIdx: index("tasks_status_run_after_idx").on(
      table.status,
      table.runAfter,
    ),
  }),
);

export type ArticleRow = typeof articles.$inferSelect;
