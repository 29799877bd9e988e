import { z } from "zod";

const feedConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  enabled: z.boolean().default(true),
});

const classificationRuleSchema = z.object({
  category: z.string().min(1),
  roots: z.array(z.string().min(1)).min(1),
});

export const DEFAULT_CLASSIFICATION_RULES = [
  { category: "Terrorism", roots: ["terror"] },
  { category: "NaturalDisasters", roots: ["earthquake"] },
];

const rulesClassifierSchema = z.object({
  kind: z.literal("rules"),
  defaultCategory: z.string().min(1).default("Other"),
  rules: z.array(classificationRuleSchema).default(DEFAULT_CLASSIFICATION_RULES),
});

const llmClassifierSchema = z.object({
  kind: z.literal("llm"),
  provider: z.enum(["anthropic", "openai", "gemini", "ollama", "lmstudio"]),
  model: z.string().min(1),
  categories: z.array(z.string().min(1)).min(1),
  defaultCategory: z.string().min(1).default("Other"),
});

export const appConfigSchema = z.object({
  feeds: z.array(feedConfigSchema).min(1),
  classifier: z
    .discriminatedUnion("kind", [rulesClassifierSchema, llmClassifierSchema])
    .default({ kind: "rules" }),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(15000),
      userAgent: z.string().min(1).default("news-ingest/1.0 (feed fetcher)"),
    })
    .default({}),
  queue: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      retryDelaySeconds: z.number().int().nonnegative().default(10),
      concurrency: z.number().int().positive().default(4),
      pollIntervalMs: z.number().int().positive().default(1000),
      batchSize: z.number().int().positive().default(20),
      // must exceed the longest classify + insert a task can take
      leaseSeconds: z.number().int().positive().default(300),
    })
    .default({}),
  schedule: z
    .object({
      dispatch: z.string().min(1).optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ClassifierConfig = AppConfig["classifier"];
export type ClassificationRule = z.infer<typeof classificationRuleSchema>;
export type LlmProvider = z.infer<typeof llmClassifierSchema>["provider"];
