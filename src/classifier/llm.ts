// pattern: imperative-shell
import { generateObject } from "ai";
import type { LanguageModel } from "ai";
import type { Category, Classifier } from "./types";

export type LlmClassifierOptions = {
  readonly categories: ReadonlyArray<Category>;
  readonly defaultCategory: Category;
  readonly maxTextLength?: number;
};

const SYSTEM_PROMPT =
  "You are a news classifier. Read the article text and answer with exactly one of the allowed categories. Use the fallback category when none of the others fits.";

/**
 * Classifier backed by a language model. The model is restricted to the
 * configured labels plus the default. SDK errors propagate to the caller,
 * which treats them as transient.
 */
export function createLlmClassifier(
  model: LanguageModel,
  options: LlmClassifierOptions,
): Classifier {
  const labels = Array.from(
    new Set([...options.categories, options.defaultCategory]),
  );
  const maxTextLength = options.maxTextLength ?? 4000;

  return {
    classify: async (text) => {
      const { object } = await generateObject({
        model,
        output: "enum",
        enum: labels,
        system: SYSTEM_PROMPT,
        prompt: `Allowed categories: ${labels.join(", ")}\nFallback category: ${options.defaultCategory}\n\nArticle:\n${text.substring(0, maxTextLength)}`,
      });
      return object;
    },
  };
}
