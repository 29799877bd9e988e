import type { ClassifierConfig } from "../config";
import { getModel } from "../llm/providers";
import { createLlmClassifier } from "./llm";
import { createRuleClassifier } from "./rules";
import type { Classifier } from "./types";

export function createClassifier(config: ClassifierConfig): Classifier {
  switch (config.kind) {
    case "rules":
      return createRuleClassifier({
        defaultCategory: config.defaultCategory,
        rules: config.rules,
      });
    case "llm":
      return createLlmClassifier(getModel(config.provider, config.model), {
        categories: config.categories,
        defaultCategory: config.defaultCategory,
      });
    default: {
      const _exhaustive: never = config;
      throw new Error(`unknown classifier: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export { candidateRoots, classifyByRules, createRuleClassifier, tokenize } from "./rules";
export { createLlmClassifier } from "./llm";
export type { Category, Classifier, RuleTable } from "./types";
