import type { Category, Classifier, RuleTable } from "./types";

const MIN_ROOT_LENGTH = 3;

/**
 * Base forms a lower-cased word may be an inflection of, the word itself first.
 * "earthquakes" → earthquake, "flooding" → flood, "quaked" → quake.
 */
export function candidateRoots(word: string): Array<string> {
  const candidates = [word];
  const add = (stem: string) => {
    if (stem.length >= MIN_ROOT_LENGTH) candidates.push(stem);
  };

  if (word.endsWith("s") && !word.endsWith("ss")) add(word.slice(0, -1));
  if (word.endsWith("es")) add(word.slice(0, -2));
  if (word.endsWith("ed")) {
    add(word.slice(0, -2));
    add(word.slice(0, -1));
  }
  if (word.endsWith("ing")) {
    add(word.slice(0, -3));
    add(`${word.slice(0, -3)}e`);
  }

  return candidates;
}

export function tokenize(text: string): Array<string> {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Reference policy: the first rule, in table order, with a root matching one of
 * the text's words decides the category.
 */
export function classifyByRules(text: string, table: RuleTable): Category {
  const forms = new Set<string>();
  for (const token of tokenize(text)) {
    for (const root of candidateRoots(token)) {
      forms.add(root);
    }
  }

  for (const rule of table.rules) {
    if (rule.roots.some((root) => forms.has(root.toLowerCase()))) {
      return rule.category;
    }
  }

  return table.defaultCategory;
}

export function createRuleClassifier(table: RuleTable): Classifier {
  return {
    classify: async (text) => classifyByRules(text, table),
  };
}
