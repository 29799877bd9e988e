/**
 * A classification label. The set is open: whatever the configured rule table or
 * model produces.
 */
export type Category = string;

/**
 * Text-analysis capability the processing task depends on. Implementations are
 * interchangeable; the pipeline only sees this shape.
 */
export type Classifier = {
  readonly classify: (text: string) => Promise<Category>;
};

export type RuleTable = {
  readonly defaultCategory: Category;
  readonly rules: ReadonlyArray<{
    readonly category: Category;
    readonly roots: ReadonlyArray<string>;
  }>;
};
