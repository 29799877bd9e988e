import { describe, it, expect, vi } from "vitest";

vi.mock("../llm/providers", () => ({
  getModel: vi.fn(() => "resolved-model"),
}));

vi.mock("./llm", () => ({
  createLlmClassifier: vi.fn(() => ({ classify: vi.fn() })),
}));

// Import after mocking
import { getModel } from "../llm/providers";
import { createLlmClassifier } from "./llm";
import { createClassifier } from "./index";

describe("createClassifier", () => {
  it("should build the rule classifier from its table", async () => {
    const classifier = createClassifier({
      kind: "rules",
      defaultCategory: "Unsorted",
      rules: [{ category: "Sport", roots: ["match"] }],
    });

    await expect(classifier.classify("The matches were postponed")).resolves.toBe("Sport");
    await expect(classifier.classify("unrelated content")).resolves.toBe("Unsorted");
  });

  it("should build an LLM classifier for the configured provider and labels", () => {
    createClassifier({
      kind: "llm",
      provider: "ollama",
      model: "llama3",
      categories: ["Terrorism", "NaturalDisasters"],
      defaultCategory: "Other",
    });

    expect(getModel).toHaveBeenCalledWith("ollama", "llama3");
    expect(createLlmClassifier).toHaveBeenCalledWith("resolved-model", {
      categories: ["Terrorism", "NaturalDisasters"],
      defaultCategory: "Other",
    });
  });
});
