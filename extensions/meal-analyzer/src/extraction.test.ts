import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildExtractionPrompt,
  cleanEntityText,
  LlmFoodExtractor,
  loadFoodVocabulary,
  mergeExtractions,
  PatternFoodExtractor,
  toQuantity,
} from "./extraction.js";

describe("cleanEntityText", () => {
  it("drops time words at either end", () => {
    expect(cleanEntityText("Pancakes this morning")).toBe("pancakes");
    expect(cleanEntityText("today rice")).toBe("rice");
    expect(cleanEntityText("last night pizza")).toBe("pizza");
    expect(cleanEntityText("ice cream later")).toBe("ice cream");
  });

  it("keeps time words inside a name", () => {
    expect(cleanEntityText("overnight oats")).toBe("overnight oats");
  });
});

describe("toQuantity", () => {
  it("accepts non-negative numbers and numeric strings", () => {
    expect(toQuantity(2)).toBe(2);
    expect(toQuantity(" 3 ")).toBe(3);
    expect(toQuantity(0)).toBe(0);
  });

  it("defaults everything else to 1", () => {
    expect(toQuantity("2 cups")).toBe(1);
    expect(toQuantity(-1)).toBe(1);
    expect(toQuantity(null)).toBe(1);
    expect(toQuantity("")).toBe(1);
  });
});

describe("mergeExtractions", () => {
  it("unions by name, keeping the larger quantity", () => {
    expect(
      mergeExtractions(
        [
          { food: "Eggs", quantity: 2 },
          { food: "toast", quantity: 1 },
        ],
        [
          { food: "eggs", quantity: 3 },
          { food: "coffee", quantity: 1 },
        ],
      ),
    ).toEqual([
      { food: "eggs", quantity: 3 },
      { food: "toast", quantity: 1 },
      { food: "coffee", quantity: 1 },
    ]);
  });
});

describe("loadFoodVocabulary", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "meal-analyzer-vocab-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loads the bundled vocabulary", () => {
    const vocab = loadFoodVocabulary();
    expect(vocab.foods).toContain("rice");
    expect(vocab.compounds).toContain("mac and cheese");
  });

  it("rejects malformed files", () => {
    const file = path.join(tmpDir, "vocab.json");
    fs.writeFileSync(file, JSON.stringify({ foods: "rice", compounds: [], fallbackFoods: [] }));
    expect(() => loadFoodVocabulary(file)).toThrow(/failed validation/);
  });
});

describe("PatternFoodExtractor", () => {
  const extractor = new PatternFoodExtractor();

  it("reads number words and container phrases", async () => {
    expect(await extractor.extract("I had two eggs and a glass of orange juice for breakfast")).toEqual([
      { food: "eggs", quantity: 2 },
      { food: "orange juice", quantity: 1 },
    ]);
  });

  it("keeps multi-word dishes together", async () => {
    expect(await extractor.extract("chicken curry and a coke")).toEqual([
      { food: "chicken curry", quantity: 1 },
      { food: "coke", quantity: 1 },
    ]);
  });

  it("does not split compound dish names on 'and'", async () => {
    expect(await extractor.extract("mac and cheese with 2 slices of bread")).toEqual([
      { food: "mac and cheese", quantity: 1 },
      { food: "bread", quantity: 2 },
    ]);
  });

  it("parses mixed-number quantities", async () => {
    expect(await extractor.extract("1 1/2 cups of rice")).toEqual([{ food: "rice", quantity: 1.5 }]);
  });

  it("strips time words and punctuation", async () => {
    expect(await extractor.extract("yesterday: pizza!!")).toEqual([{ food: "pizza", quantity: 1 }]);
  });

  it("returns nothing for text without food", async () => {
    expect(await extractor.extract("went for a run")).toEqual([]);
  });

  it("scans for fallback foods when no segment matches", () => {
    const custom = new PatternFoodExtractor({ foods: ["pizza"], compounds: [], fallbackFoods: ["rice"] });
    expect(custom.extractSync("rice please")).toEqual([{ food: "rice", quantity: 1 }]);
  });
});

describe("LlmFoodExtractor", () => {
  it("validates and cleans generated items", async () => {
    const generator = {
      generate: vi.fn(
        async (_prompt: string) =>
          '```json\n[{"food": "Eggs today", "quantity": "2"}, {"food": "toast"}, {"quantity": 3}, {"food": "x", "quantity": 1}]\n```',
      ),
    };
    const extractor = new LlmFoodExtractor(generator);

    expect(await extractor.extract("two eggs and toast today")).toEqual([
      { food: "eggs", quantity: 2 },
      { food: "toast", quantity: 1 },
    ]);
    expect(generator.generate).toHaveBeenCalledWith(buildExtractionPrompt("two eggs and toast today"));
  });

  it("keeps items whose quantity is not a number", async () => {
    const generator = {
      generate: vi.fn(
        async (_prompt: string) =>
          '[{"food": "toast", "quantity": null}, {"food": "eggs", "quantity": true}, {"food": "jam", "quantity": {"n": 2}}]',
      ),
    };

    expect(await new LlmFoodExtractor(generator).extract("toast, eggs and jam")).toEqual([
      { food: "toast", quantity: 1 },
      { food: "eggs", quantity: 1 },
      { food: "jam", quantity: 1 },
    ]);
  });

  it("embeds the description in the prompt", () => {
    expect(buildExtractionPrompt('a "big" salad')).toContain('"a \\"big\\" salad"');
  });

  it("returns nothing when generation fails", async () => {
    const logger = { debug() {}, info() {}, warn: vi.fn(), error() {} };
    const failing = {
      generate: vi.fn(async (_prompt: string): Promise<string> => {
        throw new Error("model not found");
      }),
    };

    expect(await new LlmFoodExtractor(failing, logger).extract("rice")).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("meal-analyzer: food extraction failed: Error: model not found");
  });
});
