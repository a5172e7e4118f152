import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parseQuantity } from "./ingredient-parser.js";
import { extractJsonArray, type TextGenerator } from "./llm.js";
import { silentLogger, type PluginLogger } from "./plugin-types.js";
import type { ExtractedFood } from "./types.js";

/** Free text in, candidate foods with counts out. */
export interface FoodExtractor {
  extract(text: string): Promise<ExtractedFood[]>;
}

const ajv = new Ajv({ allErrors: true, strict: false });

// ── Shared cleanup ──────────────────────────────────────────────────────────

// Longest first so "last night" goes before "night".
const TIME_MARKERS = [
  "this morning", "last night", "afternoon", "yesterday", "tomorrow",
  "morning", "evening", "today", "night", "later", "now",
];

/** Lower-case and drop time words at either end ("rice today" → "rice"). */
export function cleanEntityText(text: string): string {
  let s = text.toLowerCase().trim();
  for (const marker of TIME_MARKERS) {
    if (s.endsWith(` ${marker}`)) {
      s = s.slice(0, -(marker.length + 1)).trim();
    }
    if (s.startsWith(`${marker} `)) {
      s = s.slice(marker.length + 1).trim();
    }
  }
  return s;
}

/** Reported quantities that are not a non-negative number count as 1. */
export function toQuantity(raw: unknown): number {
  const n = typeof raw === "number" ? raw : typeof raw === "string" && raw.trim() ? Number(raw.trim()) : NaN;
  return Number.isFinite(n) && n >= 0 ? n : 1;
}

/** Union by food name, keeping the largest quantity reported for each. */
export function mergeExtractions(...lists: ExtractedFood[][]): ExtractedFood[] {
  const merged = new Map<string, number>();
  for (const list of lists) {
    for (const item of list) {
      const food = item.food.trim().toLowerCase();
      if (!food) {
        continue;
      }
      merged.set(food, Math.max(merged.get(food) ?? 0, toQuantity(item.quantity)));
    }
  }
  return [...merged].map(([food, quantity]) => ({ food, quantity }));
}

// ── Vocabulary ──────────────────────────────────────────────────────────────

const VocabularySchema = Type.Object({
  foods: Type.Array(Type.String({ minLength: 1 })),
  compounds: Type.Array(Type.String({ minLength: 1 })),
  fallbackFoods: Type.Array(Type.String({ minLength: 1 })),
});

export type FoodVocabulary = Static<typeof VocabularySchema>;

const validateVocabulary = ajv.compile<FoodVocabulary>(VocabularySchema);

export const DEFAULT_VOCABULARY_PATH = fileURLToPath(
  new URL("../data/food-vocabulary.json", import.meta.url),
);

export function loadFoodVocabulary(filePath: string = DEFAULT_VOCABULARY_PATH): FoodVocabulary {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  if (!validateVocabulary(parsed)) {
    const msg =
      validateVocabulary.errors
        ?.map((e) => `${e.instancePath || "<root>"} ${e.message || "invalid"}`)
        .join("; ") ?? "invalid";
    throw new Error(`Food vocabulary ${filePath} failed validation: ${msg}`);
  }
  return parsed;
}

// ── Rule-based extractor ────────────────────────────────────────────────────

const NUMBER_WORDS = new Map<string, number>([
  ["a", 1], ["an", 1], ["one", 1], ["two", 2], ["three", 3], ["four", 4],
  ["five", 5], ["six", 6], ["seven", 7], ["eight", 8], ["nine", 9], ["ten", 10],
  ["eleven", 11], ["twelve", 12], ["half", 0.5], ["couple", 2], ["few", 3],
]);

const FILLERS: readonly RegExp[] = [
  /\bfor (?:breakfast|brunch|lunch|dinner|supper|dessert|a snack|snack)\b/g,
  /\b(?:i|we|he|she|they)\s+(?:just\s+)?(?:had|ate|drank|have|eat|drink|got|grabbed)\b/g,
  /\b(?:had|ate|drank)\b/g,
  /\bsome\b/g,
];

const SEPARATOR_RE = /\s*(?:,|;|\+|\n|\.(?!\d)|\balong with\b|\band\b|\bwith\b|\bplus\b|\bthen\b)\s*/;
const LEADING_NUMBER_RE = /^(\d+(?:\.\d+)?(?:\/\d+)?(?:\s+\d+\/\d+)?)\s*/;
const CONTAINER_RE =
  /^(?:bowls?|glass(?:es)?|cups?|plates?|slices?|pieces?|cans?|bottles?|servings?|handfuls?|portions?|mugs?|scoops?|kg|g|grams?|ml|oz|ounces?|lbs?|pounds?|tbsp|tsp)\b\s*/;
const COMPOUND_JOINER = "\u0000";

/**
 * Keyword and pattern extractor: splits the text into segments, reads a
 * leading count ("2", "two", "a"), drops container words ("a bowl of") and
 * keeps segments that mention a known food.
 */
export class PatternFoodExtractor implements FoodExtractor {
  private readonly vocabulary: FoodVocabulary;

  constructor(vocabulary?: FoodVocabulary) {
    this.vocabulary = vocabulary ?? loadFoodVocabulary();
  }

  async extract(text: string): Promise<ExtractedFood[]> {
    return this.extractSync(text);
  }

  extractSync(text: string): ExtractedFood[] {
    let s = ` ${text.toLowerCase()} `;
    for (const compound of this.vocabulary.compounds) {
      s = s.split(compound).join(compound.replace(/ and /g, COMPOUND_JOINER));
    }
    for (const re of FILLERS) {
      s = s.replace(re, " ");
    }

    const found: ExtractedFood[] = [];
    for (const segment of s.split(SEPARATOR_RE)) {
      const item = this.parseSegment(segment.split(COMPOUND_JOINER).join(" and "));
      if (item) {
        found.push(item);
      }
    }

    if (found.length === 0) {
      const words = text.toLowerCase().split(/[^\p{L}\p{N}]+/u);
      for (const food of this.vocabulary.fallbackFoods) {
        if (words.includes(food)) {
          found.push({ food, quantity: 1 });
        }
      }
    }

    return mergeExtractions(found);
  }

  private parseSegment(segment: string): ExtractedFood | null {
    let rest = segment.replace(/\s+/g, " ").trim();
    let quantity = 1;

    const num = LEADING_NUMBER_RE.exec(rest);
    if (num?.[1]) {
      quantity = parseQuantity(num[1]);
      rest = rest.slice(num[0].length);
    } else {
      const words = rest.split(" ");
      // "a couple of", "a few"
      if ((words[0] === "a" || words[0] === "an") && words[1] && NUMBER_WORDS.has(words[1])) {
        words.shift();
      }
      const first = words[0] ?? "";
      const value = NUMBER_WORDS.get(first);
      if (value !== undefined) {
        quantity = value;
        rest = words.slice(1).join(" ");
      }
    }

    rest = rest.replace(/^of\s+/, "").replace(CONTAINER_RE, "").replace(/^of\s+/, "");
    rest = rest.replace(/^(?:the|a|an|my)\s+/, "");
    const name = cleanEntityText(rest.replace(/[^\p{L}\p{N}\s&'-]/gu, " ").replace(/\s+/g, " "));

    if (name.length < 2 || !this.vocabulary.foods.some((f) => name.includes(f))) {
      return null;
    }
    return { food: name, quantity };
  }
}

// ── Generative extractor ────────────────────────────────────────────────────

const ExtractedItemSchema = Type.Object({
  food: Type.String({ minLength: 1 }),
  // Any shape; toQuantity turns what is not a number into 1.
  quantity: Type.Optional(Type.Unknown()),
});

const validateExtractedItem = ajv.compile<Static<typeof ExtractedItemSchema>>(ExtractedItemSchema);

export function buildExtractionPrompt(text: string): string {
  return [
    "Extract food items and their respective quantities from this text:",
    JSON.stringify(text),
    "",
    "Rules:",
    '1. Only extract food items (ignore modifiers like "with", "on", "along with").',
    "2. If the quantity is unclear, assume it is 1.",
    '3. Output a clean JSON format with only "food" and "quantity" fields.',
    "",
    "Return in the format:",
    '[{"food": "food_name", "quantity": quantity}, {"food": "food_name", "quantity": quantity}]',
  ].join("\n");
}

export class LlmFoodExtractor implements FoodExtractor {
  private readonly generator: TextGenerator;
  private readonly logger: PluginLogger;

  constructor(generator: TextGenerator, logger: PluginLogger = silentLogger) {
    this.generator = generator;
    this.logger = logger;
  }

  async extract(text: string): Promise<ExtractedFood[]> {
    let output: string;
    try {
      output = await this.generator.generate(buildExtractionPrompt(text));
    } catch (err) {
      this.logger.warn(`meal-analyzer: food extraction failed: ${String(err)}`);
      return [];
    }

    const arr = extractJsonArray(output);
    if (!arr) {
      this.logger.warn("meal-analyzer: food extraction returned no JSON array");
      return [];
    }

    const items: ExtractedFood[] = [];
    for (const raw of arr) {
      if (!validateExtractedItem(raw)) {
        continue;
      }
      const food = cleanEntityText(raw.food);
      if (food.length >= 2) {
        items.push({ food, quantity: toQuantity(raw.quantity) });
      }
    }
    return items;
  }
}
