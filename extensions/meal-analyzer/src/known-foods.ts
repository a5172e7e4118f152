import type { NutritionValues } from "./types.js";

export type KnownFoodEntry = {
  key: string;
  per100g: NutritionValues;
  serving?: ServingRule;
};

/**
 * Serving override for one entry, e.g. one 330 ml can for colas. It applies
 * only when every word occurs in the food name itself, so "cheese" alone
 * does not get a bowl of mac and cheese.
 */
export type ServingRule = {
  words: readonly string[];
  defaultFactor: number;
  maxFactor?: number;
};

const COLA = { calories: 37.5, protein: 0, fat: 0, carbs: 10.6 };
const MAC_AND_CHEESE = { calories: 164, protein: 8.5, fat: 6.3, carbs: 17.8 };

function can(...words: string[]): ServingRule {
  return { words, defaultFactor: 3.3, maxFactor: 10 };
}

const BOWL: ServingRule = { words: ["mac", "cheese"], defaultFactor: 2.5 };

// ── Curated table ───────────────────────────────────────────────────────────
// Order matters: the first entry that matches wins.

export const KNOWN_FOODS: ReadonlyArray<Readonly<KnownFoodEntry>> = Object.freeze([
  // Beverages
  { key: "coke", per100g: COLA, serving: can("coke") },
  { key: "cola", per100g: COLA, serving: can("cola") },
  { key: "coca-cola", per100g: COLA, serving: can("cola") },
  { key: "pepsi", per100g: { calories: 41, protein: 0, fat: 0, carbs: 11 }, serving: can("pepsi") },

  // Dishes
  { key: "mac and cheese", per100g: MAC_AND_CHEESE, serving: BOWL },
  { key: "macaroni and cheese", per100g: MAC_AND_CHEESE, serving: BOWL },
  { key: "mac & cheese", per100g: MAC_AND_CHEESE, serving: BOWL },

  // Common ingredients
  { key: "chicken", per100g: { calories: 165, protein: 31, fat: 3.6, carbs: 0 } },
  { key: "beef", per100g: { calories: 250, protein: 26, fat: 17, carbs: 0 } },
  { key: "fish", per100g: { calories: 136, protein: 20, fat: 5, carbs: 0 } },
  { key: "rice", per100g: { calories: 130, protein: 2.7, fat: 0.3, carbs: 28 } },
  { key: "pasta", per100g: { calories: 131, protein: 5, fat: 1.1, carbs: 25 } },
  { key: "bread", per100g: { calories: 265, protein: 9, fat: 3.2, carbs: 49 } },
]);

/** The entry's serving override, when its words all occur in the food name. */
export function servingFor(entry: Readonly<KnownFoodEntry>, foodName: string): ServingRule | undefined {
  const food = foodName.trim().toLowerCase();
  const rule = entry.serving;
  return rule && rule.words.every((w) => food.includes(w)) ? rule : undefined;
}

/**
 * First entry whose key contains the name or is contained in it
 * (case-insensitive). Blank names never match.
 */
export function findKnownFood(name: string): Readonly<KnownFoodEntry> | undefined {
  const food = name.trim().toLowerCase();
  if (!food) {
    return undefined;
  }
  return KNOWN_FOODS.find((entry) => entry.key.includes(food) || food.includes(entry.key));
}
