import type { CategoryProfile, FoodCategory } from "./types.js";

// ── Keyword lists (checked in this order, first hit wins) ──────────────────

const CATEGORY_KEYWORDS: ReadonlyArray<readonly [FoodCategory, readonly string[]]> = [
  ["meat", ["chicken", "beef", "pork", "fish", "meat", "turkey"]],
  ["grain", ["rice", "pasta", "noodle", "bread", "cereal", "grain"]],
  ["vegetable", ["vegetable", "carrot", "broccoli", "spinach", "lettuce"]],
  ["fruit", ["fruit", "apple", "orange", "banana", "berry"]],
  ["dairy", ["milk", "cheese", "yogurt", "cream", "dairy"]],
  ["oil", ["oil", "butter", "margarine", "lard"]],
  ["beverage", ["drink", "beverage", "water", "juice", "soda", "coke", "cola"]],
];

// ── Profiles ────────────────────────────────────────────────────────────────
// Empirical bounds; tune here rather than at the call sites.

export const CATEGORY_PROFILES: Readonly<Record<FoodCategory, CategoryProfile>> = Object.freeze({
  meat: { category: "meat", calorieRange: [100, 300], maxServingFactor: 5 },
  grain: { category: "grain", calorieRange: [100, 200], maxServingFactor: 8 },
  vegetable: { category: "vegetable", calorieRange: [20, 80], maxServingFactor: 10 },
  fruit: { category: "fruit", calorieRange: [40, 100], maxServingFactor: 6 },
  dairy: { category: "dairy", calorieRange: [50, 400], maxServingFactor: 8 },
  oil: { category: "oil", calorieRange: [800, 900], maxServingFactor: 2 },
  beverage: { category: "beverage", calorieRange: [0, 50], maxServingFactor: 15 },
  unknown: { category: "unknown", calorieRange: [50, 300], maxServingFactor: 10 },
});

/**
 * Coarse category for a food. Name keywords decide first; the calorie
 * density only matters when no keyword matches.
 */
export function classifyFood(foodName: string, caloriesPer100g: number): FoodCategory {
  const food = foodName.toLowerCase();
  for (const [category, words] of CATEGORY_KEYWORDS) {
    if (words.some((w) => food.includes(w))) {
      return category;
    }
  }

  if (caloriesPer100g > 800) return "oil";
  if (caloriesPer100g > 300) return "meat";
  if (caloriesPer100g > 200) return "grain";
  if (caloriesPer100g < 30) return "vegetable";
  return "unknown";
}

export function maxServingFactor(category: FoodCategory): number {
  return CATEGORY_PROFILES[category].maxServingFactor;
}

export function calorieRange(category: FoodCategory): readonly [number, number] {
  return CATEGORY_PROFILES[category].calorieRange;
}
