import { round2, scaleNutrition } from "./nutrition-math.js";
import type { NutritionValues } from "./types.js";

const HEURISTIC_MAX_FACTOR = 8;

// Per-100g guesses by keyword group, first hit wins.
const HEURISTIC_GROUPS: ReadonlyArray<{ words: readonly string[]; per100g: NutritionValues }> = [
  {
    words: ["chicken", "beef", "pork", "fish", "meat"],
    per100g: { calories: 180, protein: 25, fat: 10, carbs: 0 },
  },
  {
    words: ["rice", "pasta", "noodle", "bread"],
    per100g: { calories: 130, protein: 4, fat: 1, carbs: 25 },
  },
  {
    words: ["vegetable", "carrot", "broccoli", "spinach"],
    per100g: { calories: 30, protein: 2, fat: 0.3, carbs: 6 },
  },
  {
    words: ["fruit", "apple", "orange", "banana"],
    per100g: { calories: 60, protein: 0.8, fat: 0.2, carbs: 15 },
  },
  {
    words: ["cheese", "milk", "yogurt", "cream", "dairy"],
    per100g: { calories: 130, protein: 7, fat: 9, carbs: 5 },
  },
];

const GENERIC_PER_100G: NutritionValues = { calories: 100, protein: 5, fat: 5, carbs: 10 };

export function heuristicPer100g(foodName: string): NutritionValues {
  const food = foodName.toLowerCase();
  const group = HEURISTIC_GROUPS.find((g) => g.words.some((w) => food.includes(w)));
  return group?.per100g ?? GENERIC_PER_100G;
}

/** Last-resort estimate when neither the table nor the lookup knows the food. */
export function estimateNutrition(foodName: string, factor: number): NutritionValues {
  const clamped = Math.min(factor, HEURISTIC_MAX_FACTOR);
  return round2(scaleNutrition(heuristicPer100g(foodName), clamped));
}
