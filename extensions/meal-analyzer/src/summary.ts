import { round2, sumNutrition } from "./nutrition-math.js";
import { ZERO_NUTRITION, type IngredientRecord, type MealResult, type NutritionValues } from "./types.js";

/** Whole-meal totals for any result shape. */
export function mealTotals(result: MealResult): NutritionValues {
  switch (result.type) {
    case "dish":
    case "multiple":
      return { ...result.totalNutrition };
    case "single":
      return { ...result.item.nutrition };
    case "combined":
      return round2(
        sumNutrition([
          ...result.dishes.map((d) => d.totalNutrition),
          ...result.standaloneItems.map((i) => i.nutrition),
        ]),
      );
    case "unresolved":
      return { ...ZERO_NUTRITION };
  }
}

export function formatNutrition(n: NutritionValues): string {
  return `${n.calories} cal, ${n.protein}g protein, ${n.fat}g fat, ${n.carbs}g carbs`;
}

function itemLine(item: IngredientRecord): string {
  const amount = item.unit ? `${item.quantity} ${item.unit}` : `${item.quantity}`;
  return `  • ${item.foodName} (${amount}): ${formatNutrition(item.nutrition)}`;
}

/** Plain-text breakdown for chat replies. */
export function formatMealResult(result: MealResult): string {
  switch (result.type) {
    case "unresolved":
      return "No food recognized in that description. Try listing what you ate, e.g. '2 eggs and a slice of toast'.";
    case "dish":
      return [
        `🍽️ ${result.dishName} [${result.source}]${result.adjusted ? " (scaled to a typical serving)" : ""}`,
        ...result.ingredients.map(itemLine),
        `Total: ${formatNutrition(result.totalNutrition)}`,
      ].join("\n");
    case "single":
      return [itemLine(result.item), `Total: ${formatNutrition(result.item.nutrition)}`].join("\n");
    case "multiple":
      return [...result.items.map(itemLine), `Total: ${formatNutrition(result.totalNutrition)}`].join("\n");
    case "combined":
      return [
        ...result.dishes.map(
          (d) => `🍽️ ${d.dishName} [${d.source}]: ${formatNutrition(d.totalNutrition)}`,
        ),
        ...result.standaloneItems.map(itemLine),
        `Total: ${formatNutrition(mealTotals(result))}`,
      ].join("\n");
  }
}
