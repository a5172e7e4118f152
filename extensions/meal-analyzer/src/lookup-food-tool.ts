import { Type } from "@sinclair/typebox";
import type { NutritionResolver } from "./nutrition-resolver.js";
import type { PluginTool } from "./plugin-types.js";
import { formatNutrition } from "./summary.js";
import type { IngredientRecord } from "./types.js";

export function createLookupFoodTool(nutrition: NutritionResolver): PluginTool<{ item: IngredientRecord }> {
  return {
    name: "lookup_food_nutrition",
    description:
      "Look up calories, protein, fat and carbs for one food at a given quantity. Without a unit the quantity counts 100 g servings.",
    parameters: Type.Object({
      food: Type.String({ description: "Food name (e.g. 'chicken breast')." }),
      quantity: Type.Optional(
        Type.Number({ description: "Amount in the given unit. Defaults to 1." }),
      ),
      unit: Type.Optional(
        Type.String({ description: "Unit such as g, kg, oz, lb, cup, tbsp, tsp, ml, piece, slice." }),
      ),
    }),

    async execute(_id: string, params: Record<string, unknown>) {
      const food = typeof params.food === "string" ? params.food.trim().toLowerCase() : "";
      if (!food) {
        throw new Error("food required");
      }

      const quantity =
        typeof params.quantity === "number" && Number.isFinite(params.quantity) ? params.quantity : 1;
      if (quantity < 0) {
        throw new Error("quantity must be non-negative");
      }
      const unit = typeof params.unit === "string" ? params.unit.trim().toLowerCase() : "";

      const result = await nutrition.resolve(food, quantity, unit);
      const item: IngredientRecord = { foodName: food, quantity, unit, nutrition: result };

      return {
        content: [
          {
            type: "text",
            text: `${food} (${unit ? `${quantity} ${unit}` : `${quantity} × 100g`}): ${formatNutrition(result)}`,
          },
        ],
        details: { item },
      };
    },
  };
}
