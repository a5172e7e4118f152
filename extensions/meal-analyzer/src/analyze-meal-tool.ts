import { Type } from "@sinclair/typebox";
import type { MealAnalyzer } from "./meal-analyzer.js";
import type { PluginTool } from "./plugin-types.js";
import { formatMealResult, mealTotals } from "./summary.js";
import type { MealResult, NutritionValues } from "./types.js";

export type AnalyzeMealDetails = {
  result: MealResult;
  totals: NutritionValues;
};

// ── Tool factory ────────────────────────────────────────────────────────────

export function createAnalyzeMealTool(analyzer: MealAnalyzer): PluginTool<AnalyzeMealDetails> {
  return {
    name: "analyze_meal",
    description:
      "Estimate calories, protein, fat and carbs for a natural language meal description. Dishes are broken into ingredients (stored recipe or generated list); single foods are looked up directly. Returns a per-item breakdown and meal totals.",
    parameters: Type.Object({
      description: Type.String({
        description:
          "Natural language description of the meal (e.g. 'a bowl of chicken curry and a coke')",
      }),
      useStandardRecipe: Type.Optional(
        Type.Boolean({
          description:
            "Break dishes into standard recipe ingredients. Set false to resolve every named food on its own. Defaults to true.",
        }),
      ),
    }),

    async execute(_id: string, params: Record<string, unknown>) {
      const description = typeof params.description === "string" ? params.description.trim() : "";
      if (!description) {
        throw new Error("description required");
      }
      const useStandardRecipe =
        typeof params.useStandardRecipe === "boolean" ? params.useStandardRecipe : true;

      const result = await analyzer.analyze(description, useStandardRecipe);
      const totals = mealTotals(result);

      return {
        content: [{ type: "text", text: formatMealResult(result) }],
        details: { result, totals },
      };
    },
  };
}
