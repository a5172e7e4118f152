import { calorieRange, classifyFood, maxServingFactor } from "./food-category.js";
import { estimateNutrition } from "./heuristics.js";
import { findKnownFood, servingFor } from "./known-foods.js";
import { clampNonNegative, round2, scaleNutrition } from "./nutrition-math.js";
import { silentLogger, type PluginLogger } from "./plugin-types.js";
import { ZERO_NUTRITION, type NutritionValues } from "./types.js";
import { toGrams } from "./units.js";
import type { NutritionLookup } from "./usda.js";

/** Names that never carry macros, whatever the quantity. */
export const ZERO_CALORIE_ALIASES: ReadonlySet<string> = new Set([
  "ice",
  "ice cube",
  "ice cubes",
  "water",
  "冰",
  "冰块",
]);

// An external figure below LOW × range min or above HIGH × range max is treated as a data error.
const OUTLIER_LOW = 0.5;
const OUTLIER_HIGH = 2;

export type NutritionResolverOptions = {
  lookup?: NutritionLookup;
  logger?: PluginLogger;
};

/**
 * Layered nutrition resolution: known-food table, then the external lookup,
 * then keyword heuristics. Always produces four non-negative figures.
 */
export class NutritionResolver {
  private readonly lookup: NutritionLookup | undefined;
  private readonly logger: PluginLogger;

  constructor(options: NutritionResolverOptions = {}) {
    this.lookup = options.lookup;
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(foodName: string, quantity: number, unit = ""): Promise<NutritionValues> {
    const food = foodName.trim().toLowerCase();
    if (ZERO_CALORIE_ALIASES.has(food)) {
      return { ...ZERO_NUTRITION };
    }

    const amount = Number.isFinite(quantity) && quantity > 0 ? quantity : 0;
    const grams = unit ? toGrams(amount, unit) : amount * 100;
    let factor = grams / 100;

    // ── Known foods ───────────────────────────────────────────────────────
    const known = findKnownFood(food);
    if (known) {
      const serving = servingFor(known, food);
      if (serving) {
        if (!unit) {
          factor = serving.defaultFactor;
        }
        if (serving.maxFactor !== undefined) {
          factor = Math.min(factor, serving.maxFactor);
        }
      }
      this.logger.debug(`meal-analyzer: "${food}" matched known food "${known.key}"`);
      return clampNonNegative(round2(scaleNutrition(known.per100g, factor)));
    }

    // ── External lookup ───────────────────────────────────────────────────
    const external = await this.searchExternal(food);
    if (external) {
      return clampNonNegative(this.fromExternal(food, external, factor));
    }

    this.logger.debug(`meal-analyzer: no data for "${food}", using heuristic estimate`);
    return clampNonNegative(estimateNutrition(food, factor));
  }

  private async searchExternal(food: string): Promise<NutritionValues | null> {
    if (!this.lookup || !food) {
      return null;
    }
    try {
      return await this.lookup.search(food);
    } catch (err) {
      this.logger.warn(`meal-analyzer: nutrition lookup for "${food}" failed: ${String(err)}`);
      return null;
    }
  }

  private fromExternal(food: string, per100g: NutritionValues, factor: number): NutritionValues {
    const calories = per100g.calories;
    const category = classifyFood(food, calories);
    const [min, max] = calorieRange(category);

    if (calories < min * OUTLIER_LOW || calories > max * OUTLIER_HIGH) {
      const adjustedCalories = (min + max) / 2;
      const ratio = adjustedCalories / Math.max(calories, 1);
      this.logger.info(
        `meal-analyzer: ${calories} kcal/100g for "${food}" is outside the ${category} range ${min}-${max}; using ${adjustedCalories}`,
      );
      return round2({
        calories: adjustedCalories * factor,
        protein: per100g.protein * ratio * factor,
        fat: per100g.fat * ratio * factor,
        carbs: per100g.carbs * ratio * factor,
      });
    }

    const clamped = Math.min(factor, maxServingFactor(category));
    return round2(scaleNutrition(per100g, clamped));
  }
}
