import { parseIngredient } from "./ingredient-parser.js";
import { findKnownFood } from "./known-foods.js";
import { round2, scaleNutrition, sumNutrition } from "./nutrition-math.js";
import type { NutritionResolver } from "./nutrition-resolver.js";
import { silentLogger, type PluginLogger } from "./plugin-types.js";
import type { RecipeGenerator } from "./recipe-generator.js";
import type { RecipeMatch } from "./recipe-store.js";
import type { DishAnalysis, IngredientRecord, RecipeSource, ResolvedDish } from "./types.js";

// ── Ingredient roles ────────────────────────────────────────────────────────

export const MAIN_KEYWORDS: readonly string[] = [
  "chicken", "beef", "pork", "fish", "egg", "shrimp", "rice", "noodles", "pasta", "milk",
  "tomato", "cheese", "penne", "turkey", "sausage", "coke", "coffee", "tea",
];

export const SECONDARY_KEYWORDS: readonly string[] = [
  "salt", "pepper", "oil", "garlic", "onion", "butter", "sugar", "cream", "flour",
  "vinegar", "powder", "seasoning", "herbs", "spice", "sauce", "chilies",
];

// ── Dish plausibility constants ─────────────────────────────────────────────
// Empirical figures, matched against the dish name in order. Every word of a
// rule must appear in the name.

type DishRule = { words: readonly string[]; value: number };

/** Multiples of 100 g in one serving of a dish found in the known-food table. */
export const DISH_PORTION_RULES: readonly DishRule[] = [
  { words: ["mac", "cheese"], value: 3.0 },
  { words: ["curry"], value: 4.0 },
  { words: ["coke"], value: 3.3 },
  { words: ["cola"], value: 3.3 },
];
export const DEFAULT_DISH_PORTION = 2.5;

/** Plausible kcal ceiling for one serving. */
export const DISH_CALORIE_CEILINGS: readonly DishRule[] = [
  { words: ["curry"], value: 900 },
  { words: ["mac", "cheese"], value: 700 },
  { words: ["salad"], value: 500 },
  { words: ["soup"], value: 400 },
];
export const DEFAULT_DISH_CEILING = 1200;

/** Totals above this multiple of the ceiling are scaled back to the ceiling. */
const CEILING_TRIGGER = 2;

function matchRule(rules: readonly DishRule[], dishName: string, fallback: number): number {
  const name = dishName.toLowerCase();
  return rules.find((r) => r.words.every((w) => name.includes(w)))?.value ?? fallback;
}

export function dishPortionFactor(dishName: string): number {
  return matchRule(DISH_PORTION_RULES, dishName, DEFAULT_DISH_PORTION);
}

export function dishCalorieCeiling(dishName: string): number {
  return matchRule(DISH_CALORIE_CEILINGS, dishName, DEFAULT_DISH_CEILING);
}

/**
 * Split ingredients into main and secondary. Lines matching neither list are
 * treated as main.
 */
export function classifyIngredients(list: readonly string[]): { main: string[]; secondary: string[] } {
  const main: string[] = [];
  const secondary: string[] = [];
  for (const ing of list) {
    const lower = ing.toLowerCase();
    if (MAIN_KEYWORDS.some((k) => lower.includes(k))) {
      main.push(ing);
    } else if (SECONDARY_KEYWORDS.some((k) => lower.includes(k))) {
      secondary.push(ing);
    } else {
      main.push(ing);
    }
  }
  return { main, secondary };
}

// ── Resolver ────────────────────────────────────────────────────────────────

export interface RecipeLookup {
  findByTitle(name: string): RecipeMatch | null;
}

export type DishResolverOptions = {
  nutrition: NutritionResolver;
  recipes?: RecipeLookup;
  generator?: RecipeGenerator;
  logger?: PluginLogger;
};

export class DishResolver {
  private readonly nutrition: NutritionResolver;
  private readonly recipes: RecipeLookup | undefined;
  private readonly generator: RecipeGenerator | undefined;
  private readonly logger: PluginLogger;

  constructor(options: DishResolverOptions) {
    this.nutrition = options.nutrition;
    this.recipes = options.recipes;
    this.generator = options.generator;
    this.logger = options.logger ?? silentLogger;
  }

  /** Stored recipe first, generated list second; empty ingredients when both miss. */
  async resolveDish(dishName: string): Promise<ResolvedDish> {
    const stored = this.findStored(dishName);
    if (stored && stored.ingredients.length > 0) {
      return toResolved(stored.title, stored.ingredients, "database");
    }

    const generated = this.generator ? await this.generator.generateIngredients(dishName) : [];
    if (generated.length > 0) {
      return toResolved(dishName, generated, "generated");
    }

    this.logger.debug(`meal-analyzer: no ingredients found for "${dishName}"`);
    return { title: dishName, ingredients: [], main: [], secondary: [], source: null };
  }

  private findStored(dishName: string): RecipeMatch | null {
    if (!this.recipes) {
      return null;
    }
    try {
      return this.recipes.findByTitle(dishName);
    } catch (err) {
      this.logger.warn(`meal-analyzer: recipe lookup for "${dishName}" failed: ${String(err)}`);
      return null;
    }
  }

  /**
   * Nutrition for a dish. A dish named in the known-food table skips the
   * ingredient breakdown; otherwise every line is resolved and summed, and
   * an implausible total is scaled down to the dish ceiling.
   */
  async analyzeIngredients(
    dishName: string,
    ingredients: readonly string[],
    source: RecipeSource = "database",
  ): Promise<DishAnalysis> {
    const known = findKnownFood(dishName);
    if (known) {
      const nutrition = round2(scaleNutrition(known.per100g, dishPortionFactor(dishName)));
      return {
        type: "dish",
        dishName,
        source: "known-food",
        ingredients: [{ foodName: known.key, quantity: 1, unit: "serving", nutrition }],
        totalNutrition: { ...nutrition },
        adjusted: false,
      };
    }

    let records: IngredientRecord[] = await Promise.all(
      ingredients.map(async (line) => {
        const parsed = parseIngredient(line);
        const nutrition = await this.nutrition.resolve(parsed.foodName, parsed.quantity, parsed.unit);
        return { ...parsed, quantity: Math.round(parsed.quantity * 100) / 100, nutrition };
      }),
    );

    let total = sumNutrition(records.map((r) => r.nutrition));
    let adjusted = false;

    const ceiling = dishCalorieCeiling(dishName);
    if (total.calories > ceiling * CEILING_TRIGGER) {
      const ratio = ceiling / total.calories;
      this.logger.info(
        `meal-analyzer: "${dishName}" totals ${total.calories.toFixed(2)} kcal; scaling to the ${ceiling} kcal ceiling`,
      );
      records = records.map((r) => ({ ...r, nutrition: round2(scaleNutrition(r.nutrition, ratio)) }));
      total = { ...scaleNutrition(total, ratio), calories: ceiling };
      adjusted = true;
    }

    return {
      type: "dish",
      dishName,
      source,
      ingredients: records,
      totalNutrition: round2(total),
      adjusted,
    };
  }

  /** Resolve and analyze in one step; `null` when no ingredients were found. */
  async analyzeDish(dishName: string): Promise<DishAnalysis | null> {
    const resolved = await this.resolveDish(dishName);
    if (!resolved.source || resolved.ingredients.length === 0) {
      return null;
    }
    return this.analyzeIngredients(resolved.title, resolved.ingredients, resolved.source);
  }
}

function toResolved(title: string, ingredients: string[], source: RecipeSource): ResolvedDish {
  const { main, secondary } = classifyIngredients(ingredients);
  return { title, ingredients: [...main, ...secondary], main, secondary, source };
}
