import type { DishResolver } from "./dish-resolver.js";
import { mergeExtractions, type FoodExtractor } from "./extraction.js";
import { round2, sumNutrition } from "./nutrition-math.js";
import type { NutritionResolver } from "./nutrition-resolver.js";
import { silentLogger, type PluginLogger } from "./plugin-types.js";
import type {
  DishAnalysis,
  ExtractedFood,
  ExtractionMethod,
  IngredientRecord,
  MealResult,
} from "./types.js";

export const DISH_KEYWORDS: readonly string[] = [
  "soup", "salad", "pizza", "burger", "sandwich", "stew", "curry", "cake", "pie", "pasta",
  "noodles", "omelet", "dumpling", "fried", "steak", "fries", "gratin", "casserole", "bake",
  "coke", "tea", "coffee",
];

/** Multi-word names and names carrying a dish keyword are treated as dishes. */
export function isProbablyDish(name: string): boolean {
  const lower = name.trim().toLowerCase();
  return /\s/.test(lower) || DISH_KEYWORDS.some((kw) => lower.includes(kw));
}

export type MealAnalyzerOptions = {
  nutrition: NutritionResolver;
  dishes: DishResolver;
  method?: ExtractionMethod;
  /** Keyword/pattern extractor, used by the "ner" and "hybrid" methods. */
  ruleExtractor?: FoodExtractor;
  /** Generative extractor, used by the "llm" and "hybrid" methods. */
  llmExtractor?: FoodExtractor;
  logger?: PluginLogger;
};

export class MealAnalyzer {
  private readonly nutrition: NutritionResolver;
  private readonly dishes: DishResolver;
  private readonly method: ExtractionMethod;
  private readonly ruleExtractor: FoodExtractor | undefined;
  private readonly llmExtractor: FoodExtractor | undefined;
  private readonly logger: PluginLogger;

  constructor(options: MealAnalyzerOptions) {
    this.nutrition = options.nutrition;
    this.dishes = options.dishes;
    this.method = options.method ?? "hybrid";
    this.ruleExtractor = options.ruleExtractor;
    this.llmExtractor = options.llmExtractor;
    this.logger = options.logger ?? silentLogger;
  }

  // ── Extraction ────────────────────────────────────────────────────────

  async extractFoods(text: string): Promise<ExtractedFood[]> {
    const useRules = this.method !== "llm";
    const useLlm = this.method !== "ner";

    const [ruleFoods, llmFoods] = await Promise.all([
      useRules ? this.runExtractor(this.ruleExtractor, text) : [],
      useLlm ? this.runExtractor(this.llmExtractor, text) : [],
    ]);
    return mergeExtractions(ruleFoods, llmFoods);
  }

  private async runExtractor(extractor: FoodExtractor | undefined, text: string): Promise<ExtractedFood[]> {
    if (!extractor) {
      return [];
    }
    try {
      return await extractor.extract(text);
    } catch (err) {
      this.logger.warn(`meal-analyzer: extractor failed: ${String(err)}`);
      return [];
    }
  }

  // ── Analysis ──────────────────────────────────────────────────────────

  /**
   * Analyze a meal description. Dishes are broken into ingredients when
   * `useStandardRecipe` is set; every other name is resolved on its own.
   */
  async analyze(text: string, useStandardRecipe = true): Promise<MealResult> {
    const candidates = await this.extractFoods(text);
    if (candidates.length === 0 || !useStandardRecipe) {
      return this.analyzeItems(text, candidates);
    }

    const dishes: DishAnalysis[] = [];
    const dishNames = new Set<string>();
    const standalone: ExtractedFood[] = [];

    for (const candidate of candidates) {
      if (!isProbablyDish(candidate.food)) {
        standalone.push(candidate);
        continue;
      }
      const analysis = await this.dishes.analyzeDish(candidate.food);
      if (analysis) {
        dishes.push(analysis);
        dishNames.add(candidate.food);
        dishNames.add(analysis.dishName);
      } else {
        this.logger.debug(`meal-analyzer: "${candidate.food}" unresolved as a dish; treating as a single item`);
        standalone.push({ food: candidate.food, quantity: 1 });
      }
    }

    const seen = new Set<string>();
    const items = standalone.filter((item) => {
      if (dishNames.has(item.food) || seen.has(item.food)) {
        return false;
      }
      seen.add(item.food);
      return true;
    });

    if (dishes.length === 0 && items.length === 0) {
      return this.analyzeItems(text, candidates);
    }
    const [onlyDish] = dishes;
    if (onlyDish && dishes.length === 1 && items.length === 0) {
      return onlyDish;
    }

    return {
      type: "combined",
      dishes,
      standaloneItems: await Promise.all(items.map((item) => this.resolveItem(item))),
    };
  }

  /** Resolve every extracted name on its own, without recipe breakdown. */
  async analyzeItems(text: string, extracted?: ExtractedFood[]): Promise<MealResult> {
    const foods = extracted ?? (await this.extractFoods(text));
    if (foods.length === 0) {
      return { type: "unresolved", text };
    }

    const items = await Promise.all(foods.map((food) => this.resolveItem(food)));
    const [first] = items;
    if (first && items.length === 1) {
      return { type: "single", item: first };
    }
    return {
      type: "multiple",
      items,
      totalNutrition: round2(sumNutrition(items.map((i) => i.nutrition))),
    };
  }

  private async resolveItem(item: ExtractedFood): Promise<IngredientRecord> {
    const nutrition = await this.nutrition.resolve(item.food, item.quantity, "");
    return { foodName: item.food, quantity: item.quantity, unit: "", nutrition };
  }
}
