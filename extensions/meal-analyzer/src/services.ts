import type { MealAnalyzerConfig } from "./config.js";
import { DishResolver } from "./dish-resolver.js";
import { LlmFoodExtractor, PatternFoodExtractor } from "./extraction.js";
import { OpenAiTextGenerator, type TextGenerator } from "./llm.js";
import { MealAnalyzer } from "./meal-analyzer.js";
import { NutritionResolver } from "./nutrition-resolver.js";
import { silentLogger, type PluginLogger } from "./plugin-types.js";
import { RecipeGenerator } from "./recipe-generator.js";
import { RecipeStore } from "./recipe-store.js";
import { UsdaNutritionLookup, type NutritionLookup } from "./usda.js";

export type MealAnalyzerServices = {
  analyzer: MealAnalyzer;
  nutrition: NutritionResolver;
  dishes: DishResolver;
  recipes: RecipeStore;
  close(): void;
};

/** Collaborators that tests (or an embedding host) may supply directly. */
export type ServiceOverrides = {
  lookup?: NutritionLookup;
  generator?: TextGenerator;
};

/** Build the object graph once per plugin registration. */
export function createMealAnalyzerServices(
  config: MealAnalyzerConfig,
  logger: PluginLogger = silentLogger,
  overrides: ServiceOverrides = {},
): MealAnalyzerServices {
  if (!config.usda.apiKey && !overrides.lookup) {
    logger.warn("meal-analyzer: no USDA API key configured; using the food table and estimates only");
  }

  const lookup =
    overrides.lookup ??
    new UsdaNutritionLookup({
      apiKey: config.usda.apiKey,
      baseUrl: config.usda.baseUrl,
      timeoutMs: config.usda.timeoutMs,
      logger,
    });
  const generator =
    overrides.generator ??
    new OpenAiTextGenerator({
      baseUrl: config.llm.baseUrl,
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
    });

  const recipes = new RecipeStore(config.recipeDbPath, logger);
  const nutrition = new NutritionResolver({ lookup, logger });
  const dishes = new DishResolver({
    nutrition,
    recipes,
    generator: new RecipeGenerator(generator, logger),
    logger,
  });
  const analyzer = new MealAnalyzer({
    nutrition,
    dishes,
    method: config.extractionMethod,
    ruleExtractor: new PatternFoodExtractor(),
    llmExtractor: new LlmFoodExtractor(generator, logger),
    logger,
  });

  return {
    analyzer,
    nutrition,
    dishes,
    recipes,
    close: () => recipes.close(),
  };
}
