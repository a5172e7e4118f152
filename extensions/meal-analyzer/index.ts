import { createAnalyzeMealTool } from "./src/analyze-meal-tool.js";
import { createApiRoutes } from "./src/api.js";
import { resolveConfig } from "./src/config.js";
import { createLookupFoodTool } from "./src/lookup-food-tool.js";
import type { MealAnalyzerPluginApi } from "./src/plugin-types.js";
import { createMealAnalyzerServices, type ServiceOverrides } from "./src/services.js";

export type { MealAnalyzerPluginApi } from "./src/plugin-types.js";
export type { MealResult, NutritionValues } from "./src/types.js";

export default function register(api: MealAnalyzerPluginApi, overrides: ServiceOverrides = {}) {
  const config = resolveConfig(api.pluginConfig);
  const services = createMealAnalyzerServices(config, api.logger, overrides);

  // ── Tools ───────────────────────────────────────────────────────────────
  api.registerTool(createAnalyzeMealTool(services.analyzer), { optional: true });
  api.registerTool(createLookupFoodTool(services.nutrition), { optional: true });

  // ── HTTP API routes ─────────────────────────────────────────────────────
  for (const route of createApiRoutes(services)) {
    api.registerHttpRoute(route);
  }

  api.logger.info(
    `meal-analyzer: registered (extraction: ${config.extractionMethod}, recipes: ${services.recipes.count()})`,
  );
  return services;
}
