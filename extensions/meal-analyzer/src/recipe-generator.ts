import { extractJsonArray, type TextGenerator } from "./llm.js";
import { silentLogger, type PluginLogger } from "./plugin-types.js";

export const MAX_GENERATED_INGREDIENTS = 7;

export function buildRecipePrompt(dishName: string): string {
  return [
    `Provide a concise list of common ingredients with quantities for "${dishName}".`,
    "Only include the most commonly used ingredients for this dish.",
    'Format as a JSON array of strings, e.g. ["200g chicken", "1 onion"].',
    `Keep the list focused on main ingredients (maximum ${MAX_GENERATED_INGREDIENTS} items).`,
    "For a simple item or beverage, only list its core components.",
    'For example, for "coke" or "cola", just list ["330ml Coca-Cola", "ice cubes"].',
  ].join("\n");
}

/**
 * Synthesizes an ingredient list when the recipe store has no match.
 * Returns an empty list on any failure.
 */
export class RecipeGenerator {
  private readonly generator: TextGenerator;
  private readonly logger: PluginLogger;

  constructor(generator: TextGenerator, logger: PluginLogger = silentLogger) {
    this.generator = generator;
    this.logger = logger;
  }

  async generateIngredients(dishName: string): Promise<string[]> {
    let text: string;
    try {
      text = await this.generator.generate(buildRecipePrompt(dishName));
    } catch (err) {
      this.logger.warn(`meal-analyzer: ingredient generation for "${dishName}" failed: ${String(err)}`);
      return [];
    }

    const arr = extractJsonArray(text);
    if (!arr) {
      this.logger.warn(`meal-analyzer: no ingredient array in generated output for "${dishName}"`);
      return [];
    }

    return arr
      .filter((item): item is string => typeof item === "string" && item.trim().length > 0)
      .map((item) => item.trim())
      .slice(0, MAX_GENERATED_INGREDIENTS);
  }
}
