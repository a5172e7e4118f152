import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import { silentLogger, type PluginLogger } from "./plugin-types.js";
import type { NutritionValues } from "./types.js";

/** Best-effort per-100g nutrition for a free-text food name. */
export interface NutritionLookup {
  search(foodName: string): Promise<NutritionValues | null>;
}

export const DEFAULT_USDA_BASE_URL = "https://api.nal.usda.gov/fdc/v1";

// ── FoodData Central nutrient ids ───────────────────────────────────────────

const ENERGY_KCAL_IDS = [1008, 2047, 2048];
const ENERGY_KJ_ID = 1062;
const PROTEIN_ID = 1003;
const FAT_ID = 1004;
const CARBS_ID = 1005;

const NUTRIENT_NAMES: Record<number, string> = {
  [PROTEIN_ID]: "protein",
  [FAT_ID]: "total lipid (fat)",
  [CARBS_ID]: "carbohydrate, by difference",
};

// ── Response schema ─────────────────────────────────────────────────────────

const FoodNutrientSchema = Type.Object({
  nutrientId: Type.Optional(Type.Number()),
  nutrientName: Type.Optional(Type.String()),
  unitName: Type.Optional(Type.String()),
  value: Type.Optional(Type.Number()),
});

const SearchResponseSchema = Type.Object({
  foods: Type.Optional(
    Type.Array(
      Type.Object({
        description: Type.Optional(Type.String()),
        foodNutrients: Type.Optional(Type.Array(FoodNutrientSchema)),
      }),
    ),
  ),
});

export type FoodNutrient = Static<typeof FoodNutrientSchema>;
type SearchResponse = Static<typeof SearchResponseSchema>;

const validateSearchResponse = new Ajv({ allErrors: true, strict: false }).compile<SearchResponse>(
  SearchResponseSchema,
);

function findValue(nutrients: FoodNutrient[], id: number, name?: string): number | undefined {
  const hit = nutrients.find(
    (n) =>
      n.nutrientId === id ||
      (name !== undefined && n.nutrientName?.trim().toLowerCase() === name),
  );
  return hit?.value;
}

function findEnergyKcal(nutrients: FoodNutrient[]): number | undefined {
  for (const id of ENERGY_KCAL_IDS) {
    const v = findValue(nutrients, id);
    if (v !== undefined) {
      return v;
    }
  }
  const byName = nutrients.find(
    (n) => n.nutrientName?.toLowerCase() === "energy" && n.unitName?.toLowerCase() === "kcal",
  );
  if (byName?.value !== undefined) {
    return byName.value;
  }
  const kj = findValue(nutrients, ENERGY_KJ_ID);
  return kj === undefined ? undefined : kj / 4.184;
}

/** Map a FoodData Central nutrient list to per-100g macros; missing figures read as 0. */
export function extractNutrition(nutrients: FoodNutrient[]): NutritionValues {
  return {
    calories: findEnergyKcal(nutrients) ?? 0,
    protein: findValue(nutrients, PROTEIN_ID, NUTRIENT_NAMES[PROTEIN_ID]) ?? 0,
    fat: findValue(nutrients, FAT_ID, NUTRIENT_NAMES[FAT_ID]) ?? 0,
    carbs: findValue(nutrients, CARBS_ID, NUTRIENT_NAMES[CARBS_ID]) ?? 0,
  };
}

// ── Client ──────────────────────────────────────────────────────────────────

export type UsdaLookupOptions = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: PluginLogger;
};

/**
 * USDA FoodData Central search (Foundation + SR Legacy, best match only).
 * Every failure resolves to `null`.
 */
export class UsdaNutritionLookup implements NutritionLookup {
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: PluginLogger;

  constructor(options: UsdaLookupOptions = {}) {
    this.apiKey = options.apiKey?.trim() || undefined;
    this.baseUrl = (options.baseUrl ?? DEFAULT_USDA_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  async search(foodName: string): Promise<NutritionValues | null> {
    const query = foodName.trim();
    if (!query || !this.apiKey) {
      return null;
    }

    const url = new URL(`${this.baseUrl}/foods/search`);
    url.searchParams.set("query", query);
    url.searchParams.set("api_key", this.apiKey);
    url.searchParams.append("dataType", "Foundation");
    url.searchParams.append("dataType", "SR Legacy");
    url.searchParams.set("pageSize", "1");

    let body: unknown;
    try {
      const res = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) {
        this.logger.warn(`meal-analyzer: USDA search for "${query}" failed with status ${res.status}`);
        return null;
      }
      body = await res.json();
    } catch (err) {
      this.logger.warn(`meal-analyzer: USDA search for "${query}" failed: ${String(err)}`);
      return null;
    }

    if (!validateSearchResponse(body)) {
      this.logger.warn(`meal-analyzer: USDA search for "${query}" returned an unexpected shape`);
      return null;
    }

    const food = body.foods?.[0];
    if (!food) {
      return null;
    }
    return extractNutrition(food.foodNutrients ?? []);
  }
}
