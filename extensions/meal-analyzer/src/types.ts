// ── Nutrition figures ───────────────────────────────────────────────────────

/** Absolute amounts for a resolved quantity unless a name says per-100g. */
export type NutritionValues = {
  calories: number;
  protein: number;
  fat: number;
  carbs: number;
};

export const ZERO_NUTRITION: Readonly<NutritionValues> = Object.freeze({
  calories: 0,
  protein: 0,
  fat: 0,
  carbs: 0,
});

// ── Parsed quantities ───────────────────────────────────────────────────────

export type FoodQuantity = {
  foodName: string;
  quantity: number;
  /** Empty means "quantity × 100 g/ml" unless a known-food serving applies. */
  unit: string;
};

export type IngredientRecord = FoodQuantity & {
  nutrition: NutritionValues;
};

// ── Categories ──────────────────────────────────────────────────────────────

export type FoodCategory =
  | "meat"
  | "grain"
  | "vegetable"
  | "fruit"
  | "dairy"
  | "oil"
  | "beverage"
  | "unknown";

export type CategoryProfile = {
  category: FoodCategory;
  /** Plausible kcal per 100 g, inclusive. */
  calorieRange: readonly [min: number, max: number];
  /** Upper bound on multiples of 100 g/ml in one serving. */
  maxServingFactor: number;
};

// ── Extraction ──────────────────────────────────────────────────────────────

export type ExtractedFood = {
  food: string;
  quantity: number;
};

export type ExtractionMethod = "ner" | "llm" | "hybrid";

// ── Dishes ──────────────────────────────────────────────────────────────────

export type RecipeSource = "database" | "generated";

export type ResolvedDish = {
  title: string;
  /** Main ingredients first, then secondary ones. */
  ingredients: string[];
  main: string[];
  secondary: string[];
  source: RecipeSource | null;
};

export type DishAnalysis = {
  type: "dish";
  dishName: string;
  source: RecipeSource | "known-food";
  ingredients: IngredientRecord[];
  totalNutrition: NutritionValues;
  /** Set when the dish ceiling rescaled every ingredient. */
  adjusted: boolean;
};

// ── Meal results ────────────────────────────────────────────────────────────

export type SingleItemResult = {
  type: "single";
  item: IngredientRecord;
};

export type MultipleItemsResult = {
  type: "multiple";
  items: IngredientRecord[];
  totalNutrition: NutritionValues;
};

export type CombinedResult = {
  type: "combined";
  dishes: DishAnalysis[];
  standaloneItems: IngredientRecord[];
};

export type UnresolvedResult = {
  type: "unresolved";
  text: string;
};

export type MealResult =
  | DishAnalysis
  | SingleItemResult
  | MultipleItemsResult
  | CombinedResult
  | UnresolvedResult;
