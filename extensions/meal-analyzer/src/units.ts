// ── Portion sizes (g or ml per unit) ────────────────────────────────────────

export const PORTION_SIZES: Readonly<Record<string, number>> = Object.freeze({
  cup: 240,
  tablespoon: 15,
  teaspoon: 5,
  slice: 30,
  piece: 50,
  serving: 250,
});

const DEFAULT_PORTION_GRAMS = 30;

// ── Conversion table ────────────────────────────────────────────────────────
// Volumes are treated as mass at 1 g/ml.

const UNIT_FACTORS: ReadonlyArray<{ units: readonly string[]; grams: number }> = [
  { units: ["g", "gram", "grams"], grams: 1 },
  { units: ["kg", "kilogram", "kilograms"], grams: 1000 },
  { units: ["oz", "ounce", "ounces"], grams: 28.35 },
  { units: ["lb", "lbs", "pound", "pounds"], grams: 453.592 },
  { units: ["cup", "cups"], grams: 240 },
  { units: ["tbsp", "tablespoon", "tablespoons"], grams: 15 },
  { units: ["tsp", "teaspoon", "teaspoons"], grams: 5 },
  { units: ["ml", "milliliter", "milliliters"], grams: 1 },
];

const PORTION_UNITS = new Set(["piece", "pieces", "slice", "slices"]);

/**
 * Convert a quantity to grams (or ml). An unknown unit returns the quantity
 * unchanged, i.e. it is read as grams already.
 */
export function toGrams(quantity: number, unit: string): number {
  const u = unit.trim().toLowerCase();

  for (const entry of UNIT_FACTORS) {
    if (entry.units.includes(u)) {
      return quantity * entry.grams;
    }
  }

  if (PORTION_UNITS.has(u)) {
    const singular = u.endsWith("s") ? u.slice(0, -1) : u;
    return quantity * (PORTION_SIZES[singular] ?? DEFAULT_PORTION_GRAMS);
  }

  return quantity;
}
