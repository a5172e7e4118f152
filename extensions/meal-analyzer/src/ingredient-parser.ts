import type { FoodQuantity } from "./types.js";

// "<numbers> [unit] <food>", where the unit may be glued to the number ("200g").
const INGREDIENT_RE = /^([\d/.\s]+)([a-zA-Z]+)?\s+(.*)$/;

function parseQuantityToken(token: string): number {
  if (token.includes("/")) {
    const [num, denom] = token.split("/");
    return Number(num) / Number(denom);
  }
  return Number(token);
}

/**
 * Sum whitespace-separated numbers and fractions ("1 1/2" → 1.5).
 * A token that does not parse counts as 1.
 */
export function parseQuantity(raw: string): number {
  let total = 0;
  for (const token of raw.trim().split(/\s+/).filter(Boolean)) {
    const value = parseQuantityToken(token);
    total += Number.isFinite(value) && value >= 0 ? value : 1;
  }
  return total;
}

/**
 * Split an ingredient line such as "200g chicken breast" into quantity, unit
 * and food name. Lines without a leading number default to one unit-less
 * serving of the whole line.
 */
export function parseIngredient(line: string): FoodQuantity {
  const trimmed = line.trim();
  const m = INGREDIENT_RE.exec(trimmed);
  if (!m || !m[1]?.trim()) {
    return { quantity: 1, unit: "", foodName: trimmed.toLowerCase() };
  }

  return {
    quantity: parseQuantity(m[1]),
    unit: (m[2] ?? "").toLowerCase(),
    foodName: (m[3] ?? "").trim().toLowerCase(),
  };
}
