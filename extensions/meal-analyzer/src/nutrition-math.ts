import type { NutritionValues } from "./types.js";

export function roundTo2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function round2(values: NutritionValues): NutritionValues {
  return {
    calories: roundTo2(values.calories),
    protein: roundTo2(values.protein),
    fat: roundTo2(values.fat),
    carbs: roundTo2(values.carbs),
  };
}

export function scaleNutrition(values: NutritionValues, factor: number): NutritionValues {
  return {
    calories: values.calories * factor,
    protein: values.protein * factor,
    fat: values.fat * factor,
    carbs: values.carbs * factor,
  };
}

export function sumNutrition(values: Iterable<NutritionValues>): NutritionValues {
  let calories = 0;
  let protein = 0;
  let fat = 0;
  let carbs = 0;
  for (const v of values) {
    calories += v.calories;
    protein += v.protein;
    fat += v.fat;
    carbs += v.carbs;
  }
  return { calories, protein, fat, carbs };
}

/** Replace non-finite or negative figures with 0. */
export function clampNonNegative(values: NutritionValues): NutritionValues {
  const clamp = (n: number) => (Number.isFinite(n) && n > 0 ? n : 0);
  return {
    calories: clamp(values.calories),
    protein: clamp(values.protein),
    fat: clamp(values.fat),
    carbs: clamp(values.carbs),
  };
}
