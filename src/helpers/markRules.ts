// src/helpers/markRules.ts

/** Share of a category's weight that must be earned to pass it */
export const CATEGORY_PASS_RATIO = 0.5;

/** Formative grades strictly below this count as failed */
export const FORMATIVE_FAIL_BELOW = 50;

export const SCALE_MAX = 5;

export function evaluateCategory(total: number, weight: number): boolean {
  // an empty category has nothing to fail
  if (weight === 0) return true;
  return total >= CATEGORY_PASS_RATIO * weight;
}

export function toScaledScore(finalGrade: number): number {
  return (finalGrade / 100) * SCALE_MAX;
}

export function formatStatus(passed: boolean): "PASS" | "FAIL" {
  return passed ? "PASS" : "FAIL";
}
