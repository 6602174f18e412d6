// src/models/Assignment.ts

export const CATEGORIES = ["FA", "SA"] as const;

/** "FA" = Formative, "SA" = Summative */
export type Category = (typeof CATEGORIES)[number];

export interface IAssignment {
  readonly name: string;
  readonly category: Category;
  readonly grade: number; // 0-100
  readonly weight: number; // > 0
}

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

/**
 * Builds a frozen assignment record. Callers pass values that already went
 * through input validation; nothing is re-checked here.
 */
export function createAssignment(fields: IAssignment): IAssignment {
  return Object.freeze({
    name: fields.name,
    category: fields.category,
    grade: fields.grade,
    weight: fields.weight,
  });
}

export function weightedScore(a: IAssignment): number {
  return (a.grade / 100) * a.weight;
}
