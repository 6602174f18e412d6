// src/helpers/validation.ts
import { Category, isCategory } from "../models/Assignment";

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export interface NumberBounds {
  min?: number;
  max?: number;
  /** min itself is rejected */
  exclusiveMin?: boolean;
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const ok = <T>(value: T): ValidationResult<T> => ({ ok: true, value });
const fail = <T>(error: string): ValidationResult<T> => ({ ok: false, error });

export function validateNonEmpty(raw: string): ValidationResult<string> {
  const value = raw.trim();
  if (!value) return fail("Value cannot be empty. Please try again.");
  return ok(value);
}

export function validateCategory(raw: string): ValidationResult<Category> {
  const value = raw.trim().toUpperCase();
  if (!isCategory(value)) return fail('Invalid category. Please enter "FA" or "SA".');
  return ok(value);
}

export function validateNumber(raw: string, bounds: NumberBounds = {}): ValidationResult<number> {
  const text = raw.trim();
  const value = Number(text);
  if (!DECIMAL.test(text) || !Number.isFinite(value)) {
    return fail("Please enter a numeric value.");
  }

  const { min, max, exclusiveMin = false } = bounds;
  if (min !== undefined) {
    if (exclusiveMin && value <= min) return fail(`Value must be greater than ${min}.`);
    if (!exclusiveMin && value < min) return fail(`Value must be at least ${min}.`);
  }
  if (max !== undefined && value > max) return fail(`Value must be at most ${max}.`);

  return ok(value);
}

export const validateGrade = (raw: string) => validateNumber(raw, { min: 0, max: 100 });

export const validateWeight = (raw: string) =>
  validateNumber(raw, { min: 0, exclusiveMin: true });

/** Blank counts as yes, so Enter keeps the loop going */
export function wantsAnother(raw: string): boolean {
  return ["y", "yes", ""].includes(raw.trim().toLowerCase());
}
