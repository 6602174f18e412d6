// src/services/reportPrinter.ts
import { IAssignment, weightedScore } from "../models/Assignment";
import { formatStatus } from "../helpers/markRules";
import { GradeSummary } from "./gradeSummarizer";

const formatCents = (negative: boolean, cents: bigint) =>
  `${negative ? "-" : ""}${cents / 100n}.${(cents % 100n).toString().padStart(2, "0")}`;

/**
 * Two decimals, rounding exact midpoints (x.125, x.375, ...) half to even.
 * Keeps the sign of -0 and never switches to exponent notation.
 */
export function fmt(n: number): string {
  const negative = n < 0 || Object.is(n, -0);
  const abs = Math.abs(n);

  // every double this large is a whole number
  if (abs >= 1e21) return `${negative ? "-" : ""}${BigInt(abs)}.00`;

  // an odd multiple of 1/8 sits exactly halfway between two cent values
  const eighths = abs * 8;
  if (Number.isInteger(eighths) && eighths % 2 === 1) {
    const lower = (BigInt(eighths) * 25n - 1n) / 2n;
    return formatCents(negative, lower % 2n === 0n ? lower : lower + 1n);
  }

  const text = abs.toFixed(2);
  return negative ? `-${text}` : text;
}

export function formatAssignmentLine(index: number, a: IAssignment): string {
  return (
    `${index}. ${a.name} [${a.category}] ` +
    `Grade: ${fmt(a.grade)} | Weight: ${fmt(a.weight)} | Weighted: ${fmt(weightedScore(a))}`
  );
}

export function buildReport(
  assignments: readonly IAssignment[],
  summary: GradeSummary
): string[] {
  return [
    "",
    "--- Grade Summary ---",
    ...assignments.map((a, i) => formatAssignmentLine(i + 1, a)),
    "",
    `FA total: ${fmt(summary.faTotal)} / ${fmt(summary.faWeight)}`,
    `SA total: ${fmt(summary.saTotal)} / ${fmt(summary.saWeight)}`,
    `Final grade: ${fmt(summary.finalGrade)}`,
    `GPA (5-point scale): ${fmt(summary.scaledScore)}`,
    `Pass status: ${formatStatus(summary.passed)}`,
    `Resubmission: ${summary.resubmission.message}`,
  ];
}

export function printReport(assignments: readonly IAssignment[], summary: GradeSummary) {
  buildReport(assignments, summary).forEach((line) => console.log(line));
}
