// src/services/gradeSummarizer.ts
import { Category, IAssignment, weightedScore } from "../models/Assignment";
import {
  evaluateCategory,
  FORMATIVE_FAIL_BELOW,
  toScaledScore,
} from "../helpers/markRules";

export type ResubmissionKind = "none" | "single" | "highest-weight" | "tied";

export interface ResubmissionAdvice {
  kind: ResubmissionKind;
  /** Recommended assignment names, in input order */
  names: string[];
  message: string;
}

export interface GradeSummary {
  faWeight: number;
  saWeight: number;
  faTotal: number;
  saTotal: number;
  finalGrade: number;
  scaledScore: number;
  faPass: boolean;
  saPass: boolean;
  passed: boolean;
  resubmission: ResubmissionAdvice;
}

const sumBy = (
  assignments: readonly IAssignment[],
  category: Category,
  pick: (a: IAssignment) => number
) =>
  assignments
    .filter((a) => a.category === category)
    .reduce((sum, a) => sum + pick(a), 0);

export function recommendResubmission(
  assignments: readonly IAssignment[]
): ResubmissionAdvice {
  const failed = assignments.filter(
    (a) => a.category === "FA" && a.grade < FORMATIVE_FAIL_BELOW
  );

  if (failed.length === 0) {
    return { kind: "none", names: [], message: "No failed formative assignments." };
  }

  if (failed.length === 1) {
    const { name } = failed[0];
    return {
      kind: "single",
      names: [name],
      message: `Recommended resubmission: ${name}`,
    };
  }

  const maxWeight = Math.max(...failed.map((a) => a.weight));
  // no epsilon: only identical weights tie
  const top = failed.filter((a) => a.weight === maxWeight);

  if (top.length === 1) {
    const { name } = top[0];
    return {
      kind: "highest-weight",
      names: [name],
      message: `Recommended resubmission: ${name} (highest-weight failed formative)`,
    };
  }

  const names = top.map((a) => a.name);
  return {
    kind: "tied",
    names,
    message: `Recommended resubmission (tied at highest weight): ${names.join(", ")}`,
  };
}

export function summarizeGrades(assignments: readonly IAssignment[]): GradeSummary {
  const faWeight = sumBy(assignments, "FA", (a) => a.weight);
  const saWeight = sumBy(assignments, "SA", (a) => a.weight);
  const faTotal = sumBy(assignments, "FA", weightedScore);
  const saTotal = sumBy(assignments, "SA", weightedScore);

  const finalGrade = faTotal + saTotal;
  const faPass = evaluateCategory(faTotal, faWeight);
  const saPass = evaluateCategory(saTotal, saWeight);

  return {
    faWeight,
    saWeight,
    faTotal,
    saTotal,
    finalGrade,
    scaledScore: toScaledScore(finalGrade),
    faPass,
    saPass,
    passed: faPass && saPass,
    resubmission: recommendResubmission(assignments),
  };
}
