// src/tests/gradeSummarizer.test.ts
import { createAssignment, IAssignment } from "../models/Assignment";
import { recommendResubmission, summarizeGrades } from "../services/gradeSummarizer";

const fa = (name: string, grade: number, weight: number): IAssignment =>
  createAssignment({ name, category: "FA", grade, weight });
const sa = (name: string, grade: number, weight: number): IAssignment =>
  createAssignment({ name, category: "SA", grade, weight });

describe("summarizeGrades", () => {
  it("weights one formative and one summative assignment", () => {
    const summary = summarizeGrades([fa("Quiz 1", 80, 20), sa("Final Exam", 60, 80)]);

    expect(summary.faWeight).toBe(20);
    expect(summary.saWeight).toBe(80);
    expect(summary.faTotal).toBeCloseTo(16, 10);
    expect(summary.saTotal).toBeCloseTo(48, 10);
    expect(summary.finalGrade).toBeCloseTo(64, 10);
    expect(summary.scaledScore).toBeCloseTo(3.2, 10);
    expect(summary.faPass).toBe(true);
    expect(summary.saPass).toBe(true);
    expect(summary.passed).toBe(true);
    expect(summary.resubmission).toEqual({
      kind: "none",
      names: [],
      message: "No failed formative assignments.",
    });
  });

  it("adds category totals into the final grade exactly", () => {
    const summary = summarizeGrades([
      fa("Quiz 1", 73.3, 7.7),
      fa("Quiz 2", 91.1, 12.9),
      sa("Project", 66.6, 33.3),
      sa("Final", 58.4, 46.1),
    ]);

    expect(summary.finalGrade).toBe(summary.faTotal + summary.saTotal);
  });

  it("passes a category that has no assignments", () => {
    const summary = summarizeGrades([sa("Final", 70, 100)]);

    expect(summary.faWeight).toBe(0);
    expect(summary.faTotal).toBe(0);
    expect(summary.faPass).toBe(true);
    expect(summary.passed).toBe(true);
  });

  it("fails overall when one category earns under half its weight", () => {
    const summary = summarizeGrades([fa("Essay", 30, 40), sa("Final", 90, 60)]);

    expect(summary.faTotal).toBeCloseTo(12, 10);
    expect(summary.faPass).toBe(false);
    expect(summary.saPass).toBe(true);
    expect(summary.passed).toBe(false);
  });

  it("passes a category sitting exactly on the threshold", () => {
    const summary = summarizeGrades([sa("Final", 50, 100)]);

    expect(summary.saTotal).toBe(50);
    expect(summary.saPass).toBe(true);
  });

  it("does not clamp the scaled score when weights exceed 100", () => {
    const summary = summarizeGrades([fa("Quiz", 100, 100), sa("Final", 100, 100)]);

    expect(summary.finalGrade).toBe(200);
    expect(summary.scaledScore).toBe(10);
  });

  it("returns the same result twice and leaves the input untouched", () => {
    const input = [fa("Quiz 1", 40, 30), fa("Quiz 2", 45, 30), sa("Final", 75, 40)];
    const copy = input.map((a) => ({ ...a }));

    const first = summarizeGrades(input);
    const second = summarizeGrades(input);

    expect(second).toEqual(first);
    expect(input).toEqual(copy);
  });

  it("returns a vacuous pass for an empty list", () => {
    const summary = summarizeGrades([]);

    expect(summary.finalGrade).toBe(0);
    expect(summary.scaledScore).toBe(0);
    expect(summary.passed).toBe(true);
    expect(summary.resubmission.kind).toBe("none");
  });
});

describe("recommendResubmission", () => {
  it("names the only failed formative assignment", () => {
    expect(recommendResubmission([fa("Essay", 40, 30), sa("Final", 20, 70)])).toEqual({
      kind: "single",
      names: ["Essay"],
      message: "Recommended resubmission: Essay",
    });
  });

  it("picks the heaviest failed formative assignment", () => {
    const advice = recommendResubmission([fa("Quiz", 10, 30), fa("Lab Report", 45, 50)]);

    expect(advice.kind).toBe("highest-weight");
    expect(advice.names).toEqual(["Lab Report"]);
    expect(advice.message).toBe(
      "Recommended resubmission: Lab Report (highest-weight failed formative)"
    );
  });

  it("lists every tied assignment in input order", () => {
    const advice = recommendResubmission([
      fa("Quiz B", 45, 30),
      fa("Quiz C", 20, 10),
      fa("Quiz A", 40, 30),
    ]);

    expect(advice.kind).toBe("tied");
    expect(advice.names).toEqual(["Quiz B", "Quiz A"]);
    expect(advice.message).toBe(
      "Recommended resubmission (tied at highest weight): Quiz B, Quiz A"
    );
  });

  it("does not treat a grade of exactly 50 as failed", () => {
    expect(recommendResubmission([fa("Quiz", 50, 30)]).kind).toBe("none");
  });

  it("ignores failed summative assignments", () => {
    expect(recommendResubmission([sa("Midterm", 10, 40), sa("Final", 20, 60)]).kind).toBe(
      "none"
    );
  });

  it("breaks ties on exact weight equality only", () => {
    const advice = recommendResubmission([fa("A", 10, 0.1 + 0.2), fa("B", 10, 0.3)]);

    expect(advice.kind).toBe("highest-weight");
    expect(advice.names).toEqual(["A"]);
  });
});
