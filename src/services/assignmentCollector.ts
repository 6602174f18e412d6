// src/services/assignmentCollector.ts
import { createAssignment, IAssignment } from "../models/Assignment";
import { askUntilValid, LineReader } from "../lib/prompt";
import {
  validateCategory,
  validateGrade,
  validateNonEmpty,
  validateWeight,
  wantsAnother,
} from "../helpers/validation";

export async function collectAssignment(reader: LineReader): Promise<IAssignment> {
  const name = await askUntilValid(reader, "Assignment name: ", validateNonEmpty);
  const category = await askUntilValid(reader, 'Category ("FA" or "SA"): ', validateCategory);
  const grade = await askUntilValid(reader, "Grade (0-100): ", validateGrade);
  const weight = await askUntilValid(reader, "Weight (positive number): ", validateWeight);

  return createAssignment({ name, category, grade, weight });
}

export async function collectAssignments(reader: LineReader): Promise<IAssignment[]> {
  const assignments: IAssignment[] = [];
  console.log("Enter assignments. When finished, type 'n' when asked to add another.");

  for (;;) {
    assignments.push(await collectAssignment(reader));

    const again = await reader.question("Add another assignment? (y/n): ");
    if (!wantsAnother(again)) break;
  }

  return assignments;
}
