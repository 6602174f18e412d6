// src/services/csvExporter.ts
import fs from "fs";
import papa from "papaparse";
import { createAssignment, IAssignment, isCategory } from "../models/Assignment";
import { validateGrade, validateNonEmpty, validateWeight } from "../helpers/validation";
import { CsvFormatError } from "../lib/errors";
import { fmt } from "./reportPrinter";

export const GRADES_CSV_HEADERS = ["Assignment", "Category", "Grade", "Weight"];

const NEWLINE = "\r\n";

export function toGradesCsv(assignments: readonly IAssignment[]): string {
  const body = papa.unparse(
    {
      fields: GRADES_CSV_HEADERS,
      data: assignments.map((a) => [a.name, a.category, fmt(a.grade), fmt(a.weight)]),
    },
    { newline: NEWLINE, quotes: false }
  );
  // every row, the last included, ends with a line break; a header-only
  // unparse already carries one
  return body.endsWith(NEWLINE) ? body : body + NEWLINE;
}

export async function writeGradesCsv(
  assignments: readonly IAssignment[],
  filePath: string
): Promise<void> {
  await fs.promises.writeFile(filePath, toGradesCsv(assignments), "utf-8");
}

export function parseGradesCsv(text: string): IAssignment[] {
  const parsed = papa.parse<string[]>(text, { header: false, skipEmptyLines: true });
  if (parsed.errors.length) {
    const first = parsed.errors[0];
    throw new CsvFormatError(`CSV parse error: ${first.message}`, (first.row ?? 0) + 1);
  }

  const [header, ...rows] = parsed.data;
  if (!header || header.join(",") !== GRADES_CSV_HEADERS.join(",")) {
    throw new CsvFormatError(`Expected header ${GRADES_CSV_HEADERS.join(",")}`, 1);
  }

  return rows.map((row, index) => {
    const rowNum = index + 2;
    if (row.length !== GRADES_CSV_HEADERS.length) {
      throw new CsvFormatError(
        `Expected ${GRADES_CSV_HEADERS.length} fields, got ${row.length}`,
        rowNum
      );
    }

    const [rawName, category, rawGrade, rawWeight] = row;
    const name = validateNonEmpty(rawName);
    const grade = validateGrade(rawGrade);
    const weight = validateWeight(rawWeight);

    if (!name.ok) throw new CsvFormatError(`Assignment: ${name.error}`, rowNum);
    if (!isCategory(category)) throw new CsvFormatError(`Unknown category "${category}"`, rowNum);
    if (!grade.ok) throw new CsvFormatError(`Grade: ${grade.error}`, rowNum);
    if (!weight.ok) throw new CsvFormatError(`Weight: ${weight.error}`, rowNum);

    return createAssignment({
      name: name.value,
      category,
      grade: grade.value,
      weight: weight.value,
    });
  });
}

export async function readGradesCsv(filePath: string): Promise<IAssignment[]> {
  const text = await fs.promises.readFile(filePath, "utf-8");
  return parseGradesCsv(text);
}
