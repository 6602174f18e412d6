#!/usr/bin/env node
// src/cli.ts
import path from "path";
import config from "./config/config";
import { collectAssignments } from "./services/assignmentCollector";
import { summarizeGrades } from "./services/gradeSummarizer";
import { printReport } from "./services/reportPrinter";
import { writeGradesCsv } from "./services/csvExporter";
import { archiveCsvFiles } from "./scripts/archiveCsv";
import { createConsoleReader, LineReader } from "./lib/prompt";
import { handleFatal, UsageError } from "./lib/errors";

export const USAGE = "Usage: grade-generator [calculate | archive]";

export async function runCalculator(reader: LineReader, csvFile = config.csvFile) {
  const assignments = await collectAssignments(reader);
  if (assignments.length === 0) {
    console.log("No assignments were entered. Exiting.");
    return null;
  }

  const summary = summarizeGrades(assignments);
  printReport(assignments, summary);

  const csvPath = path.resolve(csvFile);
  await writeGradesCsv(assignments, csvPath);
  console.log(`\nSaved CSV to ${csvPath}`);

  return { assignments, summary, csvPath };
}

export async function main(
  argv: string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): Promise<number> {
  const [command = "calculate", ...rest] = argv;

  try {
    if (rest.length > 0) throw new UsageError(`Unexpected arguments: ${rest.join(" ")}\n${USAGE}`);

    switch (command) {
      case "calculate": {
        const reader = createConsoleReader();
        try {
          await runCalculator(reader, path.resolve(cwd, config.csvFile));
        } finally {
          reader.close();
        }
        return 0;
      }
      case "archive":
        await archiveCsvFiles({
          sourceDir: cwd,
          archiveDir: path.resolve(cwd, config.archiveDir),
          logFile: path.resolve(cwd, config.archiveLog),
        });
        return 0;
      case "-h":
      case "--help":
        console.log(`${config.appName}\n${USAGE}`);
        return 0;
      default:
        throw new UsageError(`Unknown command "${command}"\n${USAGE}`);
    }
  } catch (err) {
    return handleFatal(err);
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
