// src/scripts/archiveCsv.ts
import fs from "fs";
import path from "path";

export interface ArchiveOptions {
  sourceDir: string;
  archiveDir: string;
  logFile: string;
  now?: () => Date;
}

export interface ArchivedFile {
  original: string;
  archivedName: string;
  destination: string;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** YYYYMMDD-HHMMSS in local time */
export function fileTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}-` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  );
}

/** ISO-8601 local time with UTC offset, to the second (2026-10-18T09:30:00+02:00) */
export function isoSeconds(d: Date): string {
  const offsetMin = -d.getTimezoneOffset();
  const sign = offsetMin >= 0 ? "+" : "-";
  const abs = Math.abs(offsetMin);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}` +
    `T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

export const archivedName = (fileName: string, at: Date) =>
  `${path.basename(fileName, ".csv")}-${fileTimestamp(at)}.csv`;

export async function archiveCsvFiles({
  sourceDir,
  archiveDir,
  logFile,
  now = () => new Date(),
}: ArchiveOptions): Promise<ArchivedFile[]> {
  await fs.promises.mkdir(archiveDir, { recursive: true });

  const entries = await fs.promises.readdir(sourceDir, { withFileTypes: true });
  const csvFiles = entries
    .filter((e) => e.isFile() && e.name.endsWith(".csv"))
    .map((e) => e.name)
    .sort();

  if (csvFiles.length === 0) {
    console.log("No CSV files found to archive.");
    return [];
  }

  const archived: ArchivedFile[] = [];

  for (const fileName of csvFiles) {
    const source = path.join(sourceDir, fileName);
    const at = now();
    const newName = archivedName(fileName, at);
    const destination = path.join(archiveDir, newName);

    // log the contents before the file leaves the source directory
    const contents = await fs.promises.readFile(source, "utf-8");
    await fs.promises.appendFile(
      logFile,
      `[${isoSeconds(at)}] ${fileName} -> ${newName}\n${contents}\n`
    );

    await fs.promises.rename(source, destination);
    console.log(`Archived ${fileName} -> ${destination}`);
    archived.push({ original: fileName, archivedName: newName, destination });
  }

  return archived;
}
