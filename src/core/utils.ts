import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

/**
 * Run tags sort chronologically: `RUN_2024-01-31_08-05-09` (UTC).
 */
export function defaultRunTag(now: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const date = `${now.getUTCFullYear()}-${pad(now.getUTCMonth() + 1)}-${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}-${pad(now.getUTCMinutes())}-${pad(now.getUTCSeconds())}`;
  return `RUN_${date}_${time}`;
}

export function slugify(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fse.outputFile(filePath, content, "utf8");
}
