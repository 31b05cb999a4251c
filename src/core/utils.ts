import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export async function appendJsonLine(filePath: string, data: unknown): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await fse.appendFile(filePath, `${JSON.stringify(data)}\n`, "utf8");
}

export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  return Array.from(new Set(values));
}
