import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import { normalizeDirectory, type DependencyFile } from "../../core/dependency.js";
import { uniqueInOrder } from "../../core/utils.js";
import type { FetchedFiles, FileFetcher } from "../../app/updater/ports.js";

import { MANIFEST_NAME } from "./package-json-parser.js";

export const LOCAL_COMMIT_SHA = "local-working-tree";

export type LocalFileFetcherOptions = {
  repoRoot: string;
  commit?: string | null;
  manifestNames?: string[];
};

/** Reads dependency files from a checkout on disk instead of a hosting provider. */
export class LocalFileFetcher implements FileFetcher {
  private readonly repoRoot: string;
  private readonly commit: string;
  private readonly manifestNames: string[];

  constructor(options: LocalFileFetcherOptions) {
    this.repoRoot = path.resolve(options.repoRoot);
    this.commit = options.commit ?? LOCAL_COMMIT_SHA;
    this.manifestNames = options.manifestNames ?? [MANIFEST_NAME];
  }

  // Literal directories keep their position; glob matches are sorted in place of the pattern.
  async resolveDirectories(patterns: string[]): Promise<string[]> {
    const resolved: string[] = [];

    for (const pattern of patterns) {
      const normalized = normalizeDirectory(pattern);
      const relative = normalized.replace(/^\/+/, "");

      if (relative === "" || !fg.isDynamicPattern(relative)) {
        resolved.push(normalized);
        continue;
      }

      const matches = await fg(relative, {
        cwd: this.repoRoot,
        onlyDirectories: true,
        ignore: ["**/node_modules/**", "**/.git/**"],
      });
      resolved.push(...matches.sort().map((match) => normalizeDirectory(match)));
    }

    return uniqueInOrder(resolved);
  }

  async fetch(directory: string): Promise<FetchedFiles> {
    const normalized = normalizeDirectory(directory);
    const absoluteDir = path.join(this.repoRoot, normalized);
    const files: DependencyFile[] = [];

    for (const name of this.manifestNames) {
      const filePath = path.join(absoluteDir, name);
      if (!(await fse.pathExists(filePath))) continue;
      files.push({ directory: normalized, name, content: await fse.readFile(filePath, "utf8") });
    }

    if (files.length === 0) {
      throw new Error(`No dependency files (${this.manifestNames.join(", ")}) in ${absoluteDir}`);
    }

    return { files, baseCommitSha: this.commit };
  }
}
