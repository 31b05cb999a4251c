import type { Dependency, DependencyFile } from "../../core/dependency.js";
import type { FileUpdater } from "../../app/updater/ports.js";

import { DEPENDENCY_SECTIONS, MANIFEST_NAME } from "./package-json-parser.js";

/**
 * Rewrites requirement strings in package.json files.
 * Returns only the files whose content changed; key order, indentation and
 * the trailing newline of the original are kept.
 */
export class PackageJsonFileUpdater implements FileUpdater {
  update(input: { dependencies: Dependency[]; files: DependencyFile[] }): DependencyFile[] {
    const updated: DependencyFile[] = [];

    for (const file of input.files) {
      if (file.name !== MANIFEST_NAME) continue;

      const relevant = input.dependencies.filter((dep) => dep.directory === file.directory);
      if (relevant.length === 0) continue;

      const content = rewriteManifest(file.content, relevant);
      if (content !== file.content) {
        updated.push({ ...file, content, operation: "update" });
      }
    }

    return updated;
  }
}

function rewriteManifest(content: string, dependencies: Dependency[]): string {
  const doc: unknown = JSON.parse(content);
  if (!isRecord(doc)) {
    throw new Error(`${MANIFEST_NAME} must contain a JSON object`);
  }

  for (const dep of dependencies) {
    for (const req of dep.requirements) {
      if (req.file !== MANIFEST_NAME || req.requirement === null) continue;

      for (const section of DEPENDENCY_SECTIONS) {
        if (!req.groups.includes(section)) continue;
        const entries = doc[section];
        if (isRecord(entries) && typeof entries[dep.name] === "string") {
          entries[dep.name] = req.requirement;
        }
      }
    }
  }

  const trailingNewline = content.endsWith("\n") ? "\n" : "";
  return `${JSON.stringify(doc, null, detectIndent(content))}${trailingNewline}`;
}

function detectIndent(content: string): string | number {
  const match = /^[ \t]+(?=")/m.exec(content);
  return match ? match[0] : 2;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
