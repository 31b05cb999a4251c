import { z } from "zod";

import {
  filePath,
  type Dependency,
  type DependencyFile,
  type DependencyRequirement,
} from "../../core/dependency.js";
import { formatIssues } from "../../core/config-loader.js";
import type { DependencyParser } from "../../app/updater/ports.js";

import { requirementBaseVersion } from "./versions.js";

export const MANIFEST_NAME = "package.json";

export const DEPENDENCY_SECTIONS = [
  "dependencies",
  "devDependencies",
  "optionalDependencies",
] as const;

export type DependencySection = (typeof DEPENDENCY_SECTIONS)[number];

const ManifestSchema = z
  .object({
    dependencies: z.record(z.string(), z.string()).optional(),
    devDependencies: z.record(z.string(), z.string()).optional(),
    optionalDependencies: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

export class PackageJsonParser implements DependencyParser {
  constructor(private readonly packageManager = "npm_and_yarn") {}

  parse(files: DependencyFile[]): Dependency[] {
    const manifest = files.find((file) => file.name === MANIFEST_NAME);
    if (!manifest) {
      throw new Error(`No ${MANIFEST_NAME} among the fetched files`);
    }

    let doc: unknown;
    try {
      doc = JSON.parse(manifest.content);
    } catch (err) {
      throw new Error(`${filePath(manifest)} is not valid JSON`, { cause: err });
    }

    const parsed = ManifestSchema.safeParse(doc);
    if (!parsed.success) {
      throw new Error(
        `${filePath(manifest)} is not a valid manifest:\n${formatIssues(parsed.error.issues)}`,
      );
    }

    // One dependency per name, even when it appears in several sections.
    const byName = new Map<string, Dependency>();
    for (const section of DEPENDENCY_SECTIONS) {
      for (const [name, requirement] of Object.entries(parsed.data[section] ?? {})) {
        const entry: DependencyRequirement = {
          file: MANIFEST_NAME,
          requirement,
          groups: [section],
        };

        const existing = byName.get(name);
        if (existing) {
          existing.requirements.push(entry);
          continue;
        }

        byName.set(name, {
          name,
          version: requirementBaseVersion(requirement),
          requirements: [entry],
          packageManager: this.packageManager,
          directory: manifest.directory,
          topLevel: true,
        });
      }
    }

    return Array.from(byName.values());
  }
}
