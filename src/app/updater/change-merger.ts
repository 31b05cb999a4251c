import { fileKey, type Dependency, type DependencyFile } from "../../core/dependency.js";
import { DependencyChange } from "../../core/dependency-change.js";

/**
 * Combines one change per directory into a single change.
 *
 * Dependencies: concatenated in directory order and de-duplicated by name;
 * the first directory to touch a dependency decides its reported version.
 * Files: keyed by (directory, name) so equal paths in different directories
 * never collide; a key produced twice keeps the last content.
 */
export function mergeDirectoryChanges(changes: DependencyChange[]): DependencyChange | null {
  const [first, ...rest] = changes;
  if (!first) return null;
  if (rest.length === 0) return first;

  const dependencies = new Map<string, Dependency>();
  const files = new Map<string, DependencyFile>();

  for (const change of changes) {
    for (const dep of change.updatedDependencies) {
      if (!dependencies.has(dep.name)) dependencies.set(dep.name, dep);
    }
    for (const file of change.updatedDependencyFiles) {
      files.set(fileKey(file), file);
    }
  }

  return new DependencyChange({
    updatedDependencies: Array.from(dependencies.values()),
    updatedDependencyFiles: Array.from(files.values()),
    group: first.group,
  });
}
