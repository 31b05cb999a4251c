import type { Dependency, DependencyFile } from "./dependency.js";
import type { DependencyGroup } from "./dependency-group.js";

/**
 * The computed upgrades and resulting file edits for one group.
 * A change with no dependencies means "nothing updatable"; it may only
 * ever drive a close, never a create or an update.
 */
export class DependencyChange {
  readonly updatedDependencies: readonly Dependency[];
  readonly updatedDependencyFiles: readonly DependencyFile[];
  readonly group: DependencyGroup | null;

  constructor(input: {
    updatedDependencies: Dependency[];
    updatedDependencyFiles: DependencyFile[];
    group?: DependencyGroup | null;
  }) {
    this.updatedDependencies = Object.freeze([...input.updatedDependencies]);
    this.updatedDependencyFiles = Object.freeze([...input.updatedDependencyFiles]);
    this.group = input.group ?? null;
  }

  get groupedUpdate(): boolean {
    return this.group !== null;
  }

  get isEmpty(): boolean {
    return this.updatedDependencies.length === 0;
  }

  dependencyNames(): string[] {
    return this.updatedDependencies.map((dep) => dep.name);
  }

  // Directories the change touches, including updates that edited no file.
  directories(): string[] {
    return Array.from(
      new Set([
        ...this.updatedDependencies.map((dep) => dep.directory),
        ...this.updatedDependencyFiles.map((file) => file.directory),
      ]),
    );
  }

  // First occurrence wins, matching the order directories were compiled in.
  targetVersions(): Map<string, string | null> {
    const versions = new Map<string, string | null>();
    for (const dep of this.updatedDependencies) {
      if (!versions.has(dep.name)) versions.set(dep.name, dep.version);
    }
    return versions;
  }
}

export function emptyChange(group: DependencyGroup | null): DependencyChange {
  return new DependencyChange({ updatedDependencies: [], updatedDependencyFiles: [], group });
}
