import type { ExistingGroupPullRequestConfig } from "./config.js";
import { normalizeDirectory } from "./dependency.js";
import { uniqueInOrder } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExistingPullRequestDependency = {
  name: string;
  version: string | null;
  directory: string | null;
};

/** What the currently open pull request for a group claims. Read-only to the updater. */
export type ExistingPullRequest = {
  groupName: string;
  dependencies: ExistingPullRequestDependency[];
};

// =============================================================================
// HELPERS
// =============================================================================

export function existingPullRequestFromConfig(
  config: ExistingGroupPullRequestConfig,
): ExistingPullRequest {
  return {
    groupName: config.dependency_group_name,
    dependencies: config.dependencies.map((dep) => ({
      name: dep.dependency_name,
      version: dep.dependency_version ?? null,
      directory: dep.directory ? normalizeDirectory(dep.directory) : null,
    })),
  };
}

export function existingDependencyNames(record: ExistingPullRequest): string[] {
  return uniqueInOrder(record.dependencies.map((dep) => dep.name));
}

// A name recorded under several directories keeps its first version.
export function existingTargetVersions(record: ExistingPullRequest): Map<string, string | null> {
  const versions = new Map<string, string | null>();
  for (const dep of record.dependencies) {
    if (!versions.has(dep.name)) versions.set(dep.name, dep.version);
  }
  return versions;
}

export function existingDirectories(record: ExistingPullRequest): string[] {
  return uniqueInOrder(
    record.dependencies.flatMap((dep) => (dep.directory === null ? [] : [dep.directory])),
  );
}
