import { minimatch } from "minimatch";

import { dependencyType, type Dependency, type DependencyType } from "./dependency.js";

// =============================================================================
// TYPES
// =============================================================================

export type GroupAppliesTo = "version-updates" | "security-updates";

export type DependencyGroupRules = {
  patterns?: string[];
  excludePatterns?: string[];
  dependencyType?: DependencyType;
};

// =============================================================================
// GROUP
// =============================================================================

/**
 * A named, predicate-defined subset of a project's dependencies.
 * Groups are immutable for the lifetime of a job; overlapping groups are
 * allowed and resolved at run time through the snapshot's handled set.
 */
export class DependencyGroup {
  readonly name: string;
  readonly appliesTo: GroupAppliesTo;
  readonly rules: Readonly<DependencyGroupRules>;

  constructor(input: { name: string; appliesTo?: GroupAppliesTo; rules?: DependencyGroupRules }) {
    this.name = input.name;
    this.appliesTo = input.appliesTo ?? "version-updates";
    this.rules = Object.freeze({ ...(input.rules ?? {}) });
  }

  contains(dependency: Dependency): boolean {
    if (!this.matchesPatterns(dependency.name)) return false;
    if (this.matchesExcludePatterns(dependency.name)) return false;

    if (this.rules.dependencyType && dependencyType(dependency) !== this.rules.dependencyType) {
      return false;
    }

    return true;
  }

  private matchesPatterns(name: string): boolean {
    const patterns = this.rules.patterns ?? [];
    if (patterns.length === 0) return true;
    return patterns.some((pattern) => matchName(name, pattern));
  }

  private matchesExcludePatterns(name: string): boolean {
    const patterns = this.rules.excludePatterns ?? [];
    return patterns.some((pattern) => matchName(name, pattern));
  }
}

// A bare "*" means every dependency, including scoped names with a slash.
function matchName(name: string, pattern: string): boolean {
  if (pattern === "*") return true;
  return minimatch(name, pattern, { nocase: true, dot: true });
}
