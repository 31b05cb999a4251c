/**
 * Pull request lifecycle decision for one group.
 * Purpose: map (change, existing PR, member count) to exactly one action.
 * Assumptions: pure; the caller performs whatever the decision names.
 */

import type { DependencyChange } from "../../core/dependency-change.js";
import {
  existingDependencyNames,
  existingTargetVersions,
  type ExistingPullRequest,
} from "../../core/existing-pull-request.js";

// =============================================================================
// TYPES
// =============================================================================

export type PullRequestAction =
  | { kind: "create" }
  | { kind: "update" }
  | { kind: "replace"; closeReason: "dependencies_changed" }
  // The hosting side closes the old PR once it sees the new one.
  | { kind: "supersede" }
  | { kind: "close"; reason: "dependency_group_empty" | "update_no_longer_possible" };

export type PullRequestActionKind = PullRequestAction["kind"];

export type PullRequestDecisionInput = {
  change: DependencyChange;
  existing: ExistingPullRequest | null;
  groupMemberCount: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function decidePullRequestAction(input: PullRequestDecisionInput): PullRequestAction {
  const { change, existing, groupMemberCount } = input;

  if (change.isEmpty) {
    return groupMemberCount === 0
      ? { kind: "close", reason: "dependency_group_empty" }
      : { kind: "close", reason: "update_no_longer_possible" };
  }

  if (!existing) {
    return { kind: "create" };
  }

  if (!sameNameSet(change.dependencyNames(), existingDependencyNames(existing))) {
    return { kind: "replace", closeReason: "dependencies_changed" };
  }

  return matchesTargetVersions(change, existing) ? { kind: "update" } : { kind: "supersede" };
}

export function describeAction(action: PullRequestAction): string {
  switch (action.kind) {
    case "create":
      return "create";
    case "update":
      return "update in place";
    case "replace":
      return `replace (${action.closeReason.replace(/_/g, " ")})`;
    case "supersede":
      return "supersede";
    case "close":
      return `close (${action.reason.replace(/_/g, " ")})`;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function sameNameSet(left: string[], right: string[]): boolean {
  const a = new Set(left);
  const b = new Set(right);
  if (a.size !== b.size) return false;
  for (const name of a) {
    if (!b.has(name)) return false;
  }
  return true;
}

function matchesTargetVersions(change: DependencyChange, existing: ExistingPullRequest): boolean {
  const recorded = existingTargetVersions(existing);
  for (const [name, version] of change.targetVersions()) {
    if (recorded.get(name) !== version) return false;
  }
  return true;
}
