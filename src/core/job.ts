import { minimatch } from "minimatch";

import type { AllowedUpdateConfig, JobConfig } from "./config.js";
import { dependencyType, normalizeDirectory, type Dependency } from "./dependency.js";
import { DependencyGroup } from "./dependency-group.js";
import {
  existingPullRequestFromConfig,
  type ExistingPullRequest,
} from "./existing-pull-request.js";
import { Experiments } from "./experiments.js";

// =============================================================================
// TYPES
// =============================================================================

export type JobSource = {
  provider: string;
  repo: string;
  branch: string | null;
  directory: string | null;
  directories: string[] | null;
  commit: string | null;
};

// =============================================================================
// JOB
// =============================================================================

/**
 * Read-only view of one update job.
 * Built once from a validated job file; nothing here changes during a run.
 */
export class Job {
  readonly id: string;
  readonly packageManager: string;
  readonly source: JobSource;
  readonly dependencies: string[] | null;
  readonly dependencyGroupToRefresh: string | null;
  readonly updatingAPullRequest: boolean;
  readonly securityUpdatesOnly: boolean;
  readonly experiments: Experiments;
  readonly dependencyGroups: DependencyGroup[];
  readonly existingGroupPullRequests: ExistingPullRequest[];

  private readonly allowedUpdates: AllowedUpdateConfig[];
  private readonly ignoredNames: string[];

  constructor(config: JobConfig) {
    this.id = config.id;
    this.packageManager = config.package_manager;
    this.source = {
      provider: config.source.provider,
      repo: config.source.repo,
      branch: config.source.branch ?? null,
      directory: config.source.directory ?? null,
      directories: config.source.directories ?? null,
      commit: config.source.commit ?? null,
    };
    this.dependencies = config.dependencies ?? null;
    this.dependencyGroupToRefresh = config.dependency_group_to_refresh ?? null;
    this.updatingAPullRequest = config.updating_a_pull_request;
    this.securityUpdatesOnly = config.security_updates_only;
    this.experiments = new Experiments(config.experiments);
    this.dependencyGroups = config.dependency_groups.map(
      (group) =>
        new DependencyGroup({
          name: group.name,
          appliesTo: group.applies_to,
          rules: {
            patterns: group.rules.patterns,
            excludePatterns: group.rules.exclude_patterns,
            dependencyType: group.rules.dependency_type,
          },
        }),
    );
    this.existingGroupPullRequests = config.existing_group_pull_requests.map(
      existingPullRequestFromConfig,
    );
    this.allowedUpdates = config.allowed_updates;
    this.ignoredNames = config.ignore_conditions.map((condition) => condition.dependency_name);
  }

  // Directory patterns as configured; callers expand globs through the file fetcher.
  directoryPatterns(): string[] {
    if (this.source.directories && this.source.directories.length > 0) {
      return this.source.directories.map(normalizeDirectory);
    }
    return [normalizeDirectory(this.source.directory ?? "/")];
  }

  hasMultipleDirectories(): boolean {
    return (this.source.directories?.length ?? 0) > 1;
  }

  allowedUpdate(dependency: Dependency): boolean {
    if (this.isIgnored(dependency)) return false;
    return this.allowedUpdates.some((rule) => matchesAllowedUpdate(rule, dependency));
  }

  isIgnored(dependency: Dependency): boolean {
    return this.ignoredNames.some((pattern) => minimatch(dependency.name, pattern, { nocase: true }));
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function matchesAllowedUpdate(rule: AllowedUpdateConfig, dependency: Dependency): boolean {
  if (rule.dependency_name && !minimatch(dependency.name, rule.dependency_name, { nocase: true })) {
    return false;
  }

  switch (rule.dependency_type) {
    case "all":
      return true;
    case "direct":
      return dependency.topLevel;
    case "indirect":
      return !dependency.topLevel;
    case "production":
      return dependency.topLevel && dependencyType(dependency) === "production";
    case "development":
      return dependency.topLevel && dependencyType(dependency) === "development";
  }
}
