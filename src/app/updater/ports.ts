/**
 * Updater ports define the boundary between the refresh core and its collaborators.
 * Purpose: make every external capability explicit and replaceable for testing.
 * Assumptions: collaborators may retry internally; the core never does.
 * Usage: implement in `src/adapters/*` (or test fakes) and pass via UpdaterPorts.
 */

import type { Dependency, DependencyFile } from "../../core/dependency.js";
import type { DependencyChange } from "../../core/dependency-change.js";
import type { DependencyGroup } from "../../core/dependency-group.js";
import type { ExistingPullRequest } from "../../core/existing-pull-request.js";
import type { Job } from "../../core/job.js";
import type { EventLogger } from "../../core/logger.js";

export type Awaitable<T> = T | Promise<T>;

// =============================================================================
// ECOSYSTEM
// =============================================================================

export type FetchedFiles = {
  files: DependencyFile[];
  baseCommitSha: string;
};

export interface FileFetcher {
  // Expands directory patterns (globs) into concrete directories, in order.
  resolveDirectories(patterns: string[]): Awaitable<string[]>;
  fetch(directory: string): Awaitable<FetchedFiles>;
}

export interface DependencyParser {
  parse(files: DependencyFile[]): Awaitable<Dependency[]>;
}

export type RequirementsUnlock = "none" | "own" | "all";

export type RequirementsToUnlock = RequirementsUnlock | "update_not_possible";

export interface UpdateChecker {
  isUpToDate(): Awaitable<boolean>;
  // False when the declared requirement cannot, or need not, be loosened.
  requirementsUnlockedOrCanBe(): Awaitable<boolean>;
  canUpdate(requirementsToUnlock: RequirementsUnlock): Awaitable<boolean>;
  updatedDependencies(requirementsToUnlock: RequirementsUnlock): Awaitable<Dependency[]>;
}

export interface UpdateCheckerFactory {
  create(input: { dependency: Dependency; files: DependencyFile[] }): UpdateChecker;
}

export interface FileUpdater {
  update(input: {
    dependencies: Dependency[];
    files: DependencyFile[];
  }): Awaitable<DependencyFile[]>;
}

// =============================================================================
// SERVICE
// =============================================================================

export type CloseReason =
  | "dependency_group_empty"
  | "update_no_longer_possible"
  | "dependencies_changed";

export interface ServiceGateway {
  existingPullRequestFor(groupName: string): Awaitable<ExistingPullRequest | null>;
  createPullRequest(change: DependencyChange, baseCommitSha: string): Awaitable<void>;
  updatePullRequest(change: DependencyChange, baseCommitSha: string): Awaitable<void>;
  closePullRequest(dependencyNames: string[], reason: CloseReason): Awaitable<void>;
}

export interface ErrorReporter {
  captureException(input: { error: unknown; job: Job; group?: DependencyGroup | null }): void;
}

// =============================================================================
// AGGREGATE
// =============================================================================

export type UpdaterPorts = {
  fileFetcher: FileFetcher;
  dependencyParser: DependencyParser;
  updateCheckers: UpdateCheckerFactory;
  fileUpdater: FileUpdater;
  gateway: ServiceGateway;
  errorReporter: ErrorReporter;
  logger: EventLogger;
};
