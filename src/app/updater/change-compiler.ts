/**
 * Change compiler: turns one group's outdated dependencies in one directory into a change.
 * Purpose: drive update checkers and the file updater dependency by dependency.
 * Assumptions: the caller has already pointed the snapshot at the directory.
 * Usage: compileDirectoryChange({ snapshot, group, ports }) per directory, then merge.
 */

import {
  describeDependency,
  fileKey,
  overlayFiles,
  type Dependency,
  type DependencyFile,
} from "../../core/dependency.js";
import { DependencyChange } from "../../core/dependency-change.js";
import type { DependencyGroup } from "../../core/dependency-group.js";
import type { DependencySnapshot } from "../../core/dependency-snapshot.js";
import {
  UpdaterError,
  UpstreamCollaboratorError,
  type CollaboratorName,
} from "../../core/errors.js";
import { logUpdaterEvent, type EventLogger } from "../../core/logger.js";

import type { Awaitable, UpdateCheckerFactory, FileUpdater } from "./ports.js";
import { requirementsToUnlock } from "./requirements.js";

// =============================================================================
// TYPES
// =============================================================================

export type CompileDirectoryInput = {
  snapshot: DependencySnapshot;
  group: DependencyGroup;
  updateCheckers: UpdateCheckerFactory;
  fileUpdater: FileUpdater;
  logger: EventLogger;
};

export type DependencySkipReason =
  | "up_to_date"
  | "update_not_possible"
  | "no_version_change"
  | "already_updated";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function compileDirectoryChange(input: CompileDirectoryInput): Promise<DependencyChange> {
  const { snapshot, group, logger } = input;
  const directory = snapshot.currentDirectory;

  const candidates = snapshot.allowedDependencies.filter(
    (dep) => group.contains(dep) && !snapshot.isHandled(dep.name),
  );

  logUpdaterEvent(logger, "directory.compile", {
    group: group.name,
    payload: { directory, candidates: candidates.map((dep) => dep.name) },
  });

  let workingFiles: DependencyFile[] = snapshot.dependencyFiles;
  const updatedDependencies = new Map<string, Dependency>();
  const updatedFiles = new Map<string, DependencyFile>();

  for (const dependency of candidates) {
    const details = { dependency: dependency.name, directory };

    // An earlier update in this directory already moved it (e.g. as an unlocked peer).
    if (updatedDependencies.has(dependency.name)) {
      logSkip(logger, group, dependency, "already_updated");
      continue;
    }

    const checker = await callCollaborator("update-checker", details, () =>
      input.updateCheckers.create({ dependency, files: workingFiles }),
    );

    if (await callCollaborator("update-checker", details, () => checker.isUpToDate())) {
      logSkip(logger, group, dependency, "up_to_date");
      continue;
    }

    const unlock = await callCollaborator("update-checker", details, () =>
      requirementsToUnlock(checker),
    );
    if (unlock === "update_not_possible") {
      logSkip(logger, group, dependency, "update_not_possible");
      continue;
    }

    const dependencies = await callCollaborator("update-checker", details, () =>
      checker.updatedDependencies(unlock),
    );
    const primary = dependencies.find((dep) => dep.name === dependency.name) ?? dependencies[0];
    if (!primary || primary.version === primary.previousVersion) {
      logSkip(logger, group, dependency, "no_version_change");
      continue;
    }

    const files = await callCollaborator("file-updater", details, () =>
      input.fileUpdater.update({ dependencies, files: workingFiles }),
    );

    workingFiles = overlayFiles(workingFiles, files);
    for (const file of files) updatedFiles.set(fileKey(file), file);
    for (const dep of dependencies) {
      if (!updatedDependencies.has(dep.name)) updatedDependencies.set(dep.name, dep);
    }

    logUpdaterEvent(logger, "dependency.update", {
      group: group.name,
      message: describeDependency(primary),
      payload: {
        directory,
        dependency: dependency.name,
        requirements_to_unlock: unlock,
        files: files.map((file) => file.name),
      },
    });
  }

  return new DependencyChange({
    updatedDependencies: Array.from(updatedDependencies.values()),
    updatedDependencyFiles: Array.from(updatedFiles.values()),
    group,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function callCollaborator<T>(
  collaborator: CollaboratorName,
  details: { dependency: string; directory: string },
  fn: () => Awaitable<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof UpdaterError) throw err;
    throw new UpstreamCollaboratorError(
      `${collaborator} failed for ${details.dependency} in ${details.directory}`,
      collaborator,
      details,
      err,
    );
  }
}

function logSkip(
  logger: EventLogger,
  group: DependencyGroup,
  dependency: Dependency,
  reason: DependencySkipReason,
): void {
  logUpdaterEvent(logger, "dependency.skip", {
    level: "debug",
    group: group.name,
    payload: { dependency: dependency.name, directory: dependency.directory, reason },
  });
}
