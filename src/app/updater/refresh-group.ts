/**
 * Refreshes the pull request that carries one dependency group.
 * Purpose: recompute the group's change on the current branch head and
 * create, update, replace, supersede or close its pull request.
 * Assumptions: one refresh at a time per snapshot; the gateway is the only
 * place anything becomes externally visible.
 * Usage: new RefreshGroupPullRequest({ job, snapshot, ports }).perform().
 */

import { filePath } from "../../core/dependency.js";
import { DependencyChange, emptyChange } from "../../core/dependency-change.js";
import type { DependencyGroup } from "../../core/dependency-group.js";
import type { DependencySnapshot } from "../../core/dependency-snapshot.js";
import {
  ConfigurationAnomalyError,
  GatewayError,
  UpdaterError,
  UpstreamCollaboratorError,
  type GatewayAction,
} from "../../core/errors.js";
import {
  existingDependencyNames,
  type ExistingPullRequest,
} from "../../core/existing-pull-request.js";
import { EXPERIMENTS } from "../../core/experiments.js";
import type { Job } from "../../core/job.js";
import { logUpdaterEvent, withDefaults, type EventLogger } from "../../core/logger.js";

import { compileDirectoryChange } from "./change-compiler.js";
import { mergeDirectoryChanges } from "./change-merger.js";
import { claimSiblingGroupDependencies } from "./claim-scan.js";
import { handleRefreshError } from "./error-handler.js";
import type { Awaitable, CloseReason, UpdaterPorts } from "./ports.js";
import {
  decidePullRequestAction,
  describeAction,
  type PullRequestAction,
} from "./pr-decision.js";

// =============================================================================
// TYPES
// =============================================================================

export type RefreshPorts = Pick<
  UpdaterPorts,
  "updateCheckers" | "fileUpdater" | "gateway" | "errorReporter" | "logger"
>;

export type RefreshGroupInput = {
  job: Job;
  snapshot: DependencySnapshot;
  ports: RefreshPorts;
  // Defaults to the job's dependency_group_to_refresh.
  groupName?: string;
  signal?: AbortSignal;
};

export type RefreshOutcome = {
  group: string;
  action: PullRequestAction;
  dependencyNames: string[];
  // False when the action needed nothing from the gateway (a close with nothing to close).
  executed: boolean;
};

const UNKNOWN_GROUP = "unknown";

// =============================================================================
// OPERATION
// =============================================================================

export class RefreshGroupPullRequest {
  static readonly tagName = "update_version_group_pr";

  /**
   * Whether a job describes a group refresh at all. Without the dependencies of
   * the existing pull request and the group that created it there is nothing to act on.
   */
  static appliesTo(job: Job): boolean {
    if (!job.dependencies || job.dependencies.length === 0) return false;
    if (!job.dependencyGroupToRefresh) return false;
    if (
      job.securityUpdatesOnly &&
      job.experiments.enabled(EXPERIMENTS.groupedSecurityUpdatesDisabled)
    ) {
      return false;
    }

    if (job.hasMultipleDirectories()) return true;

    if (job.securityUpdatesOnly) {
      if (job.dependencies.length > 1) return true;
      return job.dependencyGroups.some((group) => group.appliesTo === "security-updates");
    }

    return job.updatingAPullRequest;
  }

  private readonly job: Job;
  private readonly snapshot: DependencySnapshot;
  private readonly ports: RefreshPorts;
  private readonly groupName: string | null;
  private readonly signal?: AbortSignal;
  private readonly logger: EventLogger;

  constructor(input: RefreshGroupInput) {
    this.job = input.job;
    this.snapshot = input.snapshot;
    this.ports = input.ports;
    this.groupName = input.groupName ?? input.job.dependencyGroupToRefresh;
    this.signal = input.signal;
    this.logger = withDefaults(input.ports.logger, { jobId: input.job.id });
  }

  async perform(): Promise<RefreshOutcome> {
    const group = this.groupName === null ? null : this.snapshot.findGroup(this.groupName);
    if (!group) {
      return this.closeMissingGroup(this.groupName ?? UNKNOWN_GROUP);
    }

    const logger = withDefaults(this.logger, { group: group.name });
    logUpdaterEvent(logger, "refresh.start", {
      message: `Updating the '${group.name}' group for ${this.job.source.repo}`,
      payload: { directories: this.snapshot.directories },
    });

    try {
      const existing = await this.lookupExistingPullRequest(group.name);
      const groupMemberCount = this.snapshot.groupMembers(group).length;

      let change: DependencyChange;
      if (groupMemberCount === 0) {
        // Members were removed from the project or are no longer allowed by config.
        logUpdaterEvent(logger, "group.empty", {
          level: "warn",
          message: `The '${group.name}' group has no eligible dependencies`,
        });
        change = emptyChange(group);
      } else {
        await claimSiblingGroupDependencies({
          snapshot: this.snapshot,
          jobGroup: group,
          gateway: this.ports.gateway,
          logger,
        });
        change = await this.compileChange(group, logger);
        this.snapshot.addHandledDependencies(change.dependencyNames());
      }

      const action = decidePullRequestAction({ change, existing, groupMemberCount });
      logUpdaterEvent(logger, "decision", {
        message: describeAction(action),
        payload: {
          action: action.kind,
          dependencies: change.dependencyNames(),
          existing: existing ? existingDependencyNames(existing) : null,
          group_member_count: groupMemberCount,
        },
      });

      return await this.execute({ action, change, group, existing, logger });
    } catch (error) {
      handleRefreshError({
        error,
        job: this.job,
        group,
        errorReporter: this.ports.errorReporter,
        logger,
      });
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Compilation
  // ---------------------------------------------------------------------------

  private async compileChange(group: DependencyGroup, logger: EventLogger): Promise<DependencyChange> {
    const changes: DependencyChange[] = [];

    // Sequential on purpose: merge de-duplication relies on directory order.
    for (const directory of this.snapshot.directories) {
      this.signal?.throwIfAborted();
      this.snapshot.currentDirectory = directory;
      changes.push(
        await compileDirectoryChange({
          snapshot: this.snapshot,
          group,
          updateCheckers: this.ports.updateCheckers,
          fileUpdater: this.ports.fileUpdater,
          logger,
        }),
      );
    }

    const merged = mergeDirectoryChanges(changes) ?? emptyChange(group);
    logUpdaterEvent(logger, "change.merged", {
      payload: {
        dependencies: merged.dependencyNames(),
        files: merged.updatedDependencyFiles.map(filePath),
      },
    });
    return merged;
  }

  // ---------------------------------------------------------------------------
  // Gateway actions
  // ---------------------------------------------------------------------------

  private async execute(input: {
    action: PullRequestAction;
    change: DependencyChange;
    group: DependencyGroup;
    existing: ExistingPullRequest | null;
    logger: EventLogger;
  }): Promise<RefreshOutcome> {
    const { action, change, group, existing, logger } = input;
    const baseCommitSha = this.snapshot.jobBaseCommitSha;
    const outcome = (dependencyNames: string[], executed = true): RefreshOutcome => ({
      group: group.name,
      action,
      dependencyNames,
      executed,
    });

    switch (action.kind) {
      case "create":
      case "supersede":
        await this.createPullRequest(change, baseCommitSha, logger);
        return outcome(change.dependencyNames());
      case "update":
        logUpdaterEvent(logger, "pr.update", {
          message: `Updating pull request for '${group.name}'`,
        });
        await this.callGateway("update", () =>
          this.ports.gateway.updatePullRequest(change, baseCommitSha),
        );
        return outcome(change.dependencyNames());
      case "replace": {
        await this.closePullRequest(
          this.namesToClose(group, existing),
          action.closeReason,
          group.name,
          logger,
        );
        await this.createPullRequest(change, baseCommitSha, logger);
        return outcome(change.dependencyNames());
      }
      case "close": {
        const names = this.namesToClose(group, existing);
        const executed = await this.closePullRequest(names, action.reason, group.name, logger);
        return outcome(names, executed);
      }
    }
  }

  private async createPullRequest(
    change: DependencyChange,
    baseCommitSha: string,
    logger: EventLogger,
  ): Promise<void> {
    logUpdaterEvent(logger, "pr.create", {
      message: `Creating a new pull request for '${change.group?.name ?? UNKNOWN_GROUP}'`,
      payload: { dependencies: change.dependencyNames(), base_commit_sha: baseCommitSha },
    });
    await this.callGateway("create", () =>
      this.ports.gateway.createPullRequest(change, baseCommitSha),
    );
  }

  private async closePullRequest(
    dependencyNames: string[],
    reason: CloseReason,
    groupName: string,
    logger: EventLogger,
  ): Promise<boolean> {
    const reasonText = reason.replace(/_/g, " ");
    if (dependencyNames.length === 0) {
      logUpdaterEvent(logger, "pr.close", {
        level: "warn",
        message: `No pull request is known for the ${groupName} group; nothing to close (${reasonText})`,
        payload: { reason, skipped: true },
      });
      return false;
    }

    logUpdaterEvent(logger, "pr.close", {
      message: `Telling backend to close pull request for the ${groupName} group (${dependencyNames.join(", ")}) - ${reasonText}`,
      payload: { reason, dependencies: dependencyNames },
    });
    await this.callGateway("close", () =>
      this.ports.gateway.closePullRequest(dependencyNames, reason),
    );
    return true;
  }

  // The job lists the dependencies of the PR it was raised for; other groups rely on the record.
  private namesToClose(group: DependencyGroup, existing: ExistingPullRequest | null): string[] {
    if (group.name === this.job.dependencyGroupToRefresh && this.job.dependencies?.length) {
      return [...this.job.dependencies];
    }
    return existing ? existingDependencyNames(existing) : [];
  }

  private async callGateway<T>(action: GatewayAction, fn: () => Awaitable<T>): Promise<T> {
    this.signal?.throwIfAborted();
    try {
      return await fn();
    } catch (err) {
      if (err instanceof UpdaterError) throw err;
      throw new GatewayError(`Service gateway failed to ${action} pull request`, action, err);
    }
  }

  private async lookupExistingPullRequest(groupName: string): Promise<ExistingPullRequest | null> {
    try {
      return await this.ports.gateway.existingPullRequestFor(groupName);
    } catch (err) {
      if (err instanceof UpdaterError) throw err;
      throw new UpstreamCollaboratorError(
        `Failed to look up the open pull request for ${groupName}`,
        "service-gateway",
        {},
        err,
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Malformed state
  // ---------------------------------------------------------------------------

  // Job and configuration drifted apart; close what was open under that name instead of failing.
  private async closeMissingGroup(groupName: string): Promise<RefreshOutcome> {
    const logger = withDefaults(this.logger, { group: groupName });
    logUpdaterEvent(logger, "group.missing", {
      level: "warn",
      message: `The '${groupName}' group has been removed from the update config.`,
    });

    this.ports.errorReporter.captureException({
      error: new ConfigurationAnomalyError("Attempted to refresh a missing group."),
      job: this.job,
      group: null,
    });

    const action: PullRequestAction = { kind: "close", reason: "dependency_group_empty" };
    try {
      const names = await this.namesForMissingGroup(groupName);
      const executed = await this.closePullRequest(names, action.reason, groupName, logger);
      return { group: groupName, action, dependencyNames: names, executed };
    } catch (error) {
      handleRefreshError({
        error,
        job: this.job,
        group: null,
        errorReporter: this.ports.errorReporter,
        logger,
      });
      throw error;
    }
  }

  // Only the job's own group may fall back to the job's dependency list.
  private async namesForMissingGroup(groupName: string): Promise<string[]> {
    if (groupName === this.job.dependencyGroupToRefresh && this.job.dependencies?.length) {
      return [...this.job.dependencies];
    }
    if (groupName === UNKNOWN_GROUP) return [];
    const existing = await this.lookupExistingPullRequest(groupName);
    return existing ? existingDependencyNames(existing) : [];
  }
}
