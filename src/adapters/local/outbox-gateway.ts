/**
 * Service gateway that records pull request actions instead of calling a hosting provider.
 * Purpose: run refreshes end-to-end locally and review what would have happened.
 * Assumptions: open pull requests come from the job file and do not change mid-run.
 * Usage: new OutboxGateway({ outboxPath, existing: job.existingGroupPullRequests, logger }).
 */

import { filePath } from "../../core/dependency.js";
import type { DependencyChange } from "../../core/dependency-change.js";
import type { ExistingPullRequest } from "../../core/existing-pull-request.js";
import { logUpdaterEvent, type EventLogger } from "../../core/logger.js";
import { renderPullRequestMessage } from "../../core/pr-message.js";
import { appendJsonLine, isoNow } from "../../core/utils.js";
import type { CloseReason, ServiceGateway } from "../../app/updater/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type OutboxDependency = {
  name: string;
  version: string | null;
  previous_version: string | null;
  directory: string;
};

export type OutboxRecord =
  | {
      ts: string;
      action: "create" | "update";
      group: string | null;
      base_commit_sha: string;
      title: string;
      body: string;
      dependencies: OutboxDependency[];
      files: string[];
    }
  | {
      ts: string;
      action: "close";
      dependencies: string[];
      reason: CloseReason;
    };

export type OutboxGatewayOptions = {
  // When null nothing is written; records are kept in memory only.
  outboxPath: string | null;
  existing: ExistingPullRequest[];
  logger: EventLogger;
  now?: () => string;
};

// =============================================================================
// GATEWAY
// =============================================================================

export class OutboxGateway implements ServiceGateway {
  readonly records: OutboxRecord[] = [];

  private readonly existing: Map<string, ExistingPullRequest>;
  private readonly now: () => string;

  constructor(private readonly options: OutboxGatewayOptions) {
    this.existing = new Map(options.existing.map((record) => [record.groupName, record]));
    this.now = options.now ?? isoNow;
  }

  existingPullRequestFor(groupName: string): ExistingPullRequest | null {
    return this.existing.get(groupName) ?? null;
  }

  async createPullRequest(change: DependencyChange, baseCommitSha: string): Promise<void> {
    await this.recordChange("create", change, baseCommitSha);
  }

  async updatePullRequest(change: DependencyChange, baseCommitSha: string): Promise<void> {
    await this.recordChange("update", change, baseCommitSha);
  }

  async closePullRequest(dependencyNames: string[], reason: CloseReason): Promise<void> {
    await this.append({ ts: this.now(), action: "close", dependencies: dependencyNames, reason });
  }

  private async recordChange(
    action: "create" | "update",
    change: DependencyChange,
    baseCommitSha: string,
  ): Promise<void> {
    if (change.isEmpty) {
      throw new Error(`Refusing to ${action} a pull request without dependency updates`);
    }

    const message = await renderPullRequestMessage(change);
    await this.append({
      ts: this.now(),
      action,
      group: change.group?.name ?? null,
      base_commit_sha: baseCommitSha,
      title: message.title,
      body: message.body,
      dependencies: change.updatedDependencies.map((dep) => ({
        name: dep.name,
        version: dep.version,
        previous_version: dep.previousVersion ?? null,
        directory: dep.directory,
      })),
      files: change.updatedDependencyFiles.map(filePath),
    });
  }

  private async append(record: OutboxRecord): Promise<void> {
    this.records.push(record);
    if (this.options.outboxPath) {
      await appendJsonLine(this.options.outboxPath, record);
    }
    logUpdaterEvent(this.options.logger, "outbox.record", {
      level: "debug",
      payload: { action: record.action, outbox: this.options.outboxPath },
    });
  }
}
