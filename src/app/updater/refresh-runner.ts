import type { DependencySnapshot } from "../../core/dependency-snapshot.js";
import { formatErrorMessage } from "../../core/error-format.js";
import type { Job } from "../../core/job.js";
import { logUpdaterEvent } from "../../core/logger.js";

import { RefreshGroupPullRequest, type RefreshOutcome, type RefreshPorts } from "./refresh-group.js";

// =============================================================================
// TYPES
// =============================================================================

export type GroupRefreshResult =
  | { group: string; status: "ok"; outcome: RefreshOutcome }
  | { group: string; status: "failed"; error: unknown };

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Refreshes several groups against one snapshot, in order.
 * The handled set carries over, so an earlier group's claims bind later ones.
 * A failing group is recorded (the operation already logged and reported it)
 * and the next group still runs.
 */
export async function refreshGroups(input: {
  job: Job;
  snapshot: DependencySnapshot;
  ports: RefreshPorts;
  groupNames: string[];
  signal?: AbortSignal;
}): Promise<GroupRefreshResult[]> {
  const results: GroupRefreshResult[] = [];

  for (const groupName of input.groupNames) {
    input.signal?.throwIfAborted();

    const operation = new RefreshGroupPullRequest({
      job: input.job,
      snapshot: input.snapshot,
      ports: input.ports,
      groupName,
      signal: input.signal,
    });

    try {
      results.push({ group: groupName, status: "ok", outcome: await operation.perform() });
    } catch (error) {
      if (input.signal?.aborted) throw error;
      logUpdaterEvent(input.ports.logger, "runner.group_failed", {
        level: "warn",
        group: groupName,
        message: `Continuing after the '${groupName}' group failed: ${formatErrorMessage(error)}`,
      });
      results.push({ group: groupName, status: "failed", error });
    }
  }

  return results;
}
