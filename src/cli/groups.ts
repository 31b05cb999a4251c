import { loadJobConfig } from "../core/config-loader.js";
import type { DependencyGroup, DependencyGroupRules } from "../core/dependency-group.js";
import type { ExistingPullRequest } from "../core/existing-pull-request.js";
import { Job } from "../core/job.js";

export type GroupsCommandOptions = {
  jobPath: string;
  json?: boolean;
};

export function groupsCommand(options: GroupsCommandOptions): string[] {
  const job = new Job(loadJobConfig(options.jobPath));
  const existing = new Map(job.existingGroupPullRequests.map((pr) => [pr.groupName, pr]));

  if (options.json) {
    const rows = job.dependencyGroups.map((group) => ({
      name: group.name,
      applies_to: group.appliesTo,
      rules: serializeRules(group.rules),
      open_pull_request: existing.get(group.name)?.dependencies ?? null,
      refreshing: group.name === job.dependencyGroupToRefresh,
    }));
    return [JSON.stringify(rows, null, 2)];
  }

  if (job.dependencyGroups.length === 0) {
    return [`Job ${job.id} configures no dependency groups.`];
  }

  return job.dependencyGroups.map((group) =>
    formatGroupLine(group, existing.get(group.name) ?? null, job.dependencyGroupToRefresh),
  );
}

// Same keys as the job file.
function serializeRules(rules: Readonly<DependencyGroupRules>): Record<string, unknown> {
  return {
    patterns: rules.patterns,
    exclude_patterns: rules.excludePatterns,
    dependency_type: rules.dependencyType,
  };
}

function formatGroupLine(
  group: DependencyGroup,
  pr: ExistingPullRequest | null,
  refreshing: string | null,
): string {
  const marker = group.name === refreshing ? "*" : " ";
  const patterns = group.rules.patterns?.join(", ") ?? "*";
  const openPr = pr
    ? pr.dependencies.map((dep) => `${dep.name}@${dep.version ?? "?"}`).join(", ")
    : "no open pull request";
  return `${marker} ${group.name} [${group.appliesTo}] patterns: ${patterns} | ${openPr}`;
}
