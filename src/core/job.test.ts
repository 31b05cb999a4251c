import { describe, expect, it } from "vitest";

import { JobConfigSchema, type JobConfigInput } from "./config.js";
import type { Dependency } from "./dependency.js";
import { EXPERIMENTS } from "./experiments.js";
import { Job } from "./job.js";

function buildJob(overrides: Partial<JobConfigInput> = {}): Job {
  return new Job(JobConfigSchema.parse({ id: "job-1", source: { repo: "example/app" }, ...overrides }));
}

function dep(name: string, options: { topLevel?: boolean; section?: string } = {}): Dependency {
  return {
    name,
    version: "1.0.0",
    requirements: [
      { file: "package.json", requirement: "^1.0.0", groups: [options.section ?? "dependencies"] },
    ],
    packageManager: "npm_and_yarn",
    directory: "/",
    topLevel: options.topLevel ?? true,
  };
}

describe("Job", () => {
  it("applies schema defaults", () => {
    const job = buildJob();

    expect(job.packageManager).toBe("npm_and_yarn");
    expect(job.source).toEqual({
      provider: "github",
      repo: "example/app",
      branch: null,
      directory: null,
      directories: null,
      commit: null,
    });
    expect(job.dependencies).toBeNull();
    expect(job.dependencyGroupToRefresh).toBeNull();
    expect(job.updatingAPullRequest).toBe(false);
    expect(job.dependencyGroups).toEqual([]);
    expect(job.existingGroupPullRequests).toEqual([]);
  });

  it("maps group rules and existing pull requests", () => {
    const job = buildJob({
      dependency_groups: [
        {
          name: "dev",
          applies_to: "security-updates",
          rules: { patterns: ["*"], exclude_patterns: ["typescript"], dependency_type: "development" },
        },
      ],
      existing_group_pull_requests: [
        {
          dependency_group_name: "dev",
          dependencies: [
            { dependency_name: "vitest", dependency_version: "2.1.0", directory: "web/" },
            { dependency_name: "tsx" },
          ],
        },
      ],
    });

    const [group] = job.dependencyGroups;
    expect(group?.name).toBe("dev");
    expect(group?.appliesTo).toBe("security-updates");
    expect(group?.rules).toEqual({
      patterns: ["*"],
      excludePatterns: ["typescript"],
      dependencyType: "development",
    });
    expect(job.existingGroupPullRequests).toEqual([
      {
        groupName: "dev",
        dependencies: [
          { name: "vitest", version: "2.1.0", directory: "/web" },
          { name: "tsx", version: null, directory: null },
        ],
      },
    ]);
  });

  it("normalizes directory patterns", () => {
    expect(buildJob().directoryPatterns()).toEqual(["/"]);
    expect(buildJob({ source: { repo: "r", directory: "app/" } }).directoryPatterns()).toEqual(["/app"]);

    const multi = buildJob({ source: { repo: "r", directories: ["packages/*", "/"] } });
    expect(multi.directoryPatterns()).toEqual(["/packages/*", "/"]);
    expect(multi.hasMultipleDirectories()).toBe(true);
    expect(buildJob({ source: { repo: "r", directories: ["/"] } }).hasMultipleDirectories()).toBe(false);
  });

  it("allows direct dependencies by default", () => {
    const job = buildJob();

    expect(job.allowedUpdate(dep("react"))).toBe(true);
    expect(job.allowedUpdate(dep("scheduler", { topLevel: false }))).toBe(false);
  });

  it("matches allowed update rules by type and name", () => {
    const job = buildJob({
      allowed_updates: [
        { dependency_type: "development" },
        { dependency_type: "all", dependency_name: "@types/*" },
      ],
    });

    expect(job.allowedUpdate(dep("vitest", { section: "devDependencies" }))).toBe(true);
    expect(job.allowedUpdate(dep("react"))).toBe(false);
    expect(job.allowedUpdate(dep("@types/node", { topLevel: false }))).toBe(true);
  });

  it("never allows ignored dependencies", () => {
    const job = buildJob({
      allowed_updates: [{ dependency_type: "all" }],
      ignore_conditions: [{ dependency_name: "LEFT-*" }],
    });

    expect(job.isIgnored(dep("left-pad"))).toBe(true);
    expect(job.allowedUpdate(dep("left-pad"))).toBe(false);
    expect(job.allowedUpdate(dep("right-pad"))).toBe(true);
  });

  it("reads experiments regardless of separator style", () => {
    const job = buildJob({ experiments: { "grouped-security-updates-disabled": true } });

    expect(job.experiments.enabled(EXPERIMENTS.groupedSecurityUpdatesDisabled)).toBe(true);
    expect(job.experiments.enabled("something_else")).toBe(false);
    expect(job.experiments.toJSON()).toEqual({ grouped_security_updates_disabled: true });
  });
});
