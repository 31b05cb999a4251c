import { describe, expect, it } from "vitest";

import {
  buildDependency,
  buildDirectory,
  buildJob,
  buildSnapshot,
  FakeServiceGateway,
  MemoryLogger,
} from "./__tests__/fakes.js";
import { claimSiblingGroupDependencies } from "./claim-scan.js";

function setup() {
  const job = buildJob({
    dependency_groups: [
      { name: "everything", rules: { patterns: ["*"] } },
      { name: "tools", rules: { patterns: ["eslint*", "prettier"] } },
      { name: "advisories", applies_to: "security-updates", rules: { patterns: ["*"] } },
    ],
  });
  const snapshot = buildSnapshot(job, [
    buildDirectory("/", [buildDependency("eslint", "8.0.0"), buildDependency("lodash", "4.0.0")]),
  ]);
  const jobGroup = snapshot.jobGroup;
  if (!jobGroup) throw new Error("job group missing from snapshot");
  return { snapshot, jobGroup, gateway: new FakeServiceGateway(), logger: new MemoryLogger() };
}

describe("claimSiblingGroupDependencies", () => {
  it("marks names held by other groups' open pull requests as handled", async () => {
    const ctx = setup();
    ctx.gateway
      .withExistingPullRequest("tools", [
        { name: "eslint", version: "9.0.0" },
        { name: "prettier", version: "3.3.0" },
      ])
      .withExistingPullRequest("advisories", [{ name: "lodash", version: "4.17.21" }]);

    const claims = await claimSiblingGroupDependencies(ctx);

    expect(Array.from(claims)).toEqual([["tools", ["eslint", "prettier"]]]);
    expect(ctx.gateway.lookups).toEqual(["tools"]);
    expect(Array.from(ctx.snapshot.handledDependencies)).toEqual(["eslint", "prettier"]);
    expect(ctx.snapshot.isHandled("lodash")).toBe(false);
    expect(ctx.logger.events).toEqual([
      { type: "claims.sibling", group: "everything", payload: { tools: ["eslint", "prettier"] } },
    ]);
  });

  it("claims nothing and stays quiet when siblings have no open pull request", async () => {
    const ctx = setup();

    const claims = await claimSiblingGroupDependencies(ctx);

    expect(claims.size).toBe(0);
    expect(ctx.snapshot.handledDependencies.size).toBe(0);
    expect(ctx.logger.events).toEqual([]);
  });
});
