import { describe, expect, it } from "vitest";

import { UpstreamCollaboratorError } from "../../core/errors.js";

import {
  buildDependency,
  buildDirectory,
  buildFakePorts,
  buildJob,
  buildSnapshot,
} from "./__tests__/fakes.js";
import { refreshGroups } from "./refresh-runner.js";

function setup() {
  const job = buildJob({
    dependency_group_to_refresh: "tools",
    dependency_groups: [
      { name: "tools", rules: { patterns: ["eslint*"] } },
      { name: "rest", rules: { patterns: ["*"] } },
    ],
  });
  const snapshot = buildSnapshot(job, [
    buildDirectory("/", [buildDependency("eslint", "8.0.0"), buildDependency("alpha", "1.0.0")]),
  ]);
  const ports = buildFakePorts();
  ports.updateCheckers
    .plan("eslint", { canUpdate: { own: true }, target: "9.0.0" })
    .plan("alpha", { canUpdate: { own: true }, target: "2.0.0" });
  return { job, snapshot, ports };
}

describe("refreshGroups", () => {
  it("lets earlier groups claim dependencies for the rest of the run", async () => {
    const ctx = setup();

    const results = await refreshGroups({ ...ctx, groupNames: ["tools", "rest"] });

    expect(
      results.map((result) => (result.status === "ok" ? result.outcome.dependencyNames : result.error)),
    ).toEqual([["eslint"], ["alpha"]]);
    expect(ctx.ports.gateway.calls.map((call) => [call.action, call.dependencies])).toEqual([
      ["create", ["eslint"]],
      ["create", ["alpha"]],
    ]);
  });

  it("records a failed group and keeps going", async () => {
    const ctx = setup();
    ctx.ports.updateCheckers.plan("eslint", { error: new Error("registry down") });
    const job = buildJob({
      dependency_group_to_refresh: "tools",
      dependency_groups: [
        { name: "tools", rules: { patterns: ["eslint*"] } },
        { name: "rest", rules: { patterns: ["*"], exclude_patterns: ["eslint*"] } },
      ],
    });
    const snapshot = buildSnapshot(job, [
      buildDirectory("/", [buildDependency("eslint", "8.0.0"), buildDependency("alpha", "1.0.0")]),
    ]);

    const results = await refreshGroups({ job, snapshot, ports: ctx.ports, groupNames: ["tools", "rest"] });

    expect(results.map((result) => [result.group, result.status])).toEqual([
      ["tools", "failed"],
      ["rest", "ok"],
    ]);
    const [failed] = results;
    expect(failed?.status === "failed" ? failed.error : null).toBeInstanceOf(UpstreamCollaboratorError);
    expect(ctx.ports.logger.ofType("runner.group_failed")).toEqual([
      {
        type: "runner.group_failed",
        level: "warn",
        group: "tools",
        message: "Continuing after the 'tools' group failed: update-checker failed for eslint in /",
      },
    ]);
    expect(ctx.ports.gateway.calls.map((call) => call.dependencies)).toEqual([["alpha"]]);
  });

  it("leaves the job's own pull request alone when asked for a group that does not exist", async () => {
    const ctx = setup();

    const results = await refreshGroups({ ...ctx, groupNames: ["ghost"] });

    expect(results).toEqual([
      {
        group: "ghost",
        status: "ok",
        outcome: {
          group: "ghost",
          action: { kind: "close", reason: "dependency_group_empty" },
          dependencyNames: [],
          executed: false,
        },
      },
    ]);
    expect(ctx.ports.gateway.lookups).toEqual(["ghost"]);
    expect(ctx.ports.gateway.calls).toEqual([]);
  });

  it("closes only what was open under a missing group's own name", async () => {
    const ctx = setup();
    ctx.ports.gateway.withExistingPullRequest("ghost", [{ name: "gamma", version: "1.1.0" }]);

    await refreshGroups({ ...ctx, groupNames: ["ghost"] });

    expect(ctx.ports.gateway.calls).toEqual([
      { action: "close", dependencies: ["gamma"], reason: "dependency_group_empty" },
    ]);
  });

  it("stops the run when aborted", async () => {
    const ctx = setup();
    const controller = new AbortController();
    controller.abort(new Error("interrupted"));

    await expect(
      refreshGroups({ ...ctx, groupNames: ["tools", "rest"], signal: controller.signal }),
    ).rejects.toThrow("interrupted");
    expect(ctx.ports.gateway.lookups).toEqual([]);
  });
});
