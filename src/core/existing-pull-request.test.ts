import { describe, expect, it } from "vitest";

import {
  existingDependencyNames,
  existingDirectories,
  existingTargetVersions,
  type ExistingPullRequest,
} from "./existing-pull-request.js";

const record: ExistingPullRequest = {
  groupName: "everything",
  dependencies: [
    { name: "alpha", version: "2.0.0", directory: "/" },
    { name: "beta", version: null, directory: null },
    { name: "alpha", version: "2.1.0", directory: "/api" },
  ],
};

describe("existing pull request helpers", () => {
  it("lists unique names in recorded order", () => {
    expect(existingDependencyNames(record)).toEqual(["alpha", "beta"]);
  });

  it("keeps the first recorded version per name", () => {
    expect(Array.from(existingTargetVersions(record))).toEqual([
      ["alpha", "2.0.0"],
      ["beta", null],
    ]);
  });

  it("lists the directories the record names", () => {
    expect(existingDirectories(record)).toEqual(["/", "/api"]);
  });
});
