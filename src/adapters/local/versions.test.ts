import { describe, expect, it } from "vitest";

import {
  bumpRequirement,
  compareVersions,
  parseRequirement,
  parseVersion,
  requirementBaseVersion,
  satisfies,
} from "./versions.js";

describe("versions", () => {
  it("parses plain release versions only", () => {
    expect(parseVersion("1.2.3")).toEqual([1, 2, 3]);
    expect(parseVersion("v10.0.1")).toEqual([10, 0, 1]);
    expect(parseVersion("1.2")).toBeNull();
    expect(parseVersion("1.2.3-beta.1")).toBeNull();
  });

  it("compares numerically", () => {
    expect(compareVersions([1, 10, 0], [1, 9, 9])).toBe(1);
    expect(compareVersions([1, 2, 3], [1, 2, 3])).toBe(0);
    expect(compareVersions([0, 9, 0], [1, 0, 0])).toBe(-1);
  });

  it("parses exact, caret and tilde requirements", () => {
    expect(parseRequirement("^1.2.3")).toEqual({ operator: "caret", prefix: "^", version: [1, 2, 3] });
    expect(parseRequirement("~1.2.3")).toEqual({ operator: "tilde", prefix: "~", version: [1, 2, 3] });
    expect(parseRequirement("=1.2.3")).toEqual({ operator: "exact", prefix: "=", version: [1, 2, 3] });
    expect(parseRequirement("1.2.3")).toEqual({ operator: "exact", prefix: "", version: [1, 2, 3] });
    expect(parseRequirement(">=1.2.3")).toBeNull();
    expect(parseRequirement("*")).toBeNull();
    expect(requirementBaseVersion("^v2.0.1")).toBe("2.0.1");
    expect(requirementBaseVersion("latest")).toBeNull();
  });

  it("checks caret ranges the npm way", () => {
    expect(satisfies("^1.2.3", "1.9.0")).toBe(true);
    expect(satisfies("^1.2.3", "2.0.0")).toBe(false);
    expect(satisfies("^1.2.3", "1.2.2")).toBe(false);
    expect(satisfies("^0.2.3", "0.2.9")).toBe(true);
    expect(satisfies("^0.2.3", "0.3.0")).toBe(false);
    expect(satisfies("^0.0.3", "0.0.3")).toBe(true);
    expect(satisfies("^0.0.3", "0.0.4")).toBe(false);
  });

  it("checks tilde and exact requirements", () => {
    expect(satisfies("~1.2.3", "1.2.9")).toBe(true);
    expect(satisfies("~1.2.3", "1.3.0")).toBe(false);
    expect(satisfies("1.2.3", "1.2.3")).toBe(true);
    expect(satisfies("1.2.3", "1.2.4")).toBe(false);
    expect(satisfies("*", "1.0.0")).toBe(false);
  });

  it("moves a requirement to a target and keeps its operator", () => {
    expect(bumpRequirement("^1.2.3", "2.0.0")).toBe("^2.0.0");
    expect(bumpRequirement("~1.0.0", "1.4.2")).toBe("~1.4.2");
    expect(bumpRequirement("1.0.0", "1.0.1")).toBe("1.0.1");
    expect(bumpRequirement("*", "1.0.0")).toBeNull();
  });
});
