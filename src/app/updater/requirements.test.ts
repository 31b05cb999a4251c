import { describe, expect, it } from "vitest";

import { buildDependency, FakeUpdateChecker } from "./__tests__/fakes.js";
import { requirementsToUnlock } from "./requirements.js";

function checker(plan: ConstructorParameters<typeof FakeUpdateChecker>[1]): FakeUpdateChecker {
  return new FakeUpdateChecker(buildDependency("alpha", "1.0.0"), plan);
}

describe("requirementsToUnlock", () => {
  it("prefers loosening only the dependency's own requirement", async () => {
    const subject = checker({ canUpdate: { own: true, all: true } });

    expect(await requirementsToUnlock(subject)).toBe("own");
    expect(subject.canUpdateCalls).toEqual(["own"]);
  });

  it("escalates to all requirements when its own is not enough", async () => {
    const subject = checker({ canUpdate: { all: true } });

    expect(await requirementsToUnlock(subject)).toBe("all");
    expect(subject.canUpdateCalls).toEqual(["own", "all"]);
  });

  it("gives up when nothing can be unlocked far enough", async () => {
    const subject = checker({ canUpdate: {} });

    expect(await requirementsToUnlock(subject)).toBe("update_not_possible");
  });

  it("only tries an in-range update when requirements cannot be unlocked", async () => {
    const locked = checker({ unlocked: false, canUpdate: { none: true, own: true } });
    expect(await requirementsToUnlock(locked)).toBe("none");
    expect(locked.canUpdateCalls).toEqual(["none"]);

    const stuck = checker({ unlocked: false, canUpdate: { own: true } });
    expect(await requirementsToUnlock(stuck)).toBe("update_not_possible");
  });
});
