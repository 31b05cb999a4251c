import type { RequirementsToUnlock, UpdateChecker } from "./ports.js";

// Least invasive strategy first: loosening only the dependency's own
// requirement is always preferred over touching its requirement graph.
export async function requirementsToUnlock(checker: UpdateChecker): Promise<RequirementsToUnlock> {
  if (!(await checker.requirementsUnlockedOrCanBe())) {
    return (await checker.canUpdate("none")) ? "none" : "update_not_possible";
  }

  if (await checker.canUpdate("own")) return "own";
  if (await checker.canUpdate("all")) return "all";

  return "update_not_possible";
}
