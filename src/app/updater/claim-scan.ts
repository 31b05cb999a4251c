import type { DependencyGroup } from "../../core/dependency-group.js";
import type { DependencySnapshot } from "../../core/dependency-snapshot.js";
import { existingDependencyNames } from "../../core/existing-pull-request.js";
import { logUpdaterEvent, type EventLogger } from "../../core/logger.js";

import type { ServiceGateway } from "./ports.js";

export type SiblingClaims = Map<string, string[]>;

/**
 * Marks every dependency claimed by a sibling group's open pull request as handled.
 * Reads live open-PR state only, so a dependency frees up for other groups as soon
 * as its current PR is merged or closed. Run once per refresh, before compiling.
 */
export async function claimSiblingGroupDependencies(input: {
  snapshot: DependencySnapshot;
  jobGroup: DependencyGroup;
  gateway: ServiceGateway;
  logger: EventLogger;
}): Promise<SiblingClaims> {
  const { snapshot, jobGroup, gateway, logger } = input;
  const claims: SiblingClaims = new Map();

  for (const group of snapshot.groups) {
    if (group.name === jobGroup.name) continue;

    const existing = await gateway.existingPullRequestFor(group.name);
    if (!existing) continue;

    const names = existingDependencyNames(existing);
    snapshot.addHandledDependencies(names);
    claims.set(group.name, names);
  }

  if (claims.size > 0) {
    logUpdaterEvent(logger, "claims.sibling", {
      group: jobGroup.name,
      payload: Object.fromEntries(claims),
    });
  }

  return claims;
}
