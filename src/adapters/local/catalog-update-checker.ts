import type { Catalog, CatalogEntry } from "../../core/config.js";
import type { Dependency, DependencyRequirement } from "../../core/dependency.js";
import type {
  RequirementsUnlock,
  UpdateChecker,
  UpdateCheckerFactory,
} from "../../app/updater/ports.js";

import { bumpRequirement, compareVersions, parseRequirement, parseVersion, satisfies } from "./versions.js";

/**
 * Answers update questions from a static catalog of latest versions.
 * There is no requirement graph here, so unlocking "all" never reaches
 * further than unlocking "own".
 */
export class CatalogUpdateChecker implements UpdateChecker {
  constructor(
    private readonly dependency: Dependency,
    private readonly entry: CatalogEntry | null,
  ) {}

  get latestVersion(): string | null {
    return this.entry?.latest ?? null;
  }

  isUpToDate(): boolean {
    const latest = this.latestVersion === null ? null : parseVersion(this.latestVersion);
    if (!latest) return true;

    const current = this.dependency.version === null ? null : parseVersion(this.dependency.version);
    if (!current) return false;

    return compareVersions(current, latest) >= 0;
  }

  requirementsUnlockedOrCanBe(): boolean {
    if (!this.entry?.unlockable) return false;
    return this.dependency.requirements.every(
      (req) => req.requirement === null || parseRequirement(req.requirement) !== null,
    );
  }

  canUpdate(requirementsToUnlock: RequirementsUnlock): boolean {
    const latest = this.latestVersion;
    if (latest === null || this.isUpToDate()) return false;

    if (requirementsToUnlock === "none") {
      return this.dependency.requirements.every(
        (req) => req.requirement === null || satisfies(req.requirement, latest),
      );
    }

    return this.requirementsUnlockedOrCanBe();
  }

  updatedDependencies(requirementsToUnlock: RequirementsUnlock): Dependency[] {
    const latest = this.latestVersion;
    if (latest === null) return [];

    const requirements =
      requirementsToUnlock === "none"
        ? this.dependency.requirements
        : this.dependency.requirements.map((req) => unlockRequirement(req, latest));

    return [
      {
        ...this.dependency,
        version: latest,
        previousVersion: this.dependency.version,
        requirements,
        previousRequirements: this.dependency.requirements,
      },
    ];
  }
}

export class CatalogUpdateCheckerFactory implements UpdateCheckerFactory {
  constructor(private readonly catalog: Catalog) {}

  create(input: { dependency: Dependency }): UpdateChecker {
    const entry = this.catalog.packages[input.dependency.name] ?? null;
    return new CatalogUpdateChecker(input.dependency, entry);
  }
}

// Moves the floor even when the old range already admits the target.
function unlockRequirement(req: DependencyRequirement, target: string): DependencyRequirement {
  if (req.requirement === null) return req;
  return { ...req, requirement: bumpRequirement(req.requirement, target) ?? req.requirement };
}
