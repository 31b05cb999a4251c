/*
Purpose: the small slice of npm-style version handling the local adapters need.
Assumptions: plain MAJOR.MINOR.PATCH versions; requirements are exact, caret or tilde.
Anything else is "unsupported" and never rewritten.
*/

// =============================================================================
// TYPES
// =============================================================================

export type Version = [number, number, number];

export type RequirementOperator = "exact" | "caret" | "tilde";

export type ParsedRequirement = {
  operator: RequirementOperator;
  prefix: string;
  version: Version;
};

const VERSION_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)$/;
const REQUIREMENT_PATTERN = /^(\^|~|=)?\s*(v?\d+\.\d+\.\d+)$/;

// =============================================================================
// VERSIONS
// =============================================================================

export function parseVersion(value: string): Version | null {
  const match = VERSION_PATTERN.exec(value.trim());
  if (!match) return null;
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

export function compareVersions(left: Version, right: Version): number {
  for (let i = 0; i < 3; i += 1) {
    const diff = left[i] - right[i];
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function formatVersion(version: Version): string {
  return version.join(".");
}

// =============================================================================
// REQUIREMENTS
// =============================================================================

export function parseRequirement(requirement: string): ParsedRequirement | null {
  const match = REQUIREMENT_PATTERN.exec(requirement.trim());
  if (!match) return null;

  const version = parseVersion(match[2] ?? "");
  if (!version) return null;

  const prefix = match[1] ?? "";
  const operator: RequirementOperator =
    prefix === "^" ? "caret" : prefix === "~" ? "tilde" : "exact";

  return { operator, prefix, version };
}

// Exact version a requirement pins or starts from, as written in the manifest.
export function requirementBaseVersion(requirement: string): string | null {
  const parsed = parseRequirement(requirement);
  return parsed ? formatVersion(parsed.version) : null;
}

export function satisfies(requirement: string, candidate: string): boolean {
  const parsed = parseRequirement(requirement);
  const version = parseVersion(candidate);
  if (!parsed || !version) return false;

  const [major, minor, patch] = parsed.version;
  if (compareVersions(version, parsed.version) < 0) return false;

  switch (parsed.operator) {
    case "exact":
      return compareVersions(version, parsed.version) === 0;
    case "tilde":
      return version[0] === major && version[1] === minor;
    case "caret":
      if (major > 0) return version[0] === major;
      if (minor > 0) return version[0] === 0 && version[1] === minor;
      return version[0] === 0 && version[1] === 0 && version[2] === patch;
  }
}

// Keeps the operator the author chose and moves its base version.
export function bumpRequirement(requirement: string, target: string): string | null {
  const parsed = parseRequirement(requirement);
  const version = parseVersion(target);
  if (!parsed || !version) return null;
  return `${parsed.prefix}${formatVersion(version)}`;
}
