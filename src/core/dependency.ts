// =============================================================================
// TYPES
// =============================================================================

export type DependencyRequirement = {
  file: string;
  requirement: string | null;
  groups: string[];
};

export type Dependency = {
  name: string;
  version: string | null;
  previousVersion?: string | null;
  requirements: DependencyRequirement[];
  previousRequirements?: DependencyRequirement[];
  packageManager: string;
  directory: string;
  topLevel: boolean;
};

export type DependencyType = "production" | "development";

export type DependencyFileOperation = "update" | "create" | "delete";

export type DependencyFile = {
  directory: string;
  name: string;
  content: string;
  operation?: DependencyFileOperation;
};

// =============================================================================
// HELPERS
// =============================================================================

const DEVELOPMENT_GROUPS = new Set(["devDependencies", "development", "dev"]);

export function dependencyType(dependency: Dependency): DependencyType {
  if (dependency.requirements.length === 0) return "production";
  const allDevelopment = dependency.requirements.every(
    (req) => req.groups.length > 0 && req.groups.every((group) => DEVELOPMENT_GROUPS.has(group)),
  );
  return allDevelopment ? "development" : "production";
}

export function fileKey(file: Pick<DependencyFile, "directory" | "name">): string {
  return `${normalizeDirectory(file.directory)}::${file.name}`;
}

export function filePath(file: Pick<DependencyFile, "directory" | "name">): string {
  const directory = normalizeDirectory(file.directory);
  return directory === "/" ? `/${file.name}` : `${directory}/${file.name}`;
}

export function normalizeDirectory(directory: string): string {
  const trimmed = directory.trim().replace(/\/+$/, "");
  if (trimmed === "" || trimmed === ".") return "/";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

// Overlays updated files onto a base set; entries keep their first position.
export function overlayFiles(base: DependencyFile[], updates: DependencyFile[]): DependencyFile[] {
  const merged = new Map<string, DependencyFile>();
  for (const file of base) merged.set(fileKey(file), file);
  for (const file of updates) merged.set(fileKey(file), file);
  return Array.from(merged.values()).filter((file) => file.operation !== "delete");
}

export function describeDependency(dependency: Dependency): string {
  const from = dependency.previousVersion ?? "unknown";
  const to = dependency.version ?? "unknown";
  return `${dependency.name} ${from} -> ${to}`;
}
