import { normalizeDirectory, type Dependency, type DependencyFile } from "./dependency.js";
import type { DependencyGroup } from "./dependency-group.js";
import { ConfigError } from "./errors.js";
import type { Job } from "./job.js";

// =============================================================================
// TYPES
// =============================================================================

export type DirectorySnapshot = {
  directory: string;
  files: DependencyFile[];
  dependencies: Dependency[];
  baseCommitSha: string;
};

// =============================================================================
// SNAPSHOT
// =============================================================================

/**
 * Job-scoped view of every dependency across the job's directories.
 *
 * The handled set only grows: once a name is claimed in a run it stays
 * claimed until the snapshot is discarded. Not safe to share between
 * concurrent refreshes.
 */
export class DependencySnapshot {
  readonly job: Job;
  readonly groups: readonly DependencyGroup[];

  private readonly byDirectory: Map<string, DirectorySnapshot>;
  private readonly handled = new Set<string>();
  private cursor: string;

  constructor(input: { job: Job; directories: DirectorySnapshot[] }) {
    if (input.directories.length === 0) {
      throw new ConfigError(`Job ${input.job.id} has no directories to snapshot.`);
    }

    this.job = input.job;
    this.groups = Object.freeze(
      input.job.dependencyGroups.filter((group) =>
        input.job.securityUpdatesOnly
          ? group.appliesTo === "security-updates"
          : group.appliesTo === "version-updates",
      ),
    );

    this.byDirectory = new Map();
    for (const entry of input.directories) {
      const directory = normalizeDirectory(entry.directory);
      this.byDirectory.set(directory, { ...entry, directory });
    }

    const [first] = this.byDirectory.keys();
    this.cursor = first ?? "/";
  }

  // ---------------------------------------------------------------------------
  // Directory cursor
  // ---------------------------------------------------------------------------

  get directories(): string[] {
    return Array.from(this.byDirectory.keys());
  }

  get currentDirectory(): string {
    return this.cursor;
  }

  set currentDirectory(directory: string) {
    const normalized = normalizeDirectory(directory);
    if (!this.byDirectory.has(normalized)) {
      throw new ConfigError(`Directory ${normalized} is not part of job ${this.job.id}.`);
    }
    this.cursor = normalized;
  }

  get dependencies(): Dependency[] {
    return this.current().dependencies;
  }

  get allowedDependencies(): Dependency[] {
    return this.current().dependencies.filter((dep) => this.job.allowedUpdate(dep));
  }

  get dependencyFiles(): DependencyFile[] {
    return this.current().files;
  }

  get baseCommitSha(): string {
    return this.current().baseCommitSha;
  }

  // Every directory is fetched from the same branch head; the first one speaks for the job.
  get jobBaseCommitSha(): string {
    const [first] = this.byDirectory.values();
    return first ? first.baseCommitSha : this.baseCommitSha;
  }

  // ---------------------------------------------------------------------------
  // Groups
  // ---------------------------------------------------------------------------

  findGroup(name: string): DependencyGroup | null {
    return this.groups.find((group) => group.name === name) ?? null;
  }

  get jobGroup(): DependencyGroup | null {
    const name = this.job.dependencyGroupToRefresh;
    return name === null ? null : this.findGroup(name);
  }

  groupMembers(group: DependencyGroup): Dependency[] {
    const members: Dependency[] = [];
    for (const entry of this.byDirectory.values()) {
      for (const dep of entry.dependencies) {
        if (this.job.allowedUpdate(dep) && group.contains(dep)) members.push(dep);
      }
    }
    return members;
  }

  // ---------------------------------------------------------------------------
  // Handled dependencies
  // ---------------------------------------------------------------------------

  addHandledDependencies(names: Iterable<string>): void {
    for (const name of names) this.handled.add(name);
  }

  isHandled(name: string): boolean {
    return this.handled.has(name);
  }

  get handledDependencies(): ReadonlySet<string> {
    return this.handled;
  }

  private current(): DirectorySnapshot {
    const entry = this.byDirectory.get(this.cursor);
    if (!entry) {
      throw new ConfigError(`Directory ${this.cursor} is not part of job ${this.job.id}.`);
    }
    return entry;
  }
}
