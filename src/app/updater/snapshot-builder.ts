import { DependencySnapshot, type DirectorySnapshot } from "../../core/dependency-snapshot.js";
import { normalizeDirectory } from "../../core/dependency.js";
import { ConfigError, UpdaterError, UpstreamCollaboratorError } from "../../core/errors.js";
import type { Job } from "../../core/job.js";
import { logUpdaterEvent, type EventLogger } from "../../core/logger.js";

import type { DependencyParser, FileFetcher } from "./ports.js";

// Fetches and parses every directory once, at job start.
export async function buildDependencySnapshot(input: {
  job: Job;
  fileFetcher: FileFetcher;
  dependencyParser: DependencyParser;
  logger: EventLogger;
}): Promise<DependencySnapshot> {
  const { job, fileFetcher, dependencyParser, logger } = input;

  const patterns = job.directoryPatterns();
  const directories = await wrap("file-fetcher", patterns.join(", "), () =>
    fileFetcher.resolveDirectories(patterns),
  );
  if (directories.length === 0) {
    throw new ConfigError(`No directories matched ${patterns.join(", ")} for job ${job.id}.`);
  }

  const entries: DirectorySnapshot[] = [];
  for (const raw of directories) {
    const directory = normalizeDirectory(raw);
    const fetched = await wrap("file-fetcher", directory, () => fileFetcher.fetch(directory));
    const dependencies = await wrap("dependency-parser", directory, () =>
      dependencyParser.parse(fetched.files),
    );

    logUpdaterEvent(logger, "snapshot.directory", {
      level: "debug",
      payload: {
        directory,
        files: fetched.files.map((file) => file.name),
        dependencies: dependencies.length,
        base_commit_sha: fetched.baseCommitSha,
      },
    });

    entries.push({
      directory,
      files: fetched.files,
      dependencies,
      baseCommitSha: fetched.baseCommitSha,
    });
  }

  return new DependencySnapshot({ job, directories: entries });
}

async function wrap<T>(
  collaborator: "file-fetcher" | "dependency-parser",
  directory: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof UpdaterError) throw err;
    throw new UpstreamCollaboratorError(
      `${collaborator} failed for ${directory}`,
      collaborator,
      { directory },
      err,
    );
  }
}
