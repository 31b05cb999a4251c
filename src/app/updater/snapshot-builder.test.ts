import { describe, expect, it } from "vitest";

import type { Dependency, DependencyFile } from "../../core/dependency.js";
import { ConfigError, UpstreamCollaboratorError } from "../../core/errors.js";

import { buildDependency, buildJob, MemoryLogger } from "./__tests__/fakes.js";
import type { DependencyParser, FetchedFiles, FileFetcher } from "./ports.js";
import { buildDependencySnapshot } from "./snapshot-builder.js";

class StubFileFetcher implements FileFetcher {
  readonly fetched: string[] = [];

  constructor(
    private readonly resolved: string[],
    private readonly failFor: string | null = null,
  ) {}

  resolveDirectories(): string[] {
    return this.resolved;
  }

  fetch(directory: string): FetchedFiles {
    this.fetched.push(directory);
    if (directory === this.failFor) throw new Error("permission denied");
    return {
      files: [{ directory, name: "package.json", content: directory }],
      baseCommitSha: `sha${directory}`,
    };
  }
}

// One dependency per manifest, named after its content.
const parser: DependencyParser = {
  parse(files: DependencyFile[]): Dependency[] {
    return files.map((file) => buildDependency(`dep${file.content.replace(/\//g, "-")}`, "1.0.0", { directory: file.directory }));
  },
};

describe("buildDependencySnapshot", () => {
  it("fetches and parses every resolved directory in order", async () => {
    const fetcher = new StubFileFetcher(["/", "packages/api"]);
    const logger = new MemoryLogger();

    const snapshot = await buildDependencySnapshot({
      job: buildJob(),
      fileFetcher: fetcher,
      dependencyParser: parser,
      logger,
    });

    expect(fetcher.fetched).toEqual(["/", "/packages/api"]);
    expect(snapshot.directories).toEqual(["/", "/packages/api"]);
    expect(snapshot.jobBaseCommitSha).toBe("sha/");
    snapshot.currentDirectory = "/packages/api";
    expect(snapshot.dependencies.map((dep) => dep.name)).toEqual(["dep-packages-api"]);
    expect(logger.ofType("snapshot.directory").map((event) => event.payload)).toEqual([
      { directory: "/", files: ["package.json"], dependencies: 1, base_commit_sha: "sha/" },
      {
        directory: "/packages/api",
        files: ["package.json"],
        dependencies: 1,
        base_commit_sha: "sha/packages/api",
      },
    ]);
  });

  it("refuses a job whose patterns match no directory", async () => {
    await expect(
      buildDependencySnapshot({
        job: buildJob({ source: { repo: "example/app", directories: ["packages/*"] } }),
        fileFetcher: new StubFileFetcher([]),
        dependencyParser: parser,
        logger: new MemoryLogger(),
      }),
    ).rejects.toThrow(new ConfigError("No directories matched /packages/* for job job-1."));
  });

  it("wraps fetch failures with the directory", async () => {
    const error = await buildDependencySnapshot({
      job: buildJob(),
      fileFetcher: new StubFileFetcher(["/", "/web"], "/web"),
      dependencyParser: parser,
      logger: new MemoryLogger(),
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamCollaboratorError);
    if (!(error instanceof UpstreamCollaboratorError)) return;
    expect(error.message).toBe("file-fetcher failed for /web");
    expect(error.details).toEqual({ directory: "/web" });
  });
});
