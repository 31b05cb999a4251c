import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { LOCAL_COMMIT_SHA, LocalFileFetcher } from "./local-file-fetcher.js";

let repoRoot: string;

function write(relativePath: string, content: string): void {
  const target = path.join(repoRoot, relativePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content, "utf8");
}

beforeEach(() => {
  repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "depsync-repo-"));
  write("package.json", '{"name":"root"}');
  write("packages/b/package.json", '{"name":"b"}');
  write("packages/a/package.json", '{"name":"a"}');
  write("packages/a/node_modules/dep/package.json", '{"name":"dep"}');
  fs.mkdirSync(path.join(repoRoot, "packages", "empty"));
});

afterEach(() => {
  fs.rmSync(repoRoot, { recursive: true, force: true });
});

describe("LocalFileFetcher", () => {
  it("expands globs in place, sorted, without duplicates", async () => {
    const fetcher = new LocalFileFetcher({ repoRoot });

    expect(await fetcher.resolveDirectories(["/", "packages/*", "/packages/a/"])).toEqual([
      "/",
      "/packages/a",
      "/packages/b",
      "/packages/empty",
    ]);
  });

  it("passes literal directories through even when they do not exist", async () => {
    const fetcher = new LocalFileFetcher({ repoRoot });

    expect(await fetcher.resolveDirectories(["apps/web"])).toEqual(["/apps/web"]);
  });

  it("reads the manifest of a directory", async () => {
    const fetcher = new LocalFileFetcher({ repoRoot });

    expect(await fetcher.fetch("packages/a")).toEqual({
      files: [{ directory: "/packages/a", name: "package.json", content: '{"name":"a"}' }],
      baseCommitSha: LOCAL_COMMIT_SHA,
    });
  });

  it("reports the configured commit", async () => {
    const fetcher = new LocalFileFetcher({ repoRoot, commit: "abc123" });

    expect((await fetcher.fetch("/")).baseCommitSha).toBe("abc123");
  });

  it("fails for a directory without dependency files", async () => {
    const fetcher = new LocalFileFetcher({ repoRoot });

    await expect(fetcher.fetch("/packages/empty")).rejects.toThrow(
      `No dependency files (package.json) in ${path.join(repoRoot, "packages", "empty")}`,
    );
  });
});
