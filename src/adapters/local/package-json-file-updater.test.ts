import { describe, expect, it } from "vitest";

import type { Dependency, DependencyFile } from "../../core/dependency.js";

import { PackageJsonFileUpdater } from "./package-json-file-updater.js";

const original = {
  name: "web",
  dependencies: { react: "^18.2.0", lodash: "4.17.20" },
  devDependencies: { react: "^18.2.0", vitest: "~2.1.0" },
};

function manifestFile(content: string, directory = "/"): DependencyFile {
  return { directory, name: "package.json", content };
}

function react(requirement: string, groups: string[], directory = "/"): Dependency {
  return {
    name: "react",
    version: "18.3.1",
    previousVersion: "18.2.0",
    requirements: [{ file: "package.json", requirement, groups }],
    packageManager: "npm_and_yarn",
    directory,
    topLevel: true,
  };
}

describe("PackageJsonFileUpdater", () => {
  it("rewrites the requirement in the sections it belongs to and keeps formatting", () => {
    const content = `${JSON.stringify(original, null, 4)}\n`;

    const files = new PackageJsonFileUpdater().update({
      dependencies: [react("^18.3.1", ["dependencies"])],
      files: [manifestFile(content), { directory: "/", name: "README.md", content: "# web" }],
    });

    const expected = {
      ...original,
      dependencies: { react: "^18.3.1", lodash: "4.17.20" },
    };
    expect(files).toEqual([
      { ...manifestFile(`${JSON.stringify(expected, null, 4)}\n`), operation: "update" },
    ]);
  });

  it("keeps tab indentation and a missing trailing newline", () => {
    const content = JSON.stringify(original, null, "\t");

    const [file] = new PackageJsonFileUpdater().update({
      dependencies: [react("^18.3.1", ["dependencies", "devDependencies"])],
      files: [manifestFile(content)],
    });

    expect(file?.content).toBe(
      JSON.stringify(
        {
          ...original,
          dependencies: { react: "^18.3.1", lodash: "4.17.20" },
          devDependencies: { react: "^18.3.1", vitest: "~2.1.0" },
        },
        null,
        "\t",
      ),
    );
  });

  it("returns nothing when no manifest in the dependency's directory changes", () => {
    const content = `${JSON.stringify(original, null, 2)}\n`;
    const updater = new PackageJsonFileUpdater();

    expect(
      updater.update({ dependencies: [react("^18.3.1", ["dependencies"], "/api")], files: [manifestFile(content)] }),
    ).toEqual([]);
    expect(updater.update({ dependencies: [react("^18.2.0", ["dependencies"])], files: [manifestFile(content)] })).toEqual(
      [],
    );
  });
});
