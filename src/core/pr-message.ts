import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import type { DependencyChange } from "./dependency-change.js";

// =============================================================================
// TYPES
// =============================================================================

export type PullRequestTemplateName = "title" | "body";

export type PullRequestMessage = {
  title: string;
  body: string;
};

type TemplateValues = {
  group: string;
  scope: string;
  count: number;
  noun: string;
  dependencies: Array<{ name: string; from: string; to: string; location: string }>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderPullRequestMessage(change: DependencyChange): Promise<PullRequestMessage> {
  const values = buildTemplateValues(change);
  const [title, body] = await Promise.all([
    renderTemplate("title", values),
    renderTemplate("body", values),
  ]);
  return { title, body };
}

// =============================================================================
// INTERNALS
// =============================================================================

function buildTemplateValues(change: DependencyChange): TemplateValues {
  const directories = change.directories();
  const multiDirectory = directories.length > 1;
  const count = change.updatedDependencies.length;

  return {
    group: change.group?.name ?? "ungrouped",
    scope: multiDirectory ? ` across ${directories.length} directories` : "",
    count,
    noun: count === 1 ? "update" : "updates",
    dependencies: change.updatedDependencies.map((dep) => ({
      name: dep.name,
      from: dep.previousVersion ?? "unknown",
      to: dep.version ?? "unknown",
      location: multiDirectory ? ` in ${dep.directory}` : "",
    })),
  };
}

async function renderTemplate(
  name: PullRequestTemplateName,
  values: TemplateValues,
): Promise<string> {
  const template = await loadTemplate(name);
  const output = template(values).trim();

  if (/\{\{[^}]+\}\}/.test(output)) {
    throw new Error(`Unresolved placeholder(s) remain in pull request ${name}`);
  }

  return output;
}

const TEMPLATE_CACHE = new Map<PullRequestTemplateName, Handlebars.TemplateDelegate>();

async function loadTemplate(
  name: PullRequestTemplateName,
): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = path.join(resolveTemplatesDir(), `${name}.hbs`);
  if (!(await fse.pathExists(templatePath))) {
    throw new Error(`Pull request template not found: ${templatePath}`);
  }

  const raw = await fse.readFile(templatePath, "utf8");
  const compiled = Handlebars.compile(raw, { noEscape: true, strict: true });

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}

function resolveTemplatesDir(): string {
  const packageRoot = findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
  return path.join(packageRoot, "templates", "pr");
}

// Walk upward until we find the package root so compiled builds resolve templates too.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new Error("package.json not found while resolving pull request templates");
}
