import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue, ZodType, ZodTypeDef } from "zod";

import { CatalogSchema, JobConfigSchema, type Catalog, type JobConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [
        k,
        expandEnv(v, { ...ctx, trail: [...ctx.trail, k] }),
      ]),
    );
  }

  return value;
}

// =============================================================================
// NORMALIZATION
// =============================================================================

// Job payloads are sometimes wrapped as { job: { ... } }.
function unwrapJobEnvelope(doc: unknown): unknown {
  if (!doc || typeof doc !== "object" || Array.isArray(doc)) {
    return doc;
  }

  if (Object.keys(doc).length === 1 && "job" in doc) {
    return doc.job;
  }

  return doc;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

type ConfigKind = "job" | "catalog";

const HINTS: Record<ConfigKind, { missing: string; invalid: string }> = {
  job: {
    missing: "Pass the job file with --job <path>.",
    invalid: "Fix the job file and rerun `depsync refresh`.",
  },
  catalog: {
    missing: "Pass the version catalog with --catalog <path>.",
    invalid: "Fix the catalog file; every package needs a `latest` version.",
  },
};

const TITLES: Record<ConfigKind, string> = {
  job: "Job file",
  catalog: "Version catalog",
};

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function throwNormalizedConfigError(error: unknown, kind: ConfigKind, filePath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: `${TITLES[kind]} invalid.`,
      message: error.message,
      hint: HINTS[kind].invalid,
      cause: error,
    });
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadJobConfig(jobPath: string): JobConfig {
  return loadStructuredFile(jobPath, "job", JobConfigSchema, unwrapJobEnvelope);
}

export function loadCatalog(catalogPath: string): Catalog {
  return loadStructuredFile(catalogPath, "catalog", CatalogSchema, (doc) => doc ?? {});
}

// =============================================================================
// INTERNALS
// =============================================================================

function loadStructuredFile<T>(
  filePath: string,
  kind: ConfigKind,
  schema: ZodType<T, ZodTypeDef, unknown>,
  normalize: (doc: unknown) => unknown,
): T {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: `${TITLES[kind]} missing.`,
      message: `${TITLES[kind]} not found at ${absolutePath}.`,
      hint: HINTS[kind].missing,
    });
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read ${kind} file at ${absolutePath}`, err);
    }

    // JSON is a subset of YAML, so one parser covers both formats.
    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse ${kind} file at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc, { file: absolutePath, trail: [] });
    const parsed = schema.safeParse(normalize(expanded));
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid ${kind} file at ${absolutePath}:\n${details}`, parsed.error);
    }

    return parsed.data;
  } catch (err) {
    throwNormalizedConfigError(err, kind, absolutePath);
  }
}
