import { z } from "zod";

// =============================================================================
// JOB FILE
// =============================================================================

const SourceSchema = z.object({
  provider: z.string().min(1).default("github"),
  repo: z.string().min(1),
  branch: z.string().min(1).optional(),
  directory: z.string().min(1).optional(),
  // Globs are allowed; the file fetcher expands them.
  directories: z.array(z.string().min(1)).min(1).optional(),
  commit: z.string().min(1).optional(),
});

const GroupRulesSchema = z
  .object({
    patterns: z.array(z.string().min(1)).optional(),
    exclude_patterns: z.array(z.string().min(1)).optional(),
    dependency_type: z.enum(["production", "development"]).optional(),
  })
  .strict();

const DependencyGroupSchema = z.object({
  name: z.string().min(1),
  applies_to: z.enum(["version-updates", "security-updates"]).default("version-updates"),
  rules: GroupRulesSchema.default({}),
});

const ExistingPullRequestDependencySchema = z.object({
  dependency_name: z.string().min(1),
  dependency_version: z.string().min(1).nullable().optional(),
  directory: z.string().min(1).optional(),
});

const ExistingGroupPullRequestSchema = z.object({
  dependency_group_name: z.string().min(1),
  dependencies: z.array(ExistingPullRequestDependencySchema),
});

const AllowedUpdateSchema = z.object({
  dependency_type: z
    .enum(["direct", "indirect", "all", "production", "development"])
    .default("all"),
  dependency_name: z.string().min(1).optional(),
});

const IgnoreConditionSchema = z.object({
  dependency_name: z.string().min(1),
});

export const JobConfigSchema = z.object({
  id: z.string().min(1),
  package_manager: z.string().min(1).default("npm_and_yarn"),
  source: SourceSchema,

  // Names of the dependencies in the pull request being refreshed.
  dependencies: z.array(z.string().min(1)).optional(),
  dependency_group_to_refresh: z.string().min(1).optional(),
  updating_a_pull_request: z.boolean().default(false),
  security_updates_only: z.boolean().default(false),
  experiments: z.record(z.string(), z.boolean()).default({}),

  dependency_groups: z.array(DependencyGroupSchema).default([]),
  existing_group_pull_requests: z.array(ExistingGroupPullRequestSchema).default([]),

  allowed_updates: z.array(AllowedUpdateSchema).default([{ dependency_type: "direct" }]),
  ignore_conditions: z.array(IgnoreConditionSchema).default([]),
});

export type JobConfig = z.infer<typeof JobConfigSchema>;
export type JobConfigInput = z.input<typeof JobConfigSchema>;
export type DependencyGroupConfig = z.infer<typeof DependencyGroupSchema>;
export type ExistingGroupPullRequestConfig = z.infer<typeof ExistingGroupPullRequestSchema>;
export type AllowedUpdateConfig = z.infer<typeof AllowedUpdateSchema>;

// =============================================================================
// VERSION CATALOG (local update checker)
// =============================================================================

const CatalogEntrySchema = z.object({
  latest: z.string().min(1),
  // When false the requirement is pinned by policy and must not be loosened.
  unlockable: z.boolean().default(true),
});

export const CatalogSchema = z.object({
  packages: z.record(z.string().min(1), CatalogEntrySchema).default({}),
});

export type Catalog = z.infer<typeof CatalogSchema>;
export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;
