import path from "node:path";

import { buildDependencySnapshot } from "../app/updater/snapshot-builder.js";
import type { UpdaterPorts } from "../app/updater/ports.js";
import { describeAction } from "../app/updater/pr-decision.js";
import { RefreshGroupPullRequest } from "../app/updater/refresh-group.js";
import { refreshGroups, type GroupRefreshResult } from "../app/updater/refresh-runner.js";
import { CatalogUpdateCheckerFactory } from "../adapters/local/catalog-update-checker.js";
import { LocalFileFetcher } from "../adapters/local/local-file-fetcher.js";
import { LoggingErrorReporter } from "../adapters/local/logging-error-reporter.js";
import { OutboxGateway } from "../adapters/local/outbox-gateway.js";
import { PackageJsonFileUpdater } from "../adapters/local/package-json-file-updater.js";
import { PackageJsonParser } from "../adapters/local/package-json-parser.js";
import type { Catalog } from "../core/config.js";
import { loadCatalog, loadJobConfig } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { Job } from "../core/job.js";
import {
  createStdoutLogger,
  fanOutLogger,
  JsonlLogger,
  type EventLogger,
} from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type RefreshCommandOptions = {
  jobPath: string;
  repoRoot?: string;
  catalogPath?: string;
  outboxPath?: string;
  logFile?: string;
  groups?: string[];
  allGroups?: boolean;
  force?: boolean;
  debug?: boolean;
  quiet?: boolean;
};

export type RefreshCommandResult = {
  results: GroupRefreshResult[];
  gateway: OutboxGateway;
};

// =============================================================================
// COMMAND
// =============================================================================

export async function refreshCommand(options: RefreshCommandOptions): Promise<RefreshCommandResult> {
  const job = new Job(loadJobConfig(options.jobPath));
  const catalog: Catalog = options.catalogPath ? loadCatalog(options.catalogPath) : { packages: {} };

  const explicitGroups = options.allGroups || (options.groups?.length ?? 0) > 0;
  if (!explicitGroups && !options.force && !RefreshGroupPullRequest.appliesTo(job)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.job,
      title: "Job is not a group refresh.",
      message: `Job ${job.id} does not describe a refresh of an existing group pull request.`,
      hint: "Set dependencies and dependency_group_to_refresh in the job file, or pass --group <name>.",
      next: "Use --force to refresh the job's group anyway.",
    });
  }

  const fileLogger = options.logFile
    ? new JsonlLogger(path.resolve(options.logFile), { jobId: job.id }, options.debug)
    : null;
  const stdoutLogger = options.quiet
    ? null
    : createStdoutLogger({ jobId: job.id }, { minLevel: options.debug ? "debug" : "info" });
  const logger = fanOutLogger(...[stdoutLogger, fileLogger].filter(isLogger));

  const gateway = new OutboxGateway({
    outboxPath: options.outboxPath ? path.resolve(options.outboxPath) : null,
    existing: job.existingGroupPullRequests,
    logger,
  });
  const ports = buildLocalPorts({ job, catalog, repoRoot: options.repoRoot, gateway, logger });

  const controller = new AbortController();
  const onSignal = (): void => controller.abort(new Error("Refresh interrupted by signal"));
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const snapshot = await buildDependencySnapshot({
      job,
      fileFetcher: ports.fileFetcher,
      dependencyParser: ports.dependencyParser,
      logger,
    });

    const groupNames = options.allGroups
      ? snapshot.groups.map((group) => group.name)
      : options.groups && options.groups.length > 0
        ? options.groups
        : [job.dependencyGroupToRefresh ?? "unknown"];

    const results = await refreshGroups({
      job,
      snapshot,
      ports,
      groupNames,
      signal: controller.signal,
    });

    if (!options.quiet) {
      for (const line of summarizeResults(results)) console.log(line);
    }

    const failed = results.filter(isFailure);
    if (failed.length > 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.refresh,
        title: "Group refresh failed.",
        message: `${failed.length} of ${results.length} group refresh(es) failed: ${failed
          .map((result) => result.group)
          .join(", ")}.`,
        hint: "Rerun with --debug (and --log-file) for collaborator details.",
        cause: failed[0]?.error,
      });
    }

    return { results, gateway };
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    fileLogger?.close();
  }
}

// =============================================================================
// WIRING
// =============================================================================

export function buildLocalPorts(input: {
  job: Job;
  catalog: Catalog;
  repoRoot?: string;
  gateway: OutboxGateway;
  logger: EventLogger;
}): UpdaterPorts {
  return {
    fileFetcher: new LocalFileFetcher({
      repoRoot: input.repoRoot ?? process.cwd(),
      commit: input.job.source.commit,
    }),
    dependencyParser: new PackageJsonParser(input.job.packageManager),
    updateCheckers: new CatalogUpdateCheckerFactory(input.catalog),
    fileUpdater: new PackageJsonFileUpdater(),
    gateway: input.gateway,
    errorReporter: new LoggingErrorReporter(input.logger),
    logger: input.logger,
  };
}

export function summarizeResults(results: GroupRefreshResult[]): string[] {
  return results.map((result) => {
    if (result.status === "failed") {
      return `${result.group}: failed (${formatErrorMessage(result.error)})`;
    }

    const { outcome } = result;
    const names = outcome.dependencyNames.length > 0 ? outcome.dependencyNames.join(", ") : "none";
    const skipped = outcome.executed ? "" : " [skipped]";
    return `${outcome.group}: ${describeAction(outcome.action)} - ${names}${skipped}`;
  });
}

function isFailure(
  result: GroupRefreshResult,
): result is Extract<GroupRefreshResult, { status: "failed" }> {
  return result.status === "failed";
}

function isLogger(value: EventLogger | null): value is EventLogger {
  return value !== null;
}
