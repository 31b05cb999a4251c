import type { DependencyGroup } from "../../core/dependency-group.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { GatewayError, UpstreamCollaboratorError } from "../../core/errors.js";
import type { Job } from "../../core/job.js";
import { logUpdaterEvent, type EventLogger, type JsonObject } from "../../core/logger.js";

import type { ErrorReporter } from "./ports.js";

export function handleRefreshError(input: {
  error: unknown;
  job: Job;
  group: DependencyGroup | null;
  errorReporter: ErrorReporter;
  logger: EventLogger;
}): void {
  const { error, job, group, errorReporter, logger } = input;

  logUpdaterEvent(logger, "refresh.failed", {
    level: "error",
    group: group?.name,
    message: formatErrorMessage(error),
    payload: describeError(error),
  });

  errorReporter.captureException({ error, job, group });
}

function describeError(error: unknown): JsonObject {
  const payload: JsonObject = {
    error_name: error instanceof Error ? error.name : typeof error,
  };

  if (error instanceof UpstreamCollaboratorError) {
    payload.collaborator = error.collaborator;
    if (error.details.dependency) payload.dependency = error.details.dependency;
    if (error.details.directory) payload.directory = error.details.directory;
  }
  if (error instanceof GatewayError) {
    payload.action = error.action;
  }
  if (error instanceof Error && error.cause !== undefined) {
    payload.cause = formatErrorMessage(error.cause);
  }

  return payload;
}
