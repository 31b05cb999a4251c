export class UpdaterError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "UpdaterError";
  }
}

export class ConfigError extends UpdaterError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

// The job references state (usually a group) that current configuration no longer has.
export class ConfigurationAnomalyError extends UpdaterError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigurationAnomalyError";
  }
}

export type CollaboratorName =
  | "file-fetcher"
  | "dependency-parser"
  | "update-checker"
  | "file-updater"
  | "service-gateway";

export class UpstreamCollaboratorError extends UpdaterError {
  constructor(
    message: string,
    public readonly collaborator: CollaboratorName,
    public readonly details: { dependency?: string; directory?: string } = {},
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "UpstreamCollaboratorError";
  }
}

export type GatewayAction = "create" | "update" | "close";

export class GatewayError extends UpdaterError {
  constructor(
    message: string,
    public readonly action: GatewayAction,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "GatewayError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  job: "JOB_ERROR",
  refresh: "REFRESH_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
