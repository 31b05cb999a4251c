import type { DependencyGroup } from "../../core/dependency-group.js";
import { formatErrorLines } from "../../core/error-format.js";
import type { Job } from "../../core/job.js";
import { logUpdaterEvent, type EventLogger } from "../../core/logger.js";
import type { ErrorReporter } from "../../app/updater/ports.js";

// Stands in for a hosted error tracker: every captured error becomes an error-level event.
export class LoggingErrorReporter implements ErrorReporter {
  readonly captured: Array<{ error: unknown; jobId: string; group: string | null }> = [];

  constructor(private readonly logger: EventLogger) {}

  captureException(input: { error: unknown; job: Job; group?: DependencyGroup | null }): void {
    const group = input.group?.name ?? null;
    this.captured.push({ error: input.error, jobId: input.job.id, group });

    const lines = formatErrorLines(input.error, { mode: "debug" });
    logUpdaterEvent(this.logger, "error.captured", {
      level: "error",
      group: group ?? undefined,
      message: lines.find((line) => line.kind === "message")?.text,
      payload: Object.fromEntries(
        lines
          .filter((line) => line.kind === "name" || line.kind === "cause" || line.kind === "code")
          .map((line) => [line.kind, line.text] as const),
      ),
    });
  }
}
