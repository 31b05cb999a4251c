import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

export { RefreshGroupPullRequest } from "./app/updater/refresh-group.js";
export { refreshGroups } from "./app/updater/refresh-runner.js";
export { decidePullRequestAction } from "./app/updater/pr-decision.js";
export { mergeDirectoryChanges } from "./app/updater/change-merger.js";
export { compileDirectoryChange } from "./app/updater/change-compiler.js";
export { requirementsToUnlock } from "./app/updater/requirements.js";
export { buildDependencySnapshot } from "./app/updater/snapshot-builder.js";
export type * from "./app/updater/ports.js";
export { DependencySnapshot } from "./core/dependency-snapshot.js";
export { DependencyChange } from "./core/dependency-change.js";
export { DependencyGroup } from "./core/dependency-group.js";
export { Job } from "./core/job.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  program.exitOverride();
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  if (debugFlag !== undefined) {
    return debugFlag;
  }

  const options = program.opts<{ debug?: boolean }>();
  return Boolean(options.debug);
}

function resolveExitCode(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugEnabled(argv, program);
    console.error(renderCliError(error, { debug }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

// Allow `node dist/src/index.js` direct execution
if (import.meta.url === `file://${process.argv[1]}`) {
  void main(process.argv);
}
