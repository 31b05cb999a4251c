import { Command } from "commander";

import { groupsCommand } from "./groups.js";
import { refreshCommand } from "./refresh.js";

export const CLI_VERSION = "0.1.0";

type RefreshCliOptions = {
  job: string;
  repo?: string;
  catalog?: string;
  outbox?: string;
  logFile?: string;
  group?: string[];
  allGroups: boolean;
  force: boolean;
  quiet: boolean;
};

type GroupsCliOptions = {
  job: string;
  json: boolean;
};

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name("depsync")
    .description("Grouped dependency update reconciliation")
    .version(CLI_VERSION)
    .option("--debug", "Show debug events and stack traces", false)
    .option("--no-debug", "Hide debug events and stack traces");

  program
    .command("refresh")
    .description("Recompute a group's change and create, update or close its pull request")
    .requiredOption("--job <path>", "Job file (YAML or JSON)")
    .option("--repo <dir>", "Repository checkout to read dependency files from (default: cwd)")
    .option("--catalog <path>", "Version catalog with the latest version per package")
    .option("--outbox <path>", "Append pull request actions to this JSONL file")
    .option("--log-file <path>", "Also write structured events to this JSONL file")
    .option("--group <name>", "Refresh this group (repeatable)", collect)
    .option("--all-groups", "Refresh every configured group in order", false)
    .option("--force", "Refresh even when the job does not describe a group refresh", false)
    .option("-q, --quiet", "Only print errors", false)
    .action(async (opts: RefreshCliOptions) => {
      const globals = program.opts<{ debug?: boolean }>();
      await refreshCommand({
        jobPath: opts.job,
        repoRoot: opts.repo,
        catalogPath: opts.catalog,
        outboxPath: opts.outbox,
        logFile: opts.logFile,
        groups: opts.group,
        allGroups: opts.allGroups,
        force: opts.force,
        quiet: opts.quiet,
        debug: Boolean(globals.debug),
      });
    });

  program
    .command("groups")
    .description("List configured dependency groups and their open pull requests")
    .requiredOption("--job <path>", "Job file (YAML or JSON)")
    .option("--json", "Print JSON", false)
    .action((opts: GroupsCliOptions) => {
      for (const line of groupsCommand({ jobPath: opts.job, json: opts.json })) {
        console.log(line);
      }
    });

  return program;
}
