import { Command } from "commander";

import type { ProbelineConfig } from "../core/config.js";
import type { CommandRunner } from "../scans/command.js";

import { loadConfigForCli } from "./config.js";
import { reportCommand, type ReportOptions } from "./report.js";
import { runTargetCommand, type RunTargetOptions } from "./run.js";
import { registerScansCommand } from "./scans.js";
import { registerWorkflowsCommand } from "./workflows.js";

export type CliDeps = {
  /** Working directory for config and default scan directory lookup. */
  cwd?: string;
  runner?: CommandRunner;
};

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export function buildCli(deps: CliDeps = {}): Command {
  const program = new Command();

  const resolveConfig = (command: Command): ProbelineConfig => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    return loadConfigForCli({ explicitConfigPath: globals.config, cwd: deps.cwd }).config;
  };

  program
    .name("probeline")
    .description("Staged reconnaissance scans against a single target")
    .version("0.1.0")
    .option("--config <path>", "Config file (defaults to ./probeline.yaml when present)")
    .option("--debug", "Show error details and stack traces", false);

  program
    .command("run")
    .description("Run a workflow (or a list of scans) against a target")
    .argument("<target>", "Hostname, IP address or CIDR range")
    .option("-o, --output <dir>", "Output directory (default: output_dir from config)")
    .option("-w, --workflow <name>", "Workflow to run (default: workflow from config)")
    .option("--scans <names>", "Comma-separated scan names to run in order instead of a workflow")
    .option("--discover <dirs...>", "Extra directories to load scan definitions from")
    .option("--force-vuln", "Run the vulnerability scan even with fewer than 3 open ports", false)
    .option("--json", "Emit JSON output", false)
    .action(async (target: string, opts: RunTargetOptions, command: Command) => {
      await runTargetCommand(target, resolveConfig(command), opts, { runner: deps.runner });
    });

  registerScansCommand(program, { resolveConfig });
  registerWorkflowsCommand(program);

  program
    .command("report")
    .description("Print the summary of a saved run")
    .argument("<results>", "Path to a results.json written by `run`")
    .option("--json", "Emit JSON output", false)
    .action(async (resultsFile: string, opts: ReportOptions) => {
      await reportCommand(resultsFile, opts);
    });

  return program;
}
