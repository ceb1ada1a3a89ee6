import path from "node:path";

import type { ProbelineConfig } from "../core/config.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { JsonlLogger } from "../core/logger.js";
import { runLogPath } from "../core/paths.js";
import { serializeContext } from "../core/serialization.js";
import { saveResults, saveSummary } from "../core/storage.js";
import { defaultRunId } from "../core/utils.js";
import { runWorkflow, type WorkflowRun } from "../core/workflow.js";
import type { CommandRunner } from "../scans/command.js";
import { FORCE_VULN_SCAN_KEY } from "../scans/index.js";
import { resolveScanSelection, resolveWorkflow } from "../workflows/index.js";

import { bootstrapRegistry, printDiscoveryWarnings } from "./bootstrap.js";
import { printPortsTable, printResultsTable, printScanProgress } from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunTargetOptions = {
  output?: string;
  workflow?: string;
  scans?: string;
  discover?: string[];
  forceVuln?: boolean;
  json?: boolean;
};

export type RunTargetDeps = {
  runner?: CommandRunner;
  now?: () => Date;
};

// Hostnames, IPv4/IPv6 addresses and CIDR ranges; no leading dash.
const TARGET_PATTERN = /^[A-Za-z0-9_.:[\]][A-Za-z0-9_.:/[\]-]*$/;

// =============================================================================
// COMMAND
// =============================================================================

export async function runTargetCommand(
  target: string,
  config: ProbelineConfig,
  opts: RunTargetOptions,
  deps: RunTargetDeps = {},
): Promise<WorkflowRun> {
  const normalizedTarget = validateTarget(target);
  const outputDir = opts.output ? path.resolve(opts.output) : config.output_dir;
  const runId = defaultRunId(deps.now?.());
  const logger = new JsonlLogger(runLogPath(outputDir, runId), { runId });

  try {
    const bootstrap = await bootstrapRegistry({
      config,
      extraDirs: opts.discover,
      logger,
      runner: deps.runner,
    });
    printDiscoveryWarnings(bootstrap);

    const workflow = opts.scans
      ? resolveScanSelection(parseScanList(opts.scans), bootstrap.registry)
      : resolveWorkflow(opts.workflow ?? config.workflow, bootstrap.registry);

    const metadata: JsonObject = { ...config.metadata };
    if (opts.forceVuln) {
      metadata[FORCE_VULN_SCAN_KEY] = true;
    }

    if (!opts.json) {
      console.log(`Target: ${normalizedTarget}`);
      console.log(`Output Directory: ${outputDir}`);
      console.log(`Workflow: ${workflow.name}`);
      console.log("");
    }

    const run = await runWorkflow(workflow, {
      target: normalizedTarget,
      outputDir,
      metadata,
      runId,
      logger,
      timeoutOverrides: config.timeouts,
      onScanComplete: opts.json ? undefined : printScanProgress,
    });

    const resultsFile = await saveResults(run.context);
    const summaryFile = await saveSummary(run.context);

    if (opts.json) {
      console.log(
        JSON.stringify(
          {
            run_id: run.runId,
            workflow: run.workflow,
            results_file: resultsFile,
            summary_file: summaryFile,
            ...serializeContext(run.context),
          },
          null,
          2,
        ),
      );
    } else {
      console.log("");
      printResultsTable(run.context);
      console.log("");
      printPortsTable(run.context);
      console.log("");
      console.log(`Results saved to ${resultsFile}`);
      console.log(`Summary saved to ${summaryFile}`);
    }

    return run;
  } finally {
    logger.close();
  }
}

// =============================================================================
// INPUT
// =============================================================================

export function validateTarget(target: string): string {
  const trimmed = target.trim();
  if (!TARGET_PATTERN.test(trimmed)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid target.",
      message: `"${target}" is not a hostname, IP address or CIDR range.`,
      hint: "Targets are passed to nmap as-is and may not start with '-'.",
    });
  }
  return trimmed;
}

export function parseScanList(value: string): string[] {
  const names = value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return [...new Set(names)];
}
