import type { Command } from "commander";

import type { ProbelineConfig } from "../core/config.js";

import { bootstrapRegistry, printDiscoveryWarnings } from "./bootstrap.js";
import { printScanList } from "./output.js";

export type ScansListOptions = {
  discover?: string[];
  json?: boolean;
};

export type ScansCommandDeps = {
  resolveConfig: (command: Command) => ProbelineConfig;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerScansCommand(program: Command, deps: ScansCommandDeps): void {
  const scans = program.command("scans").description("Inspect registered scans");

  scans
    .command("list")
    .description("List built-in and discovered scans")
    .option("--discover <dirs...>", "Extra directories to load scan definitions from")
    .option("--json", "Emit JSON output", false)
    .action(async (opts: ScansListOptions, command: Command) => {
      await scansListCommand(deps.resolveConfig(command), opts);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function scansListCommand(
  config: ProbelineConfig,
  opts: ScansListOptions,
): Promise<void> {
  const bootstrap = await bootstrapRegistry({ config, extraDirs: opts.discover });
  const listings = bootstrap.registry.listAll();

  if (opts.json) {
    console.log(JSON.stringify(listings, null, 2));
    return;
  }

  printDiscoveryWarnings(bootstrap);
  printScanList(listings);
}
