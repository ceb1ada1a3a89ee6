import path from "node:path";

import type { ProbelineConfig } from "../core/config.js";
import { DuplicateScanError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { nullLogger, type EventLogger } from "../core/logger.js";
import { ScanRegistry, type DiscoveryReport } from "../core/registry.js";
import type { CommandRunner } from "../scans/command.js";
import { registerBuiltinScans } from "../scans/index.js";

// =============================================================================
// REGISTRY BOOTSTRAP
// =============================================================================

export type RegistryBootstrapArgs = {
  config: ProbelineConfig;
  /** Directories from --discover; reported when missing, unlike configured ones. */
  extraDirs?: string[];
  logger?: EventLogger;
  runner?: CommandRunner;
};

export type RegistryBootstrap = {
  registry: ScanRegistry;
  reports: DiscoveryReport[];
  explicitDirs: string[];
};

export async function bootstrapRegistry(args: RegistryBootstrapArgs): Promise<RegistryBootstrap> {
  const registry = new ScanRegistry(args.logger ?? nullLogger);
  registerBuiltinScans(registry, { nmap: args.config.nmap, runner: args.runner });

  const explicitDirs = (args.extraDirs ?? []).map((dir) => path.resolve(dir));
  const directories = [...new Set([...args.config.scan_dirs, ...explicitDirs])];

  const reports: DiscoveryReport[] = [];
  for (const directory of directories) {
    try {
      reports.push(await registry.discover(directory));
    } catch (error) {
      if (error instanceof DuplicateScanError) {
        throw new UserFacingError({
          code: USER_FACING_ERROR_CODES.registry,
          title: "Duplicate scan name.",
          message: `${error.message} Found while loading ${directory}.`,
          hint: "Scan names must be unique across built-ins and every scan directory.",
          next: "Rename one of the scans, or drop the directory from scan_dirs/--discover.",
          cause: error,
        });
      }
      throw error;
    }
  }

  return { registry, reports, explicitDirs };
}

export function printDiscoveryWarnings(bootstrap: RegistryBootstrap): void {
  for (const report of bootstrap.reports) {
    if (report.missing && bootstrap.explicitDirs.includes(report.directory)) {
      console.warn(`Warning: scan directory not found: ${report.directory}`);
    }
    for (const failure of report.failures) {
      console.warn(`Warning: ${failure.message}`);
    }
  }
}
