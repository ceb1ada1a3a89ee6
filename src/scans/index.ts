import type { ScanRegistry } from "../core/registry.js";
import type { Scan, ScanConstructor } from "../core/scan.js";
import {
  DetailedNmapScan,
  QuickNmapScan,
  VulnNmapScan,
  type NmapScanOptions,
} from "./nmap/index.js";

export { runCommand, type CommandResult, type CommandRunner } from "./command.js";
export * from "./nmap/index.js";

type NmapScanClass = new (options?: NmapScanOptions) => Scan;

const BUILTIN_NMAP_SCANS: readonly NmapScanClass[] = [
  QuickNmapScan,
  DetailedNmapScan,
  VulnNmapScan,
];

/**
 * Registers the bundled nmap scans with `options` bound in, so the registry
 * can still construct them without arguments.
 */
export function registerBuiltinScans(
  registry: ScanRegistry,
  options: NmapScanOptions = {},
): string[] {
  return BUILTIN_NMAP_SCANS.map((scanClass) => registry.register(bindOptions(scanClass, options)));
}

function bindOptions(scanClass: NmapScanClass, options: NmapScanOptions): ScanConstructor {
  return class extends scanClass {
    constructor() {
      super(options);
    }
  };
}
