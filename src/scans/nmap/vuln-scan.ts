import type { ScanContext } from "../../core/context.js";
import type { JsonObject } from "../../core/json.js";
import type { NmapReport } from "../../parsers/nmap.js";
import { formatPortList, NmapScan } from "./nmap-scan.js";

export const VULN_SCAN_MIN_PORTS = 3;
export const FORCE_VULN_SCAN_KEY = "force_vuln_scan";

export class VulnNmapScan extends NmapScan {
  readonly name = "vuln_nmap";
  readonly description = "Run Nmap vulnerability detection scripts on open ports";
  readonly timeoutSeconds = 1800;
  protected readonly outputStem = "nmap_vuln";

  // Fewer than three open ports needs metadata.force_vuln_scan === true.
  canRun(context: ScanContext): boolean {
    const openPorts = context.getOpenPorts().length;
    if (openPorts === 0) return false;
    if (openPorts >= VULN_SCAN_MIN_PORTS) return true;
    return context.metadata[FORCE_VULN_SCAN_KEY] === true;
  }

  protected scanArgs(context: ScanContext): string[] {
    return ["-p", formatPortList(context.getOpenPorts()), "--script", "vuln"];
  }

  protected summarize(report: NmapReport, context: ScanContext): JsonObject {
    return {
      vuln_ports: report.ports.filter((port) => port.scripts !== undefined).length,
      scanned_ports: context.getOpenPorts().length,
    };
  }
}
