import type { ScanContext } from "../../core/context.js";
import type { JsonObject } from "../../core/json.js";
import type { NmapReport } from "../../parsers/nmap.js";
import { formatPortList, NmapScan } from "./nmap-scan.js";

export class DetailedNmapScan extends NmapScan {
  readonly name = "detailed_nmap";
  readonly description = "Service version detection and OS fingerprinting on open ports";
  readonly timeoutSeconds = 900;
  protected readonly outputStem = "nmap_detailed";

  canRun(context: ScanContext): boolean {
    return context.hasOpenPorts();
  }

  protected scanArgs(context: ScanContext): string[] {
    return ["-sV", "-sC", "-A", "-O", "-p", formatPortList(context.getOpenPorts())];
  }

  protected summarize(report: NmapReport, context: ScanContext): JsonObject {
    return {
      service_count: report.ports.filter((port) => port.service_name.length > 0).length,
      scanned_ports: context.getOpenPorts().length,
    };
  }
}
