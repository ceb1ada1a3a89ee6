import type { JsonObject } from "../../core/json.js";
import type { NmapReport } from "../../parsers/nmap.js";
import { NmapScan } from "./nmap-scan.js";

/** Full TCP SYN sweep (1-65535); seeds the port list later stages read. */
export class QuickNmapScan extends NmapScan {
  readonly name = "quick_nmap";
  readonly description = "Fast TCP SYN scan of all ports (1-65535)";
  readonly timeoutSeconds = 600;
  protected readonly outputStem = "nmap_quick";

  protected scanArgs(): string[] {
    return [
      "-sS",
      "-Pn",
      "-p-",
      "--max-retries",
      String(this.config.max_retries),
      "--min-rate",
      String(this.config.min_rate),
    ];
  }

  protected summarize(report: NmapReport): JsonObject {
    return { port_count: report.ports.length, host_count: report.hosts.length };
  }
}
