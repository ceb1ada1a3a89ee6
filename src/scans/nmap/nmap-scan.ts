import type { ScanContext } from "../../core/context.js";
import { defaultConfig, type NmapConfig } from "../../core/config.js";
import type { JsonObject } from "../../core/json.js";
import { scanOutputPath } from "../../core/paths.js";
import { createScanResult, type ScanResult } from "../../core/result.js";
import type { Scan, ScanExecution } from "../../core/scan.js";
import { nmapReportToJson, parseNmapFile, type NmapReport } from "../../parsers/nmap.js";
import { formatCommandLine, runCommand, type CommandRunner } from "../command.js";

// =============================================================================
// TYPES
// =============================================================================

export type NmapScanOptions = {
  nmap?: Partial<NmapConfig>;
  runner?: CommandRunner;
};

export type NmapOutputFiles = {
  txt: string;
  xml: string;
};

// =============================================================================
// BASE SCAN
// =============================================================================

/**
 * Shared plumbing for nmap-backed scans: argv assembly, `-oN`/`-oX` output
 * files under the run's output directory, exit-code handling and XML parsing.
 * Subclasses supply the scan-specific flags and counters.
 */
export abstract class NmapScan implements Scan {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly timeoutSeconds: number;
  readonly requiresRoot: boolean = true;

  protected readonly config: NmapConfig;
  private readonly runner: CommandRunner;

  /** File stem under the output directory, e.g. `nmap_quick`. */
  protected abstract readonly outputStem: string;

  constructor(options: NmapScanOptions = {}) {
    this.config = { ...defaultConfig().nmap, ...options.nmap };
    this.runner = options.runner ?? runCommand;
  }

  protected abstract scanArgs(context: ScanContext): string[];

  protected abstract summarize(report: NmapReport, context: ScanContext): JsonObject;

  outputFiles(context: ScanContext): NmapOutputFiles {
    return {
      txt: scanOutputPath(context.outputDir, this.outputStem, "txt"),
      xml: scanOutputPath(context.outputDir, this.outputStem, "xml"),
    };
  }

  buildCommand(context: ScanContext): { file: string; args: string[] } {
    const outputs = this.outputFiles(context);
    const nmapArgs = [
      ...this.scanArgs(context),
      "-oN",
      outputs.txt,
      "-oX",
      outputs.xml,
      context.target,
    ];

    return this.config.sudo
      ? { file: "sudo", args: [this.config.binary, ...nmapArgs] }
      : { file: this.config.binary, args: nmapArgs };
  }

  async execute(context: ScanContext, execution: ScanExecution): Promise<ScanResult> {
    const startedAt = new Date();
    const outputs = this.outputFiles(context);
    const command = this.buildCommand(context);

    execution.logger.log({
      type: "nmap.command",
      scan: this.name,
      command: formatCommandLine(command.file, command.args),
    });

    const res = await this.runner(command.file, command.args, { signal: execution.signal });

    if (res.exitCode !== 0) {
      return createScanResult({
        scanName: this.name,
        success: false,
        startedAt,
        finishedAt: new Date(),
        rawOutput: `${res.stdout}\n${res.stderr}`,
        error: `nmap exited with code ${res.exitCode}`,
      });
    }

    const report = await parseNmapFile(outputs.xml);
    if (report.error) {
      execution.logger.log({ type: "nmap.parse_failed", scan: this.name, message: report.error });
    }

    return createScanResult({
      scanName: this.name,
      success: true,
      startedAt,
      finishedAt: new Date(),
      rawOutput: res.stdout,
      parsedData: {
        ...nmapReportToJson(report),
        ...this.summarize(report, context),
        output_txt: outputs.txt,
        output_xml: outputs.xml,
      },
    });
  }
}

export function formatPortList(ports: readonly number[]): string {
  return ports.join(",");
}
