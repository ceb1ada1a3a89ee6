import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { CommandResult, CommandRunner } from "../../scans/command.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const NMAP_FIXTURES = path.resolve(__dirname, "../../../test/fixtures/nmap");

// =============================================================================
// TYPES
// =============================================================================

export type NmapStage = "quick" | "detailed" | "vuln";

export type FakeNmapCall = {
  stage: NmapStage;
  file: string;
  args: readonly string[];
};

export type FakeNmapOptions = {
  /** Fixture file per stage, relative to test/fixtures/nmap. */
  reports?: Partial<Record<NmapStage, string>>;
  exitCodes?: Partial<Record<NmapStage, number>>;
  delayMs?: Partial<Record<NmapStage, number>>;
};

export type FakeNmap = {
  runner: CommandRunner;
  calls: FakeNmapCall[];
  /** `start:<stage>` / `end:<stage>` in the order they happened. */
  journal: string[];
};

const DEFAULT_REPORTS: Record<NmapStage, string> = {
  quick: "quick.xml",
  detailed: "detailed.xml",
  vuln: "vuln.xml",
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Stand-in for the nmap binary: copies the stage's fixture report to the
 * `-oX` path the scan asked for. Honours the abort signal like a killed child.
 */
export function createFakeNmap(options: FakeNmapOptions = {}): FakeNmap {
  const calls: FakeNmapCall[] = [];
  const journal: string[] = [];

  const runner: CommandRunner = async (file, args, runOptions = {}) => {
    const xmlPath = readFlagValue(args, "-oX");
    const stage = resolveStage(xmlPath);
    calls.push({ stage, file, args });
    journal.push(`start:${stage}`);

    await sleep(options.delayMs?.[stage] ?? 0, runOptions.signal);

    const exitCode = options.exitCodes?.[stage] ?? 0;
    if (exitCode === 0 && xmlPath) {
      const report = options.reports?.[stage] ?? DEFAULT_REPORTS[stage];
      await fs.copyFile(path.join(NMAP_FIXTURES, report), xmlPath);
    }

    journal.push(`end:${stage}`);
    return buildResult(stage, exitCode);
  };

  return { runner, calls, journal };
}

// =============================================================================
// INTERNALS
// =============================================================================

function readFlagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

function resolveStage(xmlPath: string | undefined): NmapStage {
  const base = xmlPath ? path.basename(xmlPath, ".xml") : "";
  if (base === "nmap_detailed") return "detailed";
  if (base === "nmap_vuln") return "vuln";
  return "quick";
}

function buildResult(stage: NmapStage, exitCode: number): CommandResult {
  return exitCode === 0
    ? { stdout: `fake nmap ${stage} done`, stderr: "", exitCode }
    : { stdout: "", stderr: `fake nmap ${stage} failed`, exitCode };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(new Error("fake nmap killed"));
    });
  });
}
