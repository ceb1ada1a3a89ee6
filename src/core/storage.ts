import { formatErrorMessage } from "./error-format.js";
import type { ScanContext } from "./context.js";
import { ResultsFileError } from "./errors.js";
import { resultsPath, summaryPath, RESULTS_FILE, SUMMARY_FILE } from "./paths.js";
import { durationSeconds, tallyResults } from "./result.js";
import { deserializeContext, serializeContext } from "./serialization.js";
import { readJsonFile, writeFileAtomic, writeJsonFile } from "./utils.js";

// =============================================================================
// JSON RESULTS
// =============================================================================

export async function saveResults(
  context: ScanContext,
  fileName: string = RESULTS_FILE,
): Promise<string> {
  const filePath = resultsPath(context.outputDir, fileName);
  await writeJsonFile(filePath, serializeContext(context));
  return filePath;
}

export async function loadResults(filePath: string): Promise<ScanContext> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    throw new ResultsFileError(
      `Unable to read results from ${filePath}: ${formatErrorMessage(err)}`,
      err,
    );
  }
  return deserializeContext(raw, filePath);
}

// =============================================================================
// TEXT SUMMARY
// =============================================================================

const RULE = "=".repeat(70);

export function buildSummaryText(context: ScanContext): string {
  const results = context.listResults();
  const tally = tallyResults(results);
  const lines: string[] = [
    RULE,
    "PROBELINE SCAN SUMMARY",
    RULE,
    "",
    `Target: ${context.target}`,
    `Output Directory: ${context.outputDir}`,
    "",
    `Completed Scans: ${tally.succeeded + tally.skipped}/${tally.total}` +
      (tally.skipped > 0 ? ` (${tally.skipped} skipped)` : ""),
    "",
  ];

  for (const result of results) {
    const status = result.success ? "✓" : "✗";
    lines.push(`${status} ${result.scanName}: ${durationSeconds(result).toFixed(2)}s`);
    if (result.error) {
      lines.push(`  Error: ${result.error}`);
    }
  }

  const openPorts = context.getOpenPorts();
  if (openPorts.length > 0) {
    lines.push("", `Open Ports (${openPorts.length}):`, `  ${openPorts.join(", ")}`);
  }

  const services = [...context.getServices()].sort(([a], [b]) => a - b);
  if (services.length > 0) {
    lines.push("", `Detected Services (${services.length}):`);
    for (const [port, service] of services) {
      lines.push(`  ${String(port).padStart(5)} - ${service}`);
    }
  }

  lines.push("", RULE);
  return lines.join("\n") + "\n";
}

export async function saveSummary(
  context: ScanContext,
  fileName: string = SUMMARY_FILE,
): Promise<string> {
  const filePath = summaryPath(context.outputDir, fileName);
  await writeFileAtomic(filePath, buildSummaryText(context));
  return filePath;
}
