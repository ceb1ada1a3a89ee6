import path from "node:path";

// =============================================================================
// OUTPUT LAYOUT
// =============================================================================

export const RESULTS_FILE = "results.json";
export const SUMMARY_FILE = "summary.txt";

export function resultsPath(outputDir: string, fileName: string = RESULTS_FILE): string {
  return path.join(outputDir, fileName);
}

export function summaryPath(outputDir: string, fileName: string = SUMMARY_FILE): string {
  return path.join(outputDir, fileName);
}

export function runLogsDir(outputDir: string): string {
  return path.join(outputDir, "logs");
}

export function runLogPath(outputDir: string, runId: string): string {
  return path.join(runLogsDir(outputDir), `${runId}.jsonl`);
}

export function scanOutputPath(outputDir: string, stem: string, extension: "txt" | "xml"): string {
  return path.join(outputDir, `${stem}.${extension}`);
}
