import type { ScanContext } from "../core/context.js";
import type { ScanListing } from "../core/registry.js";
import { durationSeconds, isSkipped, type ScanResult } from "../core/result.js";

// =============================================================================
// PROGRESS
// =============================================================================

export function formatScanStatus(result: ScanResult): string {
  if (isSkipped(result)) return "skipped";
  return result.success ? "ok" : "failed";
}

export function printScanProgress(result: ScanResult): void {
  const suffix = result.error ? `: ${result.error}` : "";
  console.log(
    `[${formatScanStatus(result)}] ${result.scanName} (${formatDuration(result)})${suffix}`,
  );
}

// =============================================================================
// TABLES
// =============================================================================

export function printScanList(listings: ScanListing[]): void {
  const rows = listings.map((listing) => [
    listing.name,
    `${listing.timeoutSeconds}s`,
    listing.requiresRoot ? "yes" : "no",
    listing.description || "-",
  ]);

  console.log("Available scans:");
  printTable(["Name", "Timeout", "Root", "Description"], rows);
}

export function printResultsTable(context: ScanContext): void {
  const rows = context
    .listResults()
    .map((result) => [
      result.scanName,
      formatScanStatus(result),
      formatDuration(result),
      describeResult(result),
    ]);

  printTable(["Scan", "Status", "Duration", "Details"], rows);
}

export function printPortsTable(context: ScanContext): void {
  const ports = context.getOpenPorts();
  if (ports.length === 0) {
    console.log("No open ports recorded.");
    return;
  }

  const services = context.getServices();
  console.log(`Open ports (${ports.length}):`);
  printTable(
    ["Port", "Service"],
    ports.map((port) => [String(port), services.get(port) ?? "unknown"]),
  );
}

// =============================================================================
// UTILITIES
// =============================================================================

function describeResult(result: ScanResult): string {
  if (result.error) return result.error;

  const { port_count: portCount, service_count: serviceCount } = result.parsedData;
  if (typeof portCount === "number") return `${portCount} ports`;
  if (typeof serviceCount === "number") return `${serviceCount} services`;
  return "";
}

function formatDuration(result: ScanResult): string {
  return `${durationSeconds(result).toFixed(2)}s`;
}

function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((header, index) =>
    columnWidth(
      rows.map((row) => row[index] ?? ""),
      header,
    ),
  );
  const renderRow = (cells: string[]): string =>
    cells
      .map((cell, index) => pad(cell, widths[index] ?? cell.length))
      .join("  ")
      .trimEnd();

  console.log(renderRow(headers));
  for (const row of rows) {
    console.log(renderRow(row));
  }
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}
