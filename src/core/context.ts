import type { JsonObject } from "./json.js";
import { readRecord } from "./json.js";
import type { ScanResult } from "./result.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanContextInit = {
  target: string;
  outputDir: string;
  metadata?: JsonObject;
};

const UNKNOWN_SERVICE = "unknown";

// =============================================================================
// CONTEXT
// =============================================================================

/**
 * Run-scoped state shared by every scan of one workflow run.
 *
 * Results are keyed by scan name in completion order. Port and service views
 * are recomputed from the recorded results on every call, so they always
 * reflect the latest completed scans.
 */
export class ScanContext {
  readonly target: string;
  readonly outputDir: string;
  readonly metadata: JsonObject;
  private readonly resultsByName = new Map<string, ScanResult>();

  constructor(init: ScanContextInit) {
    this.target = init.target;
    this.outputDir = init.outputDir;
    this.metadata = { ...(init.metadata ?? {}) };
  }

  get results(): ReadonlyMap<string, ScanResult> {
    return this.resultsByName;
  }

  /**
   * Single write point for results. Only the executor calls this; a result
   * under an existing name replaces it and moves to the end of the order.
   */
  recordResult(result: ScanResult): void {
    this.resultsByName.delete(result.scanName);
    this.resultsByName.set(result.scanName, result);
  }

  getResult(scanName: string): ScanResult | undefined {
    return this.resultsByName.get(scanName);
  }

  hasResult(scanName: string): boolean {
    return this.resultsByName.has(scanName);
  }

  listResults(): ScanResult[] {
    return [...this.resultsByName.values()];
  }

  getSuccessfulResults(): ScanResult[] {
    return this.listResults().filter((result) => result.success);
  }

  // ---------------------------------------------------------------------------
  // Derived views
  // ---------------------------------------------------------------------------

  getOpenPorts(): number[] {
    const ports = new Set<number>();
    for (const result of this.getSuccessfulResults()) {
      for (const port of readOpenPortList(result.parsedData)) {
        ports.add(port);
      }
      for (const entry of readPortEntries(result.parsedData)) {
        ports.add(entry.port);
      }
    }
    return [...ports].sort((a, b) => a - b);
  }

  getServices(): Map<number, string> {
    const services = new Map<number, string>();
    for (const result of this.getSuccessfulResults()) {
      for (const entry of readPortEntries(result.parsedData)) {
        services.set(entry.port, entry.service);
      }
    }
    return services;
  }

  getPortsByService(servicePattern: string): number[] {
    const needle = servicePattern.toLowerCase();
    return [...this.getServices()]
      .filter(([, service]) => service.toLowerCase().includes(needle))
      .map(([port]) => port)
      .sort((a, b) => a - b);
  }

  hasOpenPorts(): boolean {
    return this.getOpenPorts().length > 0;
  }
}

// =============================================================================
// PARSED DATA READERS
// =============================================================================

type PortEntry = {
  port: number;
  service: string;
};

function readOpenPortList(data: Readonly<JsonObject>): number[] {
  const list = data.open_ports;
  if (!Array.isArray(list)) return [];

  const ports: number[] = [];
  for (const value of list) {
    const port = parsePort(value);
    if (port !== undefined) ports.push(port);
  }
  return ports;
}

function readPortEntries(data: Readonly<JsonObject>): PortEntry[] {
  const list = data.ports;
  if (!Array.isArray(list)) return [];

  const entries: PortEntry[] = [];
  for (const value of list) {
    const record = readRecord(value);
    if (!record) continue;

    const port = parsePort(record.port_id);
    if (port === undefined) continue;

    const service =
      typeof record.service_name === "string" && record.service_name.length > 0
        ? record.service_name
        : UNKNOWN_SERVICE;
    entries.push({ port, service });
  }
  return entries;
}

function parsePort(value: unknown): number | undefined {
  const port =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : Number.NaN;

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return undefined;
  }
  return port;
}
