/**
 * Scan contract: the capability set every probe unit exposes to the
 * registry and executor. Concrete scans implement it directly; nothing in
 * the core depends on a class hierarchy.
 */

import type { ScanContext } from "./context.js";
import type { EventLogger } from "./logger.js";
import type { ScanResult } from "./result.js";

// =============================================================================
// TYPES
// =============================================================================

export const DEFAULT_SCAN_TIMEOUT_SECONDS = 300;
// Largest delay a Node.js timer honours (2^31 - 1 ms); longer ones fire at once.
export const MAX_SCAN_TIMEOUT_SECONDS = 2_147_483.647;

export type ScanExecution = {
  /** Aborted by the executor when the deadline passes. */
  signal: AbortSignal;
  logger: EventLogger;
};

export interface Scan {
  readonly name: string;
  readonly description?: string;
  readonly timeoutSeconds?: number;
  readonly requiresRoot?: boolean;

  /**
   * Evaluated once, right before execution. Must not mutate the context.
   * Scans without a predicate always run.
   */
  canRun?(context: ScanContext): boolean | Promise<boolean>;

  /**
   * Reads the context freely but never writes to it; the executor records
   * the returned result.
   */
  execute(context: ScanContext, execution: ScanExecution): Promise<ScanResult>;
}

export type ScanConstructor = new () => Scan;

export type ScanDescriptor = {
  name: string;
  description: string;
  timeoutSeconds: number;
  requiresRoot: boolean;
};

// =============================================================================
// GUARDS
// =============================================================================

export function isScan(value: unknown): value is Scan {
  if (!value || typeof value !== "object") return false;
  if (!("name" in value) || typeof value.name !== "string" || value.name.trim() === "") {
    return false;
  }
  if (!("execute" in value) || typeof value.execute !== "function") return false;
  if ("canRun" in value && value.canRun !== undefined && typeof value.canRun !== "function") {
    return false;
  }
  if ("description" in value && value.description !== undefined) {
    if (typeof value.description !== "string") return false;
  }
  if ("timeoutSeconds" in value && value.timeoutSeconds !== undefined) {
    if (!isValidTimeout(value.timeoutSeconds)) return false;
  }
  if ("requiresRoot" in value && value.requiresRoot !== undefined) {
    if (typeof value.requiresRoot !== "boolean") return false;
  }
  return true;
}

export function isScanConstructor(value: unknown): value is ScanConstructor {
  if (typeof value !== "function") return false;
  const proto: unknown = value.prototype;
  return (
    typeof proto === "object" &&
    proto !== null &&
    "execute" in proto &&
    typeof proto.execute === "function"
  );
}

export function isValidTimeout(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isFinite(value) &&
    value > 0 &&
    value <= MAX_SCAN_TIMEOUT_SECONDS
  );
}

// =============================================================================
// DESCRIPTORS
// =============================================================================

export function describeScan(scan: Scan): ScanDescriptor {
  return {
    name: scan.name,
    description: scan.description ?? "",
    timeoutSeconds: isValidTimeout(scan.timeoutSeconds)
      ? scan.timeoutSeconds
      : DEFAULT_SCAN_TIMEOUT_SECONDS,
    requiresRoot: scan.requiresRoot ?? false,
  };
}
