import type { JsonObject } from "./json.js";
import { JsonObjectSchema } from "./json.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanResult = Readonly<{
  scanName: string;
  success: boolean;
  startedAt: Date;
  finishedAt: Date;
  rawOutput: string;
  parsedData: Readonly<JsonObject>;
  error?: string;
}>;

export type ScanResultInput = {
  scanName: string;
  success: boolean;
  startedAt: Date;
  finishedAt?: Date;
  rawOutput?: string;
  parsedData?: JsonObject;
  error?: string;
};

export type ResultTally = {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
};

export const SKIPPED_MARKER = "skipped";
export const TIMED_OUT_MARKER = "timed_out";

const GENERIC_FAILURE_MESSAGE = "Scan reported failure without an error message";

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Builds a frozen result. Timestamps and parsed data are copied so later
 * mutation of the inputs cannot leak into a recorded result.
 */
export function createScanResult(input: ScanResultInput): ScanResult {
  const startedAt = new Date(input.startedAt.getTime());
  const finishedAt = new Date((input.finishedAt ?? new Date()).getTime());

  if (Number.isNaN(startedAt.getTime()) || Number.isNaN(finishedAt.getTime())) {
    throw new RangeError(`Result for "${input.scanName}" has an invalid timestamp`);
  }
  if (finishedAt.getTime() < startedAt.getTime()) {
    throw new RangeError(`Result for "${input.scanName}" finishes before it starts`);
  }

  const checked = JsonObjectSchema.safeParse(input.parsedData ?? {});
  if (!checked.success) {
    throw new TypeError(
      `Result for "${input.scanName}" has parsed data that is not plain JSON: ${checked.error.issues[0]?.message ?? "invalid value"}`,
    );
  }
  const parsedData = deepFreeze(structuredClone(input.parsedData ?? {}));
  const error = input.error && input.error.length > 0 ? input.error : undefined;

  const result: { -readonly [K in keyof ScanResult]: ScanResult[K] } = {
    scanName: input.scanName,
    success: input.success,
    startedAt,
    finishedAt,
    rawOutput: input.rawOutput ?? "",
    parsedData,
  };

  if (error) {
    result.error = error;
  } else if (!input.success) {
    result.error = GENERIC_FAILURE_MESSAGE;
  }

  return Object.freeze(result);
}

export function isScanResult(value: unknown): value is ScanResult {
  if (!value || typeof value !== "object") return false;
  if (!("scanName" in value) || typeof value.scanName !== "string") return false;
  if (!("success" in value) || typeof value.success !== "boolean") return false;
  if (!("startedAt" in value) || !(value.startedAt instanceof Date)) return false;
  if (!("finishedAt" in value) || !(value.finishedAt instanceof Date)) return false;
  if ("rawOutput" in value && typeof value.rawOutput !== "string") return false;
  if ("error" in value && value.error !== undefined && typeof value.error !== "string") {
    return false;
  }
  if (!("parsedData" in value)) return false;
  return JsonObjectSchema.safeParse(value.parsedData).success;
}

// =============================================================================
// DERIVED
// =============================================================================

export function durationSeconds(result: ScanResult): number {
  return (result.finishedAt.getTime() - result.startedAt.getTime()) / 1000;
}

export function isSkipped(result: ScanResult): boolean {
  return result.parsedData[SKIPPED_MARKER] === true;
}

export function isTimedOut(result: ScanResult): boolean {
  return result.parsedData[TIMED_OUT_MARKER] === true;
}

export function tallyResults(results: Iterable<ScanResult>): ResultTally {
  const tally: ResultTally = { total: 0, succeeded: 0, failed: 0, skipped: 0 };
  for (const result of results) {
    tally.total += 1;
    if (!result.success) {
      tally.failed += 1;
    } else if (isSkipped(result)) {
      tally.skipped += 1;
    } else {
      tally.succeeded += 1;
    }
  }
  return tally;
}

// =============================================================================
// INTERNALS
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
