/*
Purpose: persistence shape for results and contexts.
Assumptions: parsed data is plain JSON; timestamps travel as ISO strings.
Usage: serializeContext(ctx) -> JSON-safe record; deserializeContext(raw) -> ScanContext.
*/

import { z } from "zod";

import { ScanContext } from "./context.js";
import { ResultsFileError } from "./errors.js";
import { JsonObjectSchema } from "./json.js";
import { createScanResult, durationSeconds, type ScanResult } from "./result.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const IsoTimestampSchema = z.string().datetime({ offset: true });

export const ScanResultRecordSchema = z.object({
  name: z.string().min(1),
  success: z.boolean(),
  start: IsoTimestampSchema,
  end: IsoTimestampSchema,
  duration: z.number().nonnegative().optional(),
  raw_output: z.string(),
  parsed_data: JsonObjectSchema,
  error: z.string().nullable(),
});
export type ScanResultRecord = z.infer<typeof ScanResultRecordSchema>;

export const ScanContextRecordSchema = z.object({
  target: z.string().min(1),
  output_dir: z.string(),
  results: z.record(ScanResultRecordSchema),
  metadata: JsonObjectSchema,
});
export type ScanContextRecord = z.infer<typeof ScanContextRecordSchema>;

// =============================================================================
// RESULTS
// =============================================================================

export function serializeResult(result: ScanResult): ScanResultRecord {
  return {
    name: result.scanName,
    success: result.success,
    start: result.startedAt.toISOString(),
    end: result.finishedAt.toISOString(),
    duration: durationSeconds(result),
    raw_output: result.rawOutput,
    parsed_data: { ...result.parsedData },
    error: result.error ?? null,
  };
}

export function deserializeResult(record: ScanResultRecord): ScanResult {
  return createScanResult({
    scanName: record.name,
    success: record.success,
    startedAt: new Date(record.start),
    finishedAt: new Date(record.end),
    rawOutput: record.raw_output,
    parsedData: record.parsed_data,
    error: record.error ?? undefined,
  });
}

// =============================================================================
// CONTEXT
// =============================================================================

export function serializeContext(context: ScanContext): ScanContextRecord {
  const results: Record<string, ScanResultRecord> = {};
  for (const [name, result] of context.results) {
    results[name] = serializeResult(result);
  }

  return {
    target: context.target,
    output_dir: context.outputDir,
    results,
    metadata: { ...context.metadata },
  };
}

export function deserializeContext(raw: unknown, source = "<input>"): ScanContext {
  const parsed = ScanContextRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ResultsFileError(`Invalid results data in ${source}: ${parsed.error.toString()}`);
  }

  const record = parsed.data;
  const context = new ScanContext({
    target: record.target,
    outputDir: record.output_dir,
    metadata: record.metadata,
  });

  for (const [name, resultRecord] of Object.entries(record.results)) {
    try {
      context.recordResult(deserializeResult({ ...resultRecord, name }));
    } catch (err) {
      throw new ResultsFileError(`Invalid result "${name}" in ${source}`, err);
    }
  }

  return context;
}
