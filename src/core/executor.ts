import { formatErrorMessage } from "./error-format.js";
import type { ScanContext } from "./context.js";
import { guardLogger, nullLogger, type EventLogger } from "./logger.js";
import {
  createScanResult,
  durationSeconds,
  isScanResult,
  SKIPPED_MARKER,
  TIMED_OUT_MARKER,
  type ScanResult,
} from "./result.js";
import { describeScan, isValidTimeout, type Scan } from "./scan.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanExecutorOptions = {
  logger?: EventLogger;
  /** Per-run timeout overrides in seconds, keyed by scan name. */
  timeoutOverrides?: Record<string, number>;
  now?: () => Date;
};

const TIMED_OUT = Symbol("timed-out");

// =============================================================================
// EXECUTOR
// =============================================================================

/**
 * Runs one scan against a context. Whatever the scan does (skip, fail,
 * throw, hang) exactly one result is recorded under the scan's name and
 * returned; `run` never rejects.
 */
export class ScanExecutor {
  private readonly logger: EventLogger;
  private readonly timeoutOverrides: Record<string, number>;
  private readonly now: () => Date;

  constructor(options: ScanExecutorOptions = {}) {
    this.logger = guardLogger(options.logger ?? nullLogger);
    this.timeoutOverrides = options.timeoutOverrides ?? {};
    this.now = options.now ?? (() => new Date());
  }

  async run(scan: Scan, context: ScanContext): Promise<ScanResult> {
    const result = await this.evaluate(scan, context);
    context.recordResult(result);
    this.logOutcome(result);
    return result;
  }

  resolveTimeoutSeconds(scan: Scan): number {
    const override = this.timeoutOverrides[scan.name];
    return isValidTimeout(override) ? override : describeScan(scan).timeoutSeconds;
  }

  private async evaluate(scan: Scan, context: ScanContext): Promise<ScanResult> {
    const checkedAt = this.now();

    let shouldRun: boolean;
    try {
      shouldRun = scan.canRun ? await scan.canRun(context) : true;
    } catch (err) {
      return this.failure(scan, checkedAt, `canRun check failed: ${formatErrorMessage(err)}`);
    }

    if (!shouldRun) {
      return createScanResult({
        scanName: scan.name,
        success: true,
        startedAt: checkedAt,
        finishedAt: checkedAt,
        parsedData: { [SKIPPED_MARKER]: true },
      });
    }

    const timeoutSeconds = this.resolveTimeoutSeconds(scan);
    const startedAt = this.now();
    this.logger.log({ type: "scan.start", scan: scan.name, timeout_seconds: timeoutSeconds });

    try {
      return await this.executeWithDeadline(scan, context, timeoutSeconds, startedAt);
    } catch (err) {
      return this.failure(scan, startedAt, formatErrorMessage(err));
    }
  }

  private async executeWithDeadline(
    scan: Scan,
    context: ScanContext,
    timeoutSeconds: number,
    startedAt: Date,
  ): Promise<ScanResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), timeoutSeconds * 1000);
    });
    const execution = Promise.resolve().then(() =>
      scan.execute(context, { signal: controller.signal, logger: this.logger }),
    );

    try {
      const outcome = await Promise.race([execution, deadline]);

      if (outcome === TIMED_OUT) {
        const message = `Scan timed out after ${timeoutSeconds} seconds`;
        controller.abort(new Error(message));
        execution.catch((err: unknown) => {
          this.logger.log({
            type: "scan.aborted",
            scan: scan.name,
            message: formatErrorMessage(err),
          });
        });
        return createScanResult({
          scanName: scan.name,
          success: false,
          startedAt,
          finishedAt: this.now(),
          parsedData: { [TIMED_OUT_MARKER]: true },
          error: message,
        });
      }

      return this.normalize(scan, outcome, startedAt);
    } finally {
      clearTimeout(timer);
    }
  }

  // Results from discovered JavaScript scans are not type-checked.
  private normalize(scan: Scan, outcome: unknown, startedAt: Date): ScanResult {
    if (!isScanResult(outcome)) {
      return this.failure(scan, startedAt, `Scan "${scan.name}" returned an invalid result`);
    }

    return createScanResult({
      scanName: scan.name,
      success: outcome.success,
      startedAt: outcome.startedAt,
      finishedAt: outcome.finishedAt,
      rawOutput: outcome.rawOutput,
      parsedData: { ...outcome.parsedData },
      error: outcome.error,
    });
  }

  private failure(scan: Scan, startedAt: Date, message: string): ScanResult {
    const finishedAt = this.now();
    return createScanResult({
      scanName: scan.name,
      success: false,
      startedAt,
      finishedAt: finishedAt < startedAt ? startedAt : finishedAt,
      error: message.length > 0 ? message : "Scan failed",
    });
  }

  private logOutcome(result: ScanResult): void {
    const type = result.parsedData[SKIPPED_MARKER]
      ? "scan.skipped"
      : result.parsedData[TIMED_OUT_MARKER]
        ? "scan.timeout"
        : result.success
          ? "scan.complete"
          : "scan.failed";

    this.logger.log({
      type,
      scan: result.scanName,
      duration_seconds: durationSeconds(result),
      error: result.error ?? null,
    });
  }
}
