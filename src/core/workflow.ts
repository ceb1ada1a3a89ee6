import { ScanContext } from "./context.js";
import { formatErrorMessage } from "./error-format.js";
import { ScanExecutor } from "./executor.js";
import type { JsonObject } from "./json.js";
import { guardLogger, nullLogger, type EventLogger } from "./logger.js";
import { tallyResults, type ScanResult } from "./result.js";
import type { Scan } from "./scan.js";
import { defaultRunId, ensureDir } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type StageRunner = {
  readonly context: ScanContext;
  runOne(scan: Scan): Promise<ScanResult>;
  runConcurrent(scans: readonly Scan[]): Promise<ScanResult[]>;
};

export type Workflow = {
  name: string;
  description: string;
  define(stages: StageRunner): Promise<void>;
};

export type WorkflowRunOptions = {
  target: string;
  outputDir: string;
  metadata?: JsonObject;
  runId?: string;
  logger?: EventLogger;
  timeoutOverrides?: Record<string, number>;
  executor?: ScanExecutor;
  onScanComplete?: (result: ScanResult) => void;
};

export type WorkflowRun = {
  runId: string;
  workflow: string;
  context: ScanContext;
  results: ScanResult[];
  startedAt: Date;
  finishedAt: Date;
};

type StageKind = "single" | "concurrent";

// =============================================================================
// RUN
// =============================================================================

export async function runWorkflow(
  workflow: Workflow,
  options: WorkflowRunOptions,
): Promise<WorkflowRun> {
  const runId = options.runId ?? defaultRunId();
  const logger = guardLogger(options.logger ?? nullLogger);
  const executor =
    options.executor ??
    new ScanExecutor({ logger, timeoutOverrides: options.timeoutOverrides });

  const context = new ScanContext({
    target: options.target,
    outputDir: options.outputDir,
    metadata: options.metadata,
  });
  await ensureDir(context.outputDir);

  const startedAt = new Date();
  logger.log({
    type: "run.start",
    workflow: workflow.name,
    target: context.target,
    output_dir: context.outputDir,
  });

  const stages = createStageRunner({
    context,
    executor,
    logger,
    onScanComplete: options.onScanComplete,
  });

  try {
    await workflow.define(stages.runner);
    await stages.settled();
  } catch (err) {
    logger.log({ type: "run.failed", workflow: workflow.name, message: formatErrorMessage(err) });
    throw err;
  }

  const results = stages.results();
  const tally = tallyResults(results);
  logger.log({
    type: "run.complete",
    workflow: workflow.name,
    total: tally.total,
    succeeded: tally.succeeded,
    failed: tally.failed,
    skipped: tally.skipped,
  });

  return {
    runId,
    workflow: workflow.name,
    context,
    results,
    startedAt,
    finishedAt: new Date(),
  };
}

/**
 * One `runOne` stage per scan, in the given order. Backs manual invocation
 * of registered scans by name.
 */
export function createSequentialWorkflow(
  scans: readonly Scan[],
  name = "custom",
): Workflow {
  return {
    name,
    description: `Runs ${scans.map((scan) => scan.name).join(", ")} in order`,
    async define(stages) {
      for (const scan of scans) {
        await stages.runOne(scan);
      }
    },
  };
}

// =============================================================================
// STAGES
// =============================================================================

type StageRunnerDeps = {
  context: ScanContext;
  executor: ScanExecutor;
  logger: EventLogger;
  onScanComplete?: (result: ScanResult) => void;
};

/**
 * Stages are chained on a single tail promise, so stage N+1 starts only once
 * stage N has resolved even if `define` does not await each call.
 */
function createStageRunner(deps: StageRunnerDeps): {
  runner: StageRunner;
  settled: () => Promise<void>;
  results: () => ScanResult[];
} {
  const collected: ScanResult[] = [];
  let tail: Promise<void> = Promise.resolve();
  let stageIndex = 0;

  const enqueue = <T>(
    kind: StageKind,
    scans: readonly Scan[],
    body: () => Promise<T>,
  ): Promise<T> => {
    const stage = ++stageIndex;
    const next = tail.then(async () => {
      deps.logger.log({ type: "stage.start", stage, kind, scans: scans.map((s) => s.name) });
      const value = await body();
      deps.logger.log({ type: "stage.complete", stage, kind });
      return value;
    });
    // Rejections still reach the caller through `next`; the tail only orders stages.
    tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  };

  const execute = async (scan: Scan): Promise<ScanResult> => {
    const result = await deps.executor.run(scan, deps.context);
    notify(result);
    return result;
  };

  const notify = (result: ScanResult): void => {
    if (!deps.onScanComplete) return;
    try {
      deps.onScanComplete(result);
    } catch (err) {
      deps.logger.log({
        type: "observer.failed",
        scan: result.scanName,
        message: formatErrorMessage(err),
      });
    }
  };

  const runner: StageRunner = {
    context: deps.context,
    runOne(scan) {
      return enqueue("single", [scan], async () => {
        const result = await execute(scan);
        collected.push(result);
        return result;
      });
    },
    runConcurrent(scans) {
      const batch = [...scans];
      return enqueue("concurrent", batch, async () => {
        const results = await Promise.all(batch.map((scan) => execute(scan)));
        collected.push(...results);
        return results;
      });
    },
  };

  return {
    runner,
    settled: () => tail,
    results: () => [...collected],
  };
}
