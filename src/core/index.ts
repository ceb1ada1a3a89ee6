export { ScanContext, type ScanContextInit } from "./context.js";
export {
  ProbelineError,
  ConfigError,
  RegistryError,
  DuplicateScanError,
  ScanNotFoundError,
  InvalidScanError,
  MalformedScanFileError,
  CommandAbortedError,
  ResultsFileError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "./errors.js";
export { ScanExecutor, type ScanExecutorOptions } from "./executor.js";
export type { JsonArray, JsonObject, JsonValue } from "./json.js";
export { JsonlLogger, nullLogger, type EventLogger, type LogEventInput } from "./logger.js";
export { ScanRegistry, type DiscoveryReport, type ScanListing } from "./registry.js";
export {
  createScanResult,
  durationSeconds,
  isSkipped,
  isTimedOut,
  tallyResults,
  SKIPPED_MARKER,
  TIMED_OUT_MARKER,
  type ScanResult,
  type ScanResultInput,
} from "./result.js";
export {
  DEFAULT_SCAN_TIMEOUT_SECONDS,
  describeScan,
  isScan,
  type Scan,
  type ScanConstructor,
  type ScanDescriptor,
  type ScanExecution,
} from "./scan.js";
export {
  deserializeContext,
  serializeContext,
  type ScanContextRecord,
  type ScanResultRecord,
} from "./serialization.js";
export { buildSummaryText, loadResults, saveResults, saveSummary } from "./storage.js";
export {
  createSequentialWorkflow,
  runWorkflow,
  type StageRunner,
  type Workflow,
  type WorkflowRun,
  type WorkflowRunOptions,
} from "./workflow.js";
