export class ProbelineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ProbelineError";
  }
}

export class ConfigError extends ProbelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class RegistryError extends ProbelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RegistryError";
  }
}

export class DuplicateScanError extends RegistryError {
  constructor(public readonly scanName: string) {
    super(`Scan "${scanName}" is already registered.`);
    this.name = "DuplicateScanError";
  }
}

export class ScanNotFoundError extends RegistryError {
  constructor(public readonly scanName: string) {
    super(`Scan "${scanName}" is not registered.`);
    this.name = "ScanNotFoundError";
  }
}

export class InvalidScanError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InvalidScanError";
  }
}

export class MalformedScanFileError extends ProbelineError {
  constructor(
    public readonly filePath: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Malformed scan definition file ${filePath}: ${reason}`, cause);
    this.name = "MalformedScanFileError";
  }
}

export class CommandAbortedError extends ProbelineError {
  constructor(
    public readonly command: string,
    cause?: unknown,
  ) {
    super(`Command aborted: ${command}`, cause);
    this.name = "CommandAbortedError";
  }
}

export class ResultsFileError extends ProbelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ResultsFileError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  registry: "REGISTRY_ERROR",
  workflow: "WORKFLOW_ERROR",
  storage: "STORAGE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends ProbelineError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
