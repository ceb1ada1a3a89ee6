import { execa } from "execa";

import { CommandAbortedError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type CommandOptions = {
  cwd?: string;
  /** Aborting kills the child (SIGTERM, then SIGKILL after the grace period). */
  signal?: AbortSignal;
};

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

const KILL_GRACE_MS = 5_000;

// =============================================================================
// RUNNER
// =============================================================================

/**
 * Runs an external tool to completion. Non-zero exits resolve normally so
 * callers can inspect the exit code; an aborted run rejects with
 * CommandAbortedError once the process has been told to stop.
 */
export const runCommand: CommandRunner = async (file, args, options = {}) => {
  const commandLine = formatCommandLine(file, args);
  if (options.signal?.aborted) {
    throw new CommandAbortedError(commandLine, options.signal.reason);
  }

  const res = await execa(file, [...args], {
    cwd: options.cwd,
    signal: options.signal,
    forceKillAfterTimeout: KILL_GRACE_MS,
    reject: false,
    stdio: "pipe",
  });

  if (res.isCanceled || options.signal?.aborted) {
    throw new CommandAbortedError(commandLine, options.signal?.reason);
  }

  // Spawn failures (missing binary, permissions) have no exit code.
  if (res.failed && typeof res.exitCode !== "number") {
    const detail =
      "shortMessage" in res && typeof res.shortMessage === "string"
        ? res.shortMessage
        : "process did not start";
    throw new Error(`Failed to run ${commandLine}: ${detail}`);
  }

  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
  return { stdout, stderr, exitCode: res.exitCode };
};

export function formatCommandLine(file: string, args: readonly string[]): string {
  return [file, ...args].join(" ");
}
