import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, nullLogger } from "./logger.js";

const tempDirs: string[] = [];

function makeLogPath(...segments: string[]): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "probeline-logger-"));
  tempDirs.push(tmpDir);
  return path.join(tmpDir, ...segments);
}

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line): Record<string, unknown> => JSON.parse(line));
}

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("JsonlLogger", () => {
  it("writes events with run and scan fields", () => {
    const logPath = makeLogPath("logs", "run-1.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1" });

    logger.log({ type: "scan.start", scan: "quick_nmap", timeout_seconds: 600 });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "scan.start",
      run_id: "run-1",
      scan: "quick_nmap",
      timeout_seconds: 600,
    });
    expect(new Date(String(events[0]?.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = makeLogPath("events.jsonl");
    const first = new JsonlLogger(logPath, { runId: "run-2" });
    first.log({ type: "run.start" });
    first.close();

    const second = new JsonlLogger(logPath, { runId: "run-2" });
    second.log({ type: "run.complete", total: 3 });
    second.close();

    expect(readEvents(logPath).map((event) => event.type)).toEqual(["run.start", "run.complete"]);
  });

  it("ignores events logged after close", () => {
    const logPath = makeLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-3" });

    logger.log({ type: "first" });
    logger.close();
    logger.log({ type: "late" });
    logger.close();

    expect(readEvents(logPath).map((event) => event.type)).toEqual(["first"]);
  });

  it("warns on write failures instead of throwing", () => {
    const logPath = makeLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-4" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "scan.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });

  it("includes stack details when --debug is on the command line", () => {
    const originalArgv = [...process.argv];
    process.argv = [...process.argv, "--debug"];

    try {
      const logPath = makeLogPath("events.jsonl");
      const logger = new JsonlLogger(logPath, { runId: "run-5" });

      const writeError = new Error("disk full");
      writeError.stack = "Error: disk full\n    at fake:1:1";
      vi.spyOn(fs, "writeSync").mockImplementation(() => {
        throw writeError;
      });
      const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      logger.log({ type: "scan.start" });
      logger.close();

      expect(warnSpy.mock.calls[0]?.[0]).toBe(
        `Warning: failed to write log event to ${logPath}: disk full\nError: disk full\n    at fake:1:1`,
      );
    } finally {
      process.argv = originalArgv;
    }
  });
});

describe("eventWithTs", () => {
  it("fills run id from defaults and serializes dates", () => {
    const event = eventWithTs(
      {
        type: "stage.start",
        stage: 2,
        scans: ["detailed_nmap", "vuln_nmap"],
        ts: new Date("2024-05-01T10:00:00.000Z"),
      },
      { runId: "run-x" },
    );

    expect(event).toEqual({
      ts: "2024-05-01T10:00:00.000Z",
      type: "stage.start",
      run_id: "run-x",
      stage: 2,
      scans: ["detailed_nmap", "vuln_nmap"],
    });
  });

  it("drops undefined fields and prefers an explicit run id", () => {
    const event = eventWithTs(
      { type: "scan.complete", runId: "run-y", scan: "quick_nmap", error: undefined },
      { runId: "run-x" },
    );

    expect(event.run_id).toBe("run-y");
    expect(event.scan).toBe("quick_nmap");
    expect(event).not.toHaveProperty("error");
  });

  it("throws when runId is missing", () => {
    expect(() => eventWithTs({ type: "missing-run" })).toThrow(/run_id is required/i);
  });
});

describe("nullLogger", () => {
  it("accepts events without a run id", () => {
    expect(() => nullLogger.log({ type: "anything" })).not.toThrow();
  });
});
