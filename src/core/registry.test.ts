import path from "node:path";
import { fileURLToPath } from "node:url";

import { describe, expect, it } from "vitest";

import { DuplicateScanError, InvalidScanError, ScanNotFoundError } from "./errors.js";
import type { EventLogger, LogEventInput } from "./logger.js";
import { ScanRegistry } from "./registry.js";
import { createScanResult } from "./result.js";
import type { Scan } from "./scan.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SCAN_DEFS = path.resolve(__dirname, "../../test/fixtures/scan-defs");

// =============================================================================
// HELPERS
// =============================================================================

class PingScan implements Scan {
  readonly name = "ping";
  readonly description = "ICMP reachability";
  readonly timeoutSeconds = 10;

  async execute() {
    const now = new Date();
    return createScanResult({ scanName: this.name, success: true, startedAt: now, finishedAt: now });
  }
}

class PingAgainScan extends PingScan {}

class DefaultsScan implements Scan {
  readonly name = "defaults";

  async execute() {
    const now = new Date();
    return createScanResult({ scanName: this.name, success: true, startedAt: now, finishedAt: now });
  }
}

class BlankNameScan implements Scan {
  readonly name = "  ";

  async execute() {
    const now = new Date();
    return createScanResult({ scanName: "blank", success: true, startedAt: now, finishedAt: now });
  }
}

class RecordingLogger implements EventLogger {
  readonly events: LogEventInput[] = [];

  log(event: LogEventInput): void {
    this.events.push(event);
  }
}

// =============================================================================
// TESTS
// =============================================================================

describe("ScanRegistry", () => {
  it("registers and resolves scans by name", () => {
    const registry = new ScanRegistry();

    expect(registry.register(PingScan)).toBe("ping");
    expect(registry.size).toBe(1);
    expect(registry.has("ping")).toBe(true);
    expect(registry.get("ping")).toBe(PingScan);
    expect(registry.create("ping")).toBeInstanceOf(PingScan);
  });

  it("creates a fresh instance on every call", () => {
    const registry = new ScanRegistry();
    registry.register(PingScan);

    expect(registry.create("ping")).not.toBe(registry.create("ping"));
  });

  it("rejects a second scan with the same name and keeps the first", () => {
    const registry = new ScanRegistry();
    registry.register(PingScan);

    expect(() => registry.register(PingAgainScan)).toThrow(DuplicateScanError);
    expect(registry.get("ping")).toBe(PingScan);
    expect(registry.size).toBe(1);
  });

  it("throws ScanNotFoundError for unknown names", () => {
    const registry = new ScanRegistry();

    expect(() => registry.get("nope")).toThrow(ScanNotFoundError);
    expect(() => registry.create("nope")).toThrow('Scan "nope" is not registered.');
  });

  it("rejects constructors that do not produce a named scan", () => {
    const registry = new ScanRegistry();

    expect(() => registry.register(BlankNameScan)).toThrow(InvalidScanError);
    expect(registry.size).toBe(0);
  });

  it("lists descriptors with defaults filled in, in registration order", () => {
    const registry = new ScanRegistry();
    registry.register(PingScan);
    registry.register(DefaultsScan);

    expect(registry.listAll()).toEqual([
      { name: "ping", description: "ICMP reachability", timeoutSeconds: 10, requiresRoot: false },
      { name: "defaults", description: "", timeoutSeconds: 300, requiresRoot: false },
    ]);
  });

  it("logs each registration", () => {
    const logger = new RecordingLogger();
    const registry = new ScanRegistry(logger);

    registry.register(PingScan);

    expect(logger.events).toEqual([{ type: "registry.register", scan: "ping" }]);
  });
});

describe("ScanRegistry.discover", () => {
  it("loads .js and .mjs definitions recursively and skips underscore files", async () => {
    const registry = new ScanRegistry();
    const directory = path.join(SCAN_DEFS, "valid");

    const report = await registry.discover(directory);

    expect(report.missing).toBe(false);
    expect(report.files.map((file) => path.relative(directory, file))).toEqual([
      "banner-grab.mjs",
      path.join("nested", "http-title.js"),
    ]);
    expect(report.registered).toEqual(["banner_grab", "http_title"]);
    expect(report.failures).toEqual([]);
    expect(registry.listAll().map((listing) => listing.name)).toEqual(["banner_grab", "http_title"]);
    expect(registry.listAll()[0]?.timeoutSeconds).toBe(30);
  });

  it("reports broken files and keeps loading the rest", async () => {
    const registry = new ScanRegistry();
    const directory = path.join(SCAN_DEFS, "mixed");

    const report = await registry.discover(directory);

    expect(report.registered).toEqual(["mixed_good"]);
    expect(registry.has("mixed_good")).toBe(true);
    expect(report.failures.map((failure) => path.basename(failure.filePath))).toEqual([
      "broken.mjs",
      "empty.mjs",
      "nameless.mjs",
    ]);
    expect(report.failures[0]?.message).toBe(
      `Malformed scan definition file ${path.join(directory, "broken.mjs")}: failed to load`,
    );
    expect(report.failures[1]?.message).toBe(
      `Malformed scan definition file ${path.join(directory, "empty.mjs")}: exports no scan definitions`,
    );
    expect(report.failures[2]?.message).toContain("does not implement the scan contract");
  });

  it("aborts on a duplicate name but keeps earlier registrations", async () => {
    const registry = new ScanRegistry();

    await expect(registry.discover(path.join(SCAN_DEFS, "duplicates"))).rejects.toThrow(
      DuplicateScanError,
    );
    expect(registry.size).toBe(1);
    expect(registry.has("dup_scan")).toBe(true);
  });

  it("clashes with scans that are already registered", async () => {
    const registry = new ScanRegistry();
    await registry.discover(path.join(SCAN_DEFS, "valid"));

    await expect(registry.discover(path.join(SCAN_DEFS, "valid"))).rejects.toThrow(
      'Scan "banner_grab" is already registered.',
    );
  });

  it("treats a missing directory as empty", async () => {
    const logger = new RecordingLogger();
    const registry = new ScanRegistry(logger);
    const directory = path.join(SCAN_DEFS, "does-not-exist");

    const report = await registry.discover(directory);

    expect(report).toEqual({
      directory,
      missing: true,
      files: [],
      registered: [],
      failures: [],
    });
    expect(logger.events).toEqual([{ type: "discovery.missing", directory }]);
  });
});
