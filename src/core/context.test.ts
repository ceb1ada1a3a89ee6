import { describe, expect, it } from "vitest";

import { ScanContext } from "./context.js";
import type { JsonObject } from "./json.js";
import { createScanResult } from "./result.js";

const NOW = new Date("2024-05-01T10:00:00.000Z");

function makeContext(metadata?: JsonObject): ScanContext {
  return new ScanContext({ target: "10.0.0.5", outputDir: "/tmp/probeline-context", metadata });
}

function record(
  context: ScanContext,
  scanName: string,
  parsedData: JsonObject,
  success = true,
): void {
  context.recordResult(
    createScanResult({
      scanName,
      success,
      startedAt: NOW,
      finishedAt: NOW,
      parsedData,
      error: success ? undefined : "boom",
    }),
  );
}

function port(portId: string | number, serviceName?: string): JsonObject {
  return serviceName === undefined
    ? { port_id: portId }
    : { port_id: portId, service_name: serviceName };
}

describe("ScanContext results", () => {
  it("keeps results in completion order", () => {
    const context = makeContext();
    record(context, "b", {});
    record(context, "a", {});

    expect([...context.results.keys()]).toEqual(["b", "a"]);
    expect(context.hasResult("a")).toBe(true);
    expect(context.getResult("missing")).toBeUndefined();
  });

  it("replaces a result recorded under the same name and moves it last", () => {
    const context = makeContext();
    record(context, "a", { attempt: 1 });
    record(context, "b", {});
    record(context, "a", { attempt: 2 });

    expect(context.listResults().map((result) => result.scanName)).toEqual(["b", "a"]);
    expect(context.getResult("a")?.parsedData.attempt).toBe(2);
  });

  it("copies metadata at construction", () => {
    const metadata: JsonObject = { force_vuln_scan: true };
    const context = makeContext(metadata);
    metadata.force_vuln_scan = false;

    expect(context.metadata.force_vuln_scan).toBe(true);
  });
});

describe("ScanContext derived views", () => {
  it("starts with no ports", () => {
    const context = makeContext();

    expect(context.getOpenPorts()).toEqual([]);
    expect(context.hasOpenPorts()).toBe(false);
    expect(context.getServices().size).toBe(0);
  });

  it("unions open_ports lists and port entries into a sorted set", () => {
    const context = makeContext();
    record(context, "sweep", { open_ports: [443, 22, "8080"] });
    record(context, "detail", { ports: [port("80", "http"), port(22, "ssh")] });

    expect(context.getOpenPorts()).toEqual([22, 80, 443, 8080]);
    expect(context.hasOpenPorts()).toBe(true);
  });

  it("ignores failed results", () => {
    const context = makeContext();
    record(context, "failed", { open_ports: [21], ports: [port("21", "ftp")] }, false);
    record(context, "ok", { open_ports: [25] });

    expect(context.getOpenPorts()).toEqual([25]);
    expect(context.getServices().has(21)).toBe(false);
  });

  it("skips malformed port values", () => {
    const context = makeContext();
    record(context, "noisy", {
      open_ports: [0, 65536, -1, 1.5, "abc", null, 3306],
      ports: [port(""), { service_name: "orphan" }, "not-an-object", port("70000", "big")],
    });

    expect(context.getOpenPorts()).toEqual([3306]);
    expect(context.getServices().size).toBe(0);
  });

  it("maps ports to services with a later result winning", () => {
    const context = makeContext();
    record(context, "first", { ports: [port("80", "http"), port("443")] });
    record(context, "second", { ports: [port("80", "http-alt")] });

    expect([...context.getServices()]).toEqual([
      [80, "http-alt"],
      [443, "unknown"],
    ]);
  });

  it("finds ports by case-insensitive service substring", () => {
    const context = makeContext();
    record(context, "detail", {
      ports: [port("8443", "HTTPS-alt"), port("80", "http"), port("22", "ssh")],
    });

    expect(context.getPortsByService("http")).toEqual([80, 8443]);
    expect(context.getPortsByService("SSH")).toEqual([22]);
    expect(context.getPortsByService("smtp")).toEqual([]);
  });

  it("reflects results recorded after a previous read", () => {
    const context = makeContext();
    expect(context.getOpenPorts()).toEqual([]);

    record(context, "sweep", { open_ports: [22] });

    expect(context.getOpenPorts()).toEqual([22]);
  });
});
