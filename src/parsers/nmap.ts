/*
Purpose: turn nmap `-oX` reports into plain JSON data for scan results.
Assumptions: attributes are read as strings; only the first <address> of a host is used.
Usage: parseNmapXml(xml) or await parseNmapFile(path); check `error` before trusting the lists.
*/

import { XMLParser, XMLValidator } from "fast-xml-parser";

import { formatErrorMessage } from "../core/error-format.js";
import type { JsonObject } from "../core/json.js";
import { readRecord } from "../core/json.js";
import { readTextFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type NmapPort = {
  port_id: string;
  protocol: string;
  state: string;
  service_name: string;
  service_product: string;
  service_version: string;
  service_extrainfo: string;
  cpes: string[];
  scripts?: Record<string, string>;
};

export type NmapHost = {
  address: string;
  ports: NmapPort[];
};

export type NmapReport = {
  args: string;
  hosts: NmapHost[];
  /** Every reported port across all hosts, in document order. */
  ports: NmapPort[];
  error?: string;
};

const REPEATED_ELEMENTS = new Set(["host", "address", "port", "cpe", "script"]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  parseTagValue: false,
  isArray: (name) => REPEATED_ELEMENTS.has(name),
});

// =============================================================================
// PARSING
// =============================================================================

export function parseNmapXml(content: string): NmapReport {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line } = validation.err;
    return emptyReport(`XML parse error: ${msg} (line ${line})`);
  }

  let document: unknown;
  try {
    document = xmlParser.parse(content);
  } catch (err) {
    return emptyReport(`XML parse error: ${formatErrorMessage(err)}`);
  }

  const root = readRecord(readRecord(document)?.nmaprun);
  if (!root) {
    return emptyReport("XML parse error: missing <nmaprun> root element");
  }

  const hosts: NmapHost[] = [];
  const ports: NmapPort[] = [];

  for (const hostNode of readList(root.host)) {
    const host = readRecord(hostNode);
    if (!host) continue;

    const address = readString(readRecord(readList(host.address)[0])?.addr);
    if (!address) continue;

    const hostPorts: NmapPort[] = [];
    for (const portNode of readList(readRecord(host.ports)?.port)) {
      const port = parsePort(portNode);
      if (port) hostPorts.push(port);
    }

    hosts.push({ address, ports: hostPorts });
    ports.push(...hostPorts);
  }

  return { args: readString(root.args), hosts, ports };
}

export async function parseNmapFile(filePath: string): Promise<NmapReport> {
  let content: string;
  try {
    content = await readTextFile(filePath);
  } catch (err) {
    return emptyReport(`Unable to read ${filePath}: ${formatErrorMessage(err)}`);
  }
  return parseNmapXml(content);
}

// Closed ports and ports without a <state> are dropped.
function parsePort(node: unknown): NmapPort | undefined {
  const port = readRecord(node);
  if (!port) return undefined;

  const state = readRecord(port.state);
  if (!state) return undefined;

  const stateName = readString(state.state);
  if (stateName === "closed") return undefined;

  const service = readRecord(port.service);
  const parsed: NmapPort = {
    port_id: readString(port.portid),
    protocol: readString(port.protocol) || "tcp",
    state: stateName,
    service_name: readString(service?.name),
    service_product: readString(service?.product),
    service_version: readString(service?.version),
    service_extrainfo: readString(service?.extrainfo),
    cpes: readList(service?.cpe)
      .map(readText)
      .filter((cpe) => cpe.length > 0),
  };

  const scripts: Record<string, string> = {};
  for (const scriptNode of readList(port.script)) {
    const script = readRecord(scriptNode);
    const id = readString(script?.id);
    if (id) {
      scripts[id] = readString(script?.output);
    }
  }
  if (Object.keys(scripts).length > 0) {
    parsed.scripts = scripts;
  }

  return parsed;
}

// =============================================================================
// JSON VIEWS
// =============================================================================

export function nmapReportToJson(report: NmapReport): JsonObject {
  const data: JsonObject = {
    args: report.args,
    hosts: report.hosts.map((host) => ({
      address: host.address,
      ports: host.ports.map(nmapPortToJson),
    })),
    ports: report.ports.map(nmapPortToJson),
  };
  if (report.error) {
    data.error = report.error;
  }
  return data;
}

function nmapPortToJson(port: NmapPort): JsonObject {
  const data: JsonObject = {
    port_id: port.port_id,
    protocol: port.protocol,
    state: port.state,
    service_name: port.service_name,
    service_product: port.service_product,
    service_version: port.service_version,
    service_extrainfo: port.service_extrainfo,
    cpes: [...port.cpes],
  };
  if (port.scripts) {
    data.scripts = { ...port.scripts };
  }
  return data;
}

// =============================================================================
// INTERNALS
// =============================================================================

function emptyReport(error: string): NmapReport {
  return { args: "", hosts: [], ports: [], error };
}

function readList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// Text nodes come back as strings, or under "#text" when the element has attributes.
function readText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  return readString(readRecord(value)?.["#text"]).trim();
}
