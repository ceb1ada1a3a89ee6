import path from "node:path";
import { pathToFileURL } from "node:url";

import fg from "fast-glob";

import { formatErrorMessage } from "./error-format.js";
import {
  DuplicateScanError,
  InvalidScanError,
  MalformedScanFileError,
  ScanNotFoundError,
} from "./errors.js";
import { nullLogger, type EventLogger } from "./logger.js";
import {
  describeScan,
  isScan,
  isScanConstructor,
  type Scan,
  type ScanConstructor,
  type ScanDescriptor,
} from "./scan.js";
import { pathExists } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanListing = ScanDescriptor;

export type DiscoveryReport = {
  directory: string;
  missing: boolean;
  files: string[];
  registered: string[];
  failures: MalformedScanFileError[];
};

type RegistryEntry = {
  ctor: ScanConstructor;
  listing: ScanListing;
};

const DEFINITION_PATTERNS = ["**/*.js", "**/*.mjs"];
const DEFINITION_IGNORES = ["**/node_modules/**", "**/_*"];

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Catalog of scan constructors keyed by scan name.
 *
 * Populated explicitly: built-ins through `register` at bootstrap, user
 * definitions through `discover`. Nothing registers itself on import.
 */
export class ScanRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  constructor(private readonly logger: EventLogger = nullLogger) {}

  get size(): number {
    return this.entries.size;
  }

  register(ctor: ScanConstructor): string {
    const instance = instantiate(ctor);
    const listing = describeScan(instance);

    if (this.entries.has(listing.name)) {
      throw new DuplicateScanError(listing.name);
    }

    this.entries.set(listing.name, { ctor, listing });
    this.logger.log({ type: "registry.register", scan: listing.name });
    return listing.name;
  }

  get(name: string): ScanConstructor {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ScanNotFoundError(name);
    }
    return entry.ctor;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  create(name: string): Scan {
    return instantiate(this.get(name));
  }

  listAll(): ScanListing[] {
    return [...this.entries.values()].map((entry) => ({ ...entry.listing }));
  }

  /**
   * Loads every `.js`/`.mjs` definition under `directory` and registers the
   * scan constructors it exports. Broken files are reported and skipped; a
   * duplicate name aborts discovery but keeps earlier registrations.
   */
  async discover(directory: string): Promise<DiscoveryReport> {
    const root = path.resolve(directory);
    const report: DiscoveryReport = {
      directory: root,
      missing: false,
      files: [],
      registered: [],
      failures: [],
    };

    if (!(await pathExists(root))) {
      report.missing = true;
      this.logger.log({ type: "discovery.missing", directory: root });
      return report;
    }

    const files = await fg(DEFINITION_PATTERNS, {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      ignore: DEFINITION_IGNORES,
    });
    report.files = files.sort((a, b) => a.localeCompare(b));
    this.logger.log({ type: "discovery.start", directory: root, files: report.files.length });

    for (const file of report.files) {
      const names = await this.registerDefinitionFile(file, report.failures);
      report.registered.push(...names);
    }

    this.logger.log({
      type: "discovery.complete",
      directory: root,
      registered: report.registered,
      failures: report.failures.length,
    });
    return report;
  }

  private async registerDefinitionFile(
    file: string,
    failures: MalformedScanFileError[],
  ): Promise<string[]> {
    let moduleExports: unknown;
    try {
      moduleExports = await import(pathToFileURL(file).href);
    } catch (err) {
      this.recordFailure(failures, new MalformedScanFileError(file, "failed to load", err));
      return [];
    }

    const ctors = collectScanConstructors(moduleExports);
    if (ctors.length === 0) {
      this.recordFailure(failures, new MalformedScanFileError(file, "exports no scan definitions"));
      return [];
    }

    const names: string[] = [];
    for (const ctor of ctors) {
      try {
        names.push(this.register(ctor));
      } catch (err) {
        if (err instanceof DuplicateScanError) {
          throw err;
        }
        this.recordFailure(
          failures,
          new MalformedScanFileError(file, formatErrorMessage(err), err),
        );
      }
    }
    return names;
  }

  private recordFailure(failures: MalformedScanFileError[], error: MalformedScanFileError): void {
    failures.push(error);
    this.logger.log({
      type: "discovery.file_failed",
      file: error.filePath,
      message: error.message,
    });
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function instantiate(ctor: ScanConstructor): Scan {
  let instance: unknown;
  try {
    instance = new ctor();
  } catch (err) {
    throw new InvalidScanError(
      `Scan constructor ${ctor.name || "<anonymous>"} threw: ${formatErrorMessage(err)}`,
      err,
    );
  }

  if (!isScan(instance)) {
    throw new InvalidScanError(
      `${ctor.name || "<anonymous>"} does not implement the scan contract (name, execute).`,
    );
  }
  return instance;
}

function collectScanConstructors(moduleExports: unknown): ScanConstructor[] {
  if (!moduleExports || typeof moduleExports !== "object") return [];

  const found = new Set<ScanConstructor>();
  const visit = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(visit);
      return;
    }
    if (isScanConstructor(value)) {
      found.add(value);
    }
  };

  for (const value of Object.values(moduleExports)) {
    visit(value);
  }
  return [...found];
}
