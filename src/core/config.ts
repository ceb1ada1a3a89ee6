import { z } from "zod";

import { JsonValueSchema } from "./json.js";
import { MAX_SCAN_TIMEOUT_SECONDS } from "./scan.js";

const NmapSchema = z
  .object({
    binary: z.string().min(1).default("nmap"),
    sudo: z.boolean().default(true),
    min_rate: z.number().int().positive().default(1000),
    max_retries: z.number().int().nonnegative().default(3),
  })
  .strict();

export const ProbelineConfigSchema = z
  .object({
    output_dir: z.string().min(1).default("./output"),
    workflow: z.string().min(1).default("pentest"),

    // Directories searched for user scan definitions; missing ones are skipped.
    scan_dirs: z.array(z.string().min(1)).default(["./user_scans"]),

    // Per-scan timeout overrides in seconds.
    timeouts: z.record(z.number().positive().max(MAX_SCAN_TIMEOUT_SECONDS)).default({}),

    // Seeded into the run context, e.g. { force_vuln_scan: true }.
    metadata: z.record(JsonValueSchema).default({}),

    nmap: NmapSchema.default({}),
  })
  .strict();

export type ProbelineConfig = z.infer<typeof ProbelineConfigSchema>;
export type NmapConfig = z.infer<typeof NmapSchema>;

export const DEFAULT_CONFIG_FILE = "probeline.yaml";

export function defaultConfig(): ProbelineConfig {
  return ProbelineConfigSchema.parse({});
}
