import type { ScanRegistry } from "../core/registry.js";
import type { Workflow } from "../core/workflow.js";

export const PENTEST_WORKFLOW = "pentest";
export const PENTEST_DESCRIPTION =
  "Quick port discovery, then detailed and vulnerability scans concurrently";

/**
 * Port discovery first, then service detection and vulnerability scripts
 * side by side against whatever discovery found.
 */
export function createPentestWorkflow(registry: ScanRegistry): Workflow {
  return {
    name: PENTEST_WORKFLOW,
    description: PENTEST_DESCRIPTION,
    async define(stages) {
      await stages.runOne(registry.create("quick_nmap"));
      await stages.runConcurrent([
        registry.create("detailed_nmap"),
        registry.create("vuln_nmap"),
      ]);
    },
  };
}
