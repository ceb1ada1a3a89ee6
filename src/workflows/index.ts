import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { ScanRegistry } from "../core/registry.js";
import { createSequentialWorkflow, type Workflow } from "../core/workflow.js";

import { createPentestWorkflow, PENTEST_DESCRIPTION, PENTEST_WORKFLOW } from "./pentest.js";

export { createPentestWorkflow, PENTEST_WORKFLOW } from "./pentest.js";

type WorkflowFactory = {
  description: string;
  create(registry: ScanRegistry): Workflow;
};

const WORKFLOWS: Record<string, WorkflowFactory> = {
  [PENTEST_WORKFLOW]: {
    description: PENTEST_DESCRIPTION,
    create: createPentestWorkflow,
  },
};

export function listWorkflows(): Array<{ name: string; description: string }> {
  return Object.entries(WORKFLOWS).map(([name, factory]) => ({
    name,
    description: factory.description,
  }));
}

export function resolveWorkflow(name: string, registry: ScanRegistry): Workflow {
  const factory = WORKFLOWS[name];
  if (!factory) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workflow,
      title: "Unknown workflow.",
      message: `Workflow "${name}" is not defined.`,
      hint: `Available workflows: ${Object.keys(WORKFLOWS).join(", ")}.`,
      next: "Pass a known name with --workflow, or pick scans directly with --scans.",
    });
  }
  return factory.create(registry);
}

/** Sequential workflow over scans picked by name; unknown names fail before anything runs. */
export function resolveScanSelection(names: readonly string[], registry: ScanRegistry): Workflow {
  const missing = names.filter((name) => !registry.has(name));
  if (missing.length > 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.registry,
      title: "Unknown scan.",
      message: `Not registered: ${missing.join(", ")}.`,
      hint: "Run `probeline scans list` to see registered scans.",
    });
  }
  return createSequentialWorkflow(names.map((name) => registry.create(name)));
}
