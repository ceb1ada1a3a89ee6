import type { Command } from "commander";

import { listWorkflows } from "../workflows/index.js";

export function registerWorkflowsCommand(program: Command): void {
  const workflows = program.command("workflows").description("Inspect built-in workflows");

  workflows
    .command("list")
    .option("--json", "Emit JSON output", false)
    .action((opts: { json?: boolean }) => {
      const entries = listWorkflows();
      if (opts.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }
      for (const entry of entries) {
        console.log(`${entry.name}  ${entry.description}`);
      }
    });
}
