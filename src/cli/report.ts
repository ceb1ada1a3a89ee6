import path from "node:path";

import { ResultsFileError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { serializeContext } from "../core/serialization.js";
import { buildSummaryText, loadResults } from "../core/storage.js";
import type { ScanContext } from "../core/context.js";

export type ReportOptions = {
  json?: boolean;
};

export async function reportCommand(resultsFile: string, opts: ReportOptions): Promise<void> {
  const context = await loadSavedRun(path.resolve(resultsFile));

  if (opts.json) {
    console.log(JSON.stringify(serializeContext(context), null, 2));
    return;
  }

  process.stdout.write(buildSummaryText(context));
}

async function loadSavedRun(filePath: string): Promise<ScanContext> {
  try {
    return await loadResults(filePath);
  } catch (error) {
    if (error instanceof ResultsFileError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.storage,
        title: "Unable to load results.",
        message: error.message,
        hint: "Pass the results.json written by `probeline run`.",
        cause: error,
      });
    }
    throw error;
  }
}
