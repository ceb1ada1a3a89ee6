/*
Purpose: turn any thrown value into the text the CLI prints on stderr.
Assumptions: colour only on a TTY without NO_COLOR; unexpected errors get a --debug pointer.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import { UserFacingError } from "../core/errors.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const DEBUG_POINTER = "Re-run with --debug for the full error.";

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const debug = options.debug ?? false;
  const lines = formatErrorLines(error, { mode: debug ? "debug" : "short" });
  if (!debug && !(error instanceof UserFacingError)) {
    lines.push({ kind: "hint", text: DEBUG_POINTER });
  }

  const useColor = resolveColorEnabled({
    stream: options.stream ?? process.stderr,
    useColor: options.useColor,
  });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
    case "name":
    case "cause":
      return format(`${capitalize(line.kind)}: ${line.text}`, ["dim"]);
    case "stack":
      return format(`Stack:\n${indent(line.text)}`, ["dim"]);
    default:
      return line.text;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function indent(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}
