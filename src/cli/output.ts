/*
Purpose: terminal rendering for CLI errors and pipeline progress.
Assumptions: color is only used on a TTY and never when NO_COLOR is set.
Usage: console.error(renderCliError(err, { debug })); console.log(renderProgressLine(stage, message));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import type { ProgressStage } from "../pipeline/pipeline.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliOutputOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = {
  label: string | null;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
};

const ERROR_LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { label: null, labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

const PROGRESS_STYLES: Record<ProgressStage, AnsiStyle[]> = {
  start: ["cyan"],
  level: ["dim"],
  level_complete: ["dim"],
  complete: ["cyan", "bold"],
  error: ["red", "bold"],
};

// =============================================================================
// ERRORS
// =============================================================================

export function renderCliError(error: unknown, options: CliOutputOptions = {}): string {
  const format = resolveFormatter(options, process.stderr);

  return formatErrorLines(error, { mode: options.debug ? "debug" : "short" })
    .map((line) => {
      const style = ERROR_LINE_STYLES[line.kind];
      if (line.kind === "stack") {
        return `${format("Stack:", style.labelStyles)}\n${format(indent(line.text, 2), style.textStyles)}`;
      }

      const text = format(line.text, style.textStyles);
      return style.label ? `${format(style.label, style.labelStyles)} ${text}` : text;
    })
    .join("\n");
}

// =============================================================================
// PROGRESS
// =============================================================================

export function renderProgressLine(
  stage: ProgressStage,
  message: string,
  options: CliOutputOptions = {},
): string {
  const format = resolveFormatter(options, process.stdout);
  return `${format(`[${stage}]`, PROGRESS_STYLES[stage])} ${message}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFormatter(
  options: CliOutputOptions,
  fallbackStream: { isTTY?: boolean },
): AnsiFormatter {
  const stream = options.stream ?? fallbackStream;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

function indent(value: string, spaces: number): string {
  const prefix = " ".repeat(spaces);
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
