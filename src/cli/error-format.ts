/*
Purpose: render errors for the terminal, colored only when stderr is a TTY.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const LABELS: Partial<Record<ErrorFormatLineKind, { label: string; styles: AnsiStyle[]; dimText?: boolean }>> = {
  hint: { label: "Hint:", styles: ["yellow"] },
  next: { label: "Next:", styles: ["cyan"] },
  code: { label: "Code:", styles: ["dim"], dimText: true },
  name: { label: "Name:", styles: ["dim"], dimText: true },
  cause: { label: "Cause:", styles: ["dim"], dimText: true },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((entry) => `  ${entry}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const label = LABELS[line.kind];
  if (!label) return line.text;

  const text = label.dimText ? format(line.text, ["dim"]) : line.text;
  return `${format(label.label, label.styles)} ${text}`;
}
