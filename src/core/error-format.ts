/*
Purpose: turn unknown errors into ordered, typed lines for CLI output and logs.
Assumptions: UserFacingError carries the curated title/hint; anything else is summarized.
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import { UpdaterError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [
    { kind: "title", text: normalized.title },
    { kind: "message", text: normalized.message },
  ];

  if (normalized.hint) lines.push({ kind: "hint", text: normalized.hint });
  if (normalized.next) lines.push({ kind: "next", text: normalized.next });

  if (options.mode !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: normalized.code });
  if (normalized.name) lines.push({ kind: "name", text: normalized.name });
  if (normalized.cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(normalized.cause) });
  }
  if (normalized.stack) lines.push({ kind: "stack", text: normalized.stack });

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

export function resolveColorEnabled(input: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!input.stream?.isTTY) return false;
  if (input.useColor !== undefined) return input.useColor;
  if (process.env.NO_COLOR !== undefined) return false;
  return true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (text, styles) => {
    if (!enabled || styles.length === 0) return text;
    return styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

type NormalizedError = {
  title: string;
  message: string;
  hint?: string;
  next?: string;
  code: string;
  name?: string;
  cause?: unknown;
  stack?: string;
};

function normalizeError(error: unknown): NormalizedError {
  if (error instanceof UserFacingError) {
    return {
      title: error.title,
      message: error.message,
      hint: error.hint,
      next: error.next,
      code: error.code,
      name: error.name,
      cause: error.cause,
      stack: error.stack,
    };
  }

  if (error instanceof UpdaterError) {
    return {
      title: "Update run failed.",
      message: error.message,
      code: USER_FACING_ERROR_CODES.refresh,
      name: error.name,
      cause: error.cause,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      title: "Unexpected error.",
      message: error.message,
      code: USER_FACING_ERROR_CODES.unknown,
      name: error.name,
      stack: error.stack,
    };
  }

  return {
    title: "Unexpected error.",
    message: String(error),
    code: USER_FACING_ERROR_CODES.unknown,
  };
}
