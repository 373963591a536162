/*
Purpose: turn any thrown value into the lines the CLI prints, with optional ANSI styling.
Assumptions: debug mode adds code, error name, cause and stack; non-TTY output has no color.
Usage: renderErrorLines(formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(true)).
*/

import {
  RegistryError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "entity"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return options.useColor === undefined ? isTty : options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  name: ["dim"],
  entity: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

const LINE_PREFIXES: Partial<Record<ErrorFormatLineKind, string>> = {
  hint: "Hint: ",
  next: "Next: ",
  code: "Code: ",
  name: "Error: ",
  entity: "Entity: ",
  cause: "Cause: ",
};

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const normalized = normalizeUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if ((options.mode ?? "short") === "short") {
    return lines;
  }

  lines.push({ kind: "code", text: normalized.code });

  const name = error instanceof Error ? normalizeOptionalText(error.name) : undefined;
  if (name) {
    lines.push({ kind: "name", text: name });
  }

  const entity = resolveEntity(error, normalized.cause);
  if (entity) {
    lines.push({ kind: "entity", text: entity });
  }

  const cause = resolveCauseMessage(normalized.cause, normalized.message);
  if (cause) {
    lines.push({ kind: "cause", text: cause });
  }

  const stack = resolveStack(error, normalized.cause);
  if (stack) {
    lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string {
  return lines
    .map((line) => format(`${LINE_PREFIXES[line.kind] ?? ""}${line.text}`, LINE_STYLES[line.kind]))
    .join("\n");
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return normalizeOptionalText(error.message) ?? normalizeOptionalText(error.name) ?? "Error";
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeUserFacingError(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: normalizeOptionalText(error.title) ?? DEFAULT_ERROR_TITLE,
      message: normalizeOptionalText(error.message) ?? DEFAULT_ERROR_MESSAGE,
      hint: normalizeOptionalText(error.hint),
      next: normalizeOptionalText(error.next),
      cause: error.cause,
    };
  }

  if (error instanceof Error) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_ERROR_TITLE,
      message: normalizeOptionalText(formatErrorMessage(error)) ?? DEFAULT_ERROR_MESSAGE,
      cause: "cause" in error ? error.cause : undefined,
    };
  }

  if (error === null || error === undefined) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_ERROR_TITLE,
      message: DEFAULT_ERROR_MESSAGE,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: normalizeOptionalText(formatErrorMessage(error)) ?? DEFAULT_ERROR_MESSAGE,
  };
}

function normalizeOptionalText(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveEntity(error: unknown, cause: unknown): string | undefined {
  if (error instanceof RegistryError && error.entity) {
    return error.entity;
  }
  if (cause instanceof RegistryError && cause.entity) {
    return cause.entity;
  }
  return undefined;
}

function resolveCauseMessage(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }

  const resolved = normalizeOptionalText(formatErrorMessage(cause));
  if (!resolved || resolved === message) {
    return undefined;
  }

  return resolved;
}

function resolveStack(error: unknown, cause: unknown): string | undefined {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }
  if (cause instanceof Error && cause.stack) {
    return cause.stack;
  }
  return undefined;
}
