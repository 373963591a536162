import {
  createAnsiFormatter,
  formatErrorLines,
  formatErrorMessage,
  renderErrorLines,
  resolveColorEnabled,
} from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { toUserFacingError } from "./error-mapping.js";

export type OutputOptions = {
  json: boolean;
  debug: boolean;
};

// =============================================================================
// RESULTS
// =============================================================================

export function emitResult<T>(value: T, output: OutputOptions, printText: (value: T) => void): void {
  if (output.json) {
    console.log(JSON.stringify({ ok: true, result: value }, null, 2));
    return;
  }
  printText(value);
}

export function printWarnings(warnings: string[]): void {
  for (const warning of warnings) {
    console.log(`Warning: ${warning}`);
  }
}

export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );
  const formatRow = (row: string[]): string =>
    row
      .map((cell, index) => cell.padEnd(widths[index] ?? 0))
      .join("  ")
      .trimEnd();

  console.log(formatRow(headers));
  for (const row of rows) {
    console.log(formatRow(row));
  }
}

// =============================================================================
// ERRORS
// =============================================================================

export function reportCommandError(error: unknown, output: OutputOptions): void {
  const mapped = toUserFacingError(error);
  process.exitCode = 1;

  if (output.json) {
    const payload =
      mapped instanceof UserFacingError
        ? { code: mapped.code, title: mapped.title, message: mapped.message, hint: mapped.hint ?? null }
        : {
            code: USER_FACING_ERROR_CODES.unknown,
            title: "Unexpected error",
            message: formatErrorMessage(mapped),
            hint: null,
          };
    console.log(JSON.stringify({ ok: false, error: payload }, null, 2));
    return;
  }

  const lines = formatErrorLines(mapped, { mode: output.debug ? "debug" : "short" });
  const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));
  console.error(renderErrorLines(lines, format));
}
