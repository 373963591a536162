import { describe, expect, it } from "vitest";

import {
  createAnsiFormatter,
  formatErrorLines,
  formatErrorMessage,
  renderErrorLines,
  resolveColorEnabled,
} from "./error-format.js";
import { NotFoundError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Registry config invalid.",
      message: "brands_root: Expected string",
      hint: "Fix the listed keys",
      next: "Edit brand-registry.yaml",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[0]?.text).toBe("Registry config invalid.");
    expect(lines[1]?.text).toBe("brands_root: Expected string");
  });

  it("includes code, entity and stack in debug mode", () => {
    const cause = new NotFoundError("Brand 'acme' not found", "acme");
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.notFound,
      title: "Not found.",
      message: "Brand 'acme' not found",
      cause,
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.find((line) => line.kind === "code")?.text).toBe("NOT_FOUND");
    expect(lines.find((line) => line.kind === "name")?.text).toBe("UserFacingError");
    expect(lines.find((line) => line.kind === "entity")?.text).toBe("acme");
    // The cause repeats the message, so it is not printed twice.
    expect(lines.some((line) => line.kind === "cause")).toBe(false);
    expect(lines.find((line) => line.kind === "stack")?.text).toContain("UserFacingError");
  });

  it("prints a distinct cause message", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.internal,
      title: "Registry operation failed.",
      message: "Failed to update brand 'acme'",
      cause: new Error("EACCES"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.find((line) => line.kind === "cause")?.text).toBe("EACCES");
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines[0]?.text).toBe("Unexpected error");
    expect(lines[1]?.text).toBe("boom");
  });
});

describe("renderErrorLines", () => {
  it("prefixes hint lines without color", () => {
    const text = renderErrorLines(
      [
        { kind: "title", text: "Not found." },
        { kind: "hint", text: "List brands first." },
      ],
      createAnsiFormatter(false),
    );

    expect(text).toBe("Not found.\nHint: List brands first.");
  });
});

describe("formatErrorMessage", () => {
  it("falls back to the error name for blank messages", () => {
    expect(formatErrorMessage(new TypeError(""))).toBe("TypeError");
    expect(formatErrorMessage(42)).toBe("42");
  });
});

describe("resolveColorEnabled", () => {
  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false } })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true } })).toBe(true);
  });

  it("respects explicit useColor flags", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: false }, useColor: true })).toBe(false);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    const format = createAnsiFormatter(false);
    expect(format("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    const format = createAnsiFormatter(true);
    expect(format("alert", ["red"])).toBe("\x1b[31malert\x1b[0m");
  });
});
