import { describe, expect, it } from "vitest";

import { ValidationError } from "../core/errors.js";

import { assertSafePathSegment, assertValidEntityName, displayNameFromId } from "./name.js";

describe("assertValidEntityName", () => {
  it("accepts letters, digits, underscores and dashes", () => {
    expect(() => assertValidEntityName("acme_widgets-2")).not.toThrow();
  });

  it("rejects names that start with a digit, dot or underscore", () => {
    expect(() => assertValidEntityName("1acme")).toThrow(
      "Brand name '1acme' must not start with a digit, '.' or '_'",
    );
    expect(() => assertValidEntityName("_acme", "template")).toThrow(
      "Template name '_acme' must not start with a digit, '.' or '_'",
    );
  });

  it("rejects path characters and overlong names", () => {
    expect(() => assertValidEntityName("a/b")).toThrow(ValidationError);
    expect(() => assertValidEntityName("a".repeat(51))).toThrow("is longer than 50 characters");
    expect(() => assertValidEntityName("")).toThrow("Brand name must not be empty");
  });
});

describe("assertSafePathSegment", () => {
  it("rejects traversal segments", () => {
    expect(() => assertSafePathSegment("..")).toThrow("Invalid brand name '..'");
    expect(() => assertSafePathSegment("../etc")).toThrow(ValidationError);
    expect(() => assertSafePathSegment("legacy.brand")).not.toThrow();
  });
});

describe("displayNameFromId", () => {
  it("title-cases underscore separated ids", () => {
    expect(displayNameFromId("acme_widgets")).toBe("Acme Widgets");
    expect(displayNameFromId("ACME-co")).toBe("Acme-Co");
  });
});
