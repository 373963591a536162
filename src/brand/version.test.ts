import { describe, expect, it } from "vitest";

import { isMajorImpactChange, nextVersion } from "./version.js";

describe("nextVersion", () => {
  it("bumps the minor component for a colors change", () => {
    expect(nextVersion("1.0.0", ["colors"])).toBe("1.1.0");
  });

  it("keeps patch and major when bumping", () => {
    expect(nextVersion("2.4.7", ["typography", "brand"])).toBe("2.5.7");
  });

  it("leaves the version alone for other sections", () => {
    expect(nextVersion("1.3.0", ["brand", "metadata", "is_protected"])).toBe("1.3.0");
  });

  it("resets malformed versions to 1.1.0 when a bump is due", () => {
    expect(nextVersion("v1", ["assets"])).toBe("1.1.0");
    expect(nextVersion("1.2", ["compliance"])).toBe("1.1.0");
    expect(nextVersion("1.0.0-beta.1", ["colors"])).toBe("1.1.0");
  });

  it("keeps a malformed version when nothing major changed", () => {
    expect(nextVersion("draft", ["brand"])).toBe("draft");
  });

  it("accepts a custom impact set", () => {
    const impact = new Set(["brand"]);
    expect(isMajorImpactChange(["brand"], impact)).toBe(true);
    expect(nextVersion("1.0.0", ["brand"], impact)).toBe("1.1.0");
  });
});
