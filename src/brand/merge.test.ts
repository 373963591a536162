import { describe, expect, it } from "vitest";

import { setEntry, type DocumentMap } from "../store/document.js";

import { mergeDocuments } from "./merge.js";

describe("mergeDocuments", () => {
  it("merges nested mappings key by key", () => {
    const base = { colors: { primary: "#112233", secondary: "#445566" }, brand: { name: "Acme" } };
    const overlay = { colors: { primary: "#000000" } };

    expect(mergeDocuments(base, overlay)).toEqual({
      colors: { primary: "#000000", secondary: "#445566" },
      brand: { name: "Acme" },
    });
  });

  it("replaces lists and scalars whole", () => {
    const base = { assets: { fonts: ["a.woff", "b.woff"] }, layout: { margin: "1in" } };
    const overlay = { assets: { fonts: ["c.woff"] }, layout: "none" };

    expect(mergeDocuments(base, overlay)).toEqual({ assets: { fonts: ["c.woff"] }, layout: "none" });
  });

  it("lets null in the overlay replace a mapping", () => {
    expect(mergeDocuments({ metadata: { version: "1.0.0" } }, { metadata: null })).toEqual({
      metadata: null,
    });
  });

  it("is idempotent and treats an empty overlay as identity", () => {
    const document = { brand: { name: "Acme" }, colors: { primary: "#112233" }, tags: ["a"] };

    expect(mergeDocuments(document, {})).toEqual(document);
    expect(mergeDocuments(document, document)).toEqual(document);
  });

  it("does not mutate either input", () => {
    const base = { colors: { primary: "#112233" } };
    const overlay = { colors: { accent: "#ff0000" }, tags: ["a"] };

    const merged = mergeDocuments(base, overlay);
    expect(merged.tags).not.toBe(overlay.tags);

    expect(base).toEqual({ colors: { primary: "#112233" } });
    expect(overlay).toEqual({ colors: { accent: "#ff0000" }, tags: ["a"] });
  });

  it("carries a __proto__ key over as an own entry", () => {
    const overlay: DocumentMap = {};
    setEntry(overlay, "__proto__", { polluted: true });

    const merged = mergeDocuments({ brand: { name: "Acme" } }, overlay);

    expect(Object.keys(merged)).toEqual(["brand", "__proto__"]);
    expect(Object.getPrototypeOf(merged)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(merged, "__proto__")?.value).toEqual({ polluted: true });
  });
});
