import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { NotFoundError, ValidationError } from "../core/errors.js";

import {
  documentExists,
  loadDocument,
  parseDocument,
  saveDocument,
  serializeDocument,
} from "./document-store.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

// =============================================================================
// TESTS
// =============================================================================

describe("parseDocument", () => {
  it("keeps dates as plain strings", () => {
    const document = parseDocument("metadata:\n  created_at: 2026-01-02\n", "inline");
    expect(document).toEqual({ metadata: { created_at: "2026-01-02" } });
  });

  it("accepts JSON input", () => {
    expect(parseDocument('{"colors": {"primary": "#112233"}}', "inline")).toEqual({
      colors: { primary: "#112233" },
    });
  });

  it("rejects empty documents and non-mappings", () => {
    expect(() => parseDocument("", "empty.yaml")).toThrow(
      "Malformed document empty.yaml: document is empty",
    );
    expect(() => parseDocument("- a\n- b\n", "list.yaml")).toThrow(
      "Malformed document list.yaml: top level must be a mapping",
    );
  });

  it("rejects invalid YAML", () => {
    expect(() => parseDocument("brand: [unclosed", "bad.yaml")).toThrow(ValidationError);
  });
});

describe("serializeDocument", () => {
  it("writes block style and keeps key order", () => {
    const text = serializeDocument({ metadata: { version: "1.0.0" }, brand: { name: "Acme" } });
    expect(text).toBe("metadata:\n  version: 1.0.0\nbrand:\n  name: Acme\n");
  });

  it("keeps a __proto__ key as an ordinary entry", () => {
    const document = parseDocument("__proto__:\n  polluted: true\nbrand:\n  name: Acme\n", "inline");

    expect(Object.hasOwn(document, "__proto__")).toBe(true);
    expect(Object.getPrototypeOf(document)).toBe(Object.prototype);
    expect(Object.keys(document)).toEqual(["__proto__", "brand"]);
    expect(serializeDocument(document)).toBe("__proto__:\n  polluted: true\nbrand:\n  name: Acme\n");
  });
});

describe("loadDocument / saveDocument", () => {
  it("round-trips a document through disk", async () => {
    const dir = makeTempDir("document-store-");
    const filePath = path.join(dir, "nested", "brand_config.yaml");
    const document = { brand: { name: "Acme" }, colors: { primary: "#112233" }, tags: ["a", "b"] };

    await saveDocument(filePath, document);

    expect(await loadDocument(filePath)).toEqual(document);
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["brand_config.yaml"]);
  });

  it("reports whether a document exists", async () => {
    const dir = makeTempDir("document-store-");
    const filePath = path.join(dir, "brand_config.yaml");

    expect(await documentExists(filePath)).toBe(false);
    await saveDocument(filePath, { brand: { name: "Acme" } });
    expect(await documentExists(filePath)).toBe(true);
  });

  it("raises NotFoundError for a missing file", async () => {
    const dir = makeTempDir("document-store-");
    await expect(loadDocument(path.join(dir, "missing.yaml"))).rejects.toBeInstanceOf(NotFoundError);
  });
});
