import { createHash } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { BrandRegistry } from "../brand/brand-registry.js";
import { NotFoundError, ValidationError } from "../core/errors.js";
import { KeyedMutex } from "../core/keyed-mutex.js";
import type { DocumentMap } from "../store/document.js";

import { readAssetIndex } from "./asset-index.js";
import { AssetRegistry } from "./asset-registry.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];
const NOW = new Date("2026-05-06T07:08:09Z");

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

async function makeBrand(config: DocumentMap = {}): Promise<{
  brandDir: string;
  brands: BrandRegistry;
  assets: AssetRegistry;
}> {
  const root = makeTempDir("asset-registry-");
  const brands = new BrandRegistry({
    brandsRoot: root,
    locks: new KeyedMutex(),
    clock: () => NOW,
  });
  const created = await brands.create("acme", {
    config: { brand: { name: "Acme" }, colors: { primary: "#112233" }, ...config },
  });
  return { brandDir: created.path, brands, assets: new AssetRegistry({ brands, clock: () => NOW }) };
}

const encode = (text: string): string => Buffer.from(text, "utf8").toString("base64");

const sha256 = (text: string): string => createHash("sha256").update(text).digest("hex");

// =============================================================================
// TESTS
// =============================================================================

describe("AssetRegistry upload", () => {
  it("stores the file by type and records it in the index", async () => {
    const { brandDir, assets } = await makeBrand();

    const result = await assets.upload("acme", encode("png-bytes"), "logo.png", "logo", {
      source: "design",
    });

    expect(result).toEqual({
      brand: "acme",
      filename: "logo.png",
      assetType: "logo",
      path: "assets/images/logo.png",
      size: 9,
      checksum: sha256("png-bytes"),
      uploadedAt: "2026-05-06T07:08:09.000Z",
      warnings: [],
    });
    expect(fs.readFileSync(path.join(brandDir, "assets", "images", "logo.png"), "utf8")).toBe(
      "png-bytes",
    );
    expect(await readAssetIndex(brandDir)).toEqual({
      "logo.png": {
        asset_type: "logo",
        file_size: 9,
        checksum: sha256("png-bytes"),
        uploaded_at: "2026-05-06T07:08:09.000Z",
        metadata: { source: "design" },
      },
    });
  });

  it("suffixes duplicate filenames", async () => {
    const { assets } = await makeBrand();

    await assets.upload("acme", encode("first"), "logo.png", "logo");
    const second = await assets.upload("acme", encode("second"), "logo.png", "logo");

    expect(second.filename).toBe("logo_1.png");
    expect(second.path).toBe("assets/images/logo_1.png");
  });

  it("places fonts, stylesheets and unknown types", async () => {
    const { assets } = await makeBrand();

    expect((await assets.upload("acme", encode("f"), "body.woff2", "font")).path).toBe(
      "assets/fonts/body.woff2",
    );
    expect((await assets.upload("acme", encode("c"), "brand.css", "css")).path).toBe(
      "assets/brand.css",
    );
    expect((await assets.upload("acme", encode("h"), "cover.html", "snippet")).path).toBe(
      "assets/misc/cover.html",
    );
  });

  it("rejects payloads above the size ceiling", async () => {
    const { brandDir, assets } = await makeBrand();
    const payload = Buffer.alloc(15 * 1024 * 1024, 1).toString("base64");

    await expect(assets.upload("acme", payload, "big.png", "image")).rejects.toThrow(
      "File too large: 15728640 bytes > 10485760",
    );
    expect(fs.readdirSync(path.join(brandDir, "assets", "images"))).toEqual([]);
  });

  it("rejects disallowed extensions and bad payloads", async () => {
    const { assets } = await makeBrand();

    await expect(assets.upload("acme", encode("x"), "tool.exe", "misc")).rejects.toThrow(
      "File type not allowed: .exe",
    );
    await expect(assets.upload("acme", "abc", "logo.png", "logo")).rejects.toThrow(
      "Invalid base64 data",
    );
    await expect(assets.upload("acme", "", "logo.png", "logo")).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(assets.upload("acme", encode("x"), "../logo.png", "logo")).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it("raises NotFoundError for a missing brand", async () => {
    const { assets } = await makeBrand();
    await expect(assets.upload("ghost", encode("x"), "logo.png", "logo")).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});

describe("AssetRegistry list and validate", () => {
  it("lists assets sorted by filename with a type filter", async () => {
    const { assets } = await makeBrand();
    await assets.upload("acme", encode("png"), "logo.png", "logo");
    await assets.upload("acme", encode("css!"), "brand.css", "css");

    const all = await assets.list("acme");
    const images = await assets.list("acme", "image");

    expect(all.assets.map((asset) => [asset.filename, asset.relativePath, asset.assetType])).toEqual([
      ["brand.css", "brand.css", "css"],
      ["logo.png", "images/logo.png", "image"],
    ]);
    expect(all.totalSize).toBe(7);
    expect(images.assets.map((asset) => asset.filename)).toEqual(["logo.png"]);
    expect(images.typeFilter).toBe("image");
  });

  it("reports valid, missing and disallowed files", async () => {
    const { brandDir, assets } = await makeBrand();
    await assets.upload("acme", encode("png"), "logo.png", "logo");
    fs.writeFileSync(path.join(brandDir, "assets", "notes.txt"), "note");

    const valid = await assets.validate("acme", "assets/images/logo.png");
    const missing = await assets.validate("acme", "assets/images/gone.png");
    const invalid = await assets.validate("acme", "assets/notes.txt");

    expect(valid).toMatchObject({ status: "valid", size: 3, checksum: sha256("png"), extension: ".png" });
    expect(missing).toEqual({
      path: "assets/images/gone.png",
      status: "missing",
      message: "Asset file not found",
    });
    expect(invalid).toMatchObject({ status: "invalid_type", message: "File type not allowed: .txt" });
  });
});

describe("AssetRegistry delete", () => {
  it("backs the file up and drops its index entry", async () => {
    const { brandDir, assets } = await makeBrand();
    await assets.upload("acme", encode("png-bytes"), "logo.png", "logo");

    const result = await assets.delete("acme", "assets/images/logo.png");

    expect(result).toEqual({
      brand: "acme",
      path: "assets/images/logo.png",
      backupPath: "backups/logo_20260506_070809.png",
      bytesDeleted: 9,
      warnings: [],
    });
    expect(fs.existsSync(path.join(brandDir, "assets", "images", "logo.png"))).toBe(false);
    expect(fs.readFileSync(path.join(brandDir, "backups", "logo_20260506_070809.png"), "utf8")).toBe(
      "png-bytes",
    );
    expect(await readAssetIndex(brandDir)).toEqual({});
  });

  it("rejects missing files and paths outside the brand", async () => {
    const { assets } = await makeBrand();

    await expect(assets.delete("acme", "assets/images/gone.png")).rejects.toBeInstanceOf(NotFoundError);
    await expect(assets.delete("acme", "../other/brand_config.yaml")).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it("refuses directories, including the brand directory, even when locked", async () => {
    const { brandDir, brands, assets } = await makeBrand();
    await assets.upload("acme", encode("png-bytes"), "logo.png", "logo");
    await brands.lock("acme", "strict", { by: "ops", reason: "launch" });

    await expect(assets.delete("acme", ".", { createBackup: false })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(assets.delete("acme", "assets")).rejects.toBeInstanceOf(ValidationError);

    expect(fs.existsSync(path.join(brandDir, "brand_config.yaml"))).toBe(true);
    expect(fs.readFileSync(path.join(brandDir, "assets", "images", "logo.png"), "utf8")).toBe("png-bytes");
  });
});

describe("AssetRegistry cleanup", () => {
  it("removes only files the brand document does not reference", async () => {
    const { brandDir, assets } = await makeBrand({
      assets: { logo: "assets/a.png", font: "assets/b.woff" },
    });
    fs.writeFileSync(path.join(brandDir, "assets", "a.png"), "aa");
    fs.writeFileSync(path.join(brandDir, "assets", "b.woff"), "bbb");
    fs.writeFileSync(path.join(brandDir, "assets", "orphan.css"), "orphan");

    const summary = await assets.cleanup("acme", { removeUnused: true });

    expect(summary).toEqual({
      brand: "acme",
      filesProcessed: 3,
      filesRemoved: 1,
      bytesReclaimed: 6,
      removedPaths: ["orphan.css"],
      emptyDirectoriesRemoved: 2,
      warnings: [],
    });
    expect(fs.readdirSync(path.join(brandDir, "assets")).sort()).toEqual(["a.png", "b.woff"]);
  });

  it("keeps every entry of a list-valued reference", async () => {
    const { brandDir, assets } = await makeBrand({
      assets: {
        logo: "assets/images/a.png",
        fonts: ["assets/fonts/b.woff", "assets/fonts/c.ttf"],
      },
    });
    fs.writeFileSync(path.join(brandDir, "assets", "images", "a.png"), "aa");
    fs.writeFileSync(path.join(brandDir, "assets", "fonts", "b.woff"), "bbb");
    fs.writeFileSync(path.join(brandDir, "assets", "fonts", "c.ttf"), "cccc");
    fs.writeFileSync(path.join(brandDir, "assets", "orphan.css"), "orphan");

    const summary = await assets.cleanup("acme", { removeUnused: true });

    expect(summary.filesProcessed).toBe(4);
    expect(summary.removedPaths).toEqual(["orphan.css"]);
    expect(summary.bytesReclaimed).toBe(6);
    expect(fs.readdirSync(path.join(brandDir, "assets", "fonts")).sort()).toEqual(["b.woff", "c.ttf"]);
    expect(fs.existsSync(path.join(brandDir, "assets", "images", "a.png"))).toBe(true);
    expect(fs.existsSync(path.join(brandDir, "assets", "orphan.css"))).toBe(false);
  });

  it("only counts files without removeUnused", async () => {
    const { brandDir, assets } = await makeBrand();
    fs.writeFileSync(path.join(brandDir, "assets", "orphan.css"), "orphan");

    const summary = await assets.cleanup("acme");

    expect(summary.filesProcessed).toBe(1);
    expect(summary.filesRemoved).toBe(0);
    expect(fs.existsSync(path.join(brandDir, "assets", "orphan.css"))).toBe(true);
  });
});
