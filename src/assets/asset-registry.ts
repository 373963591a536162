/*
Purpose: per-brand binary assets (images, fonts, stylesheets) with an advisory JSON index.
Assumptions: the brand exists; every path argument is relative to the brand directory and must stay inside it.
Usage:
  const assets = new AssetRegistry({ brands: registry });
  await assets.upload("acme", base64, "logo.png", "logo");
  await assets.cleanup("acme", { removeUnused: true });
*/

import { createHash } from "node:crypto";
import path from "node:path";

import fse from "fs-extra";

import { referencedAssetPaths } from "../brand/asset-paths.js";
import { backupAssetFile } from "../brand/backup.js";
import type { BrandRegistry } from "../brand/brand-registry.js";
import { NotFoundError, ValidationError, wrapInternalError } from "../core/errors.js";
import { removeEmptyDirectories, walkTree } from "../core/fs-tree.js";
import { logRegistryEvent, type JsonlLogger } from "../core/logger.js";
import { ASSETS_DIR, resolveInside } from "../core/paths.js";
import { compareStrings, toPosixPath, writeFileAtomic } from "../core/utils.js";
import { documentSection, type DocumentMap } from "../store/document.js";

import { removeAssetIndexEntry, upsertAssetIndexEntry } from "./asset-index.js";
import {
  DEFAULT_MAX_ASSET_BYTES,
  MAX_FILENAME_LENGTH,
  assetDirectoryFor,
  fileExtension,
  inferAssetType,
  isAllowedExtension,
  uniqueFilename,
  type InferredAssetType,
} from "./asset-types.js";

// =============================================================================
// TYPES
// =============================================================================

export type UploadResult = {
  brand: string;
  filename: string;
  assetType: string;
  path: string; // posix, relative to the brand directory
  size: number;
  checksum: string;
  uploadedAt: string;
  warnings: string[];
};

export type AssetValidationStatus = "missing" | "valid" | "invalid_type" | "error";

export type AssetValidationReport = {
  path: string;
  status: AssetValidationStatus;
  size?: number;
  checksum?: string;
  modifiedAt?: string;
  extension?: string;
  allowedType?: boolean;
  message: string;
};

export type AssetSummary = {
  filename: string;
  relativePath: string; // posix, relative to assets/
  assetType: InferredAssetType;
  size: number;
  modifiedAt: string;
  extension: string;
};

export type AssetListing = {
  brand: string;
  assets: AssetSummary[];
  totalSize: number;
  typeFilter?: string;
};

export type AssetDeletionResult = {
  brand: string;
  path: string;
  backupPath: string | null;
  bytesDeleted: number;
  warnings: string[];
};

export type CleanupSummary = {
  brand: string;
  filesProcessed: number;
  filesRemoved: number;
  bytesReclaimed: number;
  removedPaths: string[];
  emptyDirectoriesRemoved: number;
  warnings: string[];
};

export type AssetRegistryOptions = {
  brands: BrandRegistry;
  maxBytes?: number;
  logger?: JsonlLogger;
  clock?: () => Date;
};

// Standard alphabet with padding only at the end; length must be a multiple of 4.
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

// =============================================================================
// REGISTRY
// =============================================================================

export class AssetRegistry {
  readonly maxBytes: number;
  private readonly brands: BrandRegistry;
  private readonly logger?: JsonlLogger;
  private readonly clock: () => Date;

  constructor(options: AssetRegistryOptions) {
    this.brands = options.brands;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_ASSET_BYTES;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  async upload(
    brand: string,
    base64: string,
    filename: string,
    assetType: string,
    metadata: DocumentMap = {},
  ): Promise<UploadResult> {
    const brandDir = await this.brands.requireBrandDir(brand);
    const bytes = this.decodePayload(brand, base64);
    this.assertUploadFilename(brand, filename);

    return this.brands.withBrandLock(brand, async () => {
      const targetDir = path.join(brandDir, assetDirectoryFor(assetType));
      let storedName = filename;
      let targetPath = "";

      try {
        await fse.ensureDir(targetDir);
        storedName = await uniqueFilename(targetDir, filename);
        targetPath = path.join(targetDir, storedName);
        await writeFileAtomic(targetPath, bytes);
      } catch (err) {
        throw wrapInternalError(err, `Failed to upload asset '${filename}' to brand '${brand}'`, brand);
      }

      const checksum = createHash("sha256").update(bytes).digest("hex");
      const uploadedAt = this.clock().toISOString();
      const warnings: string[] = [];

      try {
        await upsertAssetIndexEntry(brandDir, storedName, {
          asset_type: assetType,
          file_size: bytes.length,
          checksum,
          uploaded_at: uploadedAt,
          metadata,
        });
      } catch (err) {
        warnings.push(this.indexFailure(brand, storedName, err));
      }

      const relativePath = toPosixPath(path.relative(brandDir, targetPath));
      logRegistryEvent(this.logger, "asset.upload", {
        brand,
        path: relativePath,
        size: bytes.length,
        checksum,
      });

      return {
        brand,
        filename: storedName,
        assetType,
        path: relativePath,
        size: bytes.length,
        checksum,
        uploadedAt,
        warnings,
      };
    });
  }

  async validate(brand: string, assetPath: string): Promise<AssetValidationReport> {
    const brandDir = await this.brands.requireBrandDir(brand);
    const fullPath = resolveInside(brandDir, assetPath, brand);

    if (!(await fse.pathExists(fullPath))) {
      return { path: assetPath, status: "missing", message: "Asset file not found" };
    }

    try {
      const bytes = await fse.readFile(fullPath);
      const stat = await fse.stat(fullPath);
      const extension = fileExtension(fullPath);
      const allowedType = isAllowedExtension(extension);
      return {
        path: assetPath,
        status: allowedType ? "valid" : "invalid_type",
        size: bytes.length,
        checksum: createHash("sha256").update(bytes).digest("hex"),
        modifiedAt: stat.mtime.toISOString(),
        extension,
        allowedType,
        message: allowedType ? "Asset is valid" : `File type not allowed: ${extension || "<none>"}`,
      };
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return { path: assetPath, status: "error", message: `Validation failed: ${detail}` };
    }
  }

  async list(brand: string, typeFilter?: string): Promise<AssetListing> {
    const brandDir = await this.brands.requireBrandDir(brand);
    const inventory = await walkTree(path.join(brandDir, ASSETS_DIR));

    const assets: AssetSummary[] = [];
    let totalSize = 0;
    for (const file of inventory.files) {
      const assetType = inferAssetType(file.relativePath);
      if (typeFilter !== undefined && assetType !== typeFilter) continue;

      totalSize += file.size;
      assets.push({
        filename: path.basename(file.absolutePath),
        relativePath: file.relativePath,
        assetType,
        size: file.size,
        modifiedAt: file.modifiedAt.toISOString(),
        extension: fileExtension(file.absolutePath),
      });
    }

    assets.sort(
      (a, b) => compareStrings(a.filename, b.filename) || compareStrings(a.relativePath, b.relativePath),
    );
    return { brand, assets, totalSize, ...(typeFilter !== undefined ? { typeFilter } : {}) };
  }

  async delete(
    brand: string,
    assetPath: string,
    options: { createBackup?: boolean } = {},
  ): Promise<AssetDeletionResult> {
    const brandDir = await this.brands.requireBrandDir(brand);
    const fullPath = resolveInside(brandDir, assetPath, brand);

    return this.brands.withBrandLock(brand, async () => {
      if (!(await fse.pathExists(fullPath))) {
        throw new NotFoundError(`Asset '${assetPath}' not found in brand '${brand}'`, brand);
      }

      // Only single files are deletable here; whole brands go through BrandRegistry.delete.
      const stat = await fse.stat(fullPath);
      if (fullPath === path.resolve(brandDir) || !stat.isFile()) {
        throw new ValidationError(`Asset path '${assetPath}' is not a file in brand '${brand}'`, brand);
      }

      let backupPath: string | null = null;
      const bytesDeleted = stat.size;
      try {
        if (options.createBackup !== false) {
          backupPath = await backupAssetFile(brandDir, fullPath, this.clock());
        }
        await fse.unlink(fullPath);
      } catch (err) {
        throw wrapInternalError(err, `Failed to delete asset '${assetPath}' from brand '${brand}'`, brand);
      }

      const warnings: string[] = [];
      try {
        await removeAssetIndexEntry(brandDir, fullPath);
      } catch (err) {
        warnings.push(this.indexFailure(brand, path.basename(fullPath), err));
      }

      logRegistryEvent(this.logger, "asset.delete", { brand, path: assetPath, bytes: bytesDeleted });
      return {
        brand,
        path: assetPath,
        backupPath: backupPath === null ? null : toPosixPath(path.relative(brandDir, backupPath)),
        bytesDeleted,
        warnings,
      };
    });
  }

  /**
   * Walk assets/ and, when asked, delete every file the brand document does not reference.
   * References are compared as absolute paths resolved against the brand directory.
   */
  async cleanup(brand: string, options: { removeUnused?: boolean } = {}): Promise<CleanupSummary> {
    const brandDir = await this.brands.requireBrandDir(brand);
    const assetsDir = path.join(brandDir, ASSETS_DIR);

    return this.brands.withBrandLock(brand, async () => {
      const summary: CleanupSummary = {
        brand,
        filesProcessed: 0,
        filesRemoved: 0,
        bytesReclaimed: 0,
        removedPaths: [],
        emptyDirectoriesRemoved: 0,
        warnings: [],
      };
      if (!(await fse.pathExists(assetsDir))) return summary;

      // A brand that cannot be loaded must not lose its assets.
      const referenced = options.removeUnused
        ? referencedAssetPaths(brandDir, documentSection((await this.brands.load(brand)).document, "assets"))
        : new Set<string>();

      try {
        const inventory = await walkTree(assetsDir);
        for (const file of inventory.files) {
          summary.filesProcessed += 1;
          if (!options.removeUnused || referenced.has(path.resolve(file.absolutePath))) continue;

          await fse.remove(file.absolutePath);
          summary.filesRemoved += 1;
          summary.bytesReclaimed += file.size;
          summary.removedPaths.push(file.relativePath);
          const warning = await this.forgetIndexEntry(brand, brandDir, file.absolutePath);
          if (warning) summary.warnings.push(warning);
        }

        summary.emptyDirectoriesRemoved = (await removeEmptyDirectories(assetsDir)).length;
      } catch (err) {
        throw wrapInternalError(err, `Failed to clean up assets for brand '${brand}'`, brand);
      }

      logRegistryEvent(this.logger, "asset.cleanup", {
        brand,
        removed: summary.removedPaths,
        bytes: summary.bytesReclaimed,
      });
      return summary;
    });
  }

  // ---------------------------------------------------------------------------
  // VALIDATION
  // ---------------------------------------------------------------------------

  private decodePayload(brand: string, base64: string): Buffer {
    if (base64.length === 0) {
      throw new ValidationError("Invalid asset data: must be a non-empty base64 string", brand);
    }
    if (base64.length > this.maxBytes * 2) {
      throw new ValidationError(`Base64 data too large: ${base64.length} chars`, brand);
    }
    if (base64.length % 4 !== 0 || !BASE64_PATTERN.test(base64)) {
      throw new ValidationError("Invalid base64 data", brand);
    }

    const bytes = Buffer.from(base64, "base64");
    if (bytes.length > this.maxBytes) {
      throw new ValidationError(`File too large: ${bytes.length} bytes > ${this.maxBytes}`, brand);
    }
    if (bytes.length === 0) {
      throw new ValidationError("File cannot be empty", brand);
    }
    return bytes;
  }

  private assertUploadFilename(brand: string, filename: string): void {
    if (filename.length === 0 || filename.length > MAX_FILENAME_LENGTH) {
      throw new ValidationError(
        `Invalid filename: must be 1-${MAX_FILENAME_LENGTH} characters`,
        brand,
      );
    }
    if (/[\\/]/.test(filename) || filename === "." || filename === "..") {
      throw new ValidationError(`Invalid filename '${filename}': path separators are not allowed`, brand);
    }

    const ext = fileExtension(filename);
    if (!isAllowedExtension(ext)) {
      throw new ValidationError(`File type not allowed: ${ext || "<none>"}`, brand);
    }
  }

  // ---------------------------------------------------------------------------
  // INDEX
  // ---------------------------------------------------------------------------

  private async forgetIndexEntry(
    brand: string,
    brandDir: string,
    filePath: string,
  ): Promise<string | null> {
    try {
      await removeAssetIndexEntry(brandDir, filePath);
      return null;
    } catch (err) {
      return this.indexFailure(brand, path.basename(filePath), err);
    }
  }

  private indexFailure(brand: string, filename: string, err: unknown): string {
    const detail = err instanceof Error ? err.message : String(err);
    const warning = `Failed to update asset index for '${filename}': ${detail}`;
    logRegistryEvent(this.logger, "asset.index.failed", { brand, filename, message: detail });
    return warning;
  }
}
